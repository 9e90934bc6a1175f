/**
 * Search types for the LinkWeave hybrid ranker.
 */

import type { NoteId } from "./note";

/** A ranked search hit. */
export interface SearchResult {
  noteId: NoteId;
  title: string;
  snippet: string;
  /** Relevance score, higher is better. In [0, 1] for hybrid results. */
  rank: number;
}

/** Which channel(s) a search request uses. */
export type SearchType = "fulltext" | "semantic" | "hybrid";

/** All valid search types, useful for validation. */
export const SEARCH_TYPES: SearchType[] = ["fulltext", "semantic", "hybrid"];

/**
 * Outcome of checking candidate content against existing notes. The
 * nearest note is named only when it counts as a duplicate; `similarity`
 * is its score either way, or 0 when nothing could be compared.
 */
export interface DuplicateCheckResult {
  isDuplicate: boolean;
  similarNoteId: NoteId | null;
  similarNoteTitle: string | null;
  similarity: number;
}

/** Score weighting for hybrid search. */
export interface SearchWeights {
  /** Weight applied to normalised full-text ranks. */
  fullTextWeight: number;
  /** Weight applied to raw semantic similarity. */
  semanticWeight: number;
  /** Inclusive similarity floor for semantic results. */
  minimumSimilarity: number;
  /** Fused scores below this are dropped. */
  minimumHybridScore: number;
}
