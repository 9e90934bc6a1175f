/**
 * Search module — full-text, semantic and hybrid retrieval over notes.
 *
 * Hybrid search runs the two channels one after the other, min-max
 * normalises the full-text ranks, weights both channels and fuses them by
 * note ID. Semantic retrieval is optional: when the store has no vector
 * search, or embedding the query fails, hybrid search falls back to the
 * full-text results.
 */

import {
  hasCompletedEmbedding,
  type DuplicateCheckResult,
  similarityOk,
  type EmbeddingVector,
  type Neighbor,
  type NoteId,
  type NoteStore,
  type SearchResult,
  type SearchWeights,
  type SimilarityOutcome,
} from "@/types";
import {
  DUPLICATE_THRESHOLD,
  FULL_TEXT_LIMIT,
  FULL_TEXT_WEIGHT,
  MINIMUM_HYBRID_SCORE,
  MINIMUM_SIMILARITY,
  SEMANTIC_LIMIT,
  SEMANTIC_WEIGHT,
} from "./config";
import type { EmbeddingProvider } from "./embeddings";
import { guardSimilarity, warnSkipped } from "./outcome";
import { meanVector } from "./similarity";

/** Characters of content shown for a semantic hit. */
const PREVIEW_LENGTH = 200;

export interface SearchOptions extends Partial<SearchWeights> {
  /** Maximum full-text hits (default: config). */
  fullTextLimit?: number;
  /** Maximum semantic hits (default: config). */
  semanticLimit?: number;
  signal?: AbortSignal;
}

/** Configured weights with per-call overrides applied. */
export function resolveWeights(options: Partial<SearchWeights> = {}): SearchWeights {
  return {
    fullTextWeight: options.fullTextWeight ?? FULL_TEXT_WEIGHT,
    semanticWeight: options.semanticWeight ?? SEMANTIC_WEIGHT,
    minimumSimilarity: options.minimumSimilarity ?? MINIMUM_SIMILARITY,
    minimumHybridScore: options.minimumHybridScore ?? MINIMUM_HYBRID_SCORE,
  };
}

function isBlank(query: string): boolean {
  return query.trim().length === 0;
}

/** Leading slice of `content`, with an ellipsis when cut. */
export function previewSnippet(content: string): string {
  return content.length > PREVIEW_LENGTH
    ? `${content.slice(0, PREVIEW_LENGTH)}...`
    : content;
}

// ---------------------------------------------------------------------------
// Channels
// ---------------------------------------------------------------------------

/** Keyword search ranked by the store. Failures propagate. */
export async function fullTextSearch(
  store: NoteStore,
  query: string,
  options: Pick<SearchOptions, "fullTextLimit" | "signal"> = {},
): Promise<SearchResult[]> {
  if (isBlank(query)) return [];
  const hits = await store.fullTextSearch(
    query,
    options.fullTextLimit ?? FULL_TEXT_LIMIT,
    options.signal,
  );
  return hits.map((h) => ({ noteId: h.id, title: h.title, snippet: h.snippet, rank: h.rank }));
}

/** Attach content previews to neighbours; rank is the raw similarity. */
async function withPreviews(
  store: NoteStore,
  neighbors: Neighbor[],
  signal?: AbortSignal,
): Promise<SearchResult[]> {
  if (neighbors.length === 0) return [];
  const notes = await store.listNotes({}, signal);
  const content = new Map(notes.map((n) => [n.id, n.content]));
  return neighbors.map((n) => ({
    noteId: n.id,
    title: n.title,
    snippet: previewSnippet(content.get(n.id) ?? ""),
    rank: n.similarity,
  }));
}

/** Nearest notes to `vector`, as search results. */
async function searchNear(
  store: NoteStore,
  vector: EmbeddingVector,
  query: { limit: number; minSimilarity: number; excludeIds?: NoteId[] },
  signal?: AbortSignal,
): Promise<SimilarityOutcome<SearchResult[]>> {
  const outcome = await store.nearestNeighbors({ vector, ...query }, signal);
  if (!outcome.ok) return outcome;
  return similarityOk(await withPreviews(store, outcome.value, signal));
}

/**
 * Embed the query and look up its nearest notes. Every failure except
 * cancellation comes back as an outcome.
 */
async function trySemanticSearch(
  store: NoteStore,
  provider: EmbeddingProvider,
  query: string,
  options: SearchOptions,
): Promise<SimilarityOutcome<SearchResult[]>> {
  const { signal } = options;
  return guardSimilarity(async () => {
    const vector = await provider.embed(query, signal);
    return searchNear(
      store,
      vector,
      {
        limit: options.semanticLimit ?? SEMANTIC_LIMIT,
        minSimilarity: resolveWeights(options).minimumSimilarity,
      },
      signal,
    );
  }, signal);
}

/**
 * Notes whose embedding is closest to the query, best first. Returns an
 * empty list when semantic search is unavailable.
 */
export async function semanticSearch(
  store: NoteStore,
  provider: EmbeddingProvider,
  query: string,
  options: SearchOptions = {},
): Promise<SearchResult[]> {
  if (isBlank(query)) return [];
  const outcome = await trySemanticSearch(store, provider, query, options);
  if (!outcome.ok) {
    warnSkipped("semantic_search_skipped", outcome);
    return [];
  }
  return outcome.value;
}

// ---------------------------------------------------------------------------
// Fusion
// ---------------------------------------------------------------------------

/**
 * Min-max normalise ranks into [0, 1]. When every rank is equal, each
 * result normalises to 1.
 */
export function normalizeRanks(results: SearchResult[]): SearchResult[] {
  if (results.length === 0) return [];
  const ranks = results.map((r) => r.rank);
  const min = Math.min(...ranks);
  const range = Math.max(...ranks) - min;
  return results.map((r) => ({
    ...r,
    rank: range === 0 ? 1 : (r.rank - min) / range,
  }));
}

/**
 * Fuse normalised full-text results with raw semantic results.
 *
 * Scores below `minimumHybridScore` are dropped before rescaling by the
 * best fused score, so the filter applies to the weighted sum itself. The
 * title and snippet of the first channel that returned a note are kept.
 */
export function fuseResults(
  fullText: SearchResult[],
  semantic: SearchResult[],
  weights: SearchWeights,
): SearchResult[] {
  const merged = new Map<NoteId, { result: SearchResult; score: number }>();

  for (const r of normalizeRanks(fullText)) {
    merged.set(r.noteId, { result: r, score: weights.fullTextWeight * r.rank });
  }
  for (const r of semantic) {
    const existing = merged.get(r.noteId);
    const contribution = weights.semanticWeight * r.rank;
    if (existing) existing.score += contribution;
    else merged.set(r.noteId, { result: r, score: contribution });
  }

  const entries = [...merged.values()];
  if (entries.length === 0) return [];
  const maxScore = Math.max(...entries.map((e) => e.score));

  return entries
    .filter((e) => e.score >= weights.minimumHybridScore)
    .map((e) => ({
      ...e.result,
      rank: maxScore > 0 ? Math.min(e.score / maxScore, 1) : 0,
    }))
    .sort((a, b) => b.rank - a.rank);
}

/**
 * Weighted fusion of full-text and semantic results.
 *
 * A full-text failure propagates. A semantic failure is logged and the
 * full-text results are returned as they came from the store.
 */
export async function hybridSearch(
  store: NoteStore,
  provider: EmbeddingProvider,
  query: string,
  options: SearchOptions = {},
): Promise<SearchResult[]> {
  if (isBlank(query)) return [];

  const fullText = await fullTextSearch(store, query, options);
  const semantic = await trySemanticSearch(store, provider, query, options);
  options.signal?.throwIfAborted();

  if (!semantic.ok) {
    warnSkipped("semantic_search_skipped", semantic, { fallback: "fulltext" });
    return fullText;
  }
  return fuseResults(fullText, semantic.value, resolveWeights(options));
}

// ---------------------------------------------------------------------------
// Related notes and discovery
// ---------------------------------------------------------------------------

/**
 * Notes closest to `noteId`'s own embedding. Empty when the note is
 * missing, unembedded, or vector search is unavailable.
 */
export async function findRelated(
  store: NoteStore,
  noteId: NoteId,
  options: { limit?: number; minimumSimilarity?: number; signal?: AbortSignal } = {},
): Promise<SearchResult[]> {
  const { signal } = options;
  const outcome = await guardSimilarity(async () => {
    const note = await store.getNote(noteId, signal);
    if (!note || !hasCompletedEmbedding(note)) return similarityOk<SearchResult[]>([]);
    return searchNear(
      store,
      note.embeddingVector,
      {
        limit: options.limit ?? 5,
        minSimilarity: options.minimumSimilarity ?? MINIMUM_SIMILARITY,
        excludeIds: [noteId],
      },
      signal,
    );
  }, signal);

  if (!outcome.ok) {
    warnSkipped("related_search_skipped", outcome, { noteId });
    return [];
  }
  return outcome.value;
}

/**
 * Notes close to the centroid of the `recentCount` most recently updated
 * embedded notes, excluding those notes themselves.
 */
export async function discover(
  store: NoteStore,
  options: {
    recentCount?: number;
    limit?: number;
    minimumSimilarity?: number;
    signal?: AbortSignal;
  } = {},
): Promise<SearchResult[]> {
  const { signal } = options;
  const recentCount = options.recentCount ?? 3;

  const outcome = await guardSimilarity(async () => {
    const recent = (await store.listNotes({}, signal))
      .filter((n) => n.embedStatus === "Completed")
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt))
      .slice(0, Math.max(0, recentCount));

    const vectors: EmbeddingVector[] = [];
    for (const summary of recent) {
      const note = await store.getNote(summary.id, signal);
      if (note && hasCompletedEmbedding(note)) vectors.push(note.embeddingVector);
    }
    if (vectors.length === 0) return similarityOk<SearchResult[]>([]);

    return searchNear(
      store,
      meanVector(vectors),
      {
        limit: options.limit ?? 5,
        minSimilarity: options.minimumSimilarity ?? MINIMUM_SIMILARITY,
        excludeIds: recent.map((n) => n.id),
      },
      signal,
    );
  }, signal);

  if (!outcome.ok) {
    warnSkipped("discover_skipped", outcome);
    return [];
  }
  return outcome.value;
}

// ---------------------------------------------------------------------------
// Duplicate check
// ---------------------------------------------------------------------------

function notDuplicate(similarity = 0): DuplicateCheckResult {
  return { isDuplicate: false, similarNoteId: null, similarNoteTitle: null, similarity };
}

/**
 * Embed `content` and compare it with the nearest embedded note. It is a
 * duplicate when that note scores strictly above `threshold`.
 *
 * Blank content, an unavailable vector search and any failure other than
 * cancellation all answer "not a duplicate" with similarity 0.
 */
export async function checkDuplicate(
  store: NoteStore,
  provider: EmbeddingProvider,
  content: string,
  options: { threshold?: number; signal?: AbortSignal } = {},
): Promise<DuplicateCheckResult> {
  if (isBlank(content)) return notDuplicate();
  const { signal } = options;
  const threshold = options.threshold ?? DUPLICATE_THRESHOLD;

  const outcome = await guardSimilarity(async () => {
    const vector = await provider.embed(content, signal);
    return store.nearestNeighbors({ vector, limit: 1, minSimilarity: -1 }, signal);
  }, signal);

  if (!outcome.ok) {
    warnSkipped("duplicate_check_skipped", outcome);
    return notDuplicate();
  }

  const nearest = outcome.value[0];
  if (!nearest) return notDuplicate();
  if (nearest.similarity <= threshold) return notDuplicate(nearest.similarity);
  return {
    isDuplicate: true,
    similarNoteId: nearest.id,
    similarNoteTitle: nearest.title,
    similarity: nearest.similarity,
  };
}
