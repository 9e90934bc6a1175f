/**
 * Persistence contract consumed by the engine.
 *
 * The engine never talks to a concrete backend directly. A store lists and
 * fetches notes, answers nearest-neighbour and full-text queries, and
 * records mutations. Vector search is an optional capability: a store that
 * cannot answer it says so through a tagged outcome instead of throwing.
 */

import type {
  EmbeddingVector,
  Note,
  NoteId,
  NoteStatus,
  NoteSummary,
  NoteVersion,
  SeedUsageMarker,
} from "./note";

// ---------------------------------------------------------------------------
// Similarity outcome
// ---------------------------------------------------------------------------

/**
 * Result of a similarity query.
 *
 * - `ok`          — the query ran
 * - `unsupported` — the active backend has no vector search
 * - `error`       — the query failed for any other reason
 */
export type SimilarityOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "unsupported"; message: string }
  | { ok: false; reason: "error"; error: unknown };

export function similarityOk<T>(value: T): SimilarityOutcome<T> {
  return { ok: true, value };
}

export function similarityUnsupported<T>(message: string): SimilarityOutcome<T> {
  return { ok: false, reason: "unsupported", message };
}

export function similarityError<T>(error: unknown): SimilarityOutcome<T> {
  return { ok: false, reason: "error", error };
}

// ---------------------------------------------------------------------------
// Query shapes
// ---------------------------------------------------------------------------

/** Filter for listing notes. */
export interface ListNotesFilter {
  /** Only notes with this status; all notes when omitted. */
  status?: NoteStatus;
}

/** A nearest-neighbour query around a vector. */
export interface NeighborQuery {
  vector: EmbeddingVector;
  limit: number;
  /** Inclusive similarity floor. */
  minSimilarity: number;
  excludeIds?: NoteId[];
  status?: NoteStatus;
}

/** A neighbour returned by a nearest-neighbour query. */
export interface Neighbor {
  id: NoteId;
  title: string;
  similarity: number;
}

/** Per-note top-k query over every embedded note. */
export interface SemanticPairsQuery {
  /** Neighbours considered per note. */
  perNoteLimit: number;
  /** Pairs must score strictly above this. */
  minSimilarity: number;
  status?: NoteStatus;
}

/** One directed nearest-neighbour pair. */
export interface SemanticPair {
  sourceId: NoteId;
  targetId: NoteId;
  similarity: number;
}

/** A full-text hit with its raw backend rank. */
export interface FullTextHit {
  id: NoteId;
  title: string;
  snippet: string;
  rank: number;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface NoteStore {
  /** List notes without their embedding vectors. */
  listNotes(filter?: ListNotesFilter, signal?: AbortSignal): Promise<NoteSummary[]>;
  /** Fetch one note, or null when the ID does not resolve. */
  getNote(id: NoteId, signal?: AbortSignal): Promise<Note | null>;
  nearestNeighbors(
    query: NeighborQuery,
    signal?: AbortSignal,
  ): Promise<SimilarityOutcome<Neighbor[]>>;
  semanticPairs(
    query: SemanticPairsQuery,
    signal?: AbortSignal,
  ): Promise<SimilarityOutcome<SemanticPair[]>>;
  /** Ranked full-text hits, best first. */
  fullTextSearch(query: string, limit: number, signal?: AbortSignal): Promise<FullTextHit[]>;
  appendVersion(version: NoteVersion, signal?: AbortSignal): Promise<void>;
  updateNote(note: Note, signal?: AbortSignal): Promise<void>;
  listSeedUsage(signal?: AbortSignal): Promise<SeedUsageMarker[]>;
}
