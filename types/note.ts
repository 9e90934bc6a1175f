/**
 * Core note types for the LinkWeave graph engine.
 *
 * Notes are owned by the persistence layer. The engine reads them and, when
 * inserting a discovered link, appends to `content` and marks the embedding
 * stale.
 */

/** Opaque, time-ordered note identifier. */
export type NoteId = string;

/** Dense embedding of a note's content. */
export type EmbeddingVector = number[];

/**
 * Lifecycle status of a note.
 *
 * - `Permanent` — a curated note that takes part in health reporting
 * - `Fleeting`  — a captured note awaiting triage
 */
export type NoteStatus = "Permanent" | "Fleeting";

/** State of a note's embedding in the outbox pipeline. */
export type EmbedStatus =
  | "Pending"
  | "Processing"
  | "Completed"
  | "Failed"
  | "Stale";

/** All embed statuses in pipeline order. */
export const EMBED_STATUSES: EmbedStatus[] = [
  "Pending",
  "Processing",
  "Completed",
  "Failed",
  "Stale",
];

/** A note as loaded for graph work: everything except the embedding vector. */
export interface NoteSummary {
  id: NoteId;
  title: string;
  /** Markdown body, possibly containing `[[Title]]` references. */
  content: string;
  status: NoteStatus;
  embedStatus: EmbedStatus;
  /** ISO-8601 timestamp of when the note was created. */
  createdAt: string;
  /** ISO-8601 timestamp of the last update. */
  updatedAt: string;
}

/** A fully loaded note. */
export interface Note extends NoteSummary {
  /** Present only when `embedStatus` is `Completed`. */
  embeddingVector?: EmbeddingVector;
  /** Last embedding failure message, if any. */
  embedError?: string;
}

/** Snapshot of a note's title and content taken before it is mutated. */
export interface NoteVersion {
  noteId: NoteId;
  title: string;
  content: string;
  /** ISO-8601 timestamp of when the snapshot was taken. */
  savedAt: string;
}

/** Marks a note that was consumed as a generation seed elsewhere. */
export interface SeedUsageMarker {
  noteId: NoteId;
  /** ISO-8601 timestamp of when the note was used. */
  usedAt: string;
}

/** True when the note carries a usable embedding. */
export function hasCompletedEmbedding(note: Note): note is Note & { embeddingVector: EmbeddingVector } {
  return (
    note.embedStatus === "Completed" &&
    Array.isArray(note.embeddingVector) &&
    note.embeddingVector.length > 0
  );
}
