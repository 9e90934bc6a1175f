/**
 * Vault index file shapes.
 *
 * The GitHub-backed store keeps every note and its history in JSON index
 * files committed to the vault repository.
 */

import type { EmbeddingVector, Note, NoteId, NoteVersion, SeedUsageMarker } from "./note";

/** A note as stored in the notes index; vectors live in the embeddings index. */
export type NoteRecord = Omit<Note, "embeddingVector">;

/** The notes index stored in the vault at /index/notes.json. */
export interface NotesIndex {
  notes: Record<NoteId, NoteRecord>;
}

/** A completed embedding as stored in the embeddings index. */
export interface NoteEmbedding {
  noteId: NoteId;
  vector: EmbeddingVector;
  /** Model that produced the vector, e.g. "text-embedding-3-large". */
  model: string;
  createdAt: string;
}

/** Vectors keyed by note ID, stored at /index/embeddings.json. */
export interface EmbeddingsIndex {
  embeddings: Record<NoteId, NoteEmbedding>;
}

/** Append-only version history stored at /index/versions.json. */
export interface VersionsIndex {
  versions: NoteVersion[];
}

/** Seed usage markers stored at /index/seed-usage.json. */
export interface SeedUsageIndex {
  markers: SeedUsageMarker[];
}

export function emptyNotesIndex(): NotesIndex {
  return { notes: {} };
}

export function emptyEmbeddingsIndex(): EmbeddingsIndex {
  return { embeddings: {} };
}

export function emptyVersionsIndex(): VersionsIndex {
  return { versions: [] };
}

export function emptySeedUsageIndex(): SeedUsageIndex {
  return { markers: [] };
}
