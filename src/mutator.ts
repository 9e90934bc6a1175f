/**
 * Mutator module — the engine's only writes to note content.
 *
 * Inserting a discovered link snapshots the orphan first, then appends the
 * wikilink and marks the embedding stale so the pipeline re-embeds it.
 *
 * Two concurrent inserts on the same orphan can both read the old content
 * and both append. There is no optimistic check at this layer.
 */

import type { Note, NoteId, NoteStore } from "@/types";
import { formatWikilink } from "./wikilink";

export interface MutationOptions {
  /** Timestamp recorded on the version and the note (default: current time). */
  now?: Date;
  signal?: AbortSignal;
}

/** Append a wikilink to `content`, separated by a blank line when non-empty. */
export function appendWikilink(content: string, title: string): string {
  const link = formatWikilink(title);
  return content.length === 0 ? link : `${content}\n\n${link}`;
}

/**
 * Link `orphanId` to `targetId` by appending `[[Target Title]]` to the
 * orphan's content.
 *
 * Returns `null`, writing nothing, when either ID does not resolve. The
 * insert is append-only: calling it twice appends twice.
 */
export async function insertWikilink(
  store: NoteStore,
  orphanId: NoteId,
  targetId: NoteId,
  options: MutationOptions = {},
): Promise<Note | null> {
  const { signal } = options;
  const orphan = await store.getNote(orphanId, signal);
  const target = await store.getNote(targetId, signal);
  if (!orphan || !target) return null;

  const timestamp = (options.now ?? new Date()).toISOString();

  await store.appendVersion(
    {
      noteId: orphan.id,
      title: orphan.title,
      content: orphan.content,
      savedAt: timestamp,
    },
    signal,
  );

  const updated: Note = {
    ...orphan,
    content: appendWikilink(orphan.content, target.title),
    embedStatus: "Stale",
    embeddingVector: undefined,
    updatedAt: timestamp,
  };
  await store.updateNote(updated, signal);

  console.log(
    JSON.stringify({ event: "wikilink_inserted", orphanId, targetId }),
  );

  return updated;
}

/**
 * Put a note back at the start of the embedding pipeline.
 * Returns `false` when the note does not exist.
 */
export async function requeueEmbedding(
  store: NoteStore,
  noteId: NoteId,
  options: MutationOptions = {},
): Promise<boolean> {
  const note = await store.getNote(noteId, options.signal);
  if (!note) return false;

  await store.updateNote(
    {
      ...note,
      embedStatus: "Pending",
      embeddingVector: undefined,
      embedError: undefined,
      updatedAt: (options.now ?? new Date()).toISOString(),
    },
    options.signal,
  );

  console.log(JSON.stringify({ event: "embedding_requeued", noteId }));
  return true;
}
