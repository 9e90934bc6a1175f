/**
 * Shared fixtures for engine tests.
 */

import type { Note } from "@/types";

/** Fixed clock used across engine tests. */
export const NOW = new Date("2026-03-01T12:00:00.000Z");

/** ISO timestamp `days` before {@link NOW}. */
export function daysAgo(days: number): string {
  return new Date(NOW.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

/**
 * Build a permanent note without an embedding. Passing `embeddingVector`
 * marks the embedding as completed unless `embedStatus` says otherwise.
 */
export function makeNote(overrides: Partial<Note> & Pick<Note, "id">): Note {
  const createdAt = overrides.createdAt ?? daysAgo(1);
  return {
    title: overrides.id,
    content: "",
    status: "Permanent",
    embedStatus: overrides.embeddingVector ? "Completed" : "Pending",
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}
