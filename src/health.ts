/**
 * Health module — knowledge-base scorecard, orphans, clusters and seeds.
 *
 * Everything is recomputed from the store on each call. Only permanent
 * notes take part. Semantic connections use the lower suggestion
 * threshold, so a note counts as connected here even when the rendered
 * graph would not draw its edge.
 */

import {
  EMBED_STATUSES,
  emptyKbHealthOverview,
  hasCompletedEmbedding,
  type ConnectionSuggestion,
  type KbHealthOverview,
  type LargeNote,
  type Note,
  type NoteId,
  type NoteStore,
  type NoteSummary,
  type UnembeddedNote,
  type UnusedSeedNote,
} from "@/types";
import { buildClusters } from "./cluster";
import {
  LARGE_NOTE_THRESHOLD,
  ORPHAN_WINDOW_DAYS,
  SEMANTIC_NEIGHBOR_LIMIT,
  SUGGESTION_THRESHOLD,
  TOP_CLUSTER_COUNT,
} from "./config";
import {
  buildAdjacency,
  collectWikilinkEdges,
  degreeMap,
  loadSemanticEdges,
} from "./graph";
import { guardSimilarity, rethrowIfAborted, warnSkipped } from "./outcome";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface HealthOptions {
  /** Similarity a pair must exceed to count as connected (default: config). */
  suggestionThreshold?: number;
  /** Nearest neighbours considered per note (default: config). */
  neighborLimit?: number;
  /** Orphan look-back window in days (default: config). */
  orphanWindowDays?: number;
  /** Clusters reported (default: config). */
  topClusterCount?: number;
  /** Reference time for the orphan window (default: current time). */
  now?: Date;
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function byId(a: { id: NoteId }, b: { id: NoteId }): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Overview
// ---------------------------------------------------------------------------

/**
 * Load the seed-usage set. A failure here only empties the unused-seed
 * list, so it is logged rather than thrown.
 */
async function loadUsedSeeds(
  store: NoteStore,
  signal?: AbortSignal,
): Promise<Set<NoteId> | null> {
  try {
    const markers = await store.listSeedUsage(signal);
    return new Set(markers.map((m) => m.noteId));
  } catch (error) {
    rethrowIfAborted(error, signal);
    console.warn(
      JSON.stringify({ event: "seed_usage_skipped", message: errorMessage(error) }),
    );
    return null;
  }
}

/**
 * Compute the health overview for all permanent notes.
 *
 * A failure to list notes propagates. An unsupported or failing similarity
 * query leaves wikilink connections only.
 */
export async function getOverview(
  store: NoteStore,
  options: HealthOptions = {},
): Promise<KbHealthOverview> {
  const { signal } = options;
  const now = options.now ?? new Date();
  const threshold = options.suggestionThreshold ?? SUGGESTION_THRESHOLD;

  const notes = await store.listNotes({ status: "Permanent" }, signal);
  if (notes.length === 0) return emptyKbHealthOverview();

  const noteIds = new Set(notes.map((n) => n.id));
  const semanticEdges = await loadSemanticEdges(store, noteIds, {
    threshold,
    neighborLimit: options.neighborLimit ?? SEMANTIC_NEIGHBOR_LIMIT,
    status: "Permanent",
    signal,
  });
  const adjacency = buildAdjacency(noteIds, [
    ...collectWikilinkEdges(notes),
    ...semanticEdges,
  ]);
  const degrees = degreeMap(adjacency);
  const degreeOf = (id: NoteId): number => degrees.get(id) ?? 0;

  // Orphans: recent and unconnected, newest first.
  const windowStart = now.getTime() - (options.orphanWindowDays ?? ORPHAN_WINDOW_DAYS) * DAY_MS;
  const orphans = notes
    .filter((n) => Date.parse(n.createdAt) >= windowStart && degreeOf(n.id) === 0)
    .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));

  const completed = notes.filter((n) => n.embedStatus === "Completed");
  let totalDegree = 0;
  for (const n of notes) totalDegree += degreeOf(n.id);

  const clusters = buildClusters(
    notes.map((n) => n.id),
    adjacency,
    degrees,
    new Map(notes.map((n) => [n.id, n.title])),
    options.topClusterCount ?? TOP_CLUSTER_COUNT,
  );

  const usedSeeds = await loadUsedSeeds(store, signal);
  const neverUsedAsSeeds: UnusedSeedNote[] = usedSeeds
    ? completed
        .filter((n) => !usedSeeds.has(n.id))
        .sort((a, b) => degreeOf(b.id) - degreeOf(a.id) || byId(a, b))
        .map((n) => ({ id: n.id, title: n.title, connectionCount: degreeOf(n.id) }))
    : [];

  const overview: KbHealthOverview = {
    scorecard: {
      totalNotes: notes.length,
      embeddedPercent: Math.round((100 * completed.length) / notes.length),
      orphanCount: orphans.length,
      avgConnections: Math.round((totalDegree / notes.length) * 10) / 10,
    },
    newAndUnconnected: orphans.map((n) => ({
      id: n.id,
      title: n.title,
      createdAt: n.createdAt,
      embedded: n.embedStatus === "Completed",
    })),
    richestClusters: clusters.map((c) => ({
      hubNoteId: c.hubId,
      hubTitle: c.hubTitle,
      noteCount: c.members.length,
    })),
    neverUsedAsSeeds,
  };

  console.log(
    JSON.stringify({
      event: "kb_health_overview",
      totalNotes: overview.scorecard.totalNotes,
      orphanCount: overview.scorecard.orphanCount,
      clusterCount: overview.richestClusters.length,
    }),
  );

  return overview;
}

// ---------------------------------------------------------------------------
// Suggestions
// ---------------------------------------------------------------------------

/**
 * Permanent notes semantically close to `noteId`, best first. Returns an
 * empty list when the note is missing, has no completed embedding, or the
 * lookup fails for any reason other than cancellation.
 */
export async function getConnectionSuggestions(
  store: NoteStore,
  noteId: NoteId,
  limit = 5,
  options: Pick<HealthOptions, "suggestionThreshold" | "signal"> = {},
): Promise<ConnectionSuggestion[]> {
  const { signal } = options;
  const threshold = options.suggestionThreshold ?? SUGGESTION_THRESHOLD;

  let note: Note | null;
  try {
    note = await store.getNote(noteId, signal);
  } catch (error) {
    rethrowIfAborted(error, signal);
    console.warn(
      JSON.stringify({ event: "suggestions_skipped", noteId, message: errorMessage(error) }),
    );
    return [];
  }
  if (!note || !hasCompletedEmbedding(note) || limit <= 0) return [];

  const vector = note.embeddingVector;
  const outcome = await guardSimilarity(
    () =>
      store.nearestNeighbors(
        {
          vector,
          limit,
          minSimilarity: threshold,
          excludeIds: [noteId],
          status: "Permanent",
        },
        signal,
      ),
    signal,
  );
  if (!outcome.ok) {
    warnSkipped("suggestions_skipped", outcome, { noteId });
    return [];
  }

  return outcome.value
    .filter((n) => n.similarity > threshold && n.id !== noteId)
    .map((n) => ({ noteId: n.id, title: n.title, similarity: n.similarity }));
}

// ---------------------------------------------------------------------------
// Embedding and size reports
// ---------------------------------------------------------------------------

function embedStatusOrder(note: NoteSummary): number {
  return EMBED_STATUSES.indexOf(note.embedStatus);
}

/**
 * Permanent notes whose embedding has not completed, grouped by pipeline
 * stage and newest first inside each stage.
 */
export async function getNotesWithoutEmbeddings(
  store: NoteStore,
  signal?: AbortSignal,
): Promise<UnembeddedNote[]> {
  const notes = await store.listNotes({ status: "Permanent" }, signal);
  const pending = notes
    .filter((n) => n.embedStatus !== "Completed")
    .sort(
      (a, b) =>
        embedStatusOrder(a) - embedStatusOrder(b) ||
        Date.parse(b.createdAt) - Date.parse(a.createdAt),
    );

  // The list projection has no error text; fetch it per failed note.
  const result: UnembeddedNote[] = [];
  for (const n of pending) {
    let embedError: string | null = null;
    if (n.embedStatus === "Failed") {
      const full = await store.getNote(n.id, signal);
      embedError = full?.embedError ?? null;
    }
    result.push({
      id: n.id,
      title: n.title,
      createdAt: n.createdAt,
      embedStatus: n.embedStatus,
      embedError,
    });
  }
  return result;
}

/** Permanent notes longer than `threshold` characters, longest first. */
export async function getLargeNotes(
  store: NoteStore,
  options: { threshold?: number; signal?: AbortSignal } = {},
): Promise<LargeNote[]> {
  const threshold = options.threshold ?? LARGE_NOTE_THRESHOLD;
  const notes = await store.listNotes({ status: "Permanent" }, options.signal);
  return notes
    .filter((n) => n.content.length > threshold)
    .map((n) => ({
      id: n.id,
      title: n.title,
      updatedAt: n.updatedAt,
      characterCount: n.content.length,
    }))
    .sort((a, b) => b.characterCount - a.characterCount || byId(a, b));
}
