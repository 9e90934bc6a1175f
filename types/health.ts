/**
 * Knowledge-base health report types.
 */

import type { EmbedStatus, NoteId } from "./note";

/** Top-level scorecard metrics for the knowledge base. */
export interface KbHealthScorecard {
  totalNotes: number;
  /** Share of notes with a completed embedding, rounded to an integer percent. */
  embeddedPercent: number;
  /** Notes created inside the orphan window that have no connections. */
  orphanCount: number;
  /** Mean degree, rounded to one decimal. */
  avgConnections: number;
}

/** A recently created permanent note with no connections. */
export interface UnconnectedNote {
  id: NoteId;
  title: string;
  createdAt: string;
  /** Whether connection suggestions can be computed for it. */
  embedded: boolean;
}

/** A connected component summarised by its hub. */
export interface ClusterSummary {
  hubNoteId: NoteId;
  hubTitle: string;
  noteCount: number;
}

/** An embedded note never used as a generation seed. */
export interface UnusedSeedNote {
  id: NoteId;
  title: string;
  connectionCount: number;
}

/** Full overview returned to the dashboard and research agent. */
export interface KbHealthOverview {
  scorecard: KbHealthScorecard;
  newAndUnconnected: UnconnectedNote[];
  richestClusters: ClusterSummary[];
  neverUsedAsSeeds: UnusedSeedNote[];
}

/** A semantically similar note suggested as a link target for an orphan. */
export interface ConnectionSuggestion {
  noteId: NoteId;
  title: string;
  similarity: number;
}

/** A permanent note whose embedding has not completed. */
export interface UnembeddedNote {
  id: NoteId;
  title: string;
  createdAt: string;
  embedStatus: EmbedStatus;
  embedError: string | null;
}

/** A permanent note too long to embed in one request. */
export interface LargeNote {
  id: NoteId;
  title: string;
  updatedAt: string;
  characterCount: number;
}

/** Create an all-zero overview. */
export function emptyKbHealthOverview(): KbHealthOverview {
  return {
    scorecard: { totalNotes: 0, embeddedPercent: 0, orphanCount: 0, avgConnections: 0 },
    newAndUnconnected: [],
    richestClusters: [],
    neverUsedAsSeeds: [],
  };
}
