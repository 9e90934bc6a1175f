/**
 * In-process NoteStore.
 *
 * Holds notes, version history and seed markers in memory and answers
 * similarity and full-text queries by scanning. Used as the query engine
 * behind the GitHub-backed store and as a stand-alone store for local runs
 * and tests. Vector search can be switched off to mimic a backend without
 * it, in which case similarity queries report `unsupported`.
 */

import {
  type FullTextHit,
  type ListNotesFilter,
  type Neighbor,
  type NeighborQuery,
  type Note,
  type NoteId,
  type NoteStore,
  type NoteSummary,
  type NoteVersion,
  type SeedUsageMarker,
  type SemanticPair,
  type SemanticPairsQuery,
  type SimilarityOutcome,
  hasCompletedEmbedding,
  similarityOk,
  similarityUnsupported,
} from "@/types";
import { searchDocuments } from "./fulltext";
import { findNeighbors, topNeighborPairs, type EmbeddedCandidate } from "./similarity";

export interface MemoryStoreOptions {
  notes?: Note[];
  versions?: NoteVersion[];
  seedUsage?: SeedUsageMarker[];
  /** Whether similarity queries are answered (default true). */
  vectorSearch?: boolean;
}

/** Strip the vector from a note. */
export function toSummary(note: Note): NoteSummary {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    status: note.status,
    embedStatus: note.embedStatus,
    createdAt: note.createdAt,
    updatedAt: note.updatedAt,
  };
}

function cloneNote(note: Note): Note {
  return {
    ...note,
    embeddingVector: note.embeddingVector ? [...note.embeddingVector] : undefined,
  };
}

export class MemoryNoteStore implements NoteStore {
  private readonly notes: Map<NoteId, Note>;
  private readonly versions: NoteVersion[];
  private readonly seedUsage: SeedUsageMarker[];
  private readonly vectorSearch: boolean;

  constructor(options: MemoryStoreOptions = {}) {
    this.notes = new Map((options.notes ?? []).map((n) => [n.id, cloneNote(n)]));
    this.versions = [...(options.versions ?? [])];
    this.seedUsage = [...(options.seedUsage ?? [])];
    this.vectorSearch = options.vectorSearch ?? true;
  }

  /** Version records in insertion order. */
  get versionHistory(): readonly NoteVersion[] {
    return this.versions;
  }

  async listNotes(filter: ListNotesFilter = {}, signal?: AbortSignal): Promise<NoteSummary[]> {
    signal?.throwIfAborted();
    return this.matching(filter.status).map(toSummary);
  }

  async getNote(id: NoteId, signal?: AbortSignal): Promise<Note | null> {
    signal?.throwIfAborted();
    const note = this.notes.get(id);
    return note ? cloneNote(note) : null;
  }

  async nearestNeighbors(
    query: NeighborQuery,
    signal?: AbortSignal,
  ): Promise<SimilarityOutcome<Neighbor[]>> {
    signal?.throwIfAborted();
    if (!this.vectorSearch) {
      return similarityUnsupported("Vector search is not enabled for this store");
    }
    return similarityOk(
      findNeighbors(query.vector, this.candidates(query.status), {
        limit: query.limit,
        minSimilarity: query.minSimilarity,
        excludeIds: query.excludeIds,
      }),
    );
  }

  async semanticPairs(
    query: SemanticPairsQuery,
    signal?: AbortSignal,
  ): Promise<SimilarityOutcome<SemanticPair[]>> {
    signal?.throwIfAborted();
    if (!this.vectorSearch) {
      return similarityUnsupported("Vector search is not enabled for this store");
    }
    return similarityOk(
      topNeighborPairs(this.candidates(query.status), query.perNoteLimit, query.minSimilarity),
    );
  }

  async fullTextSearch(query: string, limit: number, signal?: AbortSignal): Promise<FullTextHit[]> {
    signal?.throwIfAborted();
    return searchDocuments(this.matching(), query, limit);
  }

  async appendVersion(version: NoteVersion, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.versions.push({ ...version });
  }

  async updateNote(note: Note, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (!this.notes.has(note.id)) {
      throw new Error(`Cannot update unknown note: ${note.id}`);
    }
    this.notes.set(note.id, cloneNote(note));
  }

  async listSeedUsage(signal?: AbortSignal): Promise<SeedUsageMarker[]> {
    signal?.throwIfAborted();
    return [...this.seedUsage];
  }

  private matching(status?: Note["status"]): Note[] {
    const all = [...this.notes.values()];
    return status ? all.filter((n) => n.status === status) : all;
  }

  private candidates(status?: Note["status"]): EmbeddedCandidate[] {
    const result: EmbeddedCandidate[] = [];
    for (const note of this.matching(status)) {
      if (hasCompletedEmbedding(note)) {
        result.push({ id: note.id, title: note.title, vector: note.embeddingVector });
      }
    }
    return result;
  }
}
