/**
 * GitHub integration — the vault repository as a note store.
 *
 * All persistence goes through the GitHub Contents API. The vault holds
 * JSON index files: notes, embeddings, version history and seed usage.
 * Queries load a snapshot of the notes and embeddings indexes and answer
 * in process through {@link MemoryNoteStore}; writes go through an
 * optimistic-concurrency read-modify-write on the affected index.
 */

import {
  emptyEmbeddingsIndex,
  emptyNotesIndex,
  emptySeedUsageIndex,
  emptyVersionsIndex,
  type EmbeddingsIndex,
  type FullTextHit,
  type ListNotesFilter,
  type Neighbor,
  type NeighborQuery,
  type Note,
  type NoteId,
  type NoteStore,
  type NotesIndex,
  type NoteSummary,
  type NoteVersion,
  type SeedUsageIndex,
  type SeedUsageMarker,
  type SemanticPair,
  type SemanticPairsQuery,
  type SimilarityOutcome,
  type VersionsIndex,
} from "@/types";
import {
  EMBEDDINGS_INDEX_PATH,
  GITHUB_API_BASE,
  NOTES_INDEX_PATH,
  SEED_USAGE_INDEX_PATH,
  VERSIONS_INDEX_PATH,
  getGitHubToken,
  getVaultOwner,
  getVaultRepo,
} from "./config";
import { MemoryNoteStore } from "./memory-store";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when GitHub returns 409 Conflict, meaning the SHA provided to a PUT
 * was stale — another write happened between the read and write.
 */
export class GitHubConflictError extends Error {
  constructor(path: string) {
    super(`GitHub conflict (stale SHA) for ${path}`);
    this.name = "GitHubConflictError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Result of reading a file from the GitHub Contents API. */
export interface GitHubFile {
  /** Decoded UTF-8 content of the file. */
  content: string;
  /** The blob SHA, required when updating an existing file. */
  sha: string;
}

/** Options for writing a file to the vault. */
export interface WriteFileOptions {
  /** Repo-relative file path (e.g. "index/notes.json"). */
  path: string;
  /** UTF-8 content to write. */
  content: string;
  /** Commit message. */
  message: string;
  /** SHA of the existing file (required for updates, omit for creation). */
  sha?: string;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Low-level helpers
// ---------------------------------------------------------------------------

/** Build the Contents API URL for a given path. */
function contentsUrl(path: string): string {
  const owner = getVaultOwner();
  const repo = getVaultRepo();
  return `${GITHUB_API_BASE}/repos/${owner}/${repo}/contents/${path}`;
}

/** Common headers for GitHub API requests. */
function headers(): Record<string, string> {
  return {
    Authorization: `Bearer ${getGitHubToken()}`,
    Accept: "application/vnd.github.v3+json",
    "Content-Type": "application/json",
  };
}

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

/**
 * Read a file from the vault.
 *
 * Returns the decoded content and SHA, or `null` if the file does not exist
 * (HTTP 404), so an empty vault reads as an empty knowledge base.
 */
export async function readFile(
  path: string,
  signal?: AbortSignal,
): Promise<GitHubFile | null> {
  const response = await fetch(contentsUrl(path), {
    method: "GET",
    headers: headers(),
    signal,
  });

  if (response.status === 404) {
    return null;
  }

  if (!response.ok) {
    const body = await response.text();
    throw new Error(
      `GitHub read failed for ${path} (${response.status}): ${body}`,
    );
  }

  const json = (await response.json()) as {
    content: string;
    sha: string;
    encoding: string;
  };

  if (json.encoding !== "base64") {
    throw new Error(`Unexpected encoding for ${path}: ${json.encoding}`);
  }

  const content = Buffer.from(json.content, "base64").toString("utf-8");
  return { content, sha: json.sha };
}

/**
 * Read and parse a JSON index file, falling back to `empty()` when the
 * file does not exist yet.
 */
export async function readJsonIndex<T>(
  path: string,
  empty: () => T,
  signal?: AbortSignal,
): Promise<T> {
  const file = await readFile(path, signal);
  return file ? (JSON.parse(file.content) as T) : empty();
}

// ---------------------------------------------------------------------------
// Write
// ---------------------------------------------------------------------------

/**
 * Write (create or update) a file in the vault.
 *
 * Uses the GitHub Contents API PUT endpoint. When updating an existing file,
 * the `sha` option must be provided to avoid conflicts.
 *
 * Returns the new blob SHA after the commit.
 */
export async function writeFile(options: WriteFileOptions): Promise<string> {
  const body: Record<string, string> = {
    message: options.message,
    content: Buffer.from(options.content, "utf-8").toString("base64"),
  };

  if (options.sha) {
    body.sha = options.sha;
  }

  const response = await fetch(contentsUrl(options.path), {
    method: "PUT",
    headers: headers(),
    body: JSON.stringify(body),
    signal: options.signal,
  });

  if (!response.ok) {
    if (response.status === 409) {
      throw new GitHubConflictError(options.path);
    }
    const text = await response.text();
    throw new Error(
      `GitHub write failed for ${options.path} (${response.status}): ${text}`,
    );
  }

  const json = (await response.json()) as { content: { sha: string } };
  return json.content.sha;
}

// ---------------------------------------------------------------------------
// Optimistic-concurrency index update
// ---------------------------------------------------------------------------

const MAX_UPDATE_ATTEMPTS = 5;

/**
 * Atomically read-mutate-write any JSON index file with optimistic concurrency.
 *
 * Re-fetches the file from GitHub before every write attempt, then retries on
 * 409 Conflict. Non-conflict errors (auth, network, 5xx) are rethrown
 * immediately without retrying. A `mutate` that returns `false` leaves the
 * file untouched.
 *
 * @param path    - Repo-relative path to the JSON file (e.g. "index/notes.json").
 * @param empty   - Factory that returns an empty index when the file does not yet exist.
 * @param mutate  - Applies the desired change to the parsed index in place.
 * @param message - Git commit message used for the write.
 */
export async function updateJsonFileWithRetry<T>(
  path: string,
  empty: () => T,
  mutate: (index: T) => boolean | void,
  message: string,
  signal?: AbortSignal,
): Promise<void> {
  for (let attempt = 1; attempt <= MAX_UPDATE_ATTEMPTS; attempt++) {
    signal?.throwIfAborted();
    const file = await readFile(path, signal);
    const index: T = file ? (JSON.parse(file.content) as T) : empty();
    const sha = file?.sha ?? null;

    if (mutate(index) === false) return;

    try {
      console.log(
        JSON.stringify({ event: "index_update_attempt", attempt, path }),
      );
      await writeFile({
        path,
        content: JSON.stringify(index, null, 2) + "\n",
        message,
        sha: sha ?? undefined,
        signal,
      });
      console.log(
        JSON.stringify({ event: "index_update_success", attempt, path }),
      );
      return;
    } catch (err) {
      if (!(err instanceof GitHubConflictError)) {
        throw err;
      }
      if (attempt < MAX_UPDATE_ATTEMPTS) {
        const delayMs = 50 + Math.floor(Math.random() * 100);
        console.log(
          JSON.stringify({
            event: "index_update_conflict",
            attempt,
            path,
            retryAfterMs: delayMs,
          }),
        );
        await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }

  throw new Error(
    `Failed to update "${path}" after ${MAX_UPDATE_ATTEMPTS} attempts`,
  );
}

// ---------------------------------------------------------------------------
// Note store
// ---------------------------------------------------------------------------

export interface GitHubStoreOptions {
  /** Whether similarity queries are answered (default true). */
  vectorSearch?: boolean;
}

/**
 * Join the notes index with the embeddings index. A vector is attached
 * only to notes whose embedding is marked completed.
 */
export function joinNotes(notes: NotesIndex, embeddings: EmbeddingsIndex): Note[] {
  return Object.values(notes.notes).map((record) => {
    const embedding = embeddings.embeddings[record.id];
    return record.embedStatus === "Completed" && embedding
      ? { ...record, embeddingVector: embedding.vector }
      : { ...record };
  });
}

/**
 * NoteStore backed by the vault repository. Every call reads fresh index
 * files; nothing is cached between calls.
 */
export class GitHubNoteStore implements NoteStore {
  private readonly vectorSearch: boolean;

  constructor(options: GitHubStoreOptions = {}) {
    this.vectorSearch = options.vectorSearch ?? true;
  }

  async listNotes(filter?: ListNotesFilter, signal?: AbortSignal): Promise<NoteSummary[]> {
    const notes = await readJsonIndex(NOTES_INDEX_PATH, emptyNotesIndex, signal);
    return new MemoryNoteStore({ notes: Object.values(notes.notes) }).listNotes(filter, signal);
  }

  async getNote(id: NoteId, signal?: AbortSignal): Promise<Note | null> {
    return (await this.snapshot(signal)).getNote(id, signal);
  }

  async nearestNeighbors(
    query: NeighborQuery,
    signal?: AbortSignal,
  ): Promise<SimilarityOutcome<Neighbor[]>> {
    return (await this.snapshot(signal)).nearestNeighbors(query, signal);
  }

  async semanticPairs(
    query: SemanticPairsQuery,
    signal?: AbortSignal,
  ): Promise<SimilarityOutcome<SemanticPair[]>> {
    return (await this.snapshot(signal)).semanticPairs(query, signal);
  }

  async fullTextSearch(query: string, limit: number, signal?: AbortSignal): Promise<FullTextHit[]> {
    const notes = await readJsonIndex(NOTES_INDEX_PATH, emptyNotesIndex, signal);
    return new MemoryNoteStore({ notes: Object.values(notes.notes) })
      .fullTextSearch(query, limit, signal);
  }

  async appendVersion(version: NoteVersion, signal?: AbortSignal): Promise<void> {
    await updateJsonFileWithRetry<VersionsIndex>(
      VERSIONS_INDEX_PATH,
      emptyVersionsIndex,
      (index) => { index.versions.push(version); },
      `Snapshot note ${version.noteId}`,
      signal,
    );
  }

  /**
   * Write the note record. When the note no longer carries a completed
   * embedding, its stale vector is removed from the embeddings index.
   */
  async updateNote(note: Note, signal?: AbortSignal): Promise<void> {
    const { embeddingVector, ...record } = note;

    await updateJsonFileWithRetry<NotesIndex>(
      NOTES_INDEX_PATH,
      emptyNotesIndex,
      (index) => {
        if (!index.notes[note.id]) {
          throw new Error(`Cannot update unknown note: ${note.id}`);
        }
        index.notes[note.id] = record;
      },
      `Update note ${note.id}`,
      signal,
    );

    if (note.embedStatus === "Completed" && embeddingVector) return;

    await updateJsonFileWithRetry<EmbeddingsIndex>(
      EMBEDDINGS_INDEX_PATH,
      emptyEmbeddingsIndex,
      (index) => {
        if (!index.embeddings[note.id]) return false;
        delete index.embeddings[note.id];
      },
      `Update embeddings: remove ${note.id}`,
      signal,
    );
  }

  async listSeedUsage(signal?: AbortSignal): Promise<SeedUsageMarker[]> {
    const index = await readJsonIndex<SeedUsageIndex>(
      SEED_USAGE_INDEX_PATH,
      emptySeedUsageIndex,
      signal,
    );
    return index.markers;
  }

  /** Load notes and embeddings into an in-process store. */
  private async snapshot(signal?: AbortSignal): Promise<MemoryNoteStore> {
    const notes = await readJsonIndex(NOTES_INDEX_PATH, emptyNotesIndex, signal);
    const embeddings = await readJsonIndex(EMBEDDINGS_INDEX_PATH, emptyEmbeddingsIndex, signal);
    return new MemoryNoteStore({
      notes: joinNotes(notes, embeddings),
      vectorSearch: this.vectorSearch,
    });
  }
}

/** Create the store used by the API routes. */
export function createGitHubNoteStore(options: GitHubStoreOptions = {}): NoteStore {
  return new GitHubNoteStore(options);
}
