/**
 * Shared test utilities for API route tests.
 *
 * Provides environment setup and an in-process stand-in for the GitHub
 * Contents API and the OpenAI embeddings endpoint, served through a spy
 * on the global fetch.
 */

import { beforeEach, afterEach, vi } from "vitest";
import { NextRequest } from "next/server";
import type { EmbeddingsIndex, NoteRecord, NotesIndex } from "@/types";

/** The test API key used across all route tests. */
export const TEST_API_KEY = "test-secret";

const CONTENTS_BASE = "https://api.github.com/repos/test-owner/test-repo/contents/";
const OPENAI_EMBEDDINGS_URL = "https://api.openai.com/v1/embeddings";

/**
 * Register beforeEach/afterEach hooks to set and clear environment variables
 * required by API route tests.
 */
export function setupTestEnv(extra: Record<string, string> = {}): void {
  const envVars: Record<string, string> = {
    LINKWEAVE_API_KEY: TEST_API_KEY,
    GITHUB_TOKEN: "test-token",
    VAULT_OWNER: "test-owner",
    VAULT_REPO: "test-repo",
    OPENAI_API_KEY: "test-openai-key",
    ...extra,
  };

  beforeEach(() => {
    for (const [key, value] of Object.entries(envVars)) {
      process.env[key] = value;
    }
  });

  afterEach(() => {
    for (const key of Object.keys(envVars)) {
      delete process.env[key];
    }
  });
}

function spyOnFetch() {
  return vi.spyOn(globalThis, "fetch");
}

function spyOnConsole(method: "log" | "warn") {
  return vi.spyOn(console, method).mockImplementation(() => {});
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.href : input.url;
}

/** Files in the fake vault, keyed by repo-relative path. */
export interface FakeVault {
  files: Map<string, string>;
  /** Parsed JSON content of a vault file, or null when it is absent. */
  read(path: string): unknown;
  /** Vector returned for every embedding request. */
  queryVector: number[];
}

/**
 * Register hooks that serve fetch from an in-memory vault. Each test starts
 * with an empty vault; call `seed` to populate it.
 *
 * Access `.vault` inside the test body: it is replaced before each test.
 */
export function setupFakeVault(): {
  vault: FakeVault;
  seed(files: Record<string, unknown>): void;
} {
  const ref = {
    vault: newVault(),
    seed(files: Record<string, unknown>): void {
      for (const [path, value] of Object.entries(files)) {
        ref.vault.files.set(path, JSON.stringify(value));
      }
    },
  };

  let fetchSpy: ReturnType<typeof spyOnFetch> | undefined;
  let logSpy: ReturnType<typeof spyOnConsole> | undefined;
  let warnSpy: ReturnType<typeof spyOnConsole> | undefined;

  beforeEach(() => {
    ref.vault = newVault();
    fetchSpy = spyOnFetch();
    fetchSpy.mockImplementation(async (input, init) => serve(ref.vault, input, init));
    logSpy = spyOnConsole("log");
    warnSpy = spyOnConsole("warn");
  });

  afterEach(() => {
    fetchSpy?.mockRestore();
    logSpy?.mockRestore();
    warnSpy?.mockRestore();
  });

  return ref;
}

function newVault(): FakeVault {
  const files = new Map<string, string>();
  return {
    files,
    queryVector: [1, 0],
    read(path: string): unknown {
      const content = files.get(path);
      return content === undefined ? null : JSON.parse(content);
    },
  };
}

async function serve(
  vault: FakeVault,
  input: string | URL | Request,
  init?: RequestInit,
): Promise<Response> {
  const url = requestUrl(input);

  if (url === OPENAI_EMBEDDINGS_URL) {
    return Response.json({ data: [{ embedding: vault.queryVector, index: 0 }] });
  }

  const path = url.slice(CONTENTS_BASE.length);
  if (init?.method === "PUT") {
    if (typeof init.body !== "string") throw new Error("PUT without body");
    const body = JSON.parse(init.body);
    vault.files.set(path, Buffer.from(body.content, "base64").toString("utf-8"));
    return Response.json({ content: { sha: `${path}-sha` } }, { status: 201 });
  }

  const content = vault.files.get(path);
  if (content === undefined) return new Response("Not Found", { status: 404 });
  return Response.json({
    content: Buffer.from(content, "utf-8").toString("base64"),
    sha: `${path}-sha`,
    encoding: "base64",
  });
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** Build a permanent note record for the notes index. */
export function noteRecord(
  overrides: Partial<NoteRecord> & Pick<NoteRecord, "id">,
): NoteRecord {
  return {
    title: overrides.id,
    content: "",
    status: "Permanent",
    embedStatus: "Pending",
    createdAt: new Date(Date.now() - 24 * 60 * 60 * 1000).toISOString(),
    updatedAt: new Date(Date.now() - 24 * 60 * 60 * 1000).toISOString(),
    ...overrides,
  };
}

/**
 * Vault files for a set of notes. Notes given a vector are stored as
 * completed embeddings.
 */
export function vaultFiles(
  notes: (NoteRecord & { vector?: number[] })[],
): { "index/notes.json": NotesIndex; "index/embeddings.json": EmbeddingsIndex } {
  const notesIndex: NotesIndex = { notes: {} };
  const embeddingsIndex: EmbeddingsIndex = { embeddings: {} };
  for (const { vector, ...note } of notes) {
    notesIndex.notes[note.id] = vector ? { ...note, embedStatus: "Completed" } : note;
    if (vector) {
      embeddingsIndex.embeddings[note.id] = {
        noteId: note.id,
        vector,
        model: "text-embedding-3-large",
        createdAt: note.createdAt,
      };
    }
  }
  return { "index/notes.json": notesIndex, "index/embeddings.json": embeddingsIndex };
}

/** Authenticated request to a route under test. */
export function authedRequest(path: string, init: { method?: string; body?: unknown } = {}): NextRequest {
  return new NextRequest(`http://localhost${path}`, {
    method: init.method ?? "GET",
    headers: {
      Authorization: `Bearer ${TEST_API_KEY}`,
      "Content-Type": "application/json",
    },
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  });
}

/** Unauthenticated request to a route under test. */
export function anonymousRequest(path: string, method = "GET"): NextRequest {
  return new NextRequest(`http://localhost${path}`, { method });
}
