/**
 * Centralized configuration for the LinkWeave engine.
 *
 * Every tunable lives here. Values fall back to sensible defaults
 * and can be overridden via environment variables. Engine functions
 * also accept per-call overrides, so these are defaults, not constants.
 *
 * Required environment variables are validated lazily (on first access)
 * so that importing this module in tests does not throw.
 */

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalEnv(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function optionalNumericEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

/**
 * Create a lazy getter that defers validation until first access.
 * The resolved value is cached after the first successful read.
 */
function lazyRequired(name: string): { get value(): string } {
  let cached: string | undefined;
  return {
    get value(): string {
      if (cached === undefined) {
        cached = requireEnv(name);
      }
      return cached;
    },
  };
}

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

const _apiKey = lazyRequired("LINKWEAVE_API_KEY");

/** Shared secret used to authenticate inbound API requests (validated on first access). */
export function getApiKey(): string {
  return _apiKey.value;
}

// ---------------------------------------------------------------------------
// Embedding
// ---------------------------------------------------------------------------

/** OpenAI model used for embedding search queries. */
export const EMBEDDING_MODEL = optionalEnv(
  "EMBEDDING_MODEL",
  "text-embedding-3-large",
);

const _openaiApiKey = lazyRequired("OPENAI_API_KEY");

/** OpenAI API key (validated on first access). */
export function getOpenAIApiKey(): string {
  return _openaiApiKey.value;
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

/** Similarity a semantic edge must exceed to appear in the rendered graph. */
export const SEMANTIC_THRESHOLD = optionalNumericEnv("SEMANTIC_THRESHOLD", 0.8);

/** Nearest neighbours considered per note when deriving semantic edges. */
export const SEMANTIC_NEIGHBOR_LIMIT = optionalNumericEnv(
  "SEMANTIC_NEIGHBOR_LIMIT",
  5,
);

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

/**
 * Similarity a pair must exceed to count as connected in health reports
 * and to be offered as a connection suggestion. Lower than the graph
 * threshold because some embedding models compress their score range.
 */
export const SUGGESTION_THRESHOLD = optionalNumericEnv(
  "SUGGESTION_THRESHOLD",
  0.3,
);

/** How far back (in days) an unconnected note still counts as an orphan. */
export const ORPHAN_WINDOW_DAYS = optionalNumericEnv("ORPHAN_WINDOW_DAYS", 30);

/** Number of clusters reported in the overview. */
export const TOP_CLUSTER_COUNT = optionalNumericEnv("TOP_CLUSTER_COUNT", 5);

/** Content length (characters) above which a note is reported as large. */
export const LARGE_NOTE_THRESHOLD = optionalNumericEnv(
  "LARGE_NOTE_THRESHOLD",
  4000,
);

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/** Weight applied to normalised full-text ranks in hybrid search. */
export const FULL_TEXT_WEIGHT = optionalNumericEnv("FULL_TEXT_WEIGHT", 0.3);

/** Weight applied to semantic similarity in hybrid search. */
export const SEMANTIC_WEIGHT = optionalNumericEnv("SEMANTIC_WEIGHT", 0.7);

/** Inclusive similarity floor for semantic search results. */
export const MINIMUM_SIMILARITY = optionalNumericEnv("MINIMUM_SIMILARITY", 0.5);

/** Fused hybrid scores below this are dropped. */
export const MINIMUM_HYBRID_SCORE = optionalNumericEnv(
  "MINIMUM_HYBRID_SCORE",
  0.1,
);

/** Maximum full-text hits fetched per query. */
export const FULL_TEXT_LIMIT = optionalNumericEnv("FULL_TEXT_LIMIT", 50);

/** Maximum semantic hits fetched per query. */
export const SEMANTIC_LIMIT = optionalNumericEnv("SEMANTIC_LIMIT", 20);

/** Similarity the nearest note must exceed for content to count as a duplicate. */
export const DUPLICATE_THRESHOLD = optionalNumericEnv("DUPLICATE_THRESHOLD", 0.92);

// ---------------------------------------------------------------------------
// GitHub / vault
// ---------------------------------------------------------------------------

/** GitHub API base URL (override for GitHub Enterprise). */
export const GITHUB_API_BASE = optionalEnv(
  "GITHUB_API_BASE",
  "https://api.github.com",
);

const _githubToken = lazyRequired("GITHUB_TOKEN");
const _vaultOwner = lazyRequired("VAULT_OWNER");
const _vaultRepo = lazyRequired("VAULT_REPO");

/** Fine-grained GitHub PAT with Contents read/write on the vault (validated on first access). */
export function getGitHubToken(): string {
  return _githubToken.value;
}

/** GitHub owner (user or org) of the vault repository (validated on first access). */
export function getVaultOwner(): string {
  return _vaultOwner.value;
}

/** Vault repository name (validated on first access). */
export function getVaultRepo(): string {
  return _vaultRepo.value;
}

// ---------------------------------------------------------------------------
// Vault paths (relative to repo root)
// ---------------------------------------------------------------------------

/** Path to the notes index file. */
export const NOTES_INDEX_PATH = optionalEnv(
  "NOTES_INDEX_PATH",
  "index/notes.json",
);

/** Path to the embeddings index file. */
export const EMBEDDINGS_INDEX_PATH = optionalEnv(
  "EMBEDDINGS_INDEX_PATH",
  "index/embeddings.json",
);

/** Path to the note version history file. */
export const VERSIONS_INDEX_PATH = optionalEnv(
  "VERSIONS_INDEX_PATH",
  "index/versions.json",
);

/** Path to the seed usage markers file. */
export const SEED_USAGE_INDEX_PATH = optionalEnv(
  "SEED_USAGE_INDEX_PATH",
  "index/seed-usage.json",
);
