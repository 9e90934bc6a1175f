/**
 * Embedding module — pluggable provider interface + OpenAI implementation.
 *
 * The engine only embeds search queries; note embeddings are produced by
 * the pipeline that owns `embedStatus`. The provider interface allows
 * swapping embedding backends without changing consumer code.
 */

import type { EmbeddingVector } from "@/types";
import { EMBEDDING_MODEL, getOpenAIApiKey } from "./config";

// ---------------------------------------------------------------------------
// Provider Interface
// ---------------------------------------------------------------------------

/** A pluggable embedding provider. */
export interface EmbeddingProvider {
  /** Generate an embedding vector for the given text. */
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;
  /** Identifier of the model this provider uses. */
  readonly model: string;
}

/** An embedding request the provider rejected or answered malformed. */
export class EmbeddingRequestError extends Error {
  constructor(
    message: string,
    /** HTTP status, when the provider answered at all. */
    public readonly status?: number,
  ) {
    super(message);
    this.name = "EmbeddingRequestError";
  }
}

// ---------------------------------------------------------------------------
// OpenAI Provider
// ---------------------------------------------------------------------------

const OPENAI_EMBEDDINGS_URL = "https://api.openai.com/v1/embeddings";

/** Response shape from the OpenAI embeddings endpoint. */
interface OpenAIEmbeddingResponse {
  data?: { embedding?: number[]; index: number }[];
  model?: string;
  usage?: { prompt_tokens: number; total_tokens: number };
}

/**
 * Create an EmbeddingProvider backed by the OpenAI embeddings API.
 *
 * Uses `fetch` directly (no SDK dependency). The API key is resolved on
 * the first request, so constructing a provider never throws.
 */
export function createOpenAIProvider(
  apiKey?: string,
  model: string = EMBEDDING_MODEL,
): EmbeddingProvider {
  return {
    model,

    async embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
      if (!text.trim()) {
        throw new EmbeddingRequestError("Cannot embed empty text");
      }

      const response = await fetch(OPENAI_EMBEDDINGS_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey ?? getOpenAIApiKey()}`,
        },
        body: JSON.stringify({ input: text, model }),
        signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new EmbeddingRequestError(
          `OpenAI embedding request failed (${response.status}): ${body}`,
          response.status,
        );
      }

      const json = (await response.json()) as OpenAIEmbeddingResponse;
      const embedding = json.data?.[0]?.embedding;

      if (!embedding) {
        throw new EmbeddingRequestError(
          "Unexpected OpenAI response: missing embedding data",
          response.status,
        );
      }

      return embedding;
    },
  };
}
