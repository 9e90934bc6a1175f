/**
 * Helpers for the degrade paths around optional store capabilities.
 *
 * Advisory computations (semantic edges, suggestions, semantic search) must
 * never fail the caller. These helpers turn thrown errors into tagged
 * outcomes and log the reason a capability was skipped. Cancellation is the
 * one exception: an aborted request always propagates.
 */

import type { SimilarityOutcome } from "@/types";
import { similarityError } from "@/types";

/** True for the error thrown by an aborted fetch or `signal.throwIfAborted()`. */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/** Rethrow `error` when it (or the signal) reports cancellation. */
export function rethrowIfAborted(error: unknown, signal?: AbortSignal): void {
  if (isAbortError(error)) throw error;
  if (signal?.aborted) throw signal.reason;
}

/**
 * Run a similarity query, folding any thrown error into an `error` outcome.
 */
export async function guardSimilarity<T>(
  run: () => Promise<SimilarityOutcome<T>>,
  signal?: AbortSignal,
): Promise<SimilarityOutcome<T>> {
  try {
    return await run();
  } catch (error) {
    rethrowIfAborted(error, signal);
    return similarityError(error);
  }
}

/** Human-readable reason for a failed outcome. */
export function failureMessage<T>(outcome: SimilarityOutcome<T>): string {
  if (outcome.ok) return "";
  if (outcome.reason === "unsupported") return outcome.message;
  return outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
}

/**
 * Log a skipped similarity query at warning level.
 */
export function warnSkipped<T>(
  event: string,
  outcome: SimilarityOutcome<T>,
  context: Record<string, unknown> = {},
): void {
  if (outcome.ok) return;
  console.warn(
    JSON.stringify({
      event,
      reason: outcome.reason,
      message: failureMessage(outcome),
      ...context,
    }),
  );
}
