/**
 * Inbound API authentication.
 *
 * Validates that incoming requests carry a Bearer token matching
 * the LINKWEAVE_API_KEY environment variable.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { NextRequest, NextResponse } from "next/server";
import { getApiKey } from "./config";
import { isAbortError } from "./outcome";

export type AuthResult =
  | { ok: true }
  | { ok: false; response: NextResponse };

/**
 * Compare two secrets in constant time. Both sides are hashed first so the
 * buffers have equal length whatever the inputs.
 */
export function secretsMatch(provided: string, expected: string): boolean {
  const digest = (value: string): Buffer => createHash("sha256").update(value).digest();
  return timingSafeEqual(digest(provided), digest(expected));
}

function reject(error: string, status: number): AuthResult {
  return { ok: false, response: NextResponse.json({ error }, { status }) };
}

/**
 * Verify the Authorization header on an inbound request.
 *
 * Returns `{ ok: true }` when the token matches, or
 * `{ ok: false, response }` with an appropriate error response.
 */
export function verifyAuth(req: NextRequest): AuthResult {
  const header = req.headers.get("authorization");

  if (!header) {
    return reject("Missing Authorization header", 401);
  }

  if (!header.startsWith("Bearer ")) {
    return reject("Authorization header must use Bearer scheme", 401);
  }

  const token = header.slice("Bearer ".length);
  const expected = getApiKey();

  if (!secretsMatch(token, expected)) {
    return reject("Invalid API key", 403);
  }

  return { ok: true };
}

/**
 * Higher-order function that wraps a route handler with:
 * 1. Bearer token authentication (returns 401/403 on failure)
 * 2. Centralized error handling (returns 500 on uncaught errors,
 *    499 when the client went away mid-request)
 *
 * The handler receives the request's abort signal so that store calls
 * stop as soon as the client disconnects.
 *
 * Usage:
 *   export const GET = withAuth(async (request, signal) => {
 *     return NextResponse.json({ ... });
 *   });
 */
export function withAuth(
  handler: (request: NextRequest, signal: AbortSignal) => Promise<NextResponse>,
): (request: NextRequest) => Promise<NextResponse> {
  return async (request) => {
    const auth = verifyAuth(request);
    if (!auth.ok) return auth.response;
    try {
      return await handler(request, request.signal);
    } catch (error) {
      if (isAbortError(error)) {
        return NextResponse.json({ error: "Request aborted" }, { status: 499 });
      }
      const message =
        error instanceof Error ? error.message : "Internal server error";
      console.warn(JSON.stringify({ event: "request_failed", path: request.nextUrl.pathname, message }));
      return NextResponse.json({ error: message }, { status: 500 });
    }
  };
}
