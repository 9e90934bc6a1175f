/**
 * Request parameter parsing shared by the API routes.
 *
 * Each parser returns either the value or a message suitable for a 400
 * response; routes turn the message into the response themselves.
 */

import { NextResponse } from "next/server";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** 400 response with an `{ error }` body. */
export function badRequest(error: string): NextResponse {
  return NextResponse.json({ error }, { status: 400 });
}

/**
 * Parse an optional integer query parameter within `[min, max]`.
 * A missing or empty parameter yields `fallback`.
 */
export function parseIntegerParam(
  name: string,
  raw: string | null,
  options: { fallback: number; min: number; max: number },
): ParseResult<number> {
  if (raw === null || raw === "") return { ok: true, value: options.fallback };
  const value = Number(raw);
  if (!Number.isInteger(value) || value < options.min || value > options.max) {
    return {
      ok: false,
      error: `'${name}' must be an integer between ${options.min} and ${options.max}`,
    };
  }
  return { ok: true, value };
}

/**
 * Parse an optional numeric query parameter within `[min, max]`.
 * A missing or empty parameter yields `undefined`.
 */
export function parseNumberParam(
  name: string,
  raw: string | null,
  options: { min: number; max: number },
): ParseResult<number | undefined> {
  if (raw === null || raw === "") return { ok: true, value: undefined };
  const value = Number(raw);
  if (!Number.isFinite(value) || value < options.min || value > options.max) {
    return {
      ok: false,
      error: `'${name}' must be a number between ${options.min} and ${options.max}`,
    };
  }
  return { ok: true, value };
}

/** Read a required non-empty query parameter. */
export function requireParam(name: string, raw: string | null): ParseResult<string> {
  const value = raw?.trim();
  if (!value) return { ok: false, error: `Missing required query parameter '${name}'` };
  return { ok: true, value };
}

/** Parse a JSON request body that must be an object. */
export async function readJsonObject(request: Request): Promise<ParseResult<object>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return { ok: false, error: "Invalid JSON body" };
  }

  if (!body || typeof body !== "object" || Array.isArray(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }
  return { ok: true, value: body };
}

/** Read a required non-empty string field from a parsed body. */
export function stringField(body: object, field: string): ParseResult<string> {
  const value: unknown = Reflect.get(body, field);
  if (typeof value !== "string" || !value.trim()) {
    return { ok: false, error: `Request body must include a non-empty '${field}' string` };
  }
  return { ok: true, value };
}
