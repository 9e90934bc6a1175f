/**
 * GET /api/search/related?id=<noteId>&limit=5
 *
 * Notes closest to the given note's own embedding.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { badRequest, parseIntegerParam, requireParam } from "@/src/params";
import { findRelated } from "@/src/search";

export const GET = withAuth(async (request, signal) => {
  const params = request.nextUrl.searchParams;

  const id = requireParam("id", params.get("id"));
  if (!id.ok) return badRequest(id.error);

  const limit = parseIntegerParam("limit", params.get("limit"), { fallback: 5, min: 1, max: 50 });
  if (!limit.ok) return badRequest(limit.error);

  const results = await findRelated(createGitHubNoteStore(), id.value, {
    limit: limit.value,
    signal,
  });
  return NextResponse.json({ results });
});
