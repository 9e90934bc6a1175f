/**
 * GET /api/search/discover?recent=3&limit=5
 *
 * Notes close to the centroid of the most recently updated embedded notes,
 * excluding those notes.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { badRequest, parseIntegerParam } from "@/src/params";
import { discover } from "@/src/search";

export const GET = withAuth(async (request, signal) => {
  const params = request.nextUrl.searchParams;

  const recent = parseIntegerParam("recent", params.get("recent"), { fallback: 3, min: 1, max: 20 });
  if (!recent.ok) return badRequest(recent.error);

  const limit = parseIntegerParam("limit", params.get("limit"), { fallback: 5, min: 1, max: 50 });
  if (!limit.ok) return badRequest(limit.error);

  const results = await discover(createGitHubNoteStore(), {
    recentCount: recent.value,
    limit: limit.value,
    signal,
  });
  return NextResponse.json({ results });
});
