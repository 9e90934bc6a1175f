/**
 * GET /api/kb-health/suggestions?id=<noteId>&limit=5
 *
 * Permanent notes semantically close to the given note, offered as link
 * targets. Empty when the note is unknown, unembedded, or vector search is
 * unavailable.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { getConnectionSuggestions } from "@/src/health";
import { badRequest, parseIntegerParam, requireParam } from "@/src/params";

export const GET = withAuth(async (request, signal) => {
  const params = request.nextUrl.searchParams;

  const id = requireParam("id", params.get("id"));
  if (!id.ok) return badRequest(id.error);

  const limit = parseIntegerParam("limit", params.get("limit"), { fallback: 5, min: 1, max: 50 });
  if (!limit.ok) return badRequest(limit.error);

  const suggestions = await getConnectionSuggestions(
    createGitHubNoteStore(),
    id.value,
    limit.value,
    { signal },
  );
  return NextResponse.json({ suggestions });
});
