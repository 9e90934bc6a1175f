/**
 * GET /api/notes/backlinks?id=<noteId>
 *
 * Notes whose wikilinks resolve to the given note. Empty for an unknown ID.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { loadBacklinks } from "@/src/graph";
import { badRequest, requireParam } from "@/src/params";

export const GET = withAuth(async (request, signal) => {
  const id = requireParam("id", request.nextUrl.searchParams.get("id"));
  if (!id.ok) return badRequest(id.error);

  const backlinks = await loadBacklinks(createGitHubNoteStore(), id.value, signal);
  return NextResponse.json({ backlinks });
});
