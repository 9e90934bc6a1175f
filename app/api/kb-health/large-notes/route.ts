/**
 * GET /api/kb-health/large-notes
 *
 * Permanent notes longer than LARGE_NOTE_THRESHOLD characters, longest
 * first.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { getLargeNotes } from "@/src/health";

export const GET = withAuth(async (_request, signal) => {
  const notes = await getLargeNotes(createGitHubNoteStore(), { signal });
  return NextResponse.json({ notes });
});
