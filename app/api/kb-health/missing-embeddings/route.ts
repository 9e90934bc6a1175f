/**
 * GET /api/kb-health/missing-embeddings
 *
 * Permanent notes whose embedding has not completed, grouped by pipeline
 * stage and newest first.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { getNotesWithoutEmbeddings } from "@/src/health";

export const GET = withAuth(async (_request, signal) => {
  const notes = await getNotesWithoutEmbeddings(createGitHubNoteStore(), signal);
  return NextResponse.json({ notes });
});
