/**
 * GET /api/kb-health/overview
 *
 * Health overview of the permanent notes: scorecard, recent orphans,
 * largest clusters, and embedded notes never used as generation seeds.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { getOverview } from "@/src/health";

export const GET = withAuth(async (_request, signal) => {
  const overview = await getOverview(createGitHubNoteStore(), { signal });
  return NextResponse.json(overview);
});
