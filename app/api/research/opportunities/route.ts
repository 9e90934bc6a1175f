/**
 * GET /api/research/opportunities
 *
 * Research prompts derived from the health overview: gaps (orphans),
 * clusters worth deepening, and untapped seeds. Returns an empty list,
 * never an error, when the knowledge base cannot be analysed.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { describeOpportunities, getOverviewForResearch } from "@/src/research";

export const GET = withAuth(async (_request, signal) => {
  const overview = await getOverviewForResearch(createGitHubNoteStore(), { signal });
  return NextResponse.json({ opportunities: describeOpportunities(overview) });
});
