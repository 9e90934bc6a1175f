/**
 * GET /api/graph
 *
 * Returns the note graph: every note as a node with its distinct-neighbour
 * count, plus wikilink and semantic edges.
 *
 * Query params:
 *   ?threshold=0.85  — similarity a semantic edge must exceed, in [0, 1]
 *                      (default: SEMANTIC_THRESHOLD)
 *
 * When the store has no vector search the graph carries wikilink edges only.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { loadGraph } from "@/src/graph";
import { badRequest, parseNumberParam } from "@/src/params";

export const GET = withAuth(async (request, signal) => {
  const threshold = parseNumberParam(
    "threshold",
    request.nextUrl.searchParams.get("threshold"),
    { min: 0, max: 1 },
  );
  if (!threshold.ok) return badRequest(threshold.error);

  const graph = await loadGraph(createGitHubNoteStore(), {
    semanticThreshold: threshold.value,
    signal,
  });

  return NextResponse.json(graph);
});
