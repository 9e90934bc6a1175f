/**
 * GET /api/search?q=<query>&type=hybrid
 *
 * Searches notes. `type` is one of fulltext, semantic or hybrid (default).
 * A blank query returns no results.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createOpenAIProvider } from "@/src/embeddings";
import { createGitHubNoteStore } from "@/src/github";
import { badRequest } from "@/src/params";
import { fullTextSearch, hybridSearch, semanticSearch } from "@/src/search";
import { SEARCH_TYPES, type SearchResult, type SearchType } from "@/types";

function isSearchType(value: string): value is SearchType {
  return SEARCH_TYPES.some((t) => t === value);
}

export const GET = withAuth(async (request, signal) => {
  const params = request.nextUrl.searchParams;
  const query = params.get("q") ?? "";
  const type = params.get("type") ?? "hybrid";

  if (!isSearchType(type)) {
    return badRequest(`Invalid search type. Must be one of: ${SEARCH_TYPES.join(", ")}`);
  }

  const store = createGitHubNoteStore();
  let results: SearchResult[];
  if (type === "fulltext") {
    results = await fullTextSearch(store, query, { signal });
  } else if (type === "semantic") {
    results = await semanticSearch(store, createOpenAIProvider(), query, { signal });
  } else {
    results = await hybridSearch(store, createOpenAIProvider(), query, { signal });
  }

  return NextResponse.json({ query, type, results });
});
