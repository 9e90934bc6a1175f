/**
 * POST /api/notes/check-duplicate
 *
 * Compares candidate content with the nearest embedded note.
 *
 * Input:  { "content": "..." }
 * Output: { isDuplicate, similarNoteId, similarNoteTitle, similarity }
 *
 * Answers "not a duplicate" when semantic search is unavailable.
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createOpenAIProvider } from "@/src/embeddings";
import { createGitHubNoteStore } from "@/src/github";
import { badRequest, readJsonObject, stringField } from "@/src/params";
import { checkDuplicate } from "@/src/search";

export const POST = withAuth(async (request, signal) => {
  const body = await readJsonObject(request);
  if (!body.ok) return badRequest(body.error);

  const content = stringField(body.value, "content");
  if (!content.ok) return badRequest(content.error);

  const result = await checkDuplicate(
    createGitHubNoteStore(),
    createOpenAIProvider(),
    content.value,
    { signal },
  );
  return NextResponse.json(result);
});
