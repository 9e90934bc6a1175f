/**
 * POST /api/kb-health/requeue
 *
 * Puts a note back at the start of the embedding pipeline.
 *
 * Input:  { "noteId": "..." }
 * Output: { "noteId": "...", "embedStatus": "Pending" }, or 404
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { requeueEmbedding } from "@/src/mutator";
import { badRequest, readJsonObject, stringField } from "@/src/params";

export const POST = withAuth(async (request, signal) => {
  const body = await readJsonObject(request);
  if (!body.ok) return badRequest(body.error);

  const noteId = stringField(body.value, "noteId");
  if (!noteId.ok) return badRequest(noteId.error);

  const requeued = await requeueEmbedding(createGitHubNoteStore(), noteId.value, { signal });
  if (!requeued) {
    return NextResponse.json({ error: "Note not found" }, { status: 404 });
  }
  return NextResponse.json({ noteId: noteId.value, embedStatus: "Pending" });
});
