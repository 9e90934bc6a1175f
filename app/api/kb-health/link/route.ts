/**
 * POST /api/kb-health/link
 *
 * Links an orphan to a target by appending `[[Target Title]]` to the
 * orphan's content. The prior content is kept as a version and the
 * orphan's embedding is marked stale.
 *
 * Input:  { "orphanId": "...", "targetId": "..." }
 * Output: the updated note, or 404 when either ID is unknown
 */

import { NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { createGitHubNoteStore } from "@/src/github";
import { insertWikilink } from "@/src/mutator";
import { badRequest, readJsonObject, stringField } from "@/src/params";

export const POST = withAuth(async (request, signal) => {
  const body = await readJsonObject(request);
  if (!body.ok) return badRequest(body.error);

  const orphanId = stringField(body.value, "orphanId");
  if (!orphanId.ok) return badRequest(orphanId.error);
  const targetId = stringField(body.value, "targetId");
  if (!targetId.ok) return badRequest(targetId.error);

  const note = await insertWikilink(
    createGitHubNoteStore(),
    orphanId.value,
    targetId.value,
    { signal },
  );
  if (!note) {
    return NextResponse.json({ error: "Note not found" }, { status: 404 });
  }

  return NextResponse.json(note);
});
