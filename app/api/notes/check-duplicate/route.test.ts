import { describe, expect, it } from "vitest";
import {
  setupTestEnv,
  setupFakeVault,
  authedRequest,
  anonymousRequest,
  noteRecord,
  vaultFiles,
} from "../../__test-setup__";
import { POST } from "./route";

setupTestEnv();
const fake = setupFakeVault();

function checkRequest(body: unknown) {
  return authedRequest("/api/notes/check-duplicate", { method: "POST", body });
}

describe("POST /api/notes/check-duplicate", () => {
  it("rejects unauthenticated requests", async () => {
    const response = await POST(anonymousRequest("/api/notes/check-duplicate", "POST"));
    expect(response.status).toBe(401);
  });

  it("flags content close to an existing note", async () => {
    fake.seed(
      vaultFiles([
        { ...noteRecord({ id: "g", title: "Graphs" }), vector: [1, 0] },
        { ...noteRecord({ id: "c", title: "Cooking" }), vector: [0, 1] },
      ]),
    );

    const response = await POST(checkRequest({ content: "graphs of notes" }));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      isDuplicate: true,
      similarNoteId: "g",
      similarNoteTitle: "Graphs",
      similarity: 1,
    });
  });

  it("reports the best score when nothing is close enough", async () => {
    fake.seed(vaultFiles([{ ...noteRecord({ id: "c", title: "Cooking" }), vector: [0, 1] }]));

    const response = await POST(checkRequest({ content: "graphs of notes" }));
    expect(await response.json()).toEqual({
      isDuplicate: false,
      similarNoteId: null,
      similarNoteTitle: null,
      similarity: 0,
    });
  });

  it("requires content", async () => {
    const response = await POST(checkRequest({ content: "  " }));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Request body must include a non-empty 'content' string",
    });
  });
});
