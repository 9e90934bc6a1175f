import { describe, expect, it } from "vitest";
import {
  setupTestEnv,
  setupFakeVault,
  authedRequest,
  noteRecord,
  vaultFiles,
} from "../../__test-setup__";
import { POST } from "./route";

setupTestEnv();
const fake = setupFakeVault();

describe("POST /api/kb-health/requeue", () => {
  it("resets the note's embedding to pending", async () => {
    fake.seed(vaultFiles([noteRecord({ id: "f", embedStatus: "Failed", embedError: "timeout" })]));

    const response = await POST(
      authedRequest("/api/kb-health/requeue", { method: "POST", body: { noteId: "f" } }),
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ noteId: "f", embedStatus: "Pending" });

    const index = fake.vault.read("index/notes.json");
    expect(index).toMatchObject({ notes: { f: { embedStatus: "Pending" } } });
    expect(index).not.toMatchObject({ notes: { f: { embedError: "timeout" } } });
  });

  it("returns 404 for an unknown note", async () => {
    const response = await POST(
      authedRequest("/api/kb-health/requeue", { method: "POST", body: { noteId: "ghost" } }),
    );
    expect(response.status).toBe(404);
  });
});
