import { describe, expect, it } from "vitest";
import {
  setupTestEnv,
  setupFakeVault,
  authedRequest,
  anonymousRequest,
  noteRecord,
  vaultFiles,
} from "../../__test-setup__";
import { GET } from "./route";

setupTestEnv();
const fake = setupFakeVault();

describe("GET /api/kb-health/overview", () => {
  it("rejects unauthenticated requests", async () => {
    const response = await GET(anonymousRequest("/api/kb-health/overview"));
    expect(response.status).toBe(401);
  });

  it("returns the overview of permanent notes", async () => {
    const c = noteRecord({ id: "C", content: "plain" });
    fake.seed(
      vaultFiles([
        noteRecord({ id: "A", content: "See [[B]]" }),
        noteRecord({ id: "B", content: "plain" }),
        c,
      ]),
    );

    const response = await GET(authedRequest("/api/kb-health/overview"));
    expect(response.status).toBe(200);

    expect(await response.json()).toEqual({
      scorecard: { totalNotes: 3, embeddedPercent: 0, orphanCount: 1, avgConnections: 0.7 },
      newAndUnconnected: [{ id: "C", title: "C", createdAt: c.createdAt, embedded: false }],
      richestClusters: [{ hubNoteId: "A", hubTitle: "A", noteCount: 2 }],
      neverUsedAsSeeds: [],
    });
  });

  it("returns 500 when the notes index cannot be read", async () => {
    fake.vault.files.set("index/notes.json", "{");

    const response = await GET(authedRequest("/api/kb-health/overview"));
    expect(response.status).toBe(500);
  });
});
