import { describe, expect, it } from "vitest";
import {
  setupTestEnv,
  setupFakeVault,
  authedRequest,
  noteRecord,
  vaultFiles,
} from "../../__test-setup__";
import { GET } from "./route";

setupTestEnv();
const fake = setupFakeVault();

describe("GET /api/kb-health/missing-embeddings", () => {
  it("lists permanent notes without a completed embedding", async () => {
    const createdAt = "2026-03-01T00:00:00.000Z";
    fake.seed(
      vaultFiles([
        noteRecord({ id: "p", createdAt }),
        noteRecord({ id: "f", createdAt, embedStatus: "Failed", embedError: "rate limited" }),
        { ...noteRecord({ id: "done" }), vector: [1, 0] },
      ]),
    );

    const response = await GET(authedRequest("/api/kb-health/missing-embeddings"));
    expect(response.status).toBe(200);

    expect(await response.json()).toEqual({
      notes: [
        { id: "p", title: "p", createdAt, embedStatus: "Pending", embedError: null },
        { id: "f", title: "f", createdAt, embedStatus: "Failed", embedError: "rate limited" },
      ],
    });
  });
});
