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

describe("GET /api/research/opportunities", () => {
  it("describes gaps and clusters", async () => {
    fake.seed(
      vaultFiles([
        noteRecord({ id: "A", content: "See [[B]]" }),
        noteRecord({ id: "B" }),
        noteRecord({ id: "C" }),
      ]),
    );

    const response = await GET(authedRequest("/api/research/opportunities"));
    expect(response.status).toBe(200);

    expect(await response.json()).toEqual({
      opportunities: [
        "Gap: note 'C' has no connections",
        "Deepen: cluster anchored by 'A' (2 notes)",
      ],
    });
  });

  it("returns no opportunities when the vault cannot be analysed", async () => {
    fake.vault.files.set("index/notes.json", "{");

    const response = await GET(authedRequest("/api/research/opportunities"));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ opportunities: [] });
  });
});
