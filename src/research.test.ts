import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import { describeOpportunities, getOverviewForResearch } from "./research";
import { MemoryNoteStore } from "./memory-store";
import { NOW, makeNote } from "./__test-setup__";
import { emptyKbHealthOverview, type KbHealthOverview, type NoteSummary } from "@/types";

let warnSpy: ReturnType<typeof spyOnWarn>;
let logSpy: ReturnType<typeof spyOnLog>;

function spyOnWarn() {
  return vi.spyOn(console, "warn").mockImplementation(() => {});
}

function spyOnLog() {
  return vi.spyOn(console, "log").mockImplementation(() => {});
}

beforeEach(() => {
  warnSpy = spyOnWarn();
  logSpy = spyOnLog();
});

afterEach(() => {
  warnSpy.mockRestore();
  logSpy.mockRestore();
});

class BrokenStore extends MemoryNoteStore {
  async listNotes(): Promise<NoteSummary[]> {
    throw new Error("database unavailable");
  }
}

// ---------------------------------------------------------------------------
// getOverviewForResearch
// ---------------------------------------------------------------------------

describe("getOverviewForResearch", () => {
  it("returns the overview when analysis succeeds", async () => {
    const store = new MemoryNoteStore({ notes: [makeNote({ id: "a" })] });
    const overview = await getOverviewForResearch(store, { now: NOW });
    expect(overview.scorecard.totalNotes).toBe(1);
  });

  it("returns an empty overview when analysis fails", async () => {
    const overview = await getOverviewForResearch(new BrokenStore(), { now: NOW });

    expect(overview).toEqual(emptyKbHealthOverview());
    expect(warnSpy).toHaveBeenCalledWith(
      JSON.stringify({ event: "research_overview_failed", message: "database unavailable" }),
    );
  });

  it("propagates cancellation", async () => {
    const controller = new AbortController();
    controller.abort();
    const store = new MemoryNoteStore({ notes: [makeNote({ id: "a" })] });

    await expect(
      getOverviewForResearch(store, { signal: controller.signal }),
    ).rejects.toThrow();
    expect(warnSpy).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// describeOpportunities
// ---------------------------------------------------------------------------

describe("describeOpportunities", () => {
  it("describes orphans, clusters and the first three unused seeds", () => {
    const overview: KbHealthOverview = {
      scorecard: { totalNotes: 6, embeddedPercent: 100, orphanCount: 1, avgConnections: 1.2 },
      newAndUnconnected: [
        { id: "o", title: "Lonely", createdAt: NOW.toISOString(), embedded: true },
      ],
      richestClusters: [{ hubNoteId: "h", hubTitle: "Hub", noteCount: 4 }],
      neverUsedAsSeeds: [
        { id: "s1", title: "One", connectionCount: 3 },
        { id: "s2", title: "Two", connectionCount: 2 },
        { id: "s3", title: "Three", connectionCount: 1 },
        { id: "s4", title: "Four", connectionCount: 0 },
      ],
    };

    expect(describeOpportunities(overview)).toEqual([
      "Gap: note 'Lonely' has no connections",
      "Deepen: cluster anchored by 'Hub' (4 notes)",
      "Untapped: 'One' (3 connections, never generated from)",
      "Untapped: 'Two' (2 connections, never generated from)",
      "Untapped: 'Three' (1 connections, never generated from)",
    ]);
  });

  it("describes nothing for an empty overview", () => {
    expect(describeOpportunities(emptyKbHealthOverview())).toEqual([]);
  });
});
