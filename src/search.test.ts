import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import {
  resolveWeights,
  previewSnippet,
  fullTextSearch,
  semanticSearch,
  normalizeRanks,
  fuseResults,
  hybridSearch,
  findRelated,
  discover,
  checkDuplicate,
} from "./search";
import type { EmbeddingProvider } from "./embeddings";
import { MemoryNoteStore } from "./memory-store";
import { daysAgo, makeNote } from "./__test-setup__";
import type { SearchResult, SearchWeights } from "@/types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let warnSpy: ReturnType<typeof spyOnWarn>;

function spyOnWarn() {
  return vi.spyOn(console, "warn").mockImplementation(() => {});
}

beforeEach(() => {
  warnSpy = spyOnWarn();
});

afterEach(() => {
  warnSpy.mockRestore();
});

/** Deterministic provider that embeds every query to the same vector. */
function stubProvider(vector: number[] = [1, 0]): EmbeddingProvider {
  return {
    model: "stub-model",
    embed: vi.fn(async () => vector),
  };
}

function failingProvider(message: string): EmbeddingProvider {
  return {
    model: "stub-model",
    async embed() {
      throw new Error(message);
    },
  };
}

function searchStore(vectorSearch = true): MemoryNoteStore {
  return new MemoryNoteStore({
    notes: [
      makeNote({ id: "g1", title: "Graphs", content: "graph graph", embeddingVector: [1, 0] }),
      makeNote({ id: "g2", title: "Cooking", content: "graph pasta sauce tomato", embeddingVector: [0, 1] }),
      makeNote({ id: "g3", title: "Edges", content: "links between notes", embeddingVector: [1, 1] }),
    ],
    vectorSearch,
  });
}

function result(noteId: string, rank: number, snippet = ""): SearchResult {
  return { noteId, title: noteId.toUpperCase(), snippet, rank };
}

const WEIGHTS: SearchWeights = {
  fullTextWeight: 0.3,
  semanticWeight: 0.7,
  minimumSimilarity: 0.5,
  minimumHybridScore: 0.1,
};

// ---------------------------------------------------------------------------
// Helpers under test
// ---------------------------------------------------------------------------

describe("resolveWeights", () => {
  it("applies overrides over the configured defaults", () => {
    expect(resolveWeights({ semanticWeight: 0.5 })).toEqual({
      fullTextWeight: 0.3,
      semanticWeight: 0.5,
      minimumSimilarity: 0.5,
      minimumHybridScore: 0.1,
    });
  });
});

describe("previewSnippet", () => {
  it("keeps short content whole", () => {
    expect(previewSnippet("short")).toBe("short");
  });

  it("cuts long content at 200 characters", () => {
    expect(previewSnippet("a".repeat(250))).toBe(`${"a".repeat(200)}...`);
  });
});

// ---------------------------------------------------------------------------
// Channels
// ---------------------------------------------------------------------------

describe("fullTextSearch", () => {
  it("returns store hits with raw ranks", async () => {
    const results = await fullTextSearch(searchStore(), "graph");

    expect(results.map((r) => r.noteId)).toEqual(["g1", "g2"]);
    expect(results[0].rank).toBeCloseTo(2 / (1 + Math.log(3)), 10);
    expect(results[0].snippet).toBe("graph graph");
  });

  it("returns nothing for a blank query", async () => {
    expect(await fullTextSearch(searchStore(), "   ")).toEqual([]);
  });
});

describe("semanticSearch", () => {
  it("returns neighbours above the similarity floor with previews", async () => {
    const results = await semanticSearch(searchStore(), stubProvider(), "graph");

    expect(results.map((r) => r.noteId)).toEqual(["g1", "g3"]);
    expect(results[0]).toEqual({ noteId: "g1", title: "Graphs", snippet: "graph graph", rank: 1 });
    expect(results[1].rank).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("returns nothing when vector search is unsupported", async () => {
    expect(await semanticSearch(searchStore(false), stubProvider(), "graph")).toEqual([]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("does not embed a blank query", async () => {
    const provider = stubProvider();
    expect(await semanticSearch(searchStore(), provider, "")).toEqual([]);
    expect(provider.embed).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Fusion
// ---------------------------------------------------------------------------

describe("normalizeRanks", () => {
  it("min-max scales ranks", () => {
    const ranks = normalizeRanks([result("a", 3), result("b", 1), result("c", 2)]).map((r) => r.rank);
    expect(ranks).toEqual([1, 0, 0.5]);
  });

  it("maps equal ranks to 1", () => {
    const ranks = normalizeRanks([result("a", 0.4), result("b", 0.4)]).map((r) => r.rank);
    expect(ranks).toEqual([1, 1]);
  });

  it("handles an empty list", () => {
    expect(normalizeRanks([])).toEqual([]);
  });
});

describe("fuseResults", () => {
  it("filters on the fused score before rescaling", () => {
    const fused = fuseResults(
      [result("a", 10), result("b", 0)],
      [result("c", 0.1)],
      WEIGHTS,
    );

    expect(fused).toEqual([result("a", 1)]);
  });

  it("adds both channels for a note found twice and keeps the full-text snippet", () => {
    const fused = fuseResults(
      [result("a", 5, "keyword context"), result("b", 1, "other")],
      [result("a", 0.9, "preview"), result("c", 0.8, "preview")],
      WEIGHTS,
    );

    // a: 0.3 + 0.63 = 0.93; c: 0.56; b: 0 (dropped)
    expect(fused.map((r) => r.noteId)).toEqual(["a", "c"]);
    expect(fused[0]).toEqual(result("a", 1, "keyword context"));
    expect(fused[1].rank).toBeCloseTo(0.56 / 0.93, 10);
  });

  it("rescales to zero when no score is positive", () => {
    const fused = fuseResults(
      [result("a", 1)],
      [],
      { ...WEIGHTS, fullTextWeight: 0, minimumHybridScore: 0 },
    );
    expect(fused).toEqual([result("a", 0)]);
  });

  it("returns nothing when both channels are empty", () => {
    expect(fuseResults([], [], WEIGHTS)).toEqual([]);
  });
});

describe("hybridSearch", () => {
  it("fuses both channels", async () => {
    const results = await hybridSearch(searchStore(), stubProvider(), "graph");

    expect(results.map((r) => r.noteId)).toEqual(["g1", "g3"]);
    expect(results[0]).toEqual({ noteId: "g1", title: "Graphs", snippet: "graph graph", rank: 1 });
    expect(results[1].snippet).toBe("links between notes");
    expect(results[1].rank).toBeCloseTo(0.7 * Math.SQRT1_2, 10);
  });

  it("falls back to full-text results when vector search is unsupported", async () => {
    const results = await hybridSearch(searchStore(false), stubProvider(), "graph");

    expect(results.map((r) => r.noteId)).toEqual(["g1", "g2"]);
    expect(results[1].rank).toBeCloseTo(1 / (1 + Math.log(5)), 10);
    expect(warnSpy).toHaveBeenCalledWith(
      JSON.stringify({
        event: "semantic_search_skipped",
        reason: "unsupported",
        message: "Vector search is not enabled for this store",
        fallback: "fulltext",
      }),
    );
  });

  it("falls back to full-text results when embedding fails", async () => {
    const results = await hybridSearch(searchStore(), failingProvider("quota exceeded"), "graph");

    expect(results.map((r) => r.noteId)).toEqual(["g1", "g2"]);
    expect(warnSpy).toHaveBeenCalledWith(
      JSON.stringify({
        event: "semantic_search_skipped",
        reason: "error",
        message: "quota exceeded",
        fallback: "fulltext",
      }),
    );
  });

  it("propagates a full-text failure", async () => {
    const store = searchStore();
    store.fullTextSearch = async () => {
      throw new Error("index corrupt");
    };

    await expect(hybridSearch(store, stubProvider(), "graph")).rejects.toThrow("index corrupt");
  });

  it("returns nothing for a blank query", async () => {
    const provider = stubProvider();
    expect(await hybridSearch(searchStore(), provider, " \t ")).toEqual([]);
    expect(provider.embed).not.toHaveBeenCalled();
  });

  it("propagates cancellation", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      hybridSearch(searchStore(), stubProvider(), "graph", { signal: controller.signal }),
    ).rejects.toThrow();
  });
});

// ---------------------------------------------------------------------------
// Related notes and discovery
// ---------------------------------------------------------------------------

describe("findRelated", () => {
  it("returns the closest other notes", async () => {
    const results = await findRelated(searchStore(), "g1");

    expect(results.map((r) => r.noteId)).toEqual(["g3"]);
    expect(results[0].rank).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("returns nothing for an unembedded or missing note", async () => {
    const store = new MemoryNoteStore({ notes: [makeNote({ id: "bare" })] });
    expect(await findRelated(store, "bare")).toEqual([]);
    expect(await findRelated(store, "missing")).toEqual([]);
  });

  it("returns nothing when vector search is unsupported", async () => {
    expect(await findRelated(searchStore(false), "g1")).toEqual([]);
  });
});

describe("discover", () => {
  it("searches around the centroid of recent notes, excluding them", async () => {
    const store = new MemoryNoteStore({
      notes: [
        makeNote({ id: "r1", embeddingVector: [1, 0], updatedAt: daysAgo(1) }),
        makeNote({ id: "r2", embeddingVector: [0, 1], updatedAt: daysAgo(2) }),
        makeNote({ id: "old1", embeddingVector: [1, 1], updatedAt: daysAgo(10) }),
        makeNote({ id: "old2", embeddingVector: [-1, 0], updatedAt: daysAgo(11) }),
        makeNote({ id: "bare", updatedAt: daysAgo(0) }),
      ],
    });

    const results = await discover(store, { recentCount: 2 });

    expect(results.map((r) => r.noteId)).toEqual(["old1"]);
    expect(results[0].rank).toBeCloseTo(1, 10);
  });

  it("returns nothing without embedded notes", async () => {
    expect(await discover(new MemoryNoteStore())).toEqual([]);
  });
});

describe("checkDuplicate", () => {
  it("names the nearest note when it scores above the threshold", async () => {
    const result = await checkDuplicate(searchStore(), stubProvider([1, 0]), "graph theory");
    expect(result).toEqual({
      isDuplicate: true,
      similarNoteId: "g1",
      similarNoteTitle: "Graphs",
      similarity: 1,
    });
  });

  it("reports the best score without a match below the threshold", async () => {
    const result = await checkDuplicate(searchStore(), stubProvider([2, 1]), "graph theory", {
      threshold: 0.95,
    });
    expect(result.isDuplicate).toBe(false);
    expect(result.similarNoteId).toBeNull();
    expect(result.similarNoteTitle).toBeNull();
    expect(result.similarity).toBeCloseTo(3 / Math.sqrt(10), 6);
  });

  it("requires similarity strictly above the threshold", async () => {
    const result = await checkDuplicate(searchStore(), stubProvider([1, 0]), "graph", {
      threshold: 1,
    });
    expect(result).toEqual({
      isDuplicate: false,
      similarNoteId: null,
      similarNoteTitle: null,
      similarity: 1,
    });
  });

  it("skips embedding for blank content", async () => {
    const provider = stubProvider();
    const result = await checkDuplicate(searchStore(), provider, "   ");
    expect(result.isDuplicate).toBe(false);
    expect(provider.embed).not.toHaveBeenCalled();
  });

  it("answers not-duplicate when nothing is embedded", async () => {
    const store = new MemoryNoteStore({ notes: [makeNote({ id: "bare" })] });
    const result = await checkDuplicate(store, stubProvider(), "graph");
    expect(result).toEqual({
      isDuplicate: false,
      similarNoteId: null,
      similarNoteTitle: null,
      similarity: 0,
    });
  });

  it("answers not-duplicate when vector search is unsupported", async () => {
    const result = await checkDuplicate(searchStore(false), stubProvider(), "graph");
    expect(result.isDuplicate).toBe(false);
    expect(result.similarity).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith(
      JSON.stringify({
        event: "duplicate_check_skipped",
        reason: "unsupported",
        message: "Vector search is not enabled for this store",
      }),
    );
  });

  it("answers not-duplicate when embedding fails", async () => {
    const result = await checkDuplicate(searchStore(), failingProvider("rate limited"), "graph");
    expect(result.isDuplicate).toBe(false);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("propagates cancellation", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      checkDuplicate(searchStore(), stubProvider(), "graph", { signal: controller.signal }),
    ).rejects.toThrow();
  });
});
