import { describe, expect, it } from "vitest";
import { extractReferencedTitles, formatWikilink } from "./wikilink";

describe("extractReferencedTitles", () => {
  it("returns nothing for content without links", () => {
    expect([...extractReferencedTitles("plain text")]).toEqual([]);
  });

  it("extracts titles in order of appearance", () => {
    const content = "See [[Beta]] and then [[Alpha]].";
    expect([...extractReferencedTitles(content)]).toEqual(["Beta", "Alpha"]);
  });

  it("preserves duplicates", () => {
    const content = "[[Beta]] again [[Beta]]";
    expect([...extractReferencedTitles(content)]).toEqual(["Beta", "Beta"]);
  });

  it("ignores surrounding markup", () => {
    const content = "<p>**[[Gamma Ray]]**</p> [not a link] [[ ]]";
    expect([...extractReferencedTitles(content)]).toEqual(["Gamma Ray", " "]);
  });

  it("ignores unterminated or single-bracket references", () => {
    expect([...extractReferencedTitles("[Alpha] [[Beta")]).toEqual([]);
  });

  it("can be iterated more than once", () => {
    const titles = extractReferencedTitles("[[A]] [[B]]");
    expect([...titles]).toEqual(["A", "B"]);
    expect([...titles]).toEqual(["A", "B"]);
  });

  it("is lazy", () => {
    const iterator = extractReferencedTitles("[[A]] [[B]] [[C]]")[Symbol.iterator]();
    expect(iterator.next()).toEqual({ value: "A", done: false });
    expect(iterator.next()).toEqual({ value: "B", done: false });
  });
});

describe("formatWikilink", () => {
  it("wraps the title in double brackets", () => {
    expect(formatWikilink("Beta")).toBe("[[Beta]]");
  });
});
