import { describe, expect, it } from "vitest";
import {
  badRequest,
  parseIntegerParam,
  parseNumberParam,
  requireParam,
  readJsonObject,
  stringField,
} from "./params";

const LIMIT = { fallback: 5, min: 1, max: 50 };

describe("parseIntegerParam", () => {
  it("uses the fallback for a missing or empty value", () => {
    expect(parseIntegerParam("limit", null, LIMIT)).toEqual({ ok: true, value: 5 });
    expect(parseIntegerParam("limit", "", LIMIT)).toEqual({ ok: true, value: 5 });
  });

  it("accepts integers in range", () => {
    expect(parseIntegerParam("limit", "12", LIMIT)).toEqual({ ok: true, value: 12 });
  });

  it("rejects fractions, text and out-of-range values", () => {
    const error = "'limit' must be an integer between 1 and 50";
    expect(parseIntegerParam("limit", "2.5", LIMIT)).toEqual({ ok: false, error });
    expect(parseIntegerParam("limit", "ten", LIMIT)).toEqual({ ok: false, error });
    expect(parseIntegerParam("limit", "0", LIMIT)).toEqual({ ok: false, error });
    expect(parseIntegerParam("limit", "51", LIMIT)).toEqual({ ok: false, error });
  });
});

describe("parseNumberParam", () => {
  it("returns undefined when absent", () => {
    expect(parseNumberParam("threshold", null, { min: 0, max: 1 })).toEqual({ ok: true, value: undefined });
  });

  it("accepts bounds inclusively", () => {
    expect(parseNumberParam("threshold", "0", { min: 0, max: 1 })).toEqual({ ok: true, value: 0 });
    expect(parseNumberParam("threshold", "1", { min: 0, max: 1 })).toEqual({ ok: true, value: 1 });
  });

  it("rejects values outside the range", () => {
    expect(parseNumberParam("threshold", "1.5", { min: 0, max: 1 })).toEqual({
      ok: false,
      error: "'threshold' must be a number between 0 and 1",
    });
  });
});

describe("requireParam", () => {
  it("trims the value", () => {
    expect(requireParam("id", "  n1 ")).toEqual({ ok: true, value: "n1" });
  });

  it("rejects blank values", () => {
    expect(requireParam("id", "  ")).toEqual({
      ok: false,
      error: "Missing required query parameter 'id'",
    });
  });
});

describe("readJsonObject", () => {
  it("parses an object body", async () => {
    const request = new Request("http://localhost", { method: "POST", body: '{"a":"b"}' });
    expect(await readJsonObject(request)).toEqual({ ok: true, value: { a: "b" } });
  });

  it("rejects invalid JSON", async () => {
    const request = new Request("http://localhost", { method: "POST", body: "{" });
    expect(await readJsonObject(request)).toEqual({ ok: false, error: "Invalid JSON body" });
  });

  it("rejects arrays", async () => {
    const request = new Request("http://localhost", { method: "POST", body: "[]" });
    expect(await readJsonObject(request)).toEqual({
      ok: false,
      error: "Request body must be a JSON object",
    });
  });
});

describe("stringField", () => {
  it("reads a non-empty string", () => {
    expect(stringField({ noteId: "n1" }, "noteId")).toEqual({ ok: true, value: "n1" });
  });

  it("rejects missing and non-string fields", () => {
    const error = "Request body must include a non-empty 'noteId' string";
    expect(stringField({}, "noteId")).toEqual({ ok: false, error });
    expect(stringField({ noteId: 3 }, "noteId")).toEqual({ ok: false, error });
  });
});

describe("badRequest", () => {
  it("builds a 400 JSON response", async () => {
    const response = badRequest("nope");
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "nope" });
  });
});
