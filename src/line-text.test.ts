import { describe, expect, it } from "vitest";

import { extractLineText } from "./line-text.ts";

describe("extractLineText", () => {
  it("joins non-empty segment texts with single spaces", () => {
    expect(extractLineText({ t: [{ tx: "Le" }, { tx: "" }, { tx: "Temps" }, {}, { tx: "1891" }] })).toBe(
      "Le Temps 1891",
    );
  });

  it("treats null segment text as empty", () => {
    expect(extractLineText({ t: [{ tx: null }, { tx: "mot" }, { tx: null }] })).toBe("mot");
  });

  it("trims surrounding whitespace of the joined text", () => {
    expect(extractLineText({ t: [{ tx: " Gazette" }, { tx: "de " }] })).toBe("Gazette de");
  });

  it("returns an empty string without segments", () => {
    expect(extractLineText({})).toBe("");
    expect(extractLineText({ t: [] })).toBe("");
    expect(extractLineText({ t: [{ tx: "" }, {}] })).toBe("");
  });
});
