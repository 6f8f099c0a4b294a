import { describe, it, expect } from "@jest/globals";
import {
  canonicalBookId,
  normalizeBookId,
  resolveBookSelector,
} from "../bookIdNormalizer";
import { CANON, NT_BOOKS, OT_BOOKS } from "../bookNames";

describe("normalizeBookId", () => {
  it("should keep three-character input as a code", () => {
    expect(normalizeBookId("gen")).toBe("GEN");
    expect(normalizeBookId(" jhn ")).toBe("JHN");
  });

  it("should pass unknown three-letter codes through unchanged", () => {
    expect(normalizeBookId("NAH")).toBe("NAH");
    expect(normalizeBookId("xyz")).toBe("XYZ");
  });

  it("should map full names and abbreviations to the same code", () => {
    expect(normalizeBookId("Matthew")).toBe("MAT");
    expect(normalizeBookId("Matt")).toBe("MAT");
    expect(normalizeBookId("MAT")).toBe("MAT");
  });

  it("should resolve numbered books with and without spaces", () => {
    expect(normalizeBookId("1Sam")).toBe("1SA");
    expect(normalizeBookId("1SAMUEL")).toBe("1SA");
    expect(normalizeBookId("1 Samuel")).toBe("1SA");
  });

  it("should resolve OSIS short codes", () => {
    expect(normalizeBookId("Ps")).toBe("PSA");
    expect(normalizeBookId("Nah")).toBe("NAH");
    expect(normalizeBookId("Nahum")).toBe("NAM");
  });

  it("should fall back to the first three characters", () => {
    expect(normalizeBookId("Wisdom")).toBe("WIS");
    expect(normalizeBookId("")).toBe("");
  });

  it("should converge every canonical name on its code", () => {
    for (const book of CANON) {
      expect(normalizeBookId(book.name)).toBe(book.id);
      expect(normalizeBookId(book.id)).toBe(book.id);
    }
  });
});

describe("canonicalBookId", () => {
  it("should prefer known spellings over the three-character shortcut", () => {
    expect(canonicalBookId("Nah")).toBe("NAM");
    expect(canonicalBookId("Gen")).toBe("GEN");
  });

  it("should otherwise behave like normalizeBookId", () => {
    expect(canonicalBookId("1 Samuel")).toBe("1SA");
    expect(canonicalBookId("Tob")).toBe("TOB");
  });
});

describe("resolveBookSelector", () => {
  it("should select the whole canon when empty", () => {
    expect(resolveBookSelector()).toHaveLength(66);
    expect(resolveBookSelector("  ")).toHaveLength(66);
  });

  it("should split the canon at Matthew", () => {
    expect(resolveBookSelector("ot")).toEqual([...OT_BOOKS]);
    expect(resolveBookSelector("NT")).toEqual([...NT_BOOKS]);
    expect(OT_BOOKS).toHaveLength(39);
    expect(NT_BOOKS[0]).toBe("MAT");
  });

  it("should normalize and dedupe comma lists", () => {
    expect(resolveBookSelector("jhn, Romans,JHN,,")).toEqual(["JHN", "ROM"]);
  });
});
