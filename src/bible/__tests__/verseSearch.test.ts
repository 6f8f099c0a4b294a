import { describe, it, expect } from "@jest/globals";
import { searchVerses } from "../verseSearch";
import { PROTESTANT_BOOKS } from "../bookNames";
import {
  OSIS_ATTRIBUTE_XML,
  USFX_XML,
  parseFixture,
} from "../../__tests__/fixtures/documents";

const positions = (verses: { chapter: number; verse: number }[]) =>
  verses.map(({ chapter, verse }) => `${chapter}:${verse}`);

describe("searchVerses", () => {
  const usfx = parseFixture(USFX_XML);

  it("should match case-insensitively in verse order", () => {
    const results = searchVerses(usfx, "EARTH", PROTESTANT_BOOKS, 25);

    expect(positions(results)).toEqual(["1:1", "1:2", "2:1"]);
    expect(results[1].text).toBe("Now the earth was formless and empty.");
  });

  it("should stop at the limit", () => {
    const results = searchVerses(usfx, "earth", PROTESTANT_BOOKS, 2);

    expect(positions(results)).toEqual(["1:1", "1:2"]);
  });

  it("should only search the selected books", () => {
    const results = searchVerses(usfx, "the", ["MAT"], 25);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ bookId: "MAT", chapter: 5, verse: 1 });
  });

  it("should search OSIS documents", () => {
    const results = searchVerses(parseFixture(OSIS_ATTRIBUTE_XML), "god", ["JHN"], 25);

    expect(results.map((verse) => `${verse.bookId} ${verse.chapter}:${verse.verse}`)).toEqual([
      "JHN 3:16",
      "JHN 3:17",
    ]);
  });

  it("should find nothing for a blank query or an absent book", () => {
    expect(searchVerses(usfx, "   ", PROTESTANT_BOOKS, 25)).toEqual([]);
    expect(searchVerses(usfx, "earth", ["REV"], 25)).toEqual([]);
  });
});
