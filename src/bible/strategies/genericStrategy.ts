/**
 * Generic nested markup:
 *
 *   <book id="GEN"><chapter number="1"><verse number="1">In the beginning…</verse></chapter></book>
 */

import { LocatedBook } from "../bookLocator";
import { ParsedDocument } from "../parsedDocument";
import { Verse, VerseFilter } from "../types";
import {
  XmlElement,
  allText,
  attr,
  childElements,
  directText,
  findDescendants,
  hasTag,
} from "../xml/xmlTree";
import {
  ExtractionStrategy,
  NO_MATCH,
  StrategyResult,
  matched,
} from "./ExtractionStrategy";
import { buildVerse, cleanText, parseLeadingInt, passesFilter } from "./common";

function chapterNumber(element: XmlElement): number | null {
  return parseLeadingInt(attr(element, "number") ?? attr(element, "id"));
}

function chapterElements(book: LocatedBook): XmlElement[] {
  return findDescendants(book.element, (el) => hasTag(el, "chapter"));
}

export class GenericChapterVerseStrategy implements ExtractionStrategy {
  readonly kind = "generic-chapter-verse" as const;

  verses(
    _document: ParsedDocument,
    book: LocatedBook,
    filter: VerseFilter,
  ): StrategyResult<Verse[]> {
    const chapters = chapterElements(book);
    if (chapters.length === 0) return NO_MATCH;

    // A requested chapter reads only the first element carrying that number
    const selected =
      filter.chapter === undefined
        ? chapters
        : chapters.filter((el) => chapterNumber(el) === filter.chapter).slice(0, 1);

    const verses: Verse[] = [];

    for (const chapterElement of selected) {
      const chapter = chapterNumber(chapterElement);
      if (chapter === null) continue;

      for (const verseElement of childElements(chapterElement)) {
        if (!hasTag(verseElement, "verse")) continue;

        const verse = parseLeadingInt(attr(verseElement, "number"));
        if (verse === null || !passesFilter(chapter, verse, filter)) continue;

        const text =
          cleanText(directText(verseElement)) || cleanText(allText(verseElement));
        if (text) verses.push(buildVerse(book, chapter, verse, text));
      }
    }

    return matched(verses);
  }

  chapters(
    _document: ParsedDocument,
    book: LocatedBook,
  ): StrategyResult<number[]> {
    const chapters = chapterElements(book)
      .map(chapterNumber)
      .filter((chapter): chapter is number => chapter !== null);

    return chapters.length > 0 ? matched(chapters) : NO_MATCH;
  }
}
