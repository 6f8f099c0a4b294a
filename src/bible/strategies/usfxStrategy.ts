/**
 * USFX extraction
 *
 * Chapters and verses are empty milestones inside the book:
 *
 *   <book id="GEN"><c id="1"/><v id="1"/>In the beginning…<ve/><v id="2"/>…</book>
 *
 * The walk keeps a running chapter and one open verse. A <c>, <v> or <ve>
 * closes the open verse; every text node in between belongs to it.
 */

import { LocatedBook } from "../bookLocator";
import { ParsedDocument } from "../parsedDocument";
import { Verse, VerseFilter } from "../types";
import { attr, hasTag, iterElements, xmlEvents } from "../xml/xmlTree";
import {
  ExtractionStrategy,
  NO_MATCH,
  StrategyResult,
  matched,
} from "./ExtractionStrategy";
import { buildVerse, cleanText, parseLeadingInt, passesFilter } from "./common";

interface OpenVerse {
  chapter: number;
  verse: number;
  text: string;
}

export class UsfxStrategy implements ExtractionStrategy {
  readonly kind = "usfx" as const;

  verses(
    _document: ParsedDocument,
    book: LocatedBook,
    filter: VerseFilter,
  ): StrategyResult<Verse[]> {
    const verses: Verse[] = [];
    let currentChapter: number | null = null;
    let open: OpenVerse | null = null;
    let sawMarkers = false;

    const close = (verse: OpenVerse | null) => {
      if (!verse || !passesFilter(verse.chapter, verse.verse, filter)) return;
      const text = cleanText(verse.text);
      if (text) {
        verses.push(buildVerse(book, verse.chapter, verse.verse, text));
      }
    };

    for (const event of xmlEvents(book.element)) {
      if (event.type === "text") {
        if (open) open.text += event.text;
        continue;
      }
      if (event.type === "close") continue;

      const element = event.element;

      if (hasTag(element, "c")) {
        const chapter = parseLeadingInt(attr(element, "id"));
        if (chapter === null) continue;
        close(open);
        open = null;
        currentChapter = chapter;
        sawMarkers = true;
      } else if (hasTag(element, "v")) {
        const verse = parseLeadingInt(attr(element, "id"));
        if (verse === null) continue;
        close(open);
        sawMarkers = true;
        open =
          currentChapter === null
            ? null
            : { chapter: currentChapter, verse, text: "" };
      } else if (hasTag(element, "ve")) {
        close(open);
        open = null;
      }
    }

    close(open);

    return sawMarkers ? matched(verses) : NO_MATCH;
  }

  chapters(
    _document: ParsedDocument,
    book: LocatedBook,
  ): StrategyResult<number[]> {
    const chapters: number[] = [];

    for (const element of iterElements(book.element)) {
      if (!hasTag(element, "c")) continue;
      const chapter = parseLeadingInt(attr(element, "id"));
      if (chapter !== null) chapters.push(chapter);
    }

    return chapters.length > 0 ? matched(chapters) : NO_MATCH;
  }
}
