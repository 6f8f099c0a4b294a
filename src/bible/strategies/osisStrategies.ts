/**
 * OSIS extraction
 *
 * Two flavours share osisID addressing ("Gen.1.1"):
 * - container verses: <verse osisID="Gen.1.1">In the beginning…</verse>
 * - milestone verses: <verse sID="Gen.1.1" osisID="Gen.1.1"/>In the beginning…<verse eID="Gen.1.1"/>
 */

import { LocatedBook } from "../bookLocator";
import { ParsedDocument } from "../parsedDocument";
import { Verse, VerseFilter } from "../types";
import {
  XmlElement,
  allText,
  attr,
  directText,
  hasTag,
  iterElements,
  xmlEvents,
} from "../xml/xmlTree";
import {
  ExtractionStrategy,
  NO_MATCH,
  StrategyResult,
  matched,
} from "./ExtractionStrategy";
import { buildVerse, cleanText, parseLeadingInt, passesFilter } from "./common";

interface OsisAddress {
  chapter: number;
  verse: number | null;
}

function bookPrefix(book: LocatedBook): string {
  return `${book.osisId ?? book.bookId}.`.toLowerCase();
}

/**
 * Chapter and verse of an osisID inside the given book, e.g. "Gen.1.1"
 * with prefix "gen." -> { chapter: 1, verse: 1 }. Only the first token of a
 * multi-reference osisID is read.
 */
function readAddress(
  osisId: string | undefined,
  prefix: string,
): OsisAddress | null {
  const first = osisId?.trim().split(/\s+/)[0];
  if (!first || !first.toLowerCase().startsWith(prefix)) return null;

  const parts = first.split(".");
  const chapter = parseLeadingInt(parts[1]);
  if (chapter === null) return null;

  return {
    chapter,
    verse: parts.length >= 3 ? parseLeadingInt(parts[2]) : null,
  };
}

function osisChapters(
  document: ParsedDocument,
  book: LocatedBook,
): StrategyResult<number[]> {
  const prefix = bookPrefix(book);
  const chapters: number[] = [];

  for (const element of iterElements(document.root)) {
    const address = readAddress(attr(element, "osisID"), prefix);
    if (address) chapters.push(address.chapter);
  }

  return chapters.length > 0 ? matched(chapters) : NO_MATCH;
}

export class OsisAttributeStrategy implements ExtractionStrategy {
  readonly kind = "osis-attribute" as const;

  verses(
    document: ParsedDocument,
    book: LocatedBook,
    filter: VerseFilter,
  ): StrategyResult<Verse[]> {
    const prefix = bookPrefix(book);
    const verses: Verse[] = [];
    let sawVerses = false;

    for (const element of iterElements(document.root)) {
      const address = readAddress(attr(element, "osisID"), prefix);
      if (!address || address.verse === null) continue;
      sawVerses = true;

      if (!passesFilter(address.chapter, address.verse, filter)) continue;

      const text = cleanText(directText(element)) || cleanText(allText(element));
      if (text) {
        verses.push(buildVerse(book, address.chapter, address.verse, text));
      }
    }

    return sawVerses ? matched(verses) : NO_MATCH;
  }

  chapters(document: ParsedDocument, book: LocatedBook): StrategyResult<number[]> {
    return osisChapters(document, book);
  }
}

interface OpenMilestone {
  id: string;
  address: OsisAddress & { verse: number };
  text: string;
}

function isVerseStart(element: XmlElement): boolean {
  return hasTag(element, "verse") && attr(element, "sID") !== undefined;
}

function isVerseEnd(element: XmlElement): boolean {
  return hasTag(element, "verse") && attr(element, "eID") !== undefined;
}

export class OsisMilestoneStrategy implements ExtractionStrategy {
  readonly kind = "osis-sid-eid" as const;

  verses(
    document: ParsedDocument,
    book: LocatedBook,
    filter: VerseFilter,
  ): StrategyResult<Verse[]> {
    const prefix = bookPrefix(book);
    const verses: Verse[] = [];
    let open: OpenMilestone | null = null;
    let sawMilestones = false;

    const close = (milestone: OpenMilestone | null) => {
      if (!milestone) return;
      const { chapter, verse } = milestone.address;
      if (!passesFilter(chapter, verse, filter)) return;
      const text = cleanText(milestone.text);
      if (text) verses.push(buildVerse(book, chapter, verse, text));
    };

    for (const event of xmlEvents(document.root)) {
      if (event.type === "text") {
        if (open) open.text += event.text;
        continue;
      }
      if (event.type === "close") continue;

      const element = event.element;

      if (isVerseStart(element)) {
        // A missing eID ends the previous verse at the next sID
        close(open);
        open = null;

        const id = attr(element, "sID") ?? "";
        const address = readAddress(attr(element, "osisID") ?? id, prefix);
        if (address && address.verse !== null) {
          sawMilestones = true;
          open = {
            id,
            address: { chapter: address.chapter, verse: address.verse },
            text: "",
          };
        }
      } else if (isVerseEnd(element)) {
        if (open && attr(element, "eID") === open.id) {
          close(open);
          open = null;
        }
      }
    }

    close(open);

    return sawMilestones ? matched(verses) : NO_MATCH;
  }

  chapters(document: ParsedDocument, book: LocatedBook): StrategyResult<number[]> {
    return osisChapters(document, book);
  }
}
