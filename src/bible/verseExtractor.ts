/**
 * Verse Extractor
 *
 * Resolves the book, then runs the strategy for the document's format.
 * Undetected formats try every strategy in FALLBACK_ORDER and keep the
 * first one that yields verses.
 */

import { LocatedBook, locateBook } from "./bookLocator";
import { ParsedDocument } from "./parsedDocument";
import { strategiesFor } from "./strategies";
import { Verse, VerseFilter } from "./types";

/**
 * Order by chapter then verse; the first occurrence of a verse wins
 */
export function sortVerses(verses: Verse[]): Verse[] {
  const seen = new Set<string>();
  return [...verses]
    .sort((a, b) => a.chapter - b.chapter || a.verse - b.verse)
    .filter((verse) => {
      const key = `${verse.chapter}:${verse.verse}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
}

export function versesForBook(
  document: ParsedDocument,
  book: LocatedBook,
  filter: VerseFilter = {},
): Verse[] {
  for (const strategy of strategiesFor(document.kind)) {
    const result = strategy.verses(document, book, filter);
    if (result.matched && result.value.length > 0) {
      return sortVerses(result.value);
    }
  }
  return [];
}

export function extractVerses(
  document: ParsedDocument,
  bookQuery: string,
  chapter: number,
  verseStart?: number,
  verseEnd?: number,
): Verse[] {
  const book = locateBook(document.root, bookQuery);
  if (!book) return [];

  return versesForBook(document, book, { chapter, verseStart, verseEnd });
}
