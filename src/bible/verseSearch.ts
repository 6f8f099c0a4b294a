import { normalizeBookId } from "./bookIdNormalizer";
import { findBooks } from "./bookEnumerator";
import { ParsedDocument } from "./parsedDocument";
import { Verse } from "./types";
import { versesForBook } from "./verseExtractor";

/**
 * Case-insensitive substring search over the selected books
 *
 * Books are read in document order and verses in chapter:verse order;
 * the scan stops once `limit` matches are found.
 */
export function searchVerses(
  document: ParsedDocument,
  query: string,
  bookIds: readonly string[],
  limit: number,
): Verse[] {
  const needle = query.trim().toLowerCase();
  if (!needle || limit < 1) return [];

  const wanted = new Set(bookIds.map(normalizeBookId));
  const results: Verse[] = [];

  for (const book of findBooks(document)) {
    if (!wanted.has(normalizeBookId(book.bookId))) continue;

    for (const verse of versesForBook(document, book)) {
      if (!verse.text.toLowerCase().includes(needle)) continue;
      results.push(verse);
      if (results.length >= limit) return results;
    }
  }

  return results;
}
