import { normalizeBookId } from "./bookIdNormalizer";
import { findBooks } from "./bookEnumerator";
import { ParsedDocument } from "./parsedDocument";
import { Verse } from "./types";
import { versesForBook } from "./verseExtractor";

export type RandomSource = () => number;

/**
 * Pick one verse uniformly from every verse of the selected books
 *
 * Returns null when none of the books is present or they hold no verses.
 */
export function pickRandomVerse(
  document: ParsedDocument,
  bookIds: readonly string[],
  random: RandomSource = Math.random,
): Verse | null {
  const wanted = new Set(bookIds.map(normalizeBookId));

  const candidates = findBooks(document)
    .filter((book) => wanted.has(normalizeBookId(book.bookId)))
    .flatMap((book) => versesForBook(document, book));

  if (candidates.length === 0) return null;

  const index = Math.min(
    Math.floor(random() * candidates.length),
    candidates.length - 1,
  );
  return candidates[index];
}
