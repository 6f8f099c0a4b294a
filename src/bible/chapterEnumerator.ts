import { locateBook } from "./bookLocator";
import { ParsedDocument } from "./parsedDocument";
import { strategiesFor } from "./strategies";
import { ChapterRef } from "./types";

/**
 * Distinct chapter numbers of a book, ascending
 *
 * Empty when the book is missing or carries no chapter markers.
 */
export function chaptersForBook(
  document: ParsedDocument,
  bookQuery: string,
): ChapterRef[] {
  const book = locateBook(document.root, bookQuery);
  if (!book) return [];

  for (const strategy of strategiesFor(document.kind)) {
    const result = strategy.chapters(document, book);
    if (!result.matched || result.value.length === 0) continue;

    return [...new Set(result.value)]
      .sort((a, b) => a - b)
      .map((chapter) => ({
        bookId: book.bookId,
        bookName: book.bookName,
        chapter,
      }));
  }

  return [];
}
