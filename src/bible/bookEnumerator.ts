import { canonicalBookId } from "./bookIdNormalizer";
import { LocatedBook, describeBook } from "./bookLocator";
import { ParsedDocument } from "./parsedDocument";
import { BookRef } from "./types";
import { XmlElement, attr, hasTag, iterElements } from "./xml/xmlTree";

function bookKey(element: XmlElement): string | undefined {
  if (hasTag(element, "book")) {
    return attr(element, "id") ?? attr(element, "name");
  }
  // OSIS: <div type="book" osisID="Gen">
  if (attr(element, "type") === "book") {
    return attr(element, "osisID");
  }
  return undefined;
}

/**
 * Book elements of a document in document order, one per book id
 */
export function findBooks(document: ParsedDocument): LocatedBook[] {
  const books: LocatedBook[] = [];
  const seen = new Set<string>();

  for (const element of iterElements(document.root)) {
    const key = bookKey(element)?.trim();
    if (!key) continue;

    const book = describeBook(element, canonicalBookId(key), key);
    if (seen.has(book.bookId)) continue;

    seen.add(book.bookId);
    books.push(book);
  }

  return books;
}

export function listBooks(document: ParsedDocument): BookRef[] {
  return findBooks(document).map(({ bookId, bookName }) => ({
    bookId,
    bookName,
  }));
}
