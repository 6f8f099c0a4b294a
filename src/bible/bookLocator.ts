/**
 * Book Locator
 *
 * Finds the element holding one book, trying in order:
 * 1. <book id="raw">, then <book id="NORMALIZED">
 * 2. any element whose osisID or id equals the raw or normalised id
 * 3. an OSIS book div whose osisID maps to the same code ("Gen" -> "GEN")
 * 4. a <book> whose name contains or starts with the normalised id
 */

import { BOOK_NAMES } from "./bookNames";
import { canonicalBookId, normalizeBookId } from "./bookIdNormalizer";
import { BookRef } from "./types";
import { XmlElement, attr, findDescendant, hasTag } from "./xml/xmlTree";

export interface LocatedBook extends BookRef {
  element: XmlElement;
  osisId?: string; // Prefix for osisID lookups, e.g. "Gen"
}

function firstOsisToken(value: string | undefined): string | undefined {
  return value?.trim().split(/\s+/)[0];
}

export function describeBook(
  element: XmlElement,
  fallbackId: string,
  query = fallbackId,
): LocatedBook {
  const bookId = attr(element, "id")?.trim().toUpperCase() || fallbackId;
  const osisId = firstOsisToken(attr(element, "osisID"));

  return {
    element,
    bookId,
    bookName: attr(element, "name") || BOOK_NAMES[bookId] || query,
    osisId: osisId && !osisId.includes(".") ? osisId : undefined,
  };
}

export function locateBook(
  root: XmlElement,
  bookQuery: string,
): LocatedBook | null {
  const raw = bookQuery.trim();
  if (!raw) return null;

  const normalized = normalizeBookId(raw);
  const found = (element: XmlElement | null) =>
    element ? describeBook(element, normalized, raw) : null;

  const bookWithId = (id: string) =>
    findDescendant(root, (el) => hasTag(el, "book") && attr(el, "id") === id);

  const byBookId = bookWithId(raw) ?? bookWithId(normalized);
  if (byBookId) return found(byBookId);

  const attributeSearches: Array<[string, string]> = [
    ["osisID", raw],
    ["osisID", normalized],
    ["id", raw],
    ["id", normalized],
  ];
  for (const [name, value] of attributeSearches) {
    const match = findDescendant(root, (el) => attr(el, name) === value);
    if (match) return found(match);
  }

  const osisBook = findDescendant(root, (el) => {
    const osisId = firstOsisToken(attr(el, "osisID"));
    return (
      osisId !== undefined &&
      !osisId.includes(".") &&
      canonicalBookId(osisId) === normalized
    );
  });
  if (osisBook) return found(osisBook);

  const byName = findDescendant(root, (el) => {
    if (!hasTag(el, "book")) return false;
    const name = (attr(el, "name") ?? "").toUpperCase();
    return name.includes(normalized) || name.startsWith(normalized);
  });
  return found(byName);
}
