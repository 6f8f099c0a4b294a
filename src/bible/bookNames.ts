/**
 * Protestant canon: book codes, display names and testament splits.
 *
 * Book data lives in data/books.json, one entry per book in canon order.
 */

import booksData from "./data/books.json";

export interface BookEntry {
  id: string; // Canonical 3-letter code, e.g. "GEN", "1SA"
  name: string; // Display name, e.g. "1 Samuel"
  osis: string; // OSIS short code, e.g. "1Sam"
  aliases: string[]; // Extra uppercase spellings without spaces
}

export const CANON: readonly BookEntry[] = booksData;

export const PROTESTANT_BOOKS: readonly string[] = CANON.map((b) => b.id);

const NT_START = PROTESTANT_BOOKS.indexOf("MAT");

export const OT_BOOKS: readonly string[] = PROTESTANT_BOOKS.slice(0, NT_START);
export const NT_BOOKS: readonly string[] = PROTESTANT_BOOKS.slice(NT_START);

export const BOOK_NAMES: Readonly<Record<string, string>> = Object.fromEntries(
  CANON.map((b) => [b.id, b.name]),
);

export function isCanonicalBookId(id: string): boolean {
  return BOOK_NAMES[id.toUpperCase()] !== undefined;
}
