import { LocatedBook } from "../bookLocator";
import { Verse, VerseFilter } from "../types";

/**
 * Leading integer of an id such as "16" or "16-17"; null when there is none
 */
export function parseLeadingInt(value: string | undefined): number | null {
  const match = value ? /^\s*(\d+)/.exec(value) : null;
  if (!match) return null;
  const parsed = parseInt(match[1], 10);
  return parsed > 0 ? parsed : null;
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function passesFilter(
  chapter: number,
  verse: number,
  filter: VerseFilter,
): boolean {
  if (filter.chapter !== undefined && chapter !== filter.chapter) return false;
  if (filter.verseStart !== undefined && verse < filter.verseStart) return false;
  if (filter.verseEnd !== undefined && verse > filter.verseEnd) return false;
  return true;
}

export function buildVerse(
  book: LocatedBook,
  chapter: number,
  verse: number,
  text: string,
): Verse {
  return {
    bookId: book.bookId,
    bookName: book.bookName,
    chapter,
    verse,
    text,
  };
}
