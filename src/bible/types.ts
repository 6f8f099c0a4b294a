/**
 * Bible Types and Interfaces
 */

export type FormatKind =
  | "osis-sid-eid"
  | "osis-attribute"
  | "usfx"
  | "generic-chapter-verse"
  | "unknown";

export interface VerseRef {
  bookId: string;
  chapter: number;
  verse: number;
}

export interface Verse extends VerseRef {
  bookName: string;
  text: string;
}

export interface ChapterRef {
  bookId: string;
  bookName: string;
  chapter: number;
}

export interface BookRef {
  bookId: string;
  bookName: string;
}

export interface ReferenceRange {
  bookId: string;
  chapter: number;
  verseStart: number;
  verseEnd: number;
}

export interface VerseFilter {
  chapter?: number; // All chapters when omitted
  verseStart?: number;
  verseEnd?: number;
}
