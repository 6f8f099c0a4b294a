/**
 * Bible Reference Parser
 *
 * Parses verse references from request paths:
 * - "John 3:16"
 * - "Matt 5:1-10"
 * - "John+3:16" (URL-encoded spaces)
 *
 * Only one range is produced. Comma clauses ("John 3:16,18") are accepted
 * but not expanded; they come back in `ignoredClauses`.
 * Chapter-only references ("Psalm 23") and cross-chapter ranges are not
 * supported.
 */

import { ReferenceRange } from "./types";

export type ParseResult =
  | { ok: true; ranges: ReferenceRange[]; ignoredClauses: string[] }
  | { ok: false; reason: string };

const REFERENCE_PATTERN =
  /^(\d?\s*[A-Za-z]+)\s+(\d+):(\d+)(?:-(\d+))?((?:,\d+(?:-\d+)?)*)$/;

// Common short names; anything else falls back to its first three letters
const SHORT_NAMES: Record<string, string> = {
  genesis: "GEN", gen: "GEN", ge: "GEN",
  exodus: "EXO", exo: "EXO", ex: "EXO",
  psalm: "PSA", psalms: "PSA", ps: "PSA", psa: "PSA",
  proverbs: "PRO", prov: "PRO",
  isaiah: "ISA", isa: "ISA",
  matthew: "MAT", matt: "MAT", mat: "MAT", mt: "MAT",
  mark: "MRK", mk: "MRK", mar: "MRK",
  luke: "LUK", lk: "LUK", luk: "LUK",
  john: "JHN", jn: "JHN", joh: "JHN",
  acts: "ACT",
  romans: "ROM", rom: "ROM",
  revelation: "REV", rev: "REV",
};

function resolveShortName(token: string): string {
  const lower = token.toLowerCase().trim();
  return SHORT_NAMES[lower] ?? lower.replace(/\s+/g, "").toUpperCase().slice(0, 3);
}

/**
 * Parse a reference string into a single book/chapter/verse range
 *
 * Examples:
 * - "John 3:16" -> { bookId: "JHN", chapter: 3, verseStart: 16, verseEnd: 16 }
 * - "Matt 5:1-10" -> { bookId: "MAT", chapter: 5, verseStart: 1, verseEnd: 10 }
 */
export function parseReference(reference: string): ParseResult {
  const cleaned = reference.replace(/\+/g, " ").trim();

  if (!cleaned) {
    return { ok: false, reason: "empty reference" };
  }

  const match = REFERENCE_PATTERN.exec(cleaned);
  if (!match) {
    return { ok: false, reason: `unrecognised reference "${cleaned}"` };
  }

  const [, bookToken, chapterText, startText, endText, clauses] = match;
  const chapter = parseInt(chapterText, 10);
  const verseStart = parseInt(startText, 10);
  const verseEnd = endText ? parseInt(endText, 10) : verseStart;

  if (chapter < 1 || verseStart < 1) {
    return { ok: false, reason: "chapter and verse must be positive" };
  }
  if (verseEnd < verseStart) {
    return { ok: false, reason: `descending verse range ${verseStart}-${verseEnd}` };
  }

  return {
    ok: true,
    ranges: [
      {
        bookId: resolveShortName(bookToken),
        chapter,
        verseStart,
        verseEnd,
      },
    ],
    ignoredClauses: clauses ? clauses.split(",").filter(Boolean) : [],
  };
}

/**
 * Format a range back to "BOOK c:v" or "BOOK c:v-w"
 */
export function formatRange(range: ReferenceRange): string {
  const verses =
    range.verseEnd === range.verseStart
      ? `${range.verseStart}`
      : `${range.verseStart}-${range.verseEnd}`;
  return `${range.bookId} ${range.chapter}:${verses}`;
}
