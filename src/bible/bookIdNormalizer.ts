/**
 * Book Identifier Normalizer
 *
 * Maps book names and abbreviations to canonical 3-letter codes:
 * - "Matthew", "Matt" -> "MAT"
 * - "1 Samuel", "1Sam", "1SAMUEL" -> "1SA"
 * - "Ps", "Psalms" -> "PSA"
 *
 * Three-character input is taken as a code already and is not checked
 * against the canon, so "NAH" stays "NAH" even though Nahum is "NAM".
 */

import { CANON, OT_BOOKS, NT_BOOKS, PROTESTANT_BOOKS } from "./bookNames";

function condense(value: string): string {
  return value.toUpperCase().replace(/\s+/g, "");
}

// Full names, OSIS short codes and common abbreviations -> canonical code
const ALIASES: ReadonlyMap<string, string> = (() => {
  const aliases = new Map<string, string>();
  for (const book of CANON) {
    aliases.set(condense(book.name), book.id);
    aliases.set(condense(book.osis), book.id);
    for (const alias of book.aliases) {
      aliases.set(condense(alias), book.id);
    }
  }
  return aliases;
})();

export function normalizeBookId(input: string): string {
  const upper = input.trim().toUpperCase();

  if (upper.length === 3) {
    return upper;
  }

  const condensed = condense(upper);
  return ALIASES.get(condensed) ?? condensed.slice(0, 3);
}

/**
 * Like normalizeBookId, but known spellings win over the three-character
 * shortcut. Used for identifiers read from documents, where OSIS "Nah"
 * means Nahum ("NAM").
 */
export function canonicalBookId(input: string): string {
  return ALIASES.get(condense(input)) ?? normalizeBookId(input);
}

/**
 * Resolve a book-set selector to canonical codes
 *
 * - "OT" -> Genesis..Malachi
 * - "NT" -> Matthew..Revelation
 * - "JHN,ROM" -> ["JHN", "ROM"]
 *
 * An empty selector selects the whole canon.
 */
export function resolveBookSelector(selector?: string): string[] {
  const trimmed = selector?.trim().toUpperCase() ?? "";

  if (!trimmed) return [...PROTESTANT_BOOKS];
  if (trimmed === "OT") return [...OT_BOOKS];
  if (trimmed === "NT") return [...NT_BOOKS];

  const ids = trimmed
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(normalizeBookId);

  return [...new Set(ids)];
}
