import { LocatedBook } from "../bookLocator";
import { ParsedDocument } from "../parsedDocument";
import { FormatKind, Verse, VerseFilter } from "../types";

/**
 * Outcome of one strategy: either it recognised its own markup in the book
 * (possibly with zero results after filtering) or it did not apply at all.
 */
export type StrategyResult<T> =
  | { matched: true; value: T }
  | { matched: false };

export type StrategyKind = Exclude<FormatKind, "unknown">;

export interface ExtractionStrategy {
  readonly kind: StrategyKind;

  verses(
    document: ParsedDocument,
    book: LocatedBook,
    filter: VerseFilter,
  ): StrategyResult<Verse[]>;

  chapters(document: ParsedDocument, book: LocatedBook): StrategyResult<number[]>;
}

export function matched<T>(value: T): StrategyResult<T> {
  return { matched: true, value };
}

export const NO_MATCH = { matched: false } as const;
