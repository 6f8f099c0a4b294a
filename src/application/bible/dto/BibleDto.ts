import { Translation } from "../../../domain/translations/entities/Translation";
import { BookRef, ChapterRef, Verse } from "../../../bible/types";

/**
 * Bible Data Transfer Objects
 *
 * Wire shapes of the JSON API. Field names are snake_case.
 */

export interface TranslationSummaryDto {
  identifier: string;
  name: string;
  language: string;
  language_code: string;
  license: string;
}

export interface BookDto {
  id: string;
  name: string;
}

export interface ChapterDto {
  book_id: string;
  book: string;
  chapter: number;
}

export interface VerseDto {
  book_id: string;
  book: string;
  chapter: number;
  verse: number;
  text: string;
}

export interface PassageDto {
  reference: string;
  verses: VerseDto[];
  text: string;
  translation_id: string;
  translation_name: string;
  translation_note: string;
}

export function toTranslationSummary(translation: Translation): TranslationSummaryDto {
  return {
    identifier: translation.identifier,
    name: translation.name,
    language: translation.language,
    language_code: translation.languageCode,
    license: translation.license,
  };
}

export function toBookDto(book: BookRef): BookDto {
  return { id: book.bookId, name: book.bookName };
}

export function toChapterDto(chapter: ChapterRef): ChapterDto {
  return {
    book_id: chapter.bookId,
    book: chapter.bookName,
    chapter: chapter.chapter,
  };
}

export function toVerseDto(verse: Verse): VerseDto {
  return {
    book_id: verse.bookId,
    book: verse.bookName,
    chapter: verse.chapter,
    verse: verse.verse,
    text: verse.text,
  };
}

/**
 * Join verses into one passage; with verseNumbers each verse is
 * prefixed "(n) "
 */
export function toPassageDto(
  reference: string,
  verses: VerseDto[],
  translation: TranslationSummaryDto,
  verseNumbers = false,
): PassageDto {
  const text = verses
    .map((verse) => (verseNumbers ? `(${verse.verse}) ${verse.text}` : verse.text))
    .join(" ");

  return {
    reference,
    verses,
    text,
    translation_id: translation.identifier,
    translation_name: translation.name,
    translation_note: translation.license,
  };
}
