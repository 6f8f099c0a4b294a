/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),

  // Logging
  Logger: Symbol.for("Logger"),

  // Storage
  SupabaseClient: Symbol.for("SupabaseClient"),
  DocumentSource: Symbol.for("DocumentSource"),

  // Domain Services
  BibleLibrary: Symbol.for("BibleLibrary"),
  TranslationCatalog: Symbol.for("TranslationCatalog"),
  RandomSource: Symbol.for("RandomSource"),
  TranslationResolver: Symbol.for("TranslationResolver"),

  // Use Cases
  ListTranslationsUseCase: Symbol.for("ListTranslationsUseCase"),
  GetTranslationBooksUseCase: Symbol.for("GetTranslationBooksUseCase"),
  GetBookChaptersUseCase: Symbol.for("GetBookChaptersUseCase"),
  GetChapterVersesUseCase: Symbol.for("GetChapterVersesUseCase"),
  GetRandomVerseUseCase: Symbol.for("GetRandomVerseUseCase"),
  ResolveReferenceUseCase: Symbol.for("ResolveReferenceUseCase"),
  SearchVersesUseCase: Symbol.for("SearchVersesUseCase"),
} as const;

export type DITypes = typeof TYPES;
