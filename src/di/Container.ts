import "reflect-metadata";
import { container, instanceCachingFactory } from "tsyringe";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";

// Storage
import { SupabaseClient } from "../infrastructure/storage/SupabaseClient";
import { IDocumentSource } from "../domain/translations/sources/IDocumentSource";
import { FileSystemDocumentSource } from "../infrastructure/sources/FileSystemDocumentSource";
import { SupabaseStorageDocumentSource } from "../infrastructure/sources/SupabaseStorageDocumentSource";

// Domain Services
import { BibleLibrary } from "../domain/translations/BibleLibrary";
import { TranslationCatalog } from "../domain/translations/TranslationCatalog";
import { RandomSource } from "../bible/randomVerse";
import { TranslationResolver } from "../application/bible/services/TranslationResolver";

// Use Cases
import { ListTranslationsUseCase } from "../application/bible/use-cases/ListTranslationsUseCase";
import { GetTranslationBooksUseCase } from "../application/bible/use-cases/GetTranslationBooksUseCase";
import { GetBookChaptersUseCase } from "../application/bible/use-cases/GetBookChaptersUseCase";
import { GetChapterVersesUseCase } from "../application/bible/use-cases/GetChapterVersesUseCase";
import { GetRandomVerseUseCase } from "../application/bible/use-cases/GetRandomVerseUseCase";
import { ResolveReferenceUseCase } from "../application/bible/use-cases/ResolveReferenceUseCase";
import { SearchVersesUseCase } from "../application/bible/use-cases/SearchVersesUseCase";

/**
 * Dependency Injection Container Configuration
 *
 * Registers all dependencies and their implementations
 */
export class DIContainer {
  static initialize(): void {
    // Configuration
    container.registerSingleton<IConfig>(TYPES.Config, EnvConfig);

    // Logging
    container.registerSingleton<ILogger>(TYPES.Logger, PinoLogger);

    // Storage
    container.registerSingleton<SupabaseClient>(
      TYPES.SupabaseClient,
      SupabaseClient,
    );
    container.register<IDocumentSource>(TYPES.DocumentSource, {
      useFactory: instanceCachingFactory<IDocumentSource>((c) => {
        const config = c.resolve<IConfig>(TYPES.Config);
        return config.bibleSource === "supabase"
          ? c.resolve(SupabaseStorageDocumentSource)
          : c.resolve(FileSystemDocumentSource);
      }),
    });

    // Domain Services (singletons: they own the caches)
    container.registerSingleton(TYPES.BibleLibrary, BibleLibrary);
    container.registerSingleton(TYPES.TranslationCatalog, TranslationCatalog);
    container.register<RandomSource>(TYPES.RandomSource, {
      useValue: Math.random,
    });
    container.register(TYPES.TranslationResolver, {
      useClass: TranslationResolver,
    });

    DIContainer.registerUseCases();
  }

  static registerUseCases(): void {
    container.register(TYPES.ListTranslationsUseCase, {
      useClass: ListTranslationsUseCase,
    });
    container.register(TYPES.GetTranslationBooksUseCase, {
      useClass: GetTranslationBooksUseCase,
    });
    container.register(TYPES.GetBookChaptersUseCase, {
      useClass: GetBookChaptersUseCase,
    });
    container.register(TYPES.GetChapterVersesUseCase, {
      useClass: GetChapterVersesUseCase,
    });
    container.register(TYPES.GetRandomVerseUseCase, {
      useClass: GetRandomVerseUseCase,
    });
    container.register(TYPES.ResolveReferenceUseCase, {
      useClass: ResolveReferenceUseCase,
    });
    container.register(TYPES.SearchVersesUseCase, {
      useClass: SearchVersesUseCase,
    });
  }
}

// Initialize container on module load
DIContainer.initialize();

export { container };
