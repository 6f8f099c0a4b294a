import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { ILogger } from "../../infrastructure/logging/ILogger";
import { SourceUnavailableError } from "../../shared/errors/DomainError";
import { BibleLibrary } from "./BibleLibrary";
import { Translation } from "./entities/Translation";
import { IDocumentSource } from "./sources/IDocumentSource";
import { describeTranslation, identifierFromPath } from "./translationMetadata";

/**
 * Translation Catalog
 *
 * Lists the translations held by the document source. The list is built on
 * first use and kept for the lifetime of the catalog; a failed listing is
 * not cached so the next call retries.
 */
@injectable()
export class TranslationCatalog {
  private loading: Promise<Translation[]> | null = null;

  constructor(
    @inject(TYPES.DocumentSource) private readonly source: IDocumentSource,
    @inject(TYPES.BibleLibrary) private readonly library: BibleLibrary,
    @inject(TYPES.Logger) private readonly logger: ILogger,
  ) {}

  /**
   * Connect to the document source
   *
   * @throws SourceUnavailableError when the source cannot be reached
   */
  async initialize(): Promise<void> {
    try {
      await this.source.connect();
    } catch (error) {
      throw new SourceUnavailableError("Document source is unavailable", error);
    }
    this.logger.info("Document source connected");
  }

  list(): Promise<Translation[]> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  async get(identifier: string): Promise<Translation | null> {
    const wanted = identifier.trim().toLowerCase();
    const translations = await this.list();
    return translations.find((t) => t.identifier === wanted) ?? null;
  }

  private async load(): Promise<Translation[]> {
    let paths: string[];
    try {
      paths = await this.source.listSources();
    } catch (error) {
      throw new SourceUnavailableError("Failed to list translation sources", error);
    }

    // Map keeps first-insertion order, so a replaced entry stays in place
    const byIdentifier = new Map<string, Translation>();

    for (const path of paths) {
      const identifier = identifierFromPath(path);
      if (!identifier) continue;

      const parsed = await this.library.parsed(path);
      if (!parsed) continue;

      const previous = byIdentifier.get(identifier);
      if (previous) {
        this.logger.warn("Duplicate translation identifier, keeping the later source", {
          identifier,
          replaced: previous.sourcePath,
          kept: path,
        });
      }
      byIdentifier.set(identifier, describeTranslation(identifier, path, parsed));
    }

    const translations = [...byIdentifier.values()];
    this.logger.info("Translation catalog loaded", {
      count: translations.length,
    });
    return translations;
  }
}
