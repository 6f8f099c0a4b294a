import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { DocumentParseResult, ParsedDocument } from "../../bible/parsedDocument";
import { ILogger } from "../../infrastructure/logging/ILogger";
import { MalformedSourceError } from "../../shared/errors/DomainError";
import { IDocumentSource } from "./sources/IDocumentSource";

/**
 * Bible Library
 *
 * Load-once cache of source documents. Content and parse results are kept
 * per source path as promises, so concurrent first reads of the same path
 * share one fetch and one parse. Nothing is evicted.
 */
@injectable()
export class BibleLibrary {
  private readonly contents = new Map<string, Promise<string | null>>();
  private readonly parses = new Map<string, Promise<DocumentParseResult | null>>();

  constructor(
    @inject(TYPES.DocumentSource) private readonly source: IDocumentSource,
    @inject(TYPES.Logger) private readonly logger: ILogger,
  ) {}

  /**
   * Raw document text, or null when the source cannot deliver it
   */
  content(path: string): Promise<string | null> {
    let pending = this.contents.get(path);
    if (!pending) {
      pending = this.fetchContent(path);
      this.contents.set(path, pending);
    }
    return pending;
  }

  /**
   * Parse result of a document; null when it could not be fetched
   */
  parsed(path: string): Promise<DocumentParseResult | null> {
    let pending = this.parses.get(path);
    if (!pending) {
      pending = this.parseContent(path);
      this.parses.set(path, pending);
    }
    return pending;
  }

  /**
   * The parsed document, or null when it is unavailable or malformed
   */
  async document(path: string): Promise<ParsedDocument | null> {
    const result = await this.parsed(path);
    return result?.ok ? result.document : null;
  }

  private async fetchContent(path: string): Promise<string | null> {
    try {
      return await this.source.fetch(path);
    } catch (error) {
      this.logger.warn("Failed to fetch source document", {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async parseContent(path: string): Promise<DocumentParseResult | null> {
    const content = await this.content(path);
    if (content === null) return null;

    const result = ParsedDocument.parse(content);
    if (result.ok) {
      this.logger.debug("Parsed source document", {
        path,
        format: result.document.kind,
      });
    } else {
      this.logger.warn("Source document is not well-formed XML", {
        error: new MalformedSourceError(path, result.error).toJSON(),
      });
    }
    return result;
  }
}
