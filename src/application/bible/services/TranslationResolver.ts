import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ParsedDocument } from "../../../bible/parsedDocument";
import { BibleLibrary } from "../../../domain/translations/BibleLibrary";
import { Translation } from "../../../domain/translations/entities/Translation";
import { TranslationCatalog } from "../../../domain/translations/TranslationCatalog";
import {
  EntityNotFoundError,
  NoTranslationsError,
} from "../../../shared/errors/DomainError";

/**
 * Looks up the translation a request names (or the default one) and its
 * parsed document
 */
@injectable()
export class TranslationResolver {
  constructor(
    @inject(TYPES.TranslationCatalog) private catalog: TranslationCatalog,
    @inject(TYPES.BibleLibrary) private library: BibleLibrary,
  ) {}

  /**
   * Without an identifier the first catalogued translation is used
   */
  async resolve(identifier?: string): Promise<Translation> {
    if (!identifier) {
      const [first] = await this.catalog.list();
      if (!first) throw new NoTranslationsError();
      return first;
    }

    const translation = await this.catalog.get(identifier);
    if (!translation) {
      throw new EntityNotFoundError("Translation", identifier);
    }
    return translation;
  }

  /**
   * Null when the translation's document is malformed or unreadable
   */
  document(translation: Translation): Promise<ParsedDocument | null> {
    return this.library.document(translation.sourcePath);
  }
}
