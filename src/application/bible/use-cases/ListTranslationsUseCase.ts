import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { TranslationCatalog } from "../../../domain/translations/TranslationCatalog";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { TranslationSummaryDto, toTranslationSummary } from "../dto/BibleDto";

/**
 * List Translations Use Case
 *
 * Returns every catalogued translation in source order
 */
@injectable()
export class ListTranslationsUseCase
  implements IUseCase<void, TranslationSummaryDto[]>
{
  constructor(
    @inject(TYPES.TranslationCatalog) private catalog: TranslationCatalog,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(): Promise<TranslationSummaryDto[]> {
    this.logger.info("Listing translations");

    const translations = await this.catalog.list();

    return translations.map(toTranslationSummary);
  }
}
