import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { resolveBookSelector } from "../../../bible/bookIdNormalizer";
import { isCanonicalBookId } from "../../../bible/bookNames";
import { searchVerses } from "../../../bible/verseSearch";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { ValidationError } from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  TranslationSummaryDto,
  VerseDto,
  toTranslationSummary,
  toVerseDto,
} from "../dto/BibleDto";
import { TranslationResolver } from "../services/TranslationResolver";

export interface SearchVersesRequest {
  translationId: string;
  query: string;
  /** "OT", "NT" or a comma list of book ids; all canonical books when absent */
  books?: string;
  limit: number;
}

export interface SearchResultsDto {
  translation: TranslationSummaryDto;
  query: string;
  total_results: number;
  results: VerseDto[];
}

/**
 * Search Verses Use Case
 *
 * Unknown ids in the book list are dropped; a list with no canonical book
 * left is rejected.
 */
@injectable()
export class SearchVersesUseCase
  implements IUseCase<SearchVersesRequest, SearchResultsDto>
{
  constructor(
    @inject(TYPES.TranslationResolver) private resolver: TranslationResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(request: SearchVersesRequest): Promise<SearchResultsDto> {
    const translation = await this.resolver.resolve(request.translationId);

    const bookIds = resolveBookSelector(request.books).filter(isCanonicalBookId);
    if (bookIds.length === 0) {
      throw new ValidationError("No valid books specified", "books");
    }

    const document = await this.resolver.document(translation);
    const results = document
      ? searchVerses(document, request.query, bookIds, request.limit)
      : [];

    this.logger.info("Verse search finished", {
      translationId: translation.identifier,
      query: request.query,
      count: results.length,
    });

    return {
      translation: toTranslationSummary(translation),
      query: request.query,
      total_results: results.length,
      results: results.map(toVerseDto),
    };
  }
}
