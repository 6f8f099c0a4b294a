import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { resolveBookSelector } from "../../../bible/bookIdNormalizer";
import { RandomSource, pickRandomVerse } from "../../../bible/randomVerse";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { EntityNotFoundError } from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  TranslationSummaryDto,
  VerseDto,
  toTranslationSummary,
  toVerseDto,
} from "../dto/BibleDto";
import { TranslationResolver } from "../services/TranslationResolver";

export interface GetRandomVerseRequest {
  translationId?: string;
  /** "OT", "NT" or a comma list of book ids; all canonical books when absent */
  books?: string;
}

export interface RandomVerseDto {
  translation: TranslationSummaryDto;
  random_verse: VerseDto;
}

/**
 * Get Random Verse Use Case
 */
@injectable()
export class GetRandomVerseUseCase
  implements IUseCase<GetRandomVerseRequest, RandomVerseDto>
{
  constructor(
    @inject(TYPES.TranslationResolver) private resolver: TranslationResolver,
    @inject(TYPES.RandomSource) private random: RandomSource,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(request: GetRandomVerseRequest): Promise<RandomVerseDto> {
    const translation = await this.resolver.resolve(request.translationId);
    const document = await this.resolver.document(translation);
    const bookIds = resolveBookSelector(request.books);

    const verse = document
      ? pickRandomVerse(document, bookIds, this.random)
      : null;

    if (!verse) {
      this.logger.warn("No verse available for random pick", {
        translationId: translation.identifier,
        books: request.books,
      });
      throw new EntityNotFoundError("Verse", request.books ?? "all books");
    }

    return {
      translation: toTranslationSummary(translation),
      random_verse: toVerseDto(verse),
    };
  }
}
