import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { extractVerses } from "../../../bible/verseExtractor";
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

export interface GetChapterVersesRequest {
  translationId: string;
  bookId: string;
  chapter: number;
}

export interface ChapterVersesDto {
  translation: TranslationSummaryDto;
  verses: VerseDto[];
}

/**
 * Get Chapter Verses Use Case
 */
@injectable()
export class GetChapterVersesUseCase
  implements IUseCase<GetChapterVersesRequest, ChapterVersesDto>
{
  constructor(
    @inject(TYPES.TranslationResolver) private resolver: TranslationResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(request: GetChapterVersesRequest): Promise<ChapterVersesDto> {
    this.logger.info("Fetching chapter verses", { ...request });

    const translation = await this.resolver.resolve(request.translationId);
    const document = await this.resolver.document(translation);
    const verses = document
      ? extractVerses(document, request.bookId, request.chapter)
      : [];

    if (verses.length === 0) {
      this.logger.warn("Chapter not found", { ...request });
      throw new EntityNotFoundError(
        "Book/chapter",
        `${request.bookId} ${request.chapter}`,
      );
    }

    this.logger.info("Chapter verses found", {
      translationId: translation.identifier,
      count: verses.length,
    });

    return {
      translation: toTranslationSummary(translation),
      verses: verses.map(toVerseDto),
    };
  }
}
