import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { chaptersForBook } from "../../../bible/chapterEnumerator";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { EntityNotFoundError } from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  ChapterDto,
  TranslationSummaryDto,
  toChapterDto,
  toTranslationSummary,
} from "../dto/BibleDto";
import { TranslationResolver } from "../services/TranslationResolver";

export interface GetBookChaptersRequest {
  translationId: string;
  bookId: string;
}

export interface BookChaptersDto {
  translation: TranslationSummaryDto;
  chapters: ChapterDto[];
}

/**
 * Get Book Chapters Use Case
 */
@injectable()
export class GetBookChaptersUseCase
  implements IUseCase<GetBookChaptersRequest, BookChaptersDto>
{
  constructor(
    @inject(TYPES.TranslationResolver) private resolver: TranslationResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(request: GetBookChaptersRequest): Promise<BookChaptersDto> {
    this.logger.info("Fetching chapters", { ...request });

    const translation = await this.resolver.resolve(request.translationId);
    const document = await this.resolver.document(translation);
    const chapters = document ? chaptersForBook(document, request.bookId) : [];

    if (chapters.length === 0) {
      this.logger.warn("Book not found", { ...request });
      throw new EntityNotFoundError("Book", request.bookId);
    }

    return {
      translation: toTranslationSummary(translation),
      chapters: chapters.map(toChapterDto),
    };
  }
}
