import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { listBooks } from "../../../bible/bookEnumerator";
import { isCanonicalBookId } from "../../../bible/bookNames";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  BookDto,
  TranslationSummaryDto,
  toBookDto,
  toTranslationSummary,
} from "../dto/BibleDto";
import { TranslationResolver } from "../services/TranslationResolver";

export interface GetTranslationBooksRequest {
  translationId: string;
}

export interface TranslationBooksDto {
  translation: TranslationSummaryDto;
  books: BookDto[];
}

/**
 * Get Translation Books Use Case
 *
 * Lists the canonical books present in a translation, in document order.
 * Deuterocanonical and unrecognised books are left out.
 */
@injectable()
export class GetTranslationBooksUseCase
  implements IUseCase<GetTranslationBooksRequest, TranslationBooksDto>
{
  constructor(
    @inject(TYPES.TranslationResolver) private resolver: TranslationResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(
    request: GetTranslationBooksRequest,
  ): Promise<TranslationBooksDto> {
    const translation = await this.resolver.resolve(request.translationId);
    const document = await this.resolver.document(translation);

    const books = document
      ? listBooks(document).filter((book) => isCanonicalBookId(book.bookId))
      : [];

    this.logger.info("Books listed", {
      translationId: translation.identifier,
      count: books.length,
    });

    return {
      translation: toTranslationSummary(translation),
      books: books.map(toBookDto),
    };
  }
}
