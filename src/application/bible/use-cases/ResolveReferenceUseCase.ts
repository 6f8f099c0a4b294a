import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { formatRange, parseReference } from "../../../bible/referenceParser";
import { extractVerses } from "../../../bible/verseExtractor";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import {
  EntityNotFoundError,
  UnparsableReferenceError,
} from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  PassageDto,
  toPassageDto,
  toTranslationSummary,
  toVerseDto,
} from "../dto/BibleDto";
import { TranslationResolver } from "../services/TranslationResolver";

export interface ResolveReferenceRequest {
  reference: string;
  translationId?: string;
  verseNumbers?: boolean;
}

/**
 * Resolve Reference Use Case
 *
 * Turns "John 3:16-18" into the passage text of one translation
 */
@injectable()
export class ResolveReferenceUseCase
  implements IUseCase<ResolveReferenceRequest, PassageDto>
{
  constructor(
    @inject(TYPES.TranslationResolver) private resolver: TranslationResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(request: ResolveReferenceRequest): Promise<PassageDto> {
    const reference = request.reference.replace(/\+/g, " ").trim();
    this.logger.info("Resolving reference", {
      reference,
      translationId: request.translationId,
    });

    const translation = await this.resolver.resolve(request.translationId);

    const parsed = parseReference(reference);
    if (!parsed.ok) {
      throw new UnparsableReferenceError(reference, parsed.reason);
    }
    this.logger.debug("Reference parsed", {
      ranges: parsed.ranges.map(formatRange),
    });
    if (parsed.ignoredClauses.length > 0) {
      this.logger.warn("Additional reference clauses are not expanded", {
        reference,
        ignoredClauses: parsed.ignoredClauses,
      });
    }

    const document = await this.resolver.document(translation);
    const verses = document
      ? parsed.ranges.flatMap((range) =>
          extractVerses(
            document,
            range.bookId,
            range.chapter,
            range.verseStart,
            range.verseEnd,
          ),
        )
      : [];

    if (verses.length === 0) {
      throw new EntityNotFoundError("Reference", reference);
    }

    return toPassageDto(
      reference,
      verses.map(toVerseDto),
      toTranslationSummary(translation),
      request.verseNumbers,
    );
  }
}
