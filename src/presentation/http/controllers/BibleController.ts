import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { toPassageDto } from "../../../application/bible/dto/BibleDto";
import { GetBookChaptersUseCase } from "../../../application/bible/use-cases/GetBookChaptersUseCase";
import { GetChapterVersesUseCase } from "../../../application/bible/use-cases/GetChapterVersesUseCase";
import { GetRandomVerseUseCase } from "../../../application/bible/use-cases/GetRandomVerseUseCase";
import { GetTranslationBooksUseCase } from "../../../application/bible/use-cases/GetTranslationBooksUseCase";
import { ListTranslationsUseCase } from "../../../application/bible/use-cases/ListTranslationsUseCase";
import { ResolveReferenceUseCase } from "../../../application/bible/use-cases/ResolveReferenceUseCase";
import { SearchVersesUseCase } from "../../../application/bible/use-cases/SearchVersesUseCase";
import {
  EntityNotFoundError,
  SourceUnavailableError,
  UnparsableReferenceError,
  ValidationError,
} from "../../../shared/errors/DomainError";
import {
  BadRequestError,
  NotFoundError,
  ServiceUnavailableError,
} from "../../../shared/errors/HttpError";
import {
  chapterParamSchema,
  parseRequest,
  referenceQuerySchema,
  rootQuerySchema,
  searchQuerySchema,
} from "../validation/bibleRequests";
import { sendJsonOrJsonp } from "../responses/jsonp";

function baseUrl(req: Request): string {
  return `${req.protocol}://${req.get("host") ?? "localhost"}`;
}

/**
 * Bible HTTP Controller
 *
 * Handles the versioned data API and the reference lookups
 */
@injectable()
export class BibleController {
  constructor(
    @inject(TYPES.ListTranslationsUseCase)
    private listTranslationsUseCase: ListTranslationsUseCase,
    @inject(TYPES.GetTranslationBooksUseCase)
    private getTranslationBooksUseCase: GetTranslationBooksUseCase,
    @inject(TYPES.GetBookChaptersUseCase)
    private getBookChaptersUseCase: GetBookChaptersUseCase,
    @inject(TYPES.GetChapterVersesUseCase)
    private getChapterVersesUseCase: GetChapterVersesUseCase,
    @inject(TYPES.GetRandomVerseUseCase)
    private getRandomVerseUseCase: GetRandomVerseUseCase,
    @inject(TYPES.ResolveReferenceUseCase)
    private resolveReferenceUseCase: ResolveReferenceUseCase,
    @inject(TYPES.SearchVersesUseCase)
    private searchVersesUseCase: SearchVersesUseCase,
  ) {}

  private forward(error: unknown, next: NextFunction): void {
    if (error instanceof ValidationError) {
      next(new BadRequestError(error.message));
    } else if (error instanceof EntityNotFoundError) {
      next(new NotFoundError(error.entityName.toLowerCase()));
    } else if (error instanceof UnparsableReferenceError) {
      // Bad syntax is reported like an unknown reference
      next(new NotFoundError("reference"));
    } else if (error instanceof SourceUnavailableError) {
      next(new ServiceUnavailableError(error.message));
    } else {
      next(error);
    }
  }

  /**
   * GET /v1/data - List translations
   */
  async listTranslations(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const host = baseUrl(req);
      const translations = await this.listTranslationsUseCase.execute();

      res.status(200).json({
        translations: translations.map((translation) => ({
          ...translation,
          url: `${host}/v1/data/${translation.identifier}`,
        })),
      });
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET /v1/data/:translationId - Canonical books of a translation
   */
  async getBooks(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const host = baseUrl(req);
      const { translation, books } =
        await this.getTranslationBooksUseCase.execute({
          translationId: req.params.translationId,
        });

      res.status(200).json({
        translation,
        books: books.map((book) => ({
          ...book,
          url: `${host}/v1/data/${translation.identifier}/${book.id}`,
        })),
      });
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET /v1/data/:translationId/:bookId - Chapters of a book
   */
  async getChapters(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const host = baseUrl(req);
      const { translation, chapters } =
        await this.getBookChaptersUseCase.execute({
          translationId: req.params.translationId,
          bookId: req.params.bookId,
        });

      res.status(200).json({
        translation,
        chapters: chapters.map((chapter) => ({
          ...chapter,
          url: `${host}/v1/data/${translation.identifier}/${chapter.book_id}/${chapter.chapter}`,
        })),
      });
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET /v1/data/:translationId/:bookId/:chapter - Verses of a chapter
   */
  async getVerses(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const chapter = parseRequest(
        chapterParamSchema,
        req.params.chapter,
        "chapter",
      );

      const result = await this.getChapterVersesUseCase.execute({
        translationId: req.params.translationId,
        bookId: req.params.bookId,
        chapter,
      });

      res.status(200).json(result);
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET /v1/data/:translationId/random[/:books] - Random verse
   */
  async getRandomVerse(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const result = await this.getRandomVerseUseCase.execute({
        translationId: req.params.translationId,
        books: req.params.books,
      });

      res.status(200).json(result);
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET / - API index, or a random verse with ?random
   */
  async index(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const query = parseRequest(rootQuerySchema, req.query);

      if (query.random !== undefined) {
        const { translation, random_verse: verse } =
          await this.getRandomVerseUseCase.execute({
            translationId: query.translation,
          });

        sendJsonOrJsonp(
          req,
          res,
          toPassageDto(
            `${verse.book} ${verse.chapter}:${verse.verse}`,
            [verse],
            translation,
          ),
        );
        return;
      }

      const host = baseUrl(req);
      const translations = await this.listTranslationsUseCase.execute();

      sendJsonOrJsonp(req, res, {
        name: "Scripture XML API",
        translations: translations.map((translation) => ({
          ...translation,
          url: `${host}/v1/data/${translation.identifier}`,
        })),
        endpoints: {
          translations: `${host}/v1/data`,
          books: `${host}/v1/data/{translation}`,
          chapters: `${host}/v1/data/{translation}/{book}`,
          verses: `${host}/v1/data/{translation}/{book}/{chapter}`,
          random: `${host}/v1/data/{translation}/random/{books}`,
          search: `${host}/v1/search/{translation}?q={query}&books={books}&limit={limit}`,
          reference: `${host}/{reference}?translation={translation}&verse_numbers=true`,
        },
      });
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET /:reference - Resolve "John 3:16" style references
   */
  async resolveReference(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const query = parseRequest(referenceQuerySchema, req.query);

      const passage = await this.resolveReferenceUseCase.execute({
        reference: req.params.reference,
        translationId: query.translation,
        verseNumbers: query.verse_numbers === "true",
      });

      sendJsonOrJsonp(req, res, passage);
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET /v1/search/:translationId?q=&books=&limit= - Verse text search
   */
  async searchVerses(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const query = parseRequest(searchQuerySchema, req.query);

      const result = await this.searchVersesUseCase.execute({
        translationId: req.params.translationId,
        query: query.q,
        books: query.books,
        limit: query.limit,
      });

      res.status(200).json(result);
    } catch (error) {
      this.forward(error, next);
    }
  }
}
