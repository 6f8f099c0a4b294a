import { Router } from "express";
import { container } from "../../../di/Container";
import { BibleController } from "../controllers/BibleController";

/**
 * Versioned data routes, mounted at /v1/data
 */
export function createBibleDataRouter(): Router {
  const router = Router();
  const controller = container.resolve(BibleController);

  // GET /v1/data - List translations
  router.get("/", (req, res, next) =>
    controller.listTranslations(req, res, next),
  );

  // GET /v1/data/:translationId - Books of a translation
  router.get("/:translationId", (req, res, next) =>
    controller.getBooks(req, res, next),
  );

  // Random routes come before /:bookId so "random" is not read as a book
  router.get("/:translationId/random", (req, res, next) =>
    controller.getRandomVerse(req, res, next),
  );
  router.get("/:translationId/random/:books", (req, res, next) =>
    controller.getRandomVerse(req, res, next),
  );

  // GET /v1/data/:translationId/:bookId - Chapters of a book
  router.get("/:translationId/:bookId", (req, res, next) =>
    controller.getChapters(req, res, next),
  );

  // GET /v1/data/:translationId/:bookId/:chapter - Verses of a chapter
  router.get("/:translationId/:bookId/:chapter", (req, res, next) =>
    controller.getVerses(req, res, next),
  );

  return router;
}

/**
 * Verse search, mounted at /v1/search
 */
export function createSearchRouter(): Router {
  const router = Router();
  const controller = container.resolve(BibleController);

  // GET /v1/search/:translationId?q=light&books=GEN&limit=10
  router.get("/:translationId", (req, res, next) =>
    controller.searchVerses(req, res, next),
  );

  return router;
}

/**
 * Index and free-text reference routes, mounted at the root
 */
export function createReferenceRouter(): Router {
  const router = Router();
  const controller = container.resolve(BibleController);

  // GET / - API index or legacy ?random
  router.get("/", (req, res, next) => controller.index(req, res, next));

  // GET /John%203:16 - Resolve a reference
  router.get("/:reference", (req, res, next) =>
    controller.resolveReference(req, res, next),
  );

  return router;
}
