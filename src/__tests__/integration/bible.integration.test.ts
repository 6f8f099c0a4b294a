import { describe, it, expect, beforeEach } from "@jest/globals";
import request from "supertest";
import { Express } from "express";
import { createTestApp } from "../helpers/testApp";
import { InMemoryDocumentSource } from "../../infrastructure/sources/InMemoryDocumentSource";
import {
  GENERIC_XML,
  OSIS_ATTRIBUTE_XML,
  USFX_XML,
} from "../fixtures/documents";

describe("Bible API Integration Tests", () => {
  let app: Express;
  let source: InMemoryDocumentSource;

  beforeEach(() => {
    // Fresh app and caches for each test
    ({ app, source } = createTestApp({
      documents: {
        "english/kjv.xml": OSIS_ATTRIBUTE_XML,
        "english/asv.xml": USFX_XML,
        "romanian/ro-cornilescu.xml": GENERIC_XML,
      },
    }));
  });

  describe("GET /healthz", () => {
    it("should report ok", async () => {
      const response = await request(app).get("/healthz").expect(200);

      expect(response.body).toEqual({ status: "ok" });
    });
  });

  describe("GET /v1/data", () => {
    it("should list translations with links", async () => {
      const response = await request(app).get("/v1/data").expect(200);

      expect(response.body.translations).toHaveLength(3);
      expect(response.body.translations[0]).toEqual({
        identifier: "kjv",
        name: "King James Version",
        language: "english",
        language_code: "en",
        license: "Public Domain (Crown copyright in the UK)",
        url: expect.stringMatching(/^http:\/\/[^/]+\/v1\/data\/kjv$/),
      });
    });

    it("should read each source only once across requests", async () => {
      await request(app).get("/v1/data").expect(200);
      await request(app).get("/v1/data/kjv/JHN/3").expect(200);
      await request(app).get("/v1/data").expect(200);

      expect(source.fetchCount).toBe(3);
    });
  });

  describe("GET /v1/data/:translationId", () => {
    it("should list canonical books", async () => {
      const response = await request(app).get("/v1/data/ro-cornilescu").expect(200);

      expect(response.body.translation.identifier).toBe("ro-cornilescu");
      expect(response.body.books).toHaveLength(1);
      expect(response.body.books[0]).toMatchObject({ id: "GEN", name: "Geneza" });
      expect(response.body.books[0].url).toMatch(/\/v1\/data\/ro-cornilescu\/GEN$/);
    });

    it("should return 404 for an unknown translation", async () => {
      const response = await request(app).get("/v1/data/unknown").expect(404);

      expect(response.body).toEqual({
        error: "translation not found",
        code: "NOT_FOUND",
      });
    });
  });

  describe("GET /v1/data/:translationId/:bookId", () => {
    it("should list chapters with links", async () => {
      const response = await request(app).get("/v1/data/asv/GEN").expect(200);

      expect(response.body.chapters.map((c: { chapter: number }) => c.chapter)).toEqual([
        1, 2,
      ]);
      expect(response.body.chapters[1].url).toMatch(/\/v1\/data\/asv\/GEN\/2$/);
    });

    it("should return 404 for a missing book", async () => {
      const response = await request(app).get("/v1/data/asv/REV").expect(404);

      expect(response.body.error).toBe("book not found");
    });
  });

  describe("GET /v1/data/:translationId/:bookId/:chapter", () => {
    it("should return the verses of a chapter", async () => {
      const response = await request(app).get("/v1/data/kjv/GEN/1").expect(200);

      expect(response.body.verses.map((v: { verse: number }) => v.verse)).toEqual([1, 2, 3]);
      expect(response.body.verses[0]).toEqual({
        book_id: "GEN",
        book: "Genesis",
        chapter: 1,
        verse: 1,
        text: "In the beginning God created the heaven and the earth.",
      });
    });

    it("should return 400 for a chapter that is not a number", async () => {
      const response = await request(app).get("/v1/data/kjv/GEN/one").expect(400);

      expect(response.body).toEqual({
        error: "chapter must be a number",
        code: "BAD_REQUEST",
      });
    });

    it("should return 404 for a missing chapter", async () => {
      const response = await request(app).get("/v1/data/kjv/GEN/40").expect(404);

      expect(response.body.error).toBe("book/chapter not found");
    });
  });

  describe("GET /v1/data/:translationId/random", () => {
    it("should return a random verse", async () => {
      const response = await request(app).get("/v1/data/asv/random").expect(200);

      expect(response.body.translation.identifier).toBe("asv");
      expect(response.body.random_verse).toMatchObject({
        book_id: "GEN",
        chapter: 1,
        verse: 1,
      });
    });

    it("should honour a testament selector", async () => {
      const response = await request(app).get("/v1/data/asv/random/NT").expect(200);

      expect(response.body.random_verse.book_id).toBe("MAT");
    });

    it("should return 404 when the selection has no verses", async () => {
      const response = await request(app).get("/v1/data/asv/random/REV").expect(404);

      expect(response.body.error).toBe("verse not found");
    });
  });

  describe("GET /", () => {
    it("should describe the API", async () => {
      const response = await request(app).get("/").expect(200);

      expect(response.body.name).toBe("Scripture XML API");
      expect(response.body.translations).toHaveLength(3);
      expect(response.body.endpoints.translations).toMatch(/\/v1\/data$/);
    });

    it("should return a random verse as a passage", async () => {
      const response = await request(app).get("/?random&translation=asv").expect(200);

      expect(response.body).toEqual({
        reference: "Genesis 1:1",
        verses: [
          {
            book_id: "GEN",
            book: "Genesis",
            chapter: 1,
            verse: 1,
            text: "In the beginning God created the heavens and the earth.",
          },
        ],
        text: "In the beginning God created the heavens and the earth.",
        translation_id: "asv",
        translation_name: "ASV",
        translation_note: "Public Domain",
      });
    });
  });

  describe("GET /:reference", () => {
    it("should resolve a reference in the default translation", async () => {
      const response = await request(app).get("/John%203:16").expect(200);

      expect(response.body.reference).toBe("John 3:16");
      expect(response.body.text).toBe("For God so loved the world.");
      expect(response.body.translation_id).toBe("kjv");
    });

    it("should accept + for spaces and number verses", async () => {
      const response = await request(app)
        .get("/john+3:15-16")
        .query({ translation: "kjv", verse_numbers: "true" })
        .expect(200);

      expect(response.body.text).toBe(
        "(15) That whosoever believeth in him should not perish. (16) For God so loved the world.",
      );
    });

    it("should use the requested translation", async () => {
      const response = await request(app)
        .get("/Genesis%201:3")
        .query({ translation: "ro-cornilescu" })
        .expect(200);

      expect(response.body.text).toBe("Dumnezeu a zis: Sa fie lumina!");
      expect(response.body.translation_name).toBe("Cornilescu");
    });

    it("should return 404 for an unparsable reference", async () => {
      const response = await request(app).get("/John3:16").expect(404);

      expect(response.body.error).toBe("reference not found");
    });

    it("should return 404 for a reference without verses", async () => {
      const response = await request(app).get("/Rev%201:1").expect(404);

      expect(response.body.error).toBe("reference not found");
    });

    it("should return 404 for an unknown translation", async () => {
      const response = await request(app)
        .get("/John%203:16")
        .query({ translation: "missing" })
        .expect(404);

      expect(response.body.error).toBe("translation not found");
    });
  });

  describe("GET /v1/search/:translationId", () => {
    it("should find verses case-insensitively", async () => {
      const response = await request(app)
        .get("/v1/search/kjv")
        .query({ q: "THE EARTH" })
        .expect(200);

      expect(response.body.query).toBe("THE EARTH");
      expect(response.body.total_results).toBe(3);
      expect(
        response.body.results.map(
          (verse: { chapter: number; verse: number }) => `${verse.chapter}:${verse.verse}`,
        ),
      ).toEqual(["1:1", "1:2", "2:1"]);
    });

    it("should cap results at the limit", async () => {
      const response = await request(app)
        .get("/v1/search/kjv")
        .query({ q: "earth", limit: "1" })
        .expect(200);

      expect(response.body.total_results).toBe(1);
      expect(response.body.results[0].verse).toBe(1);
    });

    it("should filter by book", async () => {
      const response = await request(app)
        .get("/v1/search/kjv")
        .query({ q: "god", books: "JHN" })
        .expect(200);

      expect(
        response.body.results.map((verse: { verse: number }) => verse.verse),
      ).toEqual([16, 17]);
    });

    it("should return 400 for a short query", async () => {
      const response = await request(app)
        .get("/v1/search/kjv")
        .query({ q: "go" })
        .expect(400);

      expect(response.body).toEqual({
        error: "Search query must be at least 3 characters",
        code: "BAD_REQUEST",
      });
    });

    it("should return 400 for a missing query", async () => {
      const response = await request(app).get("/v1/search/kjv").expect(400);

      expect(response.body.error).toBe("Search query 'q' is required");
    });

    it("should return 400 for a limit above 100", async () => {
      const response = await request(app)
        .get("/v1/search/kjv")
        .query({ q: "earth", limit: "101" })
        .expect(400);

      expect(response.body.error).toBe("Limit must be between 1 and 100");
    });

    it("should return 400 when no listed book is valid", async () => {
      const response = await request(app)
        .get("/v1/search/kjv")
        .query({ q: "earth", books: "XYZ" })
        .expect(400);

      expect(response.body.error).toBe("No valid books specified");
    });

    it("should return 404 for an unknown translation", async () => {
      const response = await request(app)
        .get("/v1/search/missing")
        .query({ q: "earth" })
        .expect(404);

      expect(response.body.error).toBe("translation not found");
    });
  });

  describe("JSONP", () => {
    it("should wrap a reference in the requested callback", async () => {
      const response = await request(app)
        .get("/John%203:16")
        .query({ callback: "show" })
        .expect(200);

      expect(response.headers["content-type"]).toMatch(/^text\/javascript/);
      expect(response.text.startsWith("show(")).toBe(true);
      expect(response.text.endsWith(")")).toBe(true);
      expect(JSON.parse(response.text.slice(5, -1)).text).toBe(
        "For God so loved the world.",
      );
    });

    it("should keep plain JSON without a callback", async () => {
      const response = await request(app).get("/John%203:16").expect(200);

      expect(response.headers["content-type"]).toMatch(/^application\/json/);
    });
  });

  describe("without translations", () => {
    it("should return 500 for a reference lookup", async () => {
      ({ app } = createTestApp());

      const response = await request(app).get("/John%203:16").expect(500);

      expect(response.body).toEqual({
        error: "No translations available",
        code: "NO_TRANSLATIONS",
      });
    });
  });

  describe("with an unreachable source", () => {
    it("should return 503 when the source cannot be listed", async () => {
      ({ app, source } = createTestApp());
      source.setReachable(false);

      const response = await request(app).get("/v1/data").expect(503);

      expect(response.body).toEqual({
        error: "Failed to list translation sources",
        code: "SERVICE_UNAVAILABLE",
      });
    });
  });
});
