import { describe, it, expect, beforeEach } from "@jest/globals";
import { BibleLibrary } from "../BibleLibrary";
import { TranslationCatalog } from "../TranslationCatalog";
import { InMemoryDocumentSource } from "../../../infrastructure/sources/InMemoryDocumentSource";
import { MockLogger } from "../../../infrastructure/logging/__tests__/MockLogger";
import { SourceUnavailableError } from "../../../shared/errors/DomainError";
import {
  GENERIC_XML,
  MALFORMED_XML,
  OSIS_ATTRIBUTE_XML,
  USFX_XML,
} from "../../../__tests__/fixtures/documents";

describe("TranslationCatalog", () => {
  let source: InMemoryDocumentSource;
  let logger: MockLogger;
  let catalog: TranslationCatalog;

  const createCatalog = () =>
    new TranslationCatalog(source, new BibleLibrary(source, logger), logger);

  beforeEach(() => {
    source = new InMemoryDocumentSource({
      "english/kjv.xml": OSIS_ATTRIBUTE_XML,
      "english/notes.txt": "not a translation",
      "romanian/ro-cornilescu.xml": GENERIC_XML,
    });
    logger = new MockLogger();
    catalog = createCatalog();
  });

  it("should list XML sources in source order", async () => {
    const translations = await catalog.list();

    expect(translations.map((t) => t.identifier)).toEqual(["kjv", "ro-cornilescu"]);
    expect(translations[1].languageCode).toBe("ro");
  });

  it("should memoize the list without fetching again", async () => {
    const first = await catalog.list();
    const fetchesAfterFirst = source.fetchCount;
    const second = await catalog.list();

    expect(fetchesAfterFirst).toBe(2);
    expect(source.fetchCount).toBe(2);
    expect(source.listCount).toBe(1);
    expect(second).toEqual(first);
  });

  it("should share one load between concurrent first calls", async () => {
    await Promise.all([catalog.list(), catalog.list(), catalog.get("kjv")]);

    expect(source.listCount).toBe(1);
    expect(source.fetchCount).toBe(2);
  });

  it("should look up translations case-insensitively", async () => {
    expect((await catalog.get("KJV"))?.name).toBe("King James Version");
    expect(await catalog.get("missing")).toBeNull();
  });

  it("should keep a malformed document as a minimal record", async () => {
    source.put("broken.xml", MALFORMED_XML);

    const broken = await catalog.get("broken");

    expect(broken).toMatchObject({ name: "BROKEN", license: "Unknown" });
  });

  it("should let the later source win an identifier collision", async () => {
    source.put("usfx/KJV.xml", USFX_XML);

    const translations = await catalog.list();

    expect(translations.map((t) => t.identifier)).toEqual(["kjv", "ro-cornilescu"]);
    expect(translations[0].sourcePath).toBe("usfx/KJV.xml");
    expect(logger.warnCalls.map((call) => call.message)).toContain(
      "Duplicate translation identifier, keeping the later source",
    );
  });

  it("should raise SourceUnavailableError when the source cannot connect", async () => {
    source.setReachable(false);

    await expect(catalog.initialize()).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it("should retry a failed listing on the next call", async () => {
    source.setReachable(false);
    await expect(catalog.list()).rejects.toBeInstanceOf(SourceUnavailableError);

    source.setReachable(true);
    const translations = await catalog.list();

    expect(translations).toHaveLength(2);
    expect(source.listCount).toBe(2);
  });
});
