import { describe, it, expect, beforeEach } from "@jest/globals";
import { BibleLibrary } from "../BibleLibrary";
import { InMemoryDocumentSource } from "../../../infrastructure/sources/InMemoryDocumentSource";
import { MockLogger } from "../../../infrastructure/logging/__tests__/MockLogger";
import { MALFORMED_XML, USFX_XML } from "../../../__tests__/fixtures/documents";

describe("BibleLibrary", () => {
  let source: InMemoryDocumentSource;
  let logger: MockLogger;
  let library: BibleLibrary;

  beforeEach(() => {
    source = new InMemoryDocumentSource({
      "asv.xml": USFX_XML,
      "broken.xml": MALFORMED_XML,
    });
    logger = new MockLogger();
    library = new BibleLibrary(source, logger);
  });

  it("should fetch and parse a document once", async () => {
    const [first, second] = await Promise.all([
      library.document("asv.xml"),
      library.document("asv.xml"),
    ]);

    expect(first?.kind).toBe("usfx");
    expect(second).toBe(first);
    expect(source.fetchCount).toBe(1);
  });

  it("should return null for a malformed document and log it", async () => {
    expect(await library.document("broken.xml")).toBeNull();
    expect((await library.parsed("broken.xml"))?.ok).toBe(false);
    expect(logger.warnCalls[0].message).toBe("Source document is not well-formed XML");
  });

  it("should return null for a missing document without throwing", async () => {
    expect(await library.content("missing.xml")).toBeNull();
    expect(await library.document("missing.xml")).toBeNull();
    expect(logger.warnCalls[0]).toEqual({
      message: "Failed to fetch source document",
      context: { path: "missing.xml", error: "No document at missing.xml" },
    });
  });
});
