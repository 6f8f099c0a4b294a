import { IDocumentSource } from "../../domain/translations/sources/IDocumentSource";

/**
 * In-memory implementation of IDocumentSource for testing
 *
 * Stores documents in a Map and counts fetches so caching can be asserted
 */
export class InMemoryDocumentSource implements IDocumentSource {
  private documents: Map<string, string> = new Map();
  private reachable = true;

  public fetchCount = 0;
  public listCount = 0;

  constructor(documents: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(documents)) {
      this.documents.set(path, content);
    }
  }

  async connect(): Promise<void> {
    if (!this.reachable) {
      throw new Error("In-memory source is offline");
    }
  }

  async listSources(): Promise<string[]> {
    this.listCount++;
    if (!this.reachable) {
      throw new Error("In-memory source is offline");
    }
    return Array.from(this.documents.keys());
  }

  async fetch(path: string): Promise<string> {
    this.fetchCount++;
    const content = this.documents.get(path);
    if (content === undefined) {
      throw new Error(`No document at ${path}`);
    }
    return content;
  }

  // Test helper methods
  put(path: string, content: string): void {
    this.documents.set(path, content);
  }

  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }
}
