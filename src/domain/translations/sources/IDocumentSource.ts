/**
 * Document Source Interface
 *
 * Abstracts where translation XML lives (a local directory, a storage
 * bucket, or memory for tests). Paths are source-relative and use "/".
 */
export interface IDocumentSource {
  /**
   * Verify the source is reachable; throws when it is not
   */
  connect(): Promise<void>;

  /**
   * Every document path the source holds
   */
  listSources(): Promise<string[]>;

  /**
   * Raw text of one document; throws when it cannot be read
   */
  fetch(path: string): Promise<string>;
}
