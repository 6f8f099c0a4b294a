/**
 * A catalogued Bible translation, derived once from its source document
 */
export interface Translation {
  readonly identifier: string;
  readonly name: string;
  readonly language: string;
  readonly languageCode: string;
  readonly license: string;
  readonly sourcePath: string;
}
