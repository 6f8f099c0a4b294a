import { detectFormat } from "./formatDetector";
import { FormatKind } from "./types";
import { XmlElement, parseXml } from "./xml/xmlTree";

export type DocumentParseResult =
  | { ok: true; document: ParsedDocument }
  | { ok: false; error: string };

/**
 * A parsed Bible document and its detected format
 *
 * Read-only once built; extraction strategies only walk the tree.
 */
export class ParsedDocument {
  private constructor(
    public readonly root: XmlElement,
    public readonly kind: FormatKind,
  ) {}

  static fromRoot(root: XmlElement): ParsedDocument {
    return new ParsedDocument(root, detectFormat(root));
  }

  static parse(xml: string): DocumentParseResult {
    const result = parseXml(xml);
    if (!result.ok) {
      return { ok: false, error: result.error };
    }
    return { ok: true, document: ParsedDocument.fromRoot(result.root) };
  }
}
