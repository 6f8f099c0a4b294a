import { DocumentParseResult } from "../../bible/parsedDocument";
import { cleanText } from "../../bible/strategies/common";
import { XmlElement, allText, attr, findDescendant, hasTag } from "../../bible/xml/xmlTree";
import { Translation } from "./entities/Translation";

interface LanguageHint {
  /** Matched anywhere in the identifier */
  needles: string[];
  /** Matched against whole identifier segments split on "-", "_" or "." */
  codes: string[];
  language: string;
  languageCode: string;
}

const LANGUAGE_HINTS: LanguageHint[] = [
  { needles: ["romanian", "ro-"], codes: [], language: "romanian", languageCode: "ro" },
  { needles: ["spanish"], codes: ["es"], language: "spanish", languageCode: "es" },
  { needles: ["french"], codes: ["fr"], language: "french", languageCode: "fr" },
  { needles: ["german"], codes: ["de"], language: "german", languageCode: "de" },
];

const DEFAULT_LICENSE = "Public Domain";
const UNKNOWN_LICENSE = "Unknown";

/**
 * "kjv.xml" or "english/KJV.xml" -> "kjv"; null for non-XML paths
 */
export function identifierFromPath(path: string): string | null {
  const filename = path.split("/").pop() ?? "";
  if (!filename.toLowerCase().endsWith(".xml")) return null;

  const identifier = filename.slice(0, -".xml".length).toLowerCase();
  return identifier || null;
}

export function inferLanguage(identifier: string): {
  language: string;
  languageCode: string;
} {
  const lowered = identifier.toLowerCase();
  const segments = new Set(lowered.split(/[-_.]/));
  const hint = LANGUAGE_HINTS.find(
    ({ needles, codes }) =>
      needles.some((needle) => lowered.includes(needle)) ||
      codes.some((code) => segments.has(code)),
  );
  return hint
    ? { language: hint.language, languageCode: hint.languageCode }
    : { language: "english", languageCode: "en" };
}

function textOf(parent: XmlElement, tag: string): string | undefined {
  const element = findDescendant(parent, (el) => hasTag(el, tag));
  const text = element ? cleanText(allText(element)) : "";
  return text || undefined;
}

function headerFields(root: XmlElement): { name?: string; license?: string } {
  if (root.tag.toLowerCase().endsWith("osis")) {
    const work = findDescendant(root, (el) => hasTag(el, "work"));
    if (!work) return {};
    return { name: textOf(work, "title"), license: textOf(work, "rights") };
  }

  return { name: attr(root, "title") || attr(root, "name") || undefined };
}

/**
 * Build the catalog record of one source document
 *
 * A document that failed to parse still yields a record, with the
 * uppercased identifier as name and an unknown license.
 */
export function describeTranslation(
  identifier: string,
  sourcePath: string,
  parsed: DocumentParseResult,
): Translation {
  const base = {
    identifier,
    sourcePath,
    ...inferLanguage(identifier),
  };

  if (!parsed.ok) {
    return { ...base, name: identifier.toUpperCase(), license: UNKNOWN_LICENSE };
  }

  const header = headerFields(parsed.document.root);
  return {
    ...base,
    name: header.name ?? identifier.toUpperCase(),
    license: header.license ?? DEFAULT_LICENSE,
  };
}
