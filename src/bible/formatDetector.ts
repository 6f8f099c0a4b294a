/**
 * Format Detector
 *
 * Classifies a parsed Bible document by its root and structure:
 * - <usfx>                          -> "usfx"
 * - <osis> with sID/eID verses      -> "osis-sid-eid"
 * - <osis> with container verses    -> "osis-attribute"
 * - <book><chapter number><verse number> -> "generic-chapter-verse"
 */

import { FormatKind } from "./types";
import {
  XmlElement,
  attr,
  childElements,
  findDescendant,
  hasTag,
} from "./xml/xmlTree";

function isMilestoneVerse(element: XmlElement): boolean {
  return (
    hasTag(element, "verse") &&
    (attr(element, "sID") !== undefined || attr(element, "eID") !== undefined)
  );
}

function hasNumberedVerses(chapter: XmlElement): boolean {
  return childElements(chapter).some(
    (child) => hasTag(child, "verse") && attr(child, "number") !== undefined,
  );
}

function isNumberedBook(element: XmlElement): boolean {
  return (
    hasTag(element, "book") &&
    findDescendant(
      element,
      (el) =>
        hasTag(el, "chapter") &&
        attr(el, "number") !== undefined &&
        hasNumberedVerses(el),
    ) !== null
  );
}

function hasGenericStructure(root: XmlElement): boolean {
  return isNumberedBook(root) || findDescendant(root, isNumberedBook) !== null;
}

export function detectFormat(root: XmlElement): FormatKind {
  const rootTag = root.tag.toLowerCase();

  if (rootTag.includes("usfx")) {
    return "usfx";
  }

  if (rootTag.endsWith("osis")) {
    return findDescendant(root, isMilestoneVerse) !== null
      ? "osis-sid-eid"
      : "osis-attribute";
  }

  if (hasGenericStructure(root)) {
    return "generic-chapter-verse";
  }

  return "unknown";
}
