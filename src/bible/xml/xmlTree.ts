/**
 * XML Tree
 *
 * Thin element tree over fast-xml-parser's ordered output. Text stays in
 * document order between child elements, so mixed content such as
 * `<v id="1"/>In the <w>beginning</w>` can be replayed as a stream.
 * Namespace prefixes are dropped: `osis:verse` is read as `verse`.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";

export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | string;

export type XmlEvent =
  | { type: "open"; element: XmlElement }
  | { type: "text"; text: string }
  | { type: "close"; element: XmlElement };

export type XmlParseResult =
  | { ok: true; root: XmlElement }
  | { ok: false; error: string };

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  removeNSPrefix: true,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  allowBooleanAttributes: true,
  processEntities: true,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX)
      ? key.slice(ATTRIBUTE_PREFIX.length)
      : key;
    attributes[name] = typeof value === "string" ? value : String(value);
  }
  return attributes;
}

function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) return [];

  const items: unknown[] = raw;
  const nodes: XmlNode[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;

    for (const [key, value] of Object.entries(item)) {
      if (key === ATTRIBUTES_KEY) continue;

      if (key === TEXT_KEY) {
        nodes.push(typeof value === "string" ? value : String(value));
        continue;
      }

      nodes.push({
        tag: key,
        attributes: readAttributes(item[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }

  return nodes;
}

/**
 * Parse an XML string into an element tree
 *
 * Returns `ok: false` for malformed input instead of throwing.
 */
export function parseXml(xml: string): XmlParseResult {
  const content = xml.replace(/^\uFEFF/, "");

  const validation = XMLValidator.validate(content, {
    allowBooleanAttributes: true,
  });
  if (validation !== true) {
    const { code, msg, line } = validation.err;
    return { ok: false, error: `${code}: ${msg} (line ${line})` };
  }

  try {
    const root = toNodes(parser.parse(content)).find(isElement);
    if (!root) {
      return { ok: false, error: "document has no root element" };
    }
    return { ok: true, root };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== "string";
}

export function attr(element: XmlElement, name: string): string | undefined {
  return element.attributes[name];
}

export function childElements(element: XmlElement): XmlElement[] {
  return element.children.filter(isElement);
}

/**
 * Depth-first walk over the element and all its descendants, in document order
 */
export function* iterElements(element: XmlElement): Generator<XmlElement> {
  yield element;
  for (const child of element.children) {
    if (isElement(child)) {
      yield* iterElements(child);
    }
  }
}

/**
 * First descendant (not the element itself) matching the predicate
 */
export function findDescendant(
  element: XmlElement,
  predicate: (candidate: XmlElement) => boolean,
): XmlElement | null {
  for (const child of childElements(element)) {
    for (const candidate of iterElements(child)) {
      if (predicate(candidate)) return candidate;
    }
  }
  return null;
}

export function findDescendants(
  element: XmlElement,
  predicate: (candidate: XmlElement) => boolean,
): XmlElement[] {
  const matches: XmlElement[] = [];
  for (const child of childElements(element)) {
    for (const candidate of iterElements(child)) {
      if (predicate(candidate)) matches.push(candidate);
    }
  }
  return matches;
}

/**
 * Open/text/close events for the subtree, in document order
 */
export function* xmlEvents(element: XmlElement): Generator<XmlEvent> {
  yield { type: "open", element };
  for (const child of element.children) {
    if (isElement(child)) {
      yield* xmlEvents(child);
    } else {
      yield { type: "text", text: child };
    }
  }
  yield { type: "close", element };
}

/**
 * Text before the first child element
 */
export function directText(element: XmlElement): string {
  let text = "";
  for (const child of element.children) {
    if (isElement(child)) break;
    text += child;
  }
  return text;
}

/**
 * All descendant text concatenated
 */
export function allText(element: XmlElement): string {
  let text = "";
  for (const child of element.children) {
    text += isElement(child) ? allText(child) : child;
  }
  return text;
}

export function hasTag(element: XmlElement, tag: string): boolean {
  return element.tag.toLowerCase() === tag.toLowerCase();
}
