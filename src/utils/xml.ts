// ---------------------------------------------------------------------------
// XML parsing and navigation helpers over fast-xml-parser output.
//
// Namespace prefixes are stripped, attributes live under "@_name" keys,
// element text under "#text" (or the element is the bare string when it has
// no attributes), and every value stays a string.  Values are not trimmed,
// so MARC fixed-length fields keep their padding; protocol fields are
// trimmed by the caller.  Repeated siblings may be
// a single value or an array; every helper here accepts both.
// ---------------------------------------------------------------------------

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";

import { XmlParseError } from "../core/errors.js";

export type XmlValue = string | XmlElement | XmlValue[];

export interface XmlElement {
  [name: string]: XmlValue | undefined;
}

const ATTRIBUTE_PREFIX = "@_";
const TEXT_KEY = "#text";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // Keep system numbers such as "000960080" as strings.
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  suppressEmptyNode: true,
});

/**
 * Parse an XML document into a navigable tree.
 *
 * @throws XmlParseError when the document is not well-formed.
 */
export function parseXml(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlParseError(`${msg} (line ${line}, column ${col})`);
  }

  const parsed: unknown = xmlParser.parse(xml);
  if (!isElement(parsed)) {
    throw new XmlParseError("Document has no root element");
  }
  return parsed;
}

export function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Normalise a value that may be a single node or an array into an array. */
export function toArray(value: XmlValue | undefined): XmlValue[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return [value];

  const flat: XmlValue[] = [];
  for (const item of value) flat.push(...toArray(item));
  return flat;
}

function isChildKey(key: string): boolean {
  return !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_KEY;
}

/** Direct children of `node` named `name`, in document order. */
export function childrenOf(
  node: XmlValue | undefined,
  name: string,
): XmlValue[] {
  const result: XmlValue[] = [];
  for (const item of toArray(node)) {
    if (isElement(item)) result.push(...toArray(item[name]));
  }
  return result;
}

/** First direct child of `node` named `name`. */
export function childOf(
  node: XmlValue | undefined,
  name: string,
): XmlValue | undefined {
  return childrenOf(node, name)[0];
}

/**
 * Every descendant element named `name`, depth first in document order.
 * Matches are not searched for nested matches of the same name.
 */
export function findAll(node: XmlValue | undefined, name: string): XmlValue[] {
  const found: XmlValue[] = [];

  const visit = (value: XmlValue): void => {
    if (Array.isArray(value)) {
      for (const item of value) visit(item);
      return;
    }
    if (!isElement(value)) return;

    for (const [key, child] of Object.entries(value)) {
      if (child === undefined || !isChildKey(key)) continue;
      if (key === name) {
        found.push(...toArray(child));
      } else {
        visit(child);
      }
    }
  };

  if (node !== undefined) visit(node);
  return found;
}

/** First descendant element named `name`. */
export function findFirst(
  node: XmlValue | undefined,
  name: string,
): XmlValue | undefined {
  return findAll(node, name)[0];
}

/**
 * Text content of an element: the bare string, its "#text", or "" for an
 * element without text.  `null` when there is no element at all.
 */
export function textOf(node: XmlValue | undefined): string | null {
  if (node === undefined) return null;
  if (typeof node === "string") return node;
  if (Array.isArray(node)) return textOf(node[0]);

  const text = node[TEXT_KEY];
  return typeof text === "string" ? text : "";
}

/** Text of the first descendant named `name`, like ElementTree's findtext. */
export function findText(
  node: XmlValue | undefined,
  name: string,
): string | null {
  return textOf(findFirst(node, name));
}

export function attributeOf(
  node: XmlValue | undefined,
  name: string,
): string | null {
  const element = Array.isArray(node) ? node[0] : node;
  if (!isElement(element)) return null;

  const value = element[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === "string" ? value : null;
}

/** Serialise a parsed node back to XML, for diagnostics. */
export function toXml(name: string, node: XmlValue | undefined): string {
  const built: unknown = xmlBuilder.build({ [name]: node ?? "" });
  return typeof built === "string" ? built : String(built);
}
