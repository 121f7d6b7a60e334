// ---------------------------------------------------------------------------
// MARCXML decoding and field accessors.
//
// Input is a parsed <record> element of the MARC21 slim schema:
//   record.leader        -> string
//   record.controlfield  -> single | array, each with @_tag and #text
//   record.datafield     -> single | array, each with @_tag, @_ind1, @_ind2
//   datafield.subfield   -> single | array, each with @_code and #text
// ---------------------------------------------------------------------------

import { MarcParseError } from "../core/errors.js";
import type {
  MarcControlField,
  MarcDataField,
  MarcRecord,
  MarcSubfield,
} from "../core/types.js";
import {
  attributeOf,
  childOf,
  childrenOf,
  findFirst,
  isElement,
  parseXml,
  textOf,
} from "./xml.js";
import type { XmlElement, XmlValue } from "./xml.js";

const LEADER_LENGTH = 24;
const TAG_RE = /^[0-9A-Za-z]{3}$/;

// ── Decoding ──────────────────────────────────────────────────────────────

/**
 * Decode a parsed MARCXML `<record>` element.
 *
 * @throws MarcParseError when the element is missing or does not carry a
 *   well-formed leader, control fields and data fields.
 */
export function marcRecordFromNode(node: XmlValue | undefined): MarcRecord {
  const record = Array.isArray(node) ? node[0] : node;
  if (!isElement(record)) {
    throw new MarcParseError("MARC record element is missing");
  }

  const leader = textOf(childOf(record, "leader"));
  if (leader === null || leader.length !== LEADER_LENGTH) {
    throw new MarcParseError(
      leader === null
        ? "MARC record has no leader"
        : `MARC leader must be ${LEADER_LENGTH} characters, got ${leader.length}`,
    );
  }

  return {
    leader,
    controlFields: childrenOf(record, "controlfield").map(decodeControlField),
    dataFields: childrenOf(record, "datafield").map(decodeDataField),
  };
}

function decodeControlField(node: XmlValue): MarcControlField {
  const tag = requireTag(node, "control field");
  return { tag, value: textOf(node) ?? "" };
}

function decodeDataField(node: XmlValue): MarcDataField {
  const tag = requireTag(node, "data field");
  const ind1 = attributeOf(node, "ind1") ?? " ";
  const ind2 = attributeOf(node, "ind2") ?? " ";

  if (ind1.length > 1 || ind2.length > 1) {
    throw new MarcParseError(
      `Data field ${tag} has invalid indicators "${ind1}" / "${ind2}"`,
    );
  }

  const subfields = childrenOf(node, "subfield").map(
    (sub): MarcSubfield => {
      const code = attributeOf(sub, "code");
      if (code === null || code.length !== 1) {
        throw new MarcParseError(`Data field ${tag} has a subfield without a code`);
      }
      return { code, value: textOf(sub) ?? "" };
    },
  );

  return { tag, ind1: ind1 || " ", ind2: ind2 || " ", subfields };
}

function requireTag(node: XmlValue, kind: string): string {
  const tag = attributeOf(node, "tag");
  if (tag === null || !TAG_RE.test(tag)) {
    throw new MarcParseError(`MARC ${kind} has an invalid tag "${tag ?? ""}"`);
  }
  return tag;
}

/**
 * Parse a MARCXML document: a bare `<record>` or the first record of a
 * `<collection>`.
 */
export function parseMarcXml(xml: string): MarcRecord {
  let doc: XmlElement;
  try {
    doc = parseXml(xml);
  } catch (err) {
    throw new MarcParseError(
      `Failed to parse MARCXML: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const record = childOf(doc, "record") ?? findFirst(doc, "record");
  return marcRecordFromNode(record);
}

// ── Field accessors ───────────────────────────────────────────────────────

/** Value of a control field (001–009), or `null` when absent. */
export function getControlField(record: MarcRecord, tag: string): string | null {
  return record.controlFields.find((f) => f.tag === tag)?.value ?? null;
}

/** Every data field carrying `tag`, in record order. */
export function getDataFields(record: MarcRecord, tag: string): MarcDataField[] {
  return record.dataFields.filter((f) => f.tag === tag);
}

/** All values of subfield `code` within one data field. */
export function getSubfieldValues(field: MarcDataField, code: string): string[] {
  return field.subfields.filter((s) => s.code === code).map((s) => s.value);
}

/**
 * First value of subfield `code` in the first data field carrying `tag`.
 */
export function getFirstSubfield(
  record: MarcRecord,
  tag: string,
  code: string,
): string | null {
  const [field] = getDataFields(record, tag);
  if (!field) return null;
  return getSubfieldValues(field, code)[0] ?? null;
}

export function controlNumber(record: MarcRecord): string | null {
  return getControlField(record, "001");
}

export function title(record: MarcRecord): string | null {
  return getFirstSubfield(record, "245", "a");
}

/**
 * ISBNs from 020$a with qualifiers such as "(pbk.)" stripped.
 */
export function isbns(record: MarcRecord): string[] {
  const found: string[] = [];

  for (const field of getDataFields(record, "020")) {
    for (const raw of getSubfieldValues(field, "a")) {
      const cleaned = raw
        .trim()
        .replace(/\s*\(.*?\)\s*/g, "")
        .replace(/\s+.*$/, "")
        .replace(/[^0-9Xx]/g, "");

      if (cleaned.length === 10 || cleaned.length === 13) {
        found.push(cleaned);
      }
    }
  }

  return found;
}
