// ---------------------------------------------------------------------------
// Record classifier – turns one harvested <record> fragment into a
// ListRecordResult.
//
// A broken header is a protocol violation and aborts the harvest; a broken
// MARC body only marks that one record as Failed.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import { OaiProtocolError } from "../../core/errors.js";
import { RecordStatus } from "../../core/types.js";
import type { ListRecordResult } from "../../core/types.js";
import { marcRecordFromNode } from "../../utils/marc-parser.js";
import {
  attributeOf,
  childOf,
  findFirst,
  textOf,
  toXml,
} from "../../utils/xml.js";
import type { XmlValue } from "../../utils/xml.js";
import { DELETED_STATUS } from "./definitions.js";
import type { HarvestIdentifierPattern } from "./identifier-pattern.js";

/**
 * Classify a harvested record.
 *
 * @throws OaiProtocolError when the header or its identifier is missing.
 * @throws IdentifierMismatchError when the identifier does not fit `pattern`.
 */
export function classifyRecord(
  fragment: XmlValue,
  pattern: HarvestIdentifierPattern,
  logger: Logger,
): ListRecordResult {
  const header = childOf(fragment, "header");
  if (header === undefined) {
    throw new OaiProtocolError("Record without header found");
  }

  const identifier = textOf(childOf(header, "identifier"))?.trim();
  if (!identifier) {
    throw new OaiProtocolError("Record header without identifier found");
  }

  const { base, systemNumber } = pattern.extract(identifier);

  if (attributeOf(header, "status") === DELETED_STATUS) {
    return { base, systemNumber, status: RecordStatus.DELETED, record: null };
  }

  try {
    const body = findFirst(childOf(fragment, "metadata"), "record");
    const record = marcRecordFromNode(body);
    return { base, systemNumber, status: RecordStatus.ACTIVE, record };
  } catch (err) {
    logger.error({ identifier, err }, "Failed to parse harvested record");
    logger.debug(
      { identifier, fragment: toXml("record", fragment) },
      "Failed record content",
    );
    return { base, systemNumber, status: RecordStatus.FAILED, record: null };
  }
}
