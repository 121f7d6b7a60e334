// ---------------------------------------------------------------------------
// HarvestIdentifierPattern – recovers (base, system number) from an OAI
// harvest identifier such as "oai:aleph.example.org:MZK01-000960080".
// ---------------------------------------------------------------------------

import { ConfigurationError, IdentifierMismatchError } from "../../core/errors.js";
import type { SystemNumberRef } from "../../core/types.js";

export const BASE_PLACEHOLDER = "{base}";
export const DOC_NUMBER_PLACEHOLDER = "{doc_number}";

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;

function escapeRegExp(literal: string): string {
  return literal.replace(REGEX_SPECIALS, "\\$&");
}

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/**
 * Compiled form of an identifier template.
 *
 * The template is split on its two placeholders; every literal piece is
 * escaped, `{base}` becomes a named group matching the configured base
 * literally and `{doc_number}` a named group around the system-number
 * pattern.  Build once per client and reuse for every record.
 */
export class HarvestIdentifierPattern {
  public readonly template: string;
  public readonly base: string;
  public readonly regex: RegExp;

  private constructor(template: string, base: string, regex: RegExp) {
    this.template = template;
    this.base = base;
    this.regex = regex;
  }

  /**
   * @throws ConfigurationError when the template does not hold exactly one
   *   of each placeholder or the system-number pattern does not compile.
   */
  static compile(
    template: string,
    base: string,
    systemNumberPattern: string,
  ): HarvestIdentifierPattern {
    for (const placeholder of [BASE_PLACEHOLDER, DOC_NUMBER_PLACEHOLDER]) {
      const count = countOccurrences(template, placeholder);
      if (count !== 1) {
        throw new ConfigurationError(
          `Identifier template "${template}" must contain ${placeholder} exactly once (found ${count})`,
        );
      }
    }

    const placeholderSplit = new RegExp(
      `(${escapeRegExp(BASE_PLACEHOLDER)}|${escapeRegExp(DOC_NUMBER_PLACEHOLDER)})`,
    );

    const source = template
      .split(placeholderSplit)
      .map((piece) => {
        if (piece === BASE_PLACEHOLDER) return `(?<base>${escapeRegExp(base)})`;
        if (piece === DOC_NUMBER_PLACEHOLDER) {
          return `(?<system_number>${systemNumberPattern})`;
        }
        return escapeRegExp(piece);
      })
      .join("");

    let regex: RegExp;
    try {
      regex = new RegExp(`^${source}$`);
    } catch (err) {
      throw new ConfigurationError(
        `Invalid system number pattern "${systemNumberPattern}"`,
        { cause: err },
      );
    }

    return new HarvestIdentifierPattern(template, base, regex);
  }

  /** Recover base and system number, or `null` when `identifier` does not match. */
  match(identifier: string): SystemNumberRef | null {
    const groups = this.regex.exec(identifier)?.groups;
    const base = groups?.["base"];
    const systemNumber = groups?.["system_number"];

    if (base === undefined || systemNumber === undefined) return null;
    return { base, systemNumber };
  }

  /**
   * Like {@link match}, but a mismatch means the template configuration is
   * wrong and is raised.
   */
  extract(identifier: string): SystemNumberRef {
    const ref = this.match(identifier);
    if (ref === null) {
      throw new IdentifierMismatchError(identifier, this.regex.source);
    }
    return ref;
  }

  /** Build the full harvest identifier of a system number. */
  format(systemNumber: string): string {
    return this.template
      .replace(BASE_PLACEHOLDER, () => this.base)
      .replace(DOC_NUMBER_PLACEHOLDER, () => systemNumber);
  }
}
