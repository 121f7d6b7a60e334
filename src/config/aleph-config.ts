// ---------------------------------------------------------------------------
// Aleph service configuration.
// Reads a YAML file, resolves ${ENV_VAR} placeholders, validates with Zod
// and returns a typed AlephConfig ready for the client facade.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import { ConfigurationError } from "../core/errors.js";
import type {
  AlephConfig,
  AlephOaiConfig,
  AlephWebConfig,
  AlephXConfig,
  AlephZ3950Config,
} from "../core/types.js";
import {
  BASE_PLACEHOLDER,
  DOC_NUMBER_PLACEHOLDER,
} from "../clients/oai/identifier-pattern.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const DEFAULT_RETRY_STATUS_CODES = [500, 502, 503, 504];

function hasSinglePlaceholder(template: string, placeholder: string): boolean {
  return template.split(placeholder).length === 2;
}

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const webConfigShape = {
  host: z.string().url(),
  endpoint: z.string().min(1),
  /** Service base; falls back to the top-level base. */
  base: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().default(30_000),
  totalRetry: z.coerce.number().int().nonnegative().default(5),
  retryBackoffMs: z.coerce.number().int().nonnegative().default(1_000),
  retryStatusCodes: z
    .array(z.coerce.number().int().min(100).max(599))
    .default(DEFAULT_RETRY_STATUS_CODES),
};

export const OaiConfigSchema = z.object({
  ...webConfigShape,
  identifierTemplate: z
    .string()
    .refine((t) => hasSinglePlaceholder(t, BASE_PLACEHOLDER), {
      message: `must contain ${BASE_PLACEHOLDER} exactly once`,
    })
    .refine((t) => hasSinglePlaceholder(t, DOC_NUMBER_PLACEHOLDER), {
      message: `must contain ${DOC_NUMBER_PLACEHOLDER} exactly once`,
    }),
  systemNumberPattern: z
    .string()
    .min(1)
    .refine(compiles, { message: "must be a valid regular expression" })
    .default("\\d{9}"),
  /** Defaults to the service base. */
  sets: z.array(z.string().min(1)).min(1).optional(),
  metadataPrefix: z.string().min(1).default("marc21"),
});

export const XConfigSchema = z.object({
  ...webConfigShape,
  pageSize: z.coerce.number().int().positive().default(10),
});

export const Z3950ConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive().max(65_535),
  base: z.string().min(1).optional(),
  preferredRecordSyntax: z.string().min(1).default("MARC21"),
});

export const AlephConfigSchema = z
  .object({
    base: z.string().min(1),
    oai: OaiConfigSchema.optional(),
    x: XConfigSchema.optional(),
    z3950: Z3950ConfigSchema.optional(),
  })
  .refine((c) => c.oai !== undefined || c.x !== undefined || c.z3950 !== undefined, {
    message: "At least one of the Aleph services (oai, x, z3950) must be configured",
  });

type ParsedAlephConfig = z.infer<typeof AlephConfigSchema>;
type ParsedWebConfig = z.infer<typeof XConfigSchema> | z.infer<typeof OaiConfigSchema>;

// ── Environment-variable placeholder resolver ───────────────────────────────

const ENV_PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)}/g;

/**
 * Recursively replace `${ENV_VAR}` placeholders in strings with the matching
 * `process.env` value.
 *
 * @throws ConfigurationError when a referenced variable is not defined.
 */
export function resolveEnvPlaceholders(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_PLACEHOLDER, (_match, varName: string) => {
      const envValue = env[varName];
      if (envValue === undefined) {
        throw new ConfigurationError(
          `Environment variable "${varName}" is referenced in the Aleph config but is not defined`,
        );
      }
      return envValue;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env));
  }
  if (value !== null && typeof value === "object") {
    const resolved: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      resolved[k] = resolveEnvPlaceholders(v, env);
    }
    return resolved;
  }
  return value;
}

// ── Mapping ─────────────────────────────────────────────────────────────────

function toWebConfig(parsed: ParsedWebConfig): AlephWebConfig {
  return {
    host: parsed.host,
    endpoint: parsed.endpoint,
    timeoutMs: parsed.timeoutMs,
    totalRetry: parsed.totalRetry,
    retryBackoffMs: parsed.retryBackoffMs,
    retryStatusCodes: parsed.retryStatusCodes,
  };
}

function toAlephConfig(parsed: ParsedAlephConfig): AlephConfig {
  const config: AlephConfig = { base: parsed.base };

  if (parsed.oai) {
    const base = parsed.oai.base ?? parsed.base;
    config.oai = {
      ...toWebConfig(parsed.oai),
      base,
      identifierTemplate: parsed.oai.identifierTemplate,
      systemNumberPattern: parsed.oai.systemNumberPattern,
      sets: parsed.oai.sets ?? [base],
      metadataPrefix: parsed.oai.metadataPrefix,
    } satisfies AlephOaiConfig;
  }

  if (parsed.x) {
    config.x = {
      ...toWebConfig(parsed.x),
      base: parsed.x.base ?? parsed.base,
      pageSize: parsed.x.pageSize,
    } satisfies AlephXConfig;
  }

  if (parsed.z3950) {
    config.z3950 = {
      host: parsed.z3950.host,
      port: parsed.z3950.port,
      base: parsed.z3950.base ?? parsed.base,
      preferredRecordSyntax: parsed.z3950.preferredRecordSyntax,
    } satisfies AlephZ3950Config;
  }

  return config;
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Validate a raw (already placeholder-resolved) configuration object and
 * apply defaults.
 *
 * @throws ConfigurationError listing every validation issue.
 */
export function parseAlephConfig(raw: unknown): AlephConfig {
  const result = AlephConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid Aleph configuration: ${issues}`, {
      cause: result.error,
    });
  }
  return toAlephConfig(result.data);
}

/**
 * Load the Aleph configuration from a YAML file.
 */
export function loadAlephConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): AlephConfig {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Aleph config file does not exist: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Could not read ${absolutePath}: ${message}`, {
      cause: err,
    });
  }

  return parseAlephConfig(resolveEnvPlaceholders(raw, env));
}
