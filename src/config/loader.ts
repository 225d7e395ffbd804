/**
 * Configuration loader for the JSON record formatter
 * Handles YAML parsing, environment variable expansion, and validation
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { collidesWithOutputField, isStandardField, RecordFormatter } from "../formatter/record-formatter.js";
import { STANDARD_FIELDS } from "../formatter/types.js";
import type { FormatterConfig, LoadResult, RawConfig } from "./types.js";

/** Default configuration values */
const DEFAULTS: FormatterConfig = {
  fields: [...STANDARD_FIELDS],
  timestampKey: "timestamp",
  ensureAscii: false,
};

/**
 * Expand environment variables in a string
 * Supports ${VAR} and ${VAR:-default} syntax
 */
function expandEnvVars(str: string): string {
  return str.replace(/\$\{([^}:]+)(:-([^}]*))?\}/g, (_match, name: string, _default, defaultValue?: string) => {
    return process.env[name] ?? defaultValue ?? "";
  });
}

/**
 * Get the default configuration file path
 */
export function getDefaultConfigPath(): string {
  return process.env.LOG_FORMAT_CONFIG ?? join(process.cwd(), "log-format.yml");
}

/**
 * Load formatter configuration from a YAML file.
 * A missing file yields the defaults.
 */
export async function loadFormatterConfig(filePath: string = getDefaultConfigPath()): Promise<LoadResult> {
  let raw: RawConfig = {};

  if (existsSync(filePath)) {
    try {
      const content = await readFile(filePath, "utf-8");
      const parsed: unknown = parseYaml(content);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        raw = {
          fields: Reflect.get(parsed, "fields"),
          json_indent: Reflect.get(parsed, "json_indent"),
          timestamp_key: Reflect.get(parsed, "timestamp_key"),
          ensure_ascii: Reflect.get(parsed, "ensure_ascii"),
        };
      }
    } catch (error) {
      throw new Error(`Failed to parse config file at ${filePath}: ${error}`);
    }
  }

  return mergeAndValidateConfig(raw);
}

/**
 * Load a config file and build the formatter it describes
 */
export async function loadFormatter(
  filePath?: string
): Promise<{ formatter: RecordFormatter; warnings: string[] }> {
  const { config, warnings } = await loadFormatterConfig(filePath);
  return { formatter: new RecordFormatter(config), warnings };
}

/**
 * Merge raw config with defaults, validate, and apply environment variable expansion
 */
export function mergeAndValidateConfig(raw: RawConfig): LoadResult {
  const warnings: string[] = [];
  const config: FormatterConfig = {
    fields: mergeFields(raw.fields, warnings),
    timestampKey: mergeTimestampKey(raw.timestamp_key),
    ensureAscii: mergeEnsureAscii(raw.ensure_ascii),
  };

  const jsonIndent = mergeJsonIndent(raw.json_indent);
  if (jsonIndent !== undefined) {
    config.jsonIndent = jsonIndent;
  }

  return { config, warnings };
}

/** Unknown names stay in the list (the formatter ignores them) and are reported */
function mergeFields(raw: unknown, warnings: string[]): string[] {
  if (raw === undefined || raw === null) {
    return [...DEFAULTS.fields];
  }
  if (!Array.isArray(raw)) {
    throw new Error(`Invalid fields: must be a list of field names, got ${typeof raw}`);
  }

  const fields: string[] = [];
  for (let i = 0; i < raw.length; i++) {
    const entry: unknown = raw[i];
    if (typeof entry !== "string") {
      throw new Error(`Invalid field at index ${i}: must be a string`);
    }
    const name = expandEnvVars(entry);
    if (!isStandardField(name)) {
      warnings.push(`Unknown field "${name}" ignored. Must be one of: ${STANDARD_FIELDS.join(", ")}`);
    }
    fields.push(name);
  }
  return fields;
}

function parseIndent(value: string, source: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid ${source}: ${value}. Must be a non-negative integer.`);
  }
  return Number.parseInt(value, 10);
}

function mergeJsonIndent(raw: unknown): number | undefined {
  const fromEnv = process.env.LOG_JSON_INDENT;
  if (fromEnv !== undefined && fromEnv !== "") {
    return parseIndent(fromEnv.trim(), "LOG_JSON_INDENT");
  }

  if (raw === undefined || raw === null) {
    return DEFAULTS.jsonIndent;
  }
  if (typeof raw === "string") {
    const expanded = expandEnvVars(raw).trim();
    return expanded === "" ? DEFAULTS.jsonIndent : parseIndent(expanded, "json_indent");
  }
  if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 0) {
    throw new Error(`Invalid json_indent: ${String(raw)}. Must be a non-negative integer.`);
  }
  return raw;
}

function mergeTimestampKey(raw: unknown): string {
  if (raw === undefined || raw === null) {
    return DEFAULTS.timestampKey;
  }
  const key = typeof raw === "string" ? expandEnvVars(raw) : "";
  if (key.length === 0) {
    throw new Error(`Invalid timestamp_key: must be a non-empty string.`);
  }
  if (collidesWithOutputField(key)) {
    throw new Error(`Invalid timestamp_key: "${key}" collides with another output field.`);
  }
  return key;
}

function mergeEnsureAscii(raw: unknown): boolean {
  if (raw === undefined || raw === null) {
    return DEFAULTS.ensureAscii;
  }
  if (typeof raw !== "boolean") {
    throw new Error(`Invalid ensure_ascii: ${String(raw)}. Must be true or false.`);
  }
  return raw;
}
