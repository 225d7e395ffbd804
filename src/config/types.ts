/**
 * Configuration types for the JSON record formatter
 */

/** Validated formatter configuration, ready for RecordFormatter */
export interface FormatterConfig {
  /** Standard fields to emit, in output order */
  fields: string[];
  /** Indent width; undefined means compact single-line output */
  jsonIndent?: number;
  /** Output key for the timestamp field */
  timestampKey: string;
  /** Escape non-ASCII characters */
  ensureAscii: boolean;
}

/** Raw parsed YAML structure (before environment variable expansion) */
export interface RawConfig {
  fields?: unknown;
  json_indent?: unknown;
  timestamp_key?: unknown;
  ensure_ascii?: unknown;
}

/** Result of loading a config file */
export interface LoadResult {
  config: FormatterConfig;
  /** Problems that were worked around, such as unknown field names */
  warnings: string[];
}
