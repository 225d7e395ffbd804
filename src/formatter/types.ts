/**
 * Types for log records and formatter configuration
 */

/** Severity of a log record, rendered uppercase in the output */
export type LogLevel = "debug" | "info" | "warning" | "error" | "critical";

/** Names of the standard output fields, in their canonical order */
export const STANDARD_FIELDS = [
  "timestamp",
  "level",
  "logger",
  "message",
  "module",
  "function",
  "line",
] as const;

export type StandardField = (typeof STANDARD_FIELDS)[number];

/** Structured exception metadata, decoupled from the runtime's Error */
export interface ExceptionInfo {
  /** Exception kind, e.g. "TypeError" */
  type: string;
  message: string;
  /** Formatted stack trace text */
  traceback: string;
  /** The exception this one was raised from, if any */
  cause?: ExceptionInfo;
}

/** Caller-supplied context. A Map keeps insertion order for every key. */
export type ExtraFields = Record<string, unknown> | Map<string, unknown>;

/** One log event as handed over by the host logging framework */
export interface LogRecord {
  timestamp: Date | number;
  level: LogLevel;
  loggerName: string;
  message: string;
  module?: string;
  function?: string;
  line?: number;
  extra?: ExtraFields;
  exceptionInfo?: ExceptionInfo;
  /** Formatted stack of the log call site */
  stackInfo?: string;
}

/** Formatter configuration, fixed at construction */
export interface FormatterOptions {
  /** Standard fields to emit, in output order. Empty or absent means all. */
  fields?: readonly string[];
  /** Indent width for pretty-printed output. Absent means one compact line. */
  jsonIndent?: number;
  /** Output key for the timestamp field (default: "timestamp") */
  timestampKey?: string;
  /** Escape every non-ASCII character as \uXXXX */
  ensureAscii?: boolean;
}

/** A JSON value whose objects keep their member order */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject extends Map<string, JsonValue> {}
