/**
 * RecordFormatter: renders one log record as a JSON object string.
 *
 * Output order is the selected standard fields, then extra fields in
 * insertion order, then "exception", then "stack_info". Extra keys that
 * collide with a standard field name are dropped, whether or not that field
 * is selected, so a caller can never overwrite the canonical values.
 *
 * format() is total: it never throws for a well-typed record. A value that
 * cannot be represented in JSON degrades to its string form, alone.
 */

import { renderException } from "./exception.js";
import { escapeNonAscii, stringifyJson, toJsonValue } from "./serialize.js";
import { safeString, UNSERIALIZABLE } from "./text.js";
import { STANDARD_FIELDS } from "./types.js";
import type { FormatterOptions, JsonObject, JsonValue, LogRecord, StandardField } from "./types.js";

const DEFAULT_TIMESTAMP_KEY = "timestamp";

const STANDARD_FIELD_SET: ReadonlySet<string> = new Set(STANDARD_FIELDS);

/** Raised at construction for options that cannot be honored */
export class FormatterConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatterConfigError";
  }
}

export function isStandardField(name: string): name is StandardField {
  return STANDARD_FIELD_SET.has(name);
}

/** Whether a timestamp key would land on another output field's key */
export function collidesWithOutputField(timestampKey: string): boolean {
  if (timestampKey === DEFAULT_TIMESTAMP_KEY) return false;
  return isStandardField(timestampKey) || timestampKey === "exception" || timestampKey === "stack_info";
}

/**
 * Render an instant as ISO-8601 in UTC with millisecond precision and an
 * explicit +00:00 offset. An invalid instant renders as "Invalid Date".
 */
export function formatTimestamp(timestamp: Date | number): string {
  const date = timestamp instanceof Date ? timestamp : new Date(timestamp);
  if (!Number.isFinite(date.getTime())) return "Invalid Date";
  return date.toISOString().replace(/Z$/, "+00:00");
}

function text(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return safeString(value);
}

function lineNumber(value: unknown): number {
  return typeof value === "number" && Number.isInteger(value) ? value : 0;
}

/** Evaluate a field, substituting fallback if reading the record throws */
function guarded<T>(read: () => T, fallback: T): T {
  try {
    return read();
  } catch {
    return fallback;
  }
}

/** Split the configured field list into known fields (deduplicated) and unknown names */
function resolveFields(fields: readonly string[] | undefined): { selected: StandardField[]; unknown: string[] } {
  if (fields === undefined || fields === null) {
    return { selected: [...STANDARD_FIELDS], unknown: [] };
  }
  if (!Array.isArray(fields)) {
    throw new FormatterConfigError(`Invalid fields: must be an array of field names, got ${typeof fields}`);
  }
  if (fields.length === 0) {
    return { selected: [...STANDARD_FIELDS], unknown: [] };
  }

  const selected: StandardField[] = [];
  const unknown: string[] = [];
  for (let i = 0; i < fields.length; i++) {
    const name: unknown = fields[i];
    if (typeof name !== "string") {
      throw new FormatterConfigError(`Invalid field at index ${i}: must be a string`);
    }
    if (!isStandardField(name)) {
      unknown.push(name);
    } else if (!selected.includes(name)) {
      selected.push(name);
    }
  }
  return { selected, unknown };
}

/** Formats log records as JSON objects, one per call */
export class RecordFormatter {
  /** Standard fields emitted, in output order */
  readonly fields: readonly StandardField[];
  /** Names from the fields option that are not standard fields; they are ignored */
  readonly unknownFields: readonly string[];
  readonly jsonIndent: number | undefined;
  readonly timestampKey: string;
  readonly ensureAscii: boolean;
  private readonly reserved: ReadonlySet<string>;

  constructor(options: FormatterOptions = {}) {
    const { selected, unknown } = resolveFields(options.fields);
    this.fields = Object.freeze(selected);
    this.unknownFields = Object.freeze(unknown);

    const indent = options.jsonIndent;
    if (indent !== undefined && indent !== null && !(Number.isInteger(indent) && indent >= 0)) {
      throw new FormatterConfigError(`Invalid jsonIndent: ${indent}. Must be a non-negative integer.`);
    }
    this.jsonIndent = indent ?? undefined;

    const timestampKey = options.timestampKey ?? DEFAULT_TIMESTAMP_KEY;
    if (typeof timestampKey !== "string" || timestampKey.length === 0) {
      throw new FormatterConfigError(`Invalid timestampKey: must be a non-empty string.`);
    }
    if (collidesWithOutputField(timestampKey)) {
      throw new FormatterConfigError(`Invalid timestampKey: "${timestampKey}" collides with another output field.`);
    }
    this.timestampKey = timestampKey;
    this.ensureAscii = options.ensureAscii ?? false;

    this.reserved = new Set(STANDARD_FIELDS.map((field) => this.outputKey(field)));
  }

  /** Output key of a standard field */
  private outputKey(field: StandardField): string {
    return field === "timestamp" ? this.timestampKey : field;
  }

  /** Whether an extra key is dropped for this record */
  private isReserved(key: string, record: LogRecord): boolean {
    if (this.reserved.has(key)) return true;
    if (key === "exception") return record.exceptionInfo !== undefined && record.exceptionInfo !== null;
    if (key === "stack_info") return record.stackInfo !== undefined && record.stackInfo !== null;
    return false;
  }

  /** Render a record as a JSON string. Never throws. */
  format(record: LogRecord): string {
    try {
      let json = stringifyJson(this.buildObject(record), this.jsonIndent);
      if (this.ensureAscii) json = escapeNonAscii(json);
      return json;
    } catch (error) {
      return JSON.stringify({ format_error: safeString(error) });
    }
  }

  /** Assemble the ordered output object for a record */
  private buildObject(record: LogRecord): JsonObject {
    const output: JsonObject = new Map<string, JsonValue>();

    for (const field of this.fields) {
      output.set(this.outputKey(field), this.standardValue(field, record));
    }

    this.mergeExtra(output, record);

    const exceptionInfo = guarded(() => record.exceptionInfo ?? null, null);
    if (exceptionInfo !== null) {
      output.set("exception", guarded<JsonValue>(() => renderException(exceptionInfo), UNSERIALIZABLE));
    }

    const stackInfo = guarded(() => {
      const value = record.stackInfo;
      return value === undefined || value === null ? null : text(value);
    }, null);
    if (stackInfo !== null) {
      output.set("stack_info", stackInfo);
    }

    return output;
  }

  private standardValue(field: StandardField, record: LogRecord): JsonValue {
    switch (field) {
      case "timestamp":
        return guarded(() => formatTimestamp(record.timestamp), "Invalid Date");
      case "level":
        return guarded(() => text(record.level).toUpperCase(), UNSERIALIZABLE);
      case "logger":
        return guarded(() => text(record.loggerName), UNSERIALIZABLE);
      case "message":
        return guarded(() => text(record.message), UNSERIALIZABLE);
      case "module":
        return guarded(() => text(record.module), "");
      case "function":
        return guarded(() => text(record.function), "");
      case "line":
        return guarded(() => lineNumber(record.line), 0);
    }
  }

  private mergeExtra(output: JsonObject, record: LogRecord): void {
    let extra: unknown;
    try {
      extra = record.extra;
    } catch {
      return;
    }
    if (typeof extra !== "object" || extra === null) return;

    const add = (key: string, value: unknown): void => {
      if (this.isReserved(key, record)) return;
      const converted = toJsonValue(value);
      if (converted !== undefined) output.set(key, converted);
    };

    try {
      if (extra instanceof Map) {
        for (const [key, value] of extra) add(safeString(key), value);
        return;
      }
      for (const key of Object.keys(extra)) {
        let value: unknown;
        try {
          value = Reflect.get(extra, key);
        } catch {
          value = UNSERIALIZABLE;
        }
        add(key, value);
      }
    } catch {
      // Extras already merged stay; the rest of the mapping is unreadable
      return;
    }
  }
}
