/**
 * Safe conversion of arbitrary values to JSON, and an order-preserving writer.
 *
 * toJsonValue never throws: anything JSON cannot represent is coerced to a
 * string, and a value that fails while being read degrades on its own
 * without affecting its siblings.
 */

import { exceptionInfoFromError, renderException } from "./exception.js";
import { safeString, UNSERIALIZABLE } from "./text.js";
import type { JsonObject, JsonValue } from "./types.js";

/** Rendered in place of a reference back to an enclosing object */
export const CIRCULAR = "[Circular]";

/** Rendered in place of objects nested deeper than MAX_DEPTH */
export const TRUNCATED = "[Truncated]";

/** Deepest object/array nesting that is expanded */
export const MAX_DEPTH = 64;

/**
 * Convert a value to a JSON value.
 * Returns undefined for values JSON omits (undefined itself).
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  try {
    return convert(value, new Set(), 0);
  } catch {
    return safeString(value);
  }
}

function convert(value: unknown, ancestors: Set<object>, depth: number): JsonValue | undefined {
  if (value === null) return null;
  if (value === undefined) return undefined;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value !== "object") return safeString(value);

  if (ancestors.has(value)) return CIRCULAR;
  if (depth >= MAX_DEPTH) return TRUNCATED;

  ancestors.add(value);
  try {
    return convertObject(value, ancestors, depth + 1);
  } catch {
    return safeString(value);
  } finally {
    ancestors.delete(value);
  }
}

function convertObject(value: object, ancestors: Set<object>, depth: number): JsonValue | undefined {
  if ("toJSON" in value && typeof value.toJSON === "function") {
    return convert(value.toJSON(), ancestors, depth);
  }
  if (value instanceof Error) {
    return renderException(exceptionInfoFromError(value));
  }
  if (value instanceof String || value instanceof Number || value instanceof Boolean) {
    return convert(value.valueOf(), ancestors, depth);
  }

  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (let i = 0; i < value.length; i++) {
      items.push(convertMember(value, i, ancestors, depth) ?? null);
    }
    return items;
  }
  if (value instanceof Set) {
    const items: JsonValue[] = [];
    for (const item of value) {
      items.push(convert(item, ancestors, depth) ?? null);
    }
    return items;
  }

  const object: JsonObject = new Map<string, JsonValue>();
  if (value instanceof Map) {
    for (const [key, item] of value) {
      const converted = convert(item, ancestors, depth);
      if (converted !== undefined) object.set(safeString(key), converted);
    }
    return object;
  }

  for (const key of Object.keys(value)) {
    const converted = convertMember(value, key, ancestors, depth);
    if (converted !== undefined) object.set(key, converted);
  }
  return object;
}

/** Convert one property; a getter that throws yields UNSERIALIZABLE */
function convertMember(
  target: object,
  key: string | number,
  ancestors: Set<object>,
  depth: number
): JsonValue | undefined {
  let member: unknown;
  try {
    member = Reflect.get(target, key);
  } catch {
    return UNSERIALIZABLE;
  }
  return convert(member, ancestors, depth);
}

/**
 * Serialize a JSON value, keeping the member order of its objects.
 * Without indent the output is one compact line; with indent each member or
 * item goes on its own line, indented by that many spaces per level.
 */
export function stringifyJson(value: JsonValue, indent?: number): string {
  return write(value, indent === undefined ? undefined : " ".repeat(indent), "");
}

function write(value: JsonValue, unit: string | undefined, current: string): string {
  if (value === null) return "null";
  if (typeof value === "number") {
    return Number.isFinite(value) ? JSON.stringify(value) : JSON.stringify(String(value));
  }
  if (typeof value === "string" || typeof value === "boolean") return JSON.stringify(value);

  const inner = unit === undefined ? current : current + unit;
  if (Array.isArray(value)) {
    return wrap("[", "]", value.map((item) => write(item, unit, inner)), unit, current);
  }

  const separator = unit === undefined ? ":" : ": ";
  const members: string[] = [];
  for (const [key, member] of value) {
    members.push(`${JSON.stringify(key)}${separator}${write(member, unit, inner)}`);
  }
  return wrap("{", "}", members, unit, current);
}

function wrap(open: string, close: string, parts: string[], unit: string | undefined, current: string): string {
  if (parts.length === 0) return open + close;
  if (unit === undefined) return `${open}${parts.join(",")}${close}`;
  const inner = current + unit;
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${current}${close}`;
}

/** Replace every non-ASCII UTF-16 code unit with a \uXXXX escape */
export function escapeNonAscii(json: string): string {
  return json.replace(/[\u0080-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`);
}
