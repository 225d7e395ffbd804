/**
 * Conversion between thrown values and structured exception metadata
 */

import { safeString } from "./text.js";
import type { ExceptionInfo, JsonObject, JsonValue } from "./types.js";

/** Longest cause chain that is followed */
const MAX_CAUSE_DEPTH = 16;

/** Read a property without letting a throwing getter escape */
function readProperty(target: object, key: PropertyKey): unknown {
  try {
    return Reflect.get(target, key);
  } catch {
    return undefined;
  }
}

function textOf(value: unknown, fallback: string): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return fallback;
  return safeString(value);
}

/** Trace text to use when none was captured */
function fallbackTraceback(type: string, message: string): string {
  return message ? `${type}: ${message}` : type;
}

function isExceptionInfo(value: unknown): value is ExceptionInfo {
  return typeof value === "object" && value !== null;
}

/**
 * Build ExceptionInfo from anything that was thrown.
 * Error causes are followed (and cycles cut) up to MAX_CAUSE_DEPTH levels.
 */
export function exceptionInfoFromError(error: unknown, seen: Set<unknown> = new Set()): ExceptionInfo {
  seen.add(error);

  if (!(error instanceof Error)) {
    const message = safeString(error);
    return { type: "NonErrorThrown", message, traceback: fallbackTraceback("NonErrorThrown", message) };
  }

  const type = textOf(readProperty(error, "name"), "") || "Error";
  const message = textOf(readProperty(error, "message"), "");
  const stack = readProperty(error, "stack");
  const info: ExceptionInfo = {
    type,
    message,
    traceback: typeof stack === "string" && stack.length > 0 ? stack : fallbackTraceback(type, message),
  };

  const cause = readProperty(error, "cause");
  if (cause !== undefined && !seen.has(cause) && seen.size < MAX_CAUSE_DEPTH) {
    info.cause = exceptionInfoFromError(cause, seen);
  }
  return info;
}

/**
 * Render ExceptionInfo as an ordered JSON object: type, message, traceback,
 * then cause. Fields that are not strings are coerced; an empty traceback is
 * replaced by "<type>: <message>".
 */
export function renderException(info: ExceptionInfo, seen: Set<ExceptionInfo> = new Set()): JsonObject {
  seen.add(info);

  const type = textOf(readProperty(info, "type"), "") || "Error";
  const message = textOf(readProperty(info, "message"), "");
  const traceback = textOf(readProperty(info, "traceback"), "") || fallbackTraceback(type, message);

  const rendered: JsonObject = new Map<string, JsonValue>();
  rendered.set("type", type);
  rendered.set("message", message);
  rendered.set("traceback", traceback);

  const cause = readProperty(info, "cause");
  if (isExceptionInfo(cause) && !seen.has(cause) && seen.size < MAX_CAUSE_DEPTH) {
    rendered.set("cause", renderException(cause, seen));
  }
  return rendered;
}
