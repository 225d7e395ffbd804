/** Rendered when a value cannot even be turned into a string */
export const UNSERIALIZABLE = "[Unserializable]";

/**
 * String form of any value. Never throws: objects without a usable
 * toString (null prototype, hostile proxies) become UNSERIALIZABLE.
 */
export function safeString(value: unknown): string {
  try {
    if (typeof value === "function") {
      return `[Function: ${value.name || "anonymous"}]`;
    }
    return String(value);
  } catch {
    return UNSERIALIZABLE;
  }
}
