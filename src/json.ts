import { JsonObject, JsonValue } from "./types";

export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainRecord(value) && Object.values(value).every(isJsonValue);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return isJsonObject(value);
    default:
      return false;
  }
}

/**
 * True for object literals and `Object.create(null)` records; false for
 * arrays, class instances and other exotic objects.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function toRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return {};
  }
  return { ...value };
}

export function parseJson(
  text: string
): { ok: true; value: JsonValue } | { ok: false; message: string } {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isJsonValue(parsed)) {
      return { ok: true, value: parsed };
    }
    return { ok: false, message: "Decoded value is not plain JSON." };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}
