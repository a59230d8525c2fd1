/**
 * JSON value types and the decode helpers accessors use to read them.
 * Every helper names the offending field in its SchemaMismatchError.
 */

import { SchemaMismatchError } from "./errors";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: JsonValue | undefined): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function mismatch(field: string, expected: string, value: JsonValue | undefined): SchemaMismatchError {
  return new SchemaMismatchError(`Field "${field}": expected ${expected}, got ${describe(value)}`);
}

export function asObject(value: JsonValue | undefined, field: string): JsonObject {
  if (!isJsonObject(value)) throw mismatch(field, "object", value);
  return value;
}

export function asOptionalObject(value: JsonValue | undefined, field: string): JsonObject | null {
  if (value === undefined || value === null) return null;
  return asObject(value, field);
}

export function asArray(value: JsonValue | undefined, field: string): JsonValue[] {
  if (!Array.isArray(value)) throw mismatch(field, "array", value);
  return value;
}

export function asString(value: JsonValue | undefined, field: string): string {
  if (typeof value !== "string") throw mismatch(field, "string", value);
  return value;
}

export function asOptionalString(value: JsonValue | undefined, field: string): string | null {
  if (value === undefined || value === null) return null;
  return asString(value, field);
}

export function asNumber(value: JsonValue | undefined, field: string): number {
  if (typeof value !== "number") throw mismatch(field, "number", value);
  return value;
}

export function asOptionalNumber(value: JsonValue | undefined, field: string): number | null {
  if (value === undefined || value === null) return null;
  return asNumber(value, field);
}

export function asBoolean(value: JsonValue | undefined, field: string): boolean {
  if (typeof value !== "boolean") throw mismatch(field, "boolean", value);
  return value;
}

export function asOptionalBoolean(value: JsonValue | undefined, field: string): boolean | null {
  if (value === undefined || value === null) return null;
  return asBoolean(value, field);
}

/**
 * Walk a dotted path ("source.branch.name") through nested objects.
 * Returns undefined as soon as a segment is missing.
 */
export function pluck(doc: JsonObject, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = doc;
  for (const key of path.split(".")) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** Drop undefined entries, for request bodies built from optional arguments. */
export function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}
