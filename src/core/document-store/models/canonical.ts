/**
 * Canonical Document Form
 *
 * Documents are JSON values. Two documents are the same version when their
 * canonical values are structurally equal: object keys are sorted
 * recursively, arrays keep their order, `-0` becomes `0`, and the JSON
 * rules for `undefined` and non-finite numbers apply.
 */

import { isDeepStrictEqual } from "node:util";

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Normalize any JSON-compatible value into its canonical structure
 *
 * @throws {TypeError} for values JSON cannot represent (bigint, symbol, functions, top-level undefined)
 */
export function canonicalize(value: unknown): JsonValue {
  const result = canonicalizeNode(value, "$");
  if (result === undefined) {
    throw new TypeError("Document must not be undefined");
  }
  return result;
}

function canonicalizeNode(value: unknown, where: string): JsonValue | undefined {
  if (value === null) return null;
  if (value === undefined) return undefined;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    return Object.is(value, -0) ? 0 : value;
  }
  if (typeof value !== "object") {
    throw new TypeError(`Unsupported ${typeof value} at ${where}`);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => canonicalizeNode(item, `${where}[${index}]`) ?? null);
  }

  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const sorted: [string, JsonValue][] = [];
  for (const [key, raw] of entries) {
    const child = canonicalizeNode(raw, `${where}.${key}`);
    if (child !== undefined) {
      sorted.push([key, child]);
    }
  }
  // fromEntries defines own properties, so a "__proto__" key stays data
  return Object.fromEntries(sorted);
}

/**
 * Canonical serialization: sorted keys, two-space indent, trailing newline
 */
export function canonicalJson(value: unknown): string {
  return serializeCanonical(canonicalize(value));
}

/**
 * Serialize a value that is already canonical
 */
export function serializeCanonical(value: JsonValue): string {
  return JSON.stringify(value, null, 2) + "\n";
}

/**
 * Parse stored bytes back into a canonical value
 *
 * @throws {SyntaxError} when the content is not JSON
 */
export function parseCanonical(content: string | Buffer): JsonValue {
  const parsed: unknown = JSON.parse(typeof content === "string" ? content : content.toString("utf-8"));
  return canonicalize(parsed);
}

/**
 * Whole-document structural equality after canonicalization
 */
export function documentsEqual(left: unknown, right: unknown): boolean {
  return isDeepStrictEqual(canonicalize(left), canonicalize(right));
}
