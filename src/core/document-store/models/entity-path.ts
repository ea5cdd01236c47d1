/**
 * Entity id ↔ file name mapping
 *
 * `AWS::S3::Bucket` is stored as `AWS--S3--Bucket.json`. The mapping is
 * bijective: every literal `-` and `%` in an id is percent-escaped first,
 * so `--` in a file name can only have come from `::`. Any other character
 * outside `[A-Za-z0-9._~]`, and a leading `.`, is percent-escaped as UTF-8.
 */

export const DOCUMENT_EXTENSION = ".json";

const SAFE_CHAR = /^[A-Za-z0-9._~]$/;
const ENCODED_NAME = /^(?:[A-Za-z0-9._~]|--|%[0-9A-F]{2})+$/;

function percentEncode(char: string): string {
  return Array.from(Buffer.from(char, "utf-8"))
    .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, "0")}`)
    .join("");
}

/**
 * Encode an entity id into a file-system-safe base name (without extension)
 *
 * @throws {RangeError} for an empty id
 */
export function encodeEntityId(entityId: string): string {
  if (entityId.length === 0) {
    throw new RangeError("Entity id must not be empty");
  }

  let encoded = "";
  let index = 0;
  while (index < entityId.length) {
    if (entityId.startsWith("::", index)) {
      encoded += "--";
      index += 2;
      continue;
    }
    const codePoint = entityId.codePointAt(index) ?? 0;
    const char = String.fromCodePoint(codePoint);
    const isLeadingDot = index === 0 && char === ".";
    encoded += SAFE_CHAR.test(char) && !isLeadingDot ? char : percentEncode(char);
    index += char.length;
  }
  return encoded;
}

/**
 * Decode a base name produced by {@link encodeEntityId}. Returns null for
 * names the encoder could never have produced.
 */
export function decodeEntityId(encoded: string): string | null {
  if (!ENCODED_NAME.test(encoded)) return null;
  try {
    const decoded = encoded.split("--").map(decodeURIComponent).join("::");
    return encodeEntityId(decoded) === encoded ? decoded : null;
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

export function entityIdToFileName(entityId: string): string {
  return encodeEntityId(entityId) + DOCUMENT_EXTENSION;
}

export function fileNameToEntityId(fileName: string): string | null {
  if (!fileName.endsWith(DOCUMENT_EXTENSION)) return null;
  return decodeEntityId(fileName.slice(0, -DOCUMENT_EXTENSION.length));
}
