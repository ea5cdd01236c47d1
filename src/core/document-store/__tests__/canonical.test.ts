/**
 * Tests for canonical document form and the id ↔ file-name mapping
 */

import { describe, it, expect } from "vitest";
import {
  canonicalize,
  canonicalJson,
  documentsEqual,
  parseCanonical,
} from "../models/canonical.js";
import {
  decodeEntityId,
  encodeEntityId,
  entityIdToFileName,
  fileNameToEntityId,
} from "../models/entity-path.js";

// =============================================================================
// Canonical Form
// =============================================================================

describe("canonicalJson", () => {
  it("should sort keys recursively and keep array order", () => {
    const text = canonicalJson({ b: 1, a: { d: [3, 1], c: null } });

    expect(text).toBe('{\n  "a": {\n    "c": null,\n    "d": [\n      3,\n      1\n    ]\n  },\n  "b": 1\n}\n');
  });

  it("should produce identical bytes for documents differing only in key order", () => {
    const left = { typeName: "AWS::S3::Bucket", properties: { Name: { type: "string" }, Arn: { type: "string" } } };
    const right = { properties: { Arn: { type: "string" }, Name: { type: "string" } }, typeName: "AWS::S3::Bucket" };

    expect(canonicalJson(left)).toBe(canonicalJson(right));
  });

  it("should end with a single newline", () => {
    expect(canonicalJson([])).toBe("[]\n");
  });
});

describe("canonicalize", () => {
  it("should turn -0 into 0", () => {
    expect(Object.is(canonicalize(-0), 0)).toBe(true);
  });

  it("should apply the JSON rules for undefined and non-finite numbers", () => {
    expect(canonicalize({ a: undefined, b: Number.NaN, c: [undefined, Infinity] })).toEqual({
      b: null,
      c: [null, null],
    });
  });

  it("should serialize dates as ISO strings", () => {
    expect(canonicalize({ at: new Date("2024-03-01T12:00:00.000Z") })).toEqual({
      at: "2024-03-01T12:00:00.000Z",
    });
  });

  it("should keep a __proto__ key as data", () => {
    const parsed: unknown = JSON.parse('{"__proto__": {"x": 1}}');
    const result = canonicalize(parsed);

    expect(Object.keys(result ?? {})).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
  });

  it("should reject values JSON cannot represent", () => {
    expect(() => canonicalize(undefined)).toThrow(TypeError);
    expect(() => canonicalize({ n: BigInt(1) })).toThrow(TypeError);
  });
});

describe("documentsEqual", () => {
  it("should ignore key order", () => {
    expect(documentsEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
  });

  it("should respect array order", () => {
    expect(documentsEqual({ a: [1, 2] }, { a: [2, 1] })).toBe(false);
  });

  it("should treat a dropped undefined field as absent", () => {
    expect(documentsEqual({ a: 1, b: undefined }, { a: 1 })).toBe(true);
  });
});

describe("parseCanonical", () => {
  it("should read back what canonicalJson wrote", () => {
    const document = { z: [{ y: true, x: "s" }], a: 1.5 };

    expect(parseCanonical(Buffer.from(canonicalJson(document)))).toEqual(canonicalize(document));
  });

  it("should throw on invalid JSON", () => {
    expect(() => parseCanonical("{not json")).toThrow(SyntaxError);
  });
});

// =============================================================================
// Entity Paths
// =============================================================================

describe("entityIdToFileName", () => {
  it("should map namespace separators to double dashes", () => {
    expect(entityIdToFileName("AWS::S3::Bucket")).toBe("AWS--S3--Bucket.json");
  });

  it("should escape characters that could collide or leave the directory", () => {
    expect(encodeEntityId("My-Type::X")).toBe("My%2DType--X");
    expect(encodeEntityId("a%b")).toBe("a%25b");
    expect(encodeEntityId("Foo/Bar")).toBe("Foo%2FBar");
    expect(encodeEntityId("A:B")).toBe("A%3AB");
    expect(encodeEntityId(":::")).toBe("--%3A");
    expect(encodeEntityId(".hidden")).toBe("%2Ehidden");
    expect(encodeEntityId("Ünï")).toBe("%C3%9Cn%C3%AF");
  });

  it("should reject an empty id", () => {
    expect(() => encodeEntityId("")).toThrow(RangeError);
  });
});

describe("fileNameToEntityId", () => {
  it("should invert the mapping", () => {
    const ids = ["AWS::S3::Bucket", "My-Type::X", "a%b", "Foo/Bar", "A:B", ":::", ".hidden", "Ünï", "--"];

    for (const id of ids) {
      expect(fileNameToEntityId(entityIdToFileName(id))).toBe(id);
    }
  });

  it("should keep distinct ids on distinct names", () => {
    expect(entityIdToFileName("A::B")).not.toBe(entityIdToFileName("A--B"));
  });

  it("should return null for names the encoder never produces", () => {
    expect(fileNameToEntityId("README.md")).toBeNull();
    expect(fileNameToEntityId("a-b.json")).toBeNull();
    expect(fileNameToEntityId("%zz.json")).toBeNull();
    expect(fileNameToEntityId("a%2db.json")).toBeNull();
    expect(fileNameToEntityId(".hidden.json")).toBeNull();
    expect(decodeEntityId("%FF")).toBeNull();
  });
});
