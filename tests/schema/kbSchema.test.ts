/**
 * Tests for the KB interchange schema
 */

import { describe, it, expect } from "@jest/globals";
import { KbDocumentSchema, OffsetSchema } from "../../src/schema/kbSchema.js";
import { D0 } from "../fixtures/documents.js";

describe("KbDocumentSchema", () => {
  it("should accept a complete document", () => {
    const result = KbDocumentSchema.safeParse(D0);
    expect(result.success).toBe(true);
  });

  it("should default missing layers to empty lists", () => {
    const document = KbDocumentSchema.parse({ id: "d9" });

    expect(document.document_id).toBeNull();
    expect(document.passages).toEqual([]);
    expect(document.entities).toEqual([]);
    expect(document.events).toEqual([]);
    expect(document.relations).toEqual([]);
    expect(document.coreferences).toEqual([]);
  });

  it("should default entity normalizations and event arguments", () => {
    const document = KbDocumentSchema.parse({
      id: "d1",
      entities: [{ id: "e0", type: "gene", text: ["A"], offsets: [[0, 1]] }],
      events: [{ id: "v0", type: "binding", trigger: { text: ["binds"], offsets: [[2, 7]] } }],
    });

    expect(document.entities[0].normalized).toEqual([]);
    expect(document.events[0].arguments).toEqual([]);
  });

  it("should reject an empty document id", () => {
    const result = KbDocumentSchema.safeParse({ id: "" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("id must not be empty");
    }
  });

  it("should reject a layer that is not a list", () => {
    const result = KbDocumentSchema.safeParse({ id: "d1", entities: "e0" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["entities"]);
    }
  });
});

describe("OffsetSchema", () => {
  it("should accept a pair of non-negative integers", () => {
    expect(OffsetSchema.parse([3, 9])).toEqual([3, 9]);
  });

  it("should reject negative or fractional bounds", () => {
    expect(OffsetSchema.safeParse([-1, 4]).success).toBe(false);
    expect(OffsetSchema.safeParse([0, 1.5]).success).toBe(false);
  });

  it("should reject anything but a pair", () => {
    expect(OffsetSchema.safeParse([1]).success).toBe(false);
    expect(OffsetSchema.safeParse([1, 2, 3]).success).toBe(false);
  });
});
