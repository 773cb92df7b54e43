/**
 * Tests for the Offset Verifier
 */

import { describe, it, expect } from "@jest/globals";
import { checkDocumentOffsets, checkOffsets } from "../../src/validator/offsets.js";
import { DocumentText } from "../../src/schema/document.js";
import { buildKb, D0 } from "../fixtures/documents.js";

const TEXT = "Gene X causes Y";

describe("checkOffsets", () => {
  it("should pass when every span matches", () => {
    expect(checkOffsets(TEXT, [[0, 6], [14, 15]], ["Gene X", "Y"], { annotationId: "e0" })).toEqual([]);
  });

  it("should report a mismatching span with both texts", () => {
    const findings = checkOffsets(TEXT, [[0, 4]], ["Gene X"], { split: "train", documentId: "d0", annotationId: "e0" });

    expect(findings).toEqual([
      {
        severity: "WARNING",
        component: "offsets",
        code: "OFFSET_MISMATCH",
        message: "e0: text `Gene X` != text_by_offset `Gene` at [0, 4]",
        split: "train",
        documentId: "d0",
        annotationId: "e0",
        details: { offset: [0, 4], expected: "Gene X", actual: "Gene" },
      },
    ]);
  });

  it("should compare exactly, without case or whitespace folding", () => {
    const findings = checkOffsets(TEXT, [[0, 4], [4, 6]], ["gene", "X"], { annotationId: "e0" });

    expect(findings.map((f) => f.details?.actual)).toEqual(["Gene", " X"]);
  });

  it("should warn on ragged lists and keep checking the offsets", () => {
    const findings = checkOffsets(TEXT, [[0, 4], [5, 6]], ["Gene"], { annotationId: "e3" });

    expect(findings.map((f) => f.code)).toEqual(["RAGGED_SPAN", "OFFSET_MISMATCH"]);
    expect(findings[0].severity).toBe("WARNING");
    expect(findings[0].message).toBe("e3: number of texts 1 != number of offsets 2");
    expect(findings[1].message).toBe("e3: text `` != text_by_offset `X` at [5, 6]");
  });

  it("should not compare extra texts that have no offset", () => {
    const findings = checkOffsets(TEXT, [[0, 4]], ["Gene", "X"], { annotationId: "e4" });

    expect(findings.map((f) => f.code)).toEqual(["RAGGED_SPAN"]);
  });

  it("should raise ragged lists to ERROR in strict mode", () => {
    const findings = checkOffsets(TEXT, [[0, 4]], [], { annotationId: "e5" }, { strict: true });

    expect(findings[0]).toMatchObject({ severity: "ERROR", code: "RAGGED_SPAN" });
  });

  it("should count offsets in code points on plain strings", () => {
    expect(checkOffsets("\u{1F600} Gene", [[2, 6]], ["Gene"], { annotationId: "e6" })).toEqual([]);
  });

  it("should warn on an annotation without texts and offsets", () => {
    const findings = checkOffsets(TEXT, [], [], { documentId: "d0", annotationId: "e7" });

    expect(findings).toEqual([
      {
        severity: "WARNING",
        component: "offsets",
        code: "EMPTY_SPAN",
        message: "e7: annotation has no text and no offset",
        documentId: "d0",
        annotationId: "e7",
      },
    ]);
  });

  it("should label findings without an annotation id", () => {
    const findings = checkOffsets(TEXT, [[0, 1]], ["x"]);
    expect(findings[0].message).toBe("(unknown): text `x` != text_by_offset `G` at [0, 1]");
  });
});

describe("checkDocumentOffsets", () => {
  it("should accept the reference document", () => {
    const document = buildKb(D0);
    expect(checkDocumentOffsets(document, DocumentText.fromPassages(document))).toEqual([]);
  });

  it("should check passages, entities and event triggers", () => {
    const document = buildKb({
      id: "d1",
      passages: [{ id: "p0", type: "abstract", text: ["TP53 activates MDM2"], offsets: [[0, 19]] }],
      entities: [{ id: "e0", type: "gene", text: ["TP53"], offsets: [[0, 3]] }],
      events: [{ id: "v0", type: "activation", trigger: { text: ["activates"], offsets: [[5, 13]] } }],
    });

    const findings = checkDocumentOffsets(document, DocumentText.fromPassages(document), { documentId: "d1" });

    expect(findings.map((f) => [f.annotationId, f.details?.actual])).toEqual([
      ["e0", "TP5"],
      ["v0", "activate"],
    ]);
  });

  it("should flag passages that are not a single span", () => {
    const document = buildKb({
      id: "d1",
      passages: [{ id: "p0", type: "abstract", text: ["A", "B"], offsets: [[0, 1], [2, 3]] }],
    });

    const findings = checkDocumentOffsets(document, DocumentText.fromPassages(document));

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      severity: "WARNING",
      code: "PASSAGE_SHAPE",
      annotationId: "p0",
      message: "p0: passages must have exactly one text and one offset, found 2 and 2",
    });
  });

  it("should raise malformed passages to ERROR in strict mode", () => {
    const document = buildKb({
      id: "d1",
      passages: [{ id: "p0", type: "abstract", text: ["A", "B"], offsets: [[0, 1], [2, 3]] }],
    });

    const findings = checkDocumentOffsets(document, DocumentText.fromPassages(document), {}, { strict: true });
    expect(findings[0].severity).toBe("ERROR");
  });

  it("should skip bypassed layers", () => {
    const document = buildKb({
      id: "d1",
      passages: [{ id: "p0", type: "abstract", text: ["TP53"], offsets: [[0, 4]] }],
      entities: [{ id: "e0", type: "gene", text: ["TP53"], offsets: [[0, 2]] }],
    });

    const findings = checkDocumentOffsets(document, DocumentText.fromPassages(document), {}, {
      skipLayers: new Set(["entities"]),
    });
    expect(findings).toEqual([]);
  });

  it("should read offsets in code points across astral characters", () => {
    const document = buildKb({
      id: "d1",
      passages: [{ id: "p0", type: "abstract", text: ["\u{1F9EC} BRCA1"], offsets: [[0, 7]] }],
      entities: [{ id: "e0", type: "gene", text: ["BRCA1"], offsets: [[2, 7]] }],
    });

    expect(checkDocumentOffsets(document, DocumentText.fromPassages(document))).toEqual([]);
    expect(checkDocumentOffsets(document, DocumentText.fromPassages(document, " ", "utf16"))).toHaveLength(2);
  });
});
