/**
 * Tests for the multi-label checks
 */

import { describe, it, expect } from "@jest/globals";
import { checkMultilabel, dedupeMultilabelFindings, findConnector } from "../../src/validator/multilabel.js";
import { sortFindings } from "../../src/validator/findings.js";
import { buildKb } from "../fixtures/documents.js";

describe("findConnector", () => {
  it("should find each connector", () => {
    expect(findConnector("Gene+Protein")).toBe("+");
    expect(findConnector("a,b")).toBe(",");
    expect(findConnector("a|b")).toBe("|");
    expect(findConnector("a;b")).toBe(";");
    expect(findConnector("Gene_or_Protein")).toBeNull();
  });
});

describe("checkMultilabel", () => {
  it("should flag packed types and normalization values", () => {
    const document = buildKb({
      id: "d1",
      entities: [
        {
          id: "e0",
          type: "Gene;Protein",
          text: ["A"],
          offsets: [[0, 1]],
          normalized: [{ db_name: "MESH", db_id: "D001|D002" }],
        },
      ],
    });

    const findings = checkMultilabel(document, { documentId: "d1" });

    expect(findings).toHaveLength(2);
    expect(findings[0]).toMatchObject({
      code: "MULTILABEL_TYPE",
      annotationId: "e0",
      message: "entities e0 has type `Gene;Protein` with connector `;`; split it into one record per type",
      details: { layer: "entities", type: "Gene;Protein", connector: ";" },
    });
    expect(findings[1]).toMatchObject({
      code: "MULTILABEL_DB_REFERENCE",
      details: { field: "db_id", value: "D001|D002", connector: "|" },
    });
  });

  it("should check relation and passage types", () => {
    const document = buildKb({
      id: "d1",
      passages: [{ id: "p0", type: "title+abstract", text: ["x"], offsets: [[0, 1]] }],
      relations: [{ id: "r0", type: "binds,activates", arg1_id: "a", arg2_id: "b" }],
    });

    expect(checkMultilabel(document).map((f) => f.details?.layer)).toEqual(["passages", "relations"]);
  });

  it("should skip bypassed layers", () => {
    const document = buildKb({
      id: "d1",
      entities: [{ id: "e0", type: "a;b", text: [], offsets: [], normalized: [{ db_name: "x;y", db_id: "1" }] }],
    });

    expect(checkMultilabel(document, {}, new Set(["entities"]))).toEqual([]);
  });
});

describe("dedupeMultilabelFindings", () => {
  it("should keep one type finding per layer and one db finding per connector", () => {
    const first = buildKb({
      id: "d1",
      entities: [
        { id: "e0", type: "a;b", text: [], offsets: [], normalized: [{ db_name: "M", db_id: "1|2" }] },
        { id: "e1", type: "c;d", text: [], offsets: [], normalized: [{ db_name: "M", db_id: "3|4" }] },
      ],
    });
    const second = buildKb({
      id: "d2",
      entities: [{ id: "e0", type: "x+y", text: [], offsets: [], normalized: [{ db_name: "M", db_id: "5;6" }] }],
    });

    const findings = sortFindings([
      ...checkMultilabel(second, { split: "train", documentId: "d2" }),
      ...checkMultilabel(first, { split: "train", documentId: "d1" }),
    ]);
    const kept = dedupeMultilabelFindings(findings);

    expect(kept.map((f) => [f.documentId, f.annotationId, f.code])).toEqual([
      ["d1", "e0", "MULTILABEL_DB_REFERENCE"],
      ["d1", "e0", "MULTILABEL_TYPE"],
      ["d2", "e0", "MULTILABEL_DB_REFERENCE"],
    ]);
  });
});
