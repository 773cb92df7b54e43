/**
 * corpuslint - Schema Document Variant
 *
 * Closed tagged variant over the interchange schemas. Checks dispatch on
 * `schema` instead of probing record keys at run time.
 */

import type { ZodIssue } from "zod";
import { KbDocumentSchema, type KbDocument } from "./kbSchema.js";
import { QaDocumentSchema, type QaDocument } from "./qaSchema.js";
import {
  EntailmentDocumentSchema,
  PairsDocumentSchema,
  Text2TextDocumentSchema,
  TextDocumentSchema,
  type EntailmentDocument,
  type PairsDocument,
  type Text2TextDocument,
  type TextDocument,
} from "./textSchemas.js";
import type { SchemaName } from "./tasks.js";

// ============================================================================
// Types
// ============================================================================

export type SchemaDocument =
  | { schema: "KB"; document: KbDocument }
  | { schema: "QA"; document: QaDocument }
  | { schema: "TE"; document: EntailmentDocument }
  | { schema: "PAIRS"; document: PairsDocument }
  | { schema: "T2T"; document: Text2TextDocument }
  | { schema: "TEXT"; document: TextDocument };

/**
 * An identifier declared somewhere inside a document
 */
export interface IdentifiableNode {
  id: string;
  /** Layer that declares it, e.g. "entities" */
  layer: string;
  /** Position inside the layer */
  index: number;
}

export type ParseResult =
  | { success: true; value: SchemaDocument }
  | { success: false; issues: ZodIssue[] };

/**
 * Offsets count Unicode code points (the unit most corpora are indexed in)
 * or UTF-16 code units (JavaScript string indices)
 */
export type OffsetUnit = "codepoint" | "utf16";

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate a raw record against the schema of the config being checked
 */
export function parseSchemaDocument(schema: SchemaName, raw: unknown): ParseResult {
  switch (schema) {
    case "KB": {
      const result = KbDocumentSchema.safeParse(raw);
      return result.success ? { success: true, value: { schema, document: result.data } } : { success: false, issues: result.error.issues };
    }
    case "QA": {
      const result = QaDocumentSchema.safeParse(raw);
      return result.success ? { success: true, value: { schema, document: result.data } } : { success: false, issues: result.error.issues };
    }
    case "TE": {
      const result = EntailmentDocumentSchema.safeParse(raw);
      return result.success ? { success: true, value: { schema, document: result.data } } : { success: false, issues: result.error.issues };
    }
    case "PAIRS": {
      const result = PairsDocumentSchema.safeParse(raw);
      return result.success ? { success: true, value: { schema, document: result.data } } : { success: false, issues: result.error.issues };
    }
    case "T2T": {
      const result = Text2TextDocumentSchema.safeParse(raw);
      return result.success ? { success: true, value: { schema, document: result.data } } : { success: false, issues: result.error.issues };
    }
    case "TEXT": {
      const result = TextDocumentSchema.safeParse(raw);
      return result.success ? { success: true, value: { schema, document: result.data } } : { success: false, issues: result.error.issues };
    }
  }
}

export function kbDocument(document: KbDocument): SchemaDocument {
  return { schema: "KB", document };
}

// ============================================================================
// Visitors
// ============================================================================

/**
 * Identifiers declared inside a document, layer by layer.
 * The document's own `id` is not included; it is unique per split instead.
 */
export function identifiableNodes(doc: SchemaDocument): IdentifiableNode[] {
  if (doc.schema !== "KB") {
    return [];
  }

  const { document } = doc;
  const layers: Array<[string, ReadonlyArray<{ id: string }>]> = [
    ["passages", document.passages],
    ["entities", document.entities],
    ["events", document.events],
    ["relations", document.relations],
    ["coreferences", document.coreferences],
  ];

  const nodes: IdentifiableNode[] = [];
  for (const [layer, records] of layers) {
    records.forEach((record, index) => {
      nodes.push({ id: record.id, layer, index });
    });
  }
  return nodes;
}

function countValue(value: string | null): number {
  return value ? 1 : 0;
}

/**
 * Per-document feature counts: list features count their elements,
 * scalar features count 1 when non-empty
 */
export function featureCounts(doc: SchemaDocument): Record<string, number> {
  switch (doc.schema) {
    case "KB": {
      const d = doc.document;
      return {
        id: countValue(d.id),
        document_id: countValue(d.document_id),
        passages: d.passages.length,
        entities: d.entities.length,
        events: d.events.length,
        coreferences: d.coreferences.length,
        relations: d.relations.length,
        normalized: d.entities.reduce((sum, entity) => sum + entity.normalized.length, 0),
      };
    }
    case "QA": {
      const d = doc.document;
      return {
        id: countValue(d.id),
        question_id: countValue(d.question_id),
        document_id: countValue(d.document_id),
        question: countValue(d.question),
        type: countValue(d.type),
        choices: d.choices.length,
        context: countValue(d.context),
        answer: d.answer.length,
      };
    }
    case "TE": {
      const d = doc.document;
      return {
        id: countValue(d.id),
        premise: countValue(d.premise),
        hypothesis: countValue(d.hypothesis),
        label: countValue(d.label),
      };
    }
    case "PAIRS": {
      const d = doc.document;
      return {
        id: countValue(d.id),
        document_id: countValue(d.document_id),
        text_1: countValue(d.text_1),
        text_2: countValue(d.text_2),
        label: countValue(d.label),
      };
    }
    case "T2T": {
      const d = doc.document;
      return {
        id: countValue(d.id),
        document_id: countValue(d.document_id),
        text_1: countValue(d.text_1),
        text_2: countValue(d.text_2),
        text_1_name: countValue(d.text_1_name),
        text_2_name: countValue(d.text_2_name),
      };
    }
    case "TEXT": {
      const d = doc.document;
      return {
        id: countValue(d.id),
        document_id: countValue(d.document_id),
        text: countValue(d.text),
        labels: d.labels.length,
      };
    }
  }
}

// ============================================================================
// Document text
// ============================================================================

export const DEFAULT_PASSAGE_SEPARATOR = " ";

/**
 * Canonical text of a KB document against which every offset is read
 */
export class DocumentText {
  readonly value: string;
  private readonly unit: OffsetUnit;
  // Only materialised when the text has characters outside the BMP
  private readonly codePoints: string[] | null;

  constructor(value: string, unit: OffsetUnit = "codepoint") {
    this.value = value;
    this.unit = unit;
    this.codePoints = unit === "codepoint" && /[\uD800-\uDFFF]/.test(value) ? Array.from(value) : null;
  }

  static fromPassages(document: KbDocument, separator: string = DEFAULT_PASSAGE_SEPARATOR, unit?: OffsetUnit): DocumentText {
    const parts = document.passages.flatMap((passage) => passage.text);
    return new DocumentText(parts.join(separator), unit);
  }

  get length(): number {
    return this.codePoints ? this.codePoints.length : this.value.length;
  }

  get offsetUnit(): OffsetUnit {
    return this.unit;
  }

  /**
   * Substring over [start, end), clamped the way a sequence slice is
   */
  slice(start: number, end: number): string {
    if (this.codePoints) {
      return this.codePoints.slice(start, end).join("");
    }
    return this.value.slice(start, end);
  }
}
