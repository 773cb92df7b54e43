/**
 * corpuslint - Per-document Checks
 *
 * Runs every document-local check in a fixed order and returns the
 * findings. Holds no state between documents.
 */

import { DocumentText, DEFAULT_PASSAGE_SEPARATOR, type OffsetUnit, type SchemaDocument } from "../schema/document.js";
import { collectAndCheckIds } from "./identity.js";
import { checkReferences } from "./references.js";
import { checkDocumentOffsets } from "./offsets.js";
import { checkMultilabel } from "./multilabel.js";
import { checkQuestionAnswering } from "./questionAnswering.js";
import type { Finding } from "./findings.js";

export interface DocumentCheckOptions {
  split?: string;
  /** Ragged spans and malformed passages become ERROR */
  strict?: boolean;
  /** Joins passage texts into the document text (default: one space) */
  passageSeparator?: string;
  offsetUnit?: OffsetUnit;
  /** Features whose checks are bypassed */
  skipKeys?: ReadonlySet<string>;
}

/**
 * Identity → references → offsets → multi-label (KB), or the QA checks
 */
export function checkDocument(doc: SchemaDocument, options: DocumentCheckOptions = {}): Finding[] {
  const skipKeys = options.skipKeys ?? new Set<string>();
  const context = {
    ...(options.split !== undefined ? { split: options.split } : {}),
    documentId: doc.document.id,
  };

  const findings: Finding[] = [...collectAndCheckIds(doc, context, { skipLayers: skipKeys }).findings];

  switch (doc.schema) {
    case "KB": {
      const document = doc.document;
      const text = DocumentText.fromPassages(
        document,
        options.passageSeparator ?? DEFAULT_PASSAGE_SEPARATOR,
        options.offsetUnit
      );
      findings.push(...checkReferences(document, context, { skipLayers: skipKeys }));
      findings.push(
        ...checkDocumentOffsets(document, text, context, { strict: options.strict, skipLayers: skipKeys })
      );
      findings.push(...checkMultilabel(document, context, skipKeys));
      break;
    }
    case "QA":
      findings.push(...checkQuestionAnswering(doc.document, context, { skipKeys }));
      break;
    default:
      break;
  }

  return findings;
}
