/**
 * corpuslint - Offset Verifier
 *
 * Confirms that the document text read at each [start, end) offset equals
 * the span text the annotation claims. Comparison is exact: no case
 * folding, no whitespace collapsing.
 */

import type { KbDocument, Offset } from "../schema/kbSchema.js";
import { DocumentText } from "../schema/document.js";
import { createFinding, type Finding, type FindingContext, type Severity } from "./findings.js";

export interface OffsetCheckOptions {
  /** Report ragged text/offset lists and malformed passages as ERROR */
  strict?: boolean;
}

/**
 * Compare each (offset, text) pair against the document text.
 *
 * Lists of different lengths raise RAGGED_SPAN and checking continues over
 * every offset; an offset with no text compares against "". An annotation
 * with neither texts nor offsets raises EMPTY_SPAN.
 */
export function checkOffsets(
  documentText: DocumentText | string,
  offsetList: readonly Offset[],
  textList: readonly string[],
  context: FindingContext = {},
  options: OffsetCheckOptions = {}
): Finding[] {
  const text = typeof documentText === "string" ? new DocumentText(documentText) : documentText;
  const raggedSeverity: Severity = options.strict ? "ERROR" : "WARNING";
  const findings: Finding[] = [];
  const label = context.annotationId ?? "(unknown)";

  if (textList.length === 0 && offsetList.length === 0) {
    findings.push(
      createFinding("WARNING", "offsets", "EMPTY_SPAN", `${label}: annotation has no text and no offset`, context)
    );
  }

  if (textList.length !== offsetList.length) {
    findings.push(
      createFinding(
        raggedSeverity,
        "offsets",
        "RAGGED_SPAN",
        `${label}: number of texts ${textList.length} != number of offsets ${offsetList.length}`,
        context,
        { texts: textList.length, offsets: offsetList.length }
      )
    );
  }

  offsetList.forEach(([start, end], index) => {
    const actual = text.slice(start, end);
    const expected = index < textList.length ? textList[index] : "";

    if (actual !== expected) {
      findings.push(
        createFinding(
          "WARNING",
          "offsets",
          "OFFSET_MISMATCH",
          `${label}: text \`${expected}\` != text_by_offset \`${actual}\` at [${start}, ${end}]`,
          context,
          { offset: [start, end], expected, actual }
        )
      );
    }
  });

  return findings;
}

/**
 * Check passages, entity mentions and event triggers of one KB document
 */
export function checkDocumentOffsets(
  document: KbDocument,
  documentText: DocumentText,
  context: FindingContext = {},
  options: OffsetCheckOptions & { skipLayers?: ReadonlySet<string> } = {}
): Finding[] {
  const skip = options.skipLayers ?? new Set<string>();
  const shapeSeverity: Severity = options.strict ? "ERROR" : "WARNING";
  const findings: Finding[] = [];

  if (!skip.has("passages")) {
    for (const passage of document.passages) {
      const passageContext = { ...context, annotationId: passage.id };

      if (passage.text.length !== 1 || passage.offsets.length !== 1) {
        findings.push(
          createFinding(
            shapeSeverity,
            "offsets",
            "PASSAGE_SHAPE",
            `${passage.id}: passages must have exactly one text and one offset, found ${passage.text.length} and ${passage.offsets.length}`,
            passageContext,
            { texts: passage.text.length, offsets: passage.offsets.length }
          )
        );
      }

      findings.push(...checkOffsets(documentText, passage.offsets, passage.text, passageContext, options));
    }
  }

  if (!skip.has("entities")) {
    for (const entity of document.entities) {
      findings.push(
        ...checkOffsets(documentText, entity.offsets, entity.text, { ...context, annotationId: entity.id }, options)
      );
    }
  }

  if (!skip.has("events")) {
    for (const event of document.events) {
      findings.push(
        ...checkOffsets(
          documentText,
          event.trigger.offsets,
          event.trigger.text,
          { ...context, annotationId: event.id },
          options
        )
      );
    }
  }

  return findings;
}
