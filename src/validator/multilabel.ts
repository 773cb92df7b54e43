/**
 * corpuslint - Multi-label Checks
 *
 * Loaders sometimes pack several labels into one `type` or one
 * normalization value ("Gene;Protein", "MESH:D001|MESH:D002"). One record
 * per label is expected instead.
 */

import type { KbDocument, KbTypedLayer } from "../schema/kbSchema.js";
import { KB_TYPED_LAYERS } from "../schema/kbSchema.js";
import { createFinding, type Finding, type FindingContext } from "./findings.js";

export const CONNECTOR_PATTERN = /\+|,|\||;/;

export function findConnector(value: string): string | null {
  const match = CONNECTOR_PATTERN.exec(value);
  return match ? match[0] : null;
}

function typedRecords(document: KbDocument, layer: KbTypedLayer): ReadonlyArray<{ id: string; type: string }> {
  switch (layer) {
    case "passages":
      return document.passages;
    case "entities":
      return document.entities;
    case "relations":
      return document.relations;
    case "events":
      return document.events;
  }
}

/**
 * Every `type` and normalization value containing a connector
 */
export function checkMultilabel(
  document: KbDocument,
  context: FindingContext = {},
  skipLayers: ReadonlySet<string> = new Set()
): Finding[] {
  const findings: Finding[] = [];

  for (const layer of KB_TYPED_LAYERS) {
    if (skipLayers.has(layer)) {
      continue;
    }
    for (const record of typedRecords(document, layer)) {
      const connector = findConnector(record.type);
      if (connector) {
        findings.push(
          createFinding(
            "WARNING",
            "multilabel",
            "MULTILABEL_TYPE",
            `${layer} ${record.id} has type \`${record.type}\` with connector \`${connector}\`; split it into one record per type`,
            { ...context, annotationId: record.id },
            { layer, type: record.type, connector }
          )
        );
      }
    }
  }

  if (!skipLayers.has("entities")) {
    for (const entity of document.entities) {
      for (const normalization of entity.normalized) {
        for (const field of ["db_name", "db_id"] as const) {
          const value = normalization[field];
          const connector = findConnector(value);
          if (connector) {
            findings.push(
              createFinding(
                "WARNING",
                "multilabel",
                "MULTILABEL_DB_REFERENCE",
                `entity ${entity.id} has \`${field}\` \`${value}\` with connector \`${connector}\`; expand the normalization list instead`,
                { ...context, annotationId: entity.id },
                { field, value, connector }
              )
            );
          }
        }
      }
    }
  }

  return findings;
}

/**
 * Keep the first MULTILABEL_TYPE finding per layer and the first
 * MULTILABEL_DB_REFERENCE finding per connector. Expects sorted input so
 * the survivor does not depend on scheduling. Pass the same `seen` set
 * across splits to deduplicate over a whole run.
 */
export function dedupeMultilabelFindings(findings: readonly Finding[], seen: Set<string> = new Set()): Finding[] {
  return findings.filter((finding) => {
    if (finding.component !== "multilabel") {
      return true;
    }
    const key =
      finding.code === "MULTILABEL_TYPE"
        ? `type:${String(finding.details?.layer)}`
        : `db:${String(finding.details?.connector)}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
