/**
 * corpuslint - Reference Resolver
 *
 * Every ID a relation, coreference chain or event argument points to must
 * exist in the same document. Misses are warnings: real corpora reference
 * annotations that were pruned or deduplicated upstream.
 */

import type { KbDocument } from "../schema/kbSchema.js";
import { createFinding, type Finding, type FindingContext } from "./findings.js";

export type ReferableKind = "entity" | "event";

/**
 * "entity" and "event" must resolve to that kind; "any" accepts both
 * (event arguments may point at entities or at other events)
 */
export type ReferenceKind = ReferableKind | "any";

export interface ReferencedId {
  id: string;
  kind: ReferenceKind;
  /** Annotation holding the reference */
  referrerId: string;
  /** Field path inside the referrer, e.g. "arg2_id" or "arguments[1].ref_id" */
  field: string;
}

export interface ReferenceCheckOptions {
  /** Layers whose references are not checked (bypassed keys) */
  skipLayers?: ReadonlySet<string>;
}

const referableKey = (id: string, kind: ReferableKind) => `${kind}:${id}`;

/**
 * (id, kind) pairs that references may resolve to
 */
export function existingReferableIds(document: KbDocument): Set<string> {
  const existing = new Set<string>();
  for (const entity of document.entities) {
    existing.add(referableKey(entity.id, "entity"));
  }
  for (const event of document.events) {
    existing.add(referableKey(event.id, "event"));
  }
  return existing;
}

/**
 * Every reference the document makes, in layer order
 */
export function referencedIds(document: KbDocument, skipLayers: ReadonlySet<string> = new Set()): ReferencedId[] {
  const references: ReferencedId[] = [];

  if (!skipLayers.has("events")) {
    for (const event of document.events) {
      event.arguments.forEach((argument, index) => {
        references.push({ id: argument.ref_id, kind: "any", referrerId: event.id, field: `arguments[${index}].ref_id` });
      });
    }
  }

  if (!skipLayers.has("coreferences")) {
    for (const coreference of document.coreferences) {
      coreference.entity_ids.forEach((entityId, index) => {
        references.push({ id: entityId, kind: "entity", referrerId: coreference.id, field: `entity_ids[${index}]` });
      });
    }
  }

  if (!skipLayers.has("relations")) {
    for (const relation of document.relations) {
      references.push({ id: relation.arg1_id, kind: "entity", referrerId: relation.id, field: "arg1_id" });
      references.push({ id: relation.arg2_id, kind: "entity", referrerId: relation.id, field: "arg2_id" });
    }
  }

  return references;
}

export function isResolved(reference: Pick<ReferencedId, "id" | "kind">, existing: ReadonlySet<string>): boolean {
  if (reference.kind === "any") {
    return existing.has(referableKey(reference.id, "entity")) || existing.has(referableKey(reference.id, "event"));
  }
  return existing.has(referableKey(reference.id, reference.kind));
}

/**
 * One WARNING per unresolved reference, carrying the missing (id, kind)
 * and the IDs that do exist
 */
export function checkReferences(
  document: KbDocument,
  context: FindingContext = {},
  options: ReferenceCheckOptions = {}
): Finding[] {
  const existing = existingReferableIds(document);
  const findings: Finding[] = [];

  for (const reference of referencedIds(document, options.skipLayers)) {
    if (isResolved(reference, existing)) {
      continue;
    }

    const kindLabel = reference.kind === "any" ? "entity/event" : reference.kind;
    findings.push(
      createFinding(
        "WARNING",
        "references",
        "UNRESOLVED_REFERENCE",
        `${reference.referrerId}.${reference.field} = "${reference.id}" (${kindLabel}) could not be found`,
        { ...context, annotationId: reference.referrerId },
        {
          field: reference.field,
          missing: { id: reference.id, kind: reference.kind },
          existingIds: [...existing].sort(),
        }
      )
    );
  }

  return findings;
}
