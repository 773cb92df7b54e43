/**
 * corpuslint - Identity Registry
 *
 * Walks the identifiers a document declares, layer by layer, and flags any
 * identifier declared twice. IDs are observed, never minted or rewritten.
 */

import { identifiableNodes, type IdentifiableNode, type SchemaDocument } from "../schema/document.js";
import { createFinding, type Finding, type FindingContext } from "./findings.js";

export interface IdentityResult {
  /** Every distinct identifier declared in the document */
  ids: Set<string>;
  findings: Finding[];
}

export interface IdentityCheckOptions {
  /** Layers left out of the walk (bypassed keys) */
  skipLayers?: ReadonlySet<string>;
}

/**
 * Collect declared IDs and report duplicates (always ERROR: a reference to
 * a duplicated ID resolves ambiguously)
 */
export function collectAndCheckIds(
  doc: SchemaDocument,
  context: FindingContext = {},
  options: IdentityCheckOptions = {}
): IdentityResult {
  const ids = new Set<string>();
  const firstSeen = new Map<string, IdentifiableNode>();
  const findings: Finding[] = [];

  for (const node of identifiableNodes(doc)) {
    if (options.skipLayers?.has(node.layer)) {
      continue;
    }

    const previous = firstSeen.get(node.id);
    if (previous) {
      findings.push(
        createFinding(
          "ERROR",
          "identity",
          "DUPLICATE_ID",
          `duplicate identifier "${node.id}" in ${node.layer}[${node.index}], first declared in ${previous.layer}[${previous.index}]`,
          { ...context, annotationId: node.id },
          {
            first: { layer: previous.layer, index: previous.index },
            duplicate: { layer: node.layer, index: node.index },
          }
        )
      );
      continue;
    }

    firstSeen.set(node.id, node);
    ids.add(node.id);
  }

  return { ids, findings };
}

/**
 * Tracks document IDs across one split
 */
export class DocumentIdRegistry {
  private readonly seen = new Set<string>();

  /**
   * @returns a DUPLICATE_DOCUMENT_ID finding when `documentId` was registered before
   */
  register(documentId: string, split: string): Finding | null {
    if (this.seen.has(documentId)) {
      return createFinding(
        "ERROR",
        "identity",
        "DUPLICATE_DOCUMENT_ID",
        `document id "${documentId}" appears more than once in split ${split}`,
        { split, documentId, annotationId: documentId }
      );
    }
    this.seen.add(documentId);
    return null;
  }

  get size(): number {
    return this.seen.size;
  }
}
