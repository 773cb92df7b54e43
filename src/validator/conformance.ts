/**
 * corpuslint - Schema Conformance Checker
 *
 * Works at split granularity: sparse population per document is normal,
 * but a feature a declared task needs must show up somewhere in the split.
 */

import { featureCounts, type SchemaDocument } from "../schema/document.js";
import { requiredFeatures, TASK_FEATURES, type SchemaName, type Task } from "../schema/tasks.js";
import { createFinding, type Finding } from "./findings.js";

/**
 * Running per-feature totals for one split
 */
export class FeatureCounter {
  private readonly counts = new Map<string, number>();

  add(doc: SchemaDocument): void {
    for (const [feature, count] of Object.entries(featureCounts(doc))) {
      this.counts.set(feature, (this.counts.get(feature) ?? 0) + count);
    }
  }

  get(feature: string): number {
    return this.counts.get(feature) ?? 0;
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries([...this.counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }
}

export function collectFeatureCounts(documents: Iterable<SchemaDocument>): FeatureCounter {
  const counter = new FeatureCounter();
  for (const doc of documents) {
    counter.add(doc);
  }
  return counter;
}

export interface ConformanceOptions {
  /** Schema of the split; inferred from the first document when omitted, else KB */
  schema?: SchemaName;
  split?: string;
  /** Features exempt from both checks (bypassed keys) */
  skipFeatures?: ReadonlySet<string>;
}

/**
 * Compare split feature totals with what the declared tasks require
 */
export function evaluateConformance(
  counts: Pick<FeatureCounter, "get" | "toJSON">,
  schema: SchemaName,
  declaredTasks: readonly Task[],
  options: Pick<ConformanceOptions, "split" | "skipFeatures"> = {}
): Finding[] {
  const skip = options.skipFeatures ?? new Set<string>();
  const required = requiredFeatures(schema, declaredTasks);
  const context = options.split !== undefined ? { split: options.split } : {};
  const findings: Finding[] = [];

  for (const feature of [...required].sort()) {
    if (skip.has(feature)) {
      continue;
    }
    if (counts.get(feature) === 0) {
      findings.push(
        createFinding(
          "ERROR",
          "conformance",
          "MISSING_REQUIRED_FEATURE",
          `required feature '${feature}' does not have any instances`,
          context,
          { feature, tasks: declaredTasks.filter((task) => requiredFeatures(schema, [task]).has(feature)) }
        )
      );
    }
  }

  for (const [feature, count] of Object.entries(counts.toJSON())) {
    if (count > 0 && !required.has(feature) && TASK_FEATURES.has(feature) && !skip.has(feature)) {
      findings.push(
        createFinding(
          "WARNING",
          "conformance",
          "UNDECLARED_FEATURE",
          `found ${count} instances of '${feature}' but no declared task uses them; are the declared tasks correct?`,
          context,
          { feature, count }
        )
      );
    }
  }

  return findings;
}

/**
 * Conformance of a whole split held in memory
 */
export function checkConformance(
  splitDocuments: readonly SchemaDocument[],
  declaredTasks: readonly Task[],
  options: ConformanceOptions = {}
): Finding[] {
  const schema = options.schema ?? splitDocuments[0]?.schema ?? "KB";
  return evaluateConformance(collectFeatureCounts(splitDocuments), schema, declaredTasks, options);
}
