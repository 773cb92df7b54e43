/**
 * corpuslint - Report Writer
 *
 * Renders a validation report either as a human-readable summary or as
 * JSON Lines (one object per split).
 * Outputs:
 *   - summary: counts per severity and component, sample findings, verdict
 *   - jsonl: split reports, findings included
 */

import { COMPONENTS, type Component, type Finding, type SeverityCounts } from "../validator/findings.js";
import type { SplitReport, ValidationReport } from "../validator/aggregator.js";

// ============================================================================
// Types
// ============================================================================

export type ReportFormat = "summary" | "jsonl";

export interface ReportOptions {
  /** Example findings shown per (component, code) category */
  maxSamples?: number;
}

export interface WriteReportOptions extends ReportOptions {
  format: ReportFormat;
  /** Receives each output line (default: console.log) */
  write?: (line: string) => void;
}

/**
 * One line of JSON output
 */
export interface SplitRecord {
  split: string;
  schema: string;
  declared_tasks: string[];
  skipped: boolean;
  documents_checked: number;
  passed: boolean;
  counts: SeverityCounts;
  by_component: Partial<Record<Component, SeverityCounts>>;
  feature_counts: Record<string, number>;
  findings: Finding[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_SAMPLES = 5;

/** Width of the component column in the summary */
const COMPONENT_COLUMN = 12;

// ============================================================================
// Utility Functions
// ============================================================================

function formatCounts(counts: SeverityCounts): string {
  return `${counts.ERROR} error(s), ${counts.WARNING} warning(s)`;
}

function formatMs(value: number): string {
  return `${value.toFixed(0)}ms`;
}

function nonEmptyComponents(
  byComponent: Record<Component, SeverityCounts>
): Array<[Component, SeverityCounts]> {
  return COMPONENTS.filter((component) => byComponent[component].ERROR + byComponent[component].WARNING > 0).map(
    (component): [Component, SeverityCounts] => [component, byComponent[component]]
  );
}

function findingLocation(finding: Finding): string {
  if (finding.documentId === undefined) {
    return "(split)";
  }
  return finding.annotationId !== undefined && finding.annotationId !== finding.documentId
    ? `${finding.documentId}/${finding.annotationId}`
    : finding.documentId;
}

interface FindingCategory {
  severity: Finding["severity"];
  component: Component;
  code: Finding["code"];
  findings: Finding[];
}

/**
 * Group findings by (component, code); categories follow component order,
 * then code. Findings keep their report order inside a category.
 */
export function groupFindings(findings: readonly Finding[]): FindingCategory[] {
  const categories = new Map<string, FindingCategory>();

  for (const finding of findings) {
    const key = `${finding.component}/${finding.code}`;
    const category = categories.get(key);
    if (category) {
      category.findings.push(finding);
      if (finding.severity === "ERROR") {
        category.severity = "ERROR";
      }
    } else {
      categories.set(key, {
        severity: finding.severity,
        component: finding.component,
        code: finding.code,
        findings: [finding],
      });
    }
  }

  return [...categories.values()].sort(
    (a, b) =>
      COMPONENTS.indexOf(a.component) - COMPONENTS.indexOf(b.component) ||
      (a.code < b.code ? -1 : a.code > b.code ? 1 : 0)
  );
}

// ============================================================================
// JSON Lines Output
// ============================================================================

export function toSplitRecord(split: SplitReport, report: ValidationReport): SplitRecord {
  const byComponent: Partial<Record<Component, SeverityCounts>> = {};
  for (const [component, counts] of nonEmptyComponents(split.byComponent)) {
    byComponent[component] = counts;
  }

  return {
    split: split.split,
    schema: split.schema,
    declared_tasks: report.declaredTasks,
    skipped: split.skipped,
    documents_checked: split.documentsChecked,
    passed: !split.hasFatalError,
    counts: split.counts,
    by_component: byComponent,
    feature_counts: split.featureCounts,
    findings: split.findings,
  };
}

export function formatJsonLines(report: ValidationReport): string[] {
  return report.splits.map((split) => JSON.stringify(toSplitRecord(split, report)));
}

// ============================================================================
// Summary Output
// ============================================================================

function formatSplitSummary(split: SplitReport, maxSamples: number): string[] {
  if (split.skipped) {
    return [`Split ${split.split}: skipped`];
  }

  const lines: string[] = [];
  lines.push(`Split ${split.split}: ${split.documentsChecked} document(s), ${formatCounts(split.counts)}`);

  for (const [component, counts] of nonEmptyComponents(split.byComponent)) {
    lines.push(`  ${component.padEnd(COMPONENT_COLUMN)}${formatCounts(counts)}`);
  }

  for (const category of groupFindings(split.findings)) {
    lines.push(`  [${category.severity}] ${category.component}/${category.code} (${category.findings.length})`);
    for (const finding of category.findings.slice(0, maxSamples)) {
      lines.push(`    - ${findingLocation(finding)}: ${finding.message}`);
    }
    const hidden = category.findings.length - maxSamples;
    if (hidden > 0) {
      lines.push(`    ... and ${hidden} more`);
    }
  }

  return lines;
}

/**
 * Human-readable summary, one entry per output line
 */
export function formatSummary(report: ValidationReport, options: ReportOptions = {}): string[] {
  const maxSamples = Math.max(0, options.maxSamples ?? DEFAULT_MAX_SAMPLES);
  const lines: string[] = [];

  const tasks = report.declaredTasks.length > 0 ? report.declaredTasks.join(", ") : "(none)";
  lines.push(`Schema: ${report.schema}`);
  lines.push(`Declared tasks: ${tasks}`);
  lines.push("");

  for (const split of report.splits) {
    lines.push(...formatSplitSummary(split, maxSamples));
    lines.push("");
  }

  const total: SeverityCounts = { ERROR: 0, WARNING: 0 };
  let documents = 0;
  for (const split of report.splits) {
    total.ERROR += split.counts.ERROR;
    total.WARNING += split.counts.WARNING;
    documents += split.documentsChecked;
  }

  lines.push(
    `Result: ${report.passed ? "PASS" : "FAIL"} (${formatCounts(total)} in ${documents} document(s), ${formatMs(report.durationMs)})`
  );

  return lines;
}

// ============================================================================
// Main Writer
// ============================================================================

/**
 * Write a report line by line
 *
 * @example
 * ```typescript
 * writeReport(report, { format: "summary", maxSamples: 3 });
 * ```
 */
export function writeReport(report: ValidationReport, options: WriteReportOptions): void {
  const write = options.write ?? ((line: string) => console.log(line));
  const lines = options.format === "jsonl" ? formatJsonLines(report) : formatSummary(report, options);
  for (const line of lines) {
    write(line);
  }
}
