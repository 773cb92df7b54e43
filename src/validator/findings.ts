/**
 * corpuslint - Findings
 *
 * A finding is one reported inconsistency. Severity decides whether it
 * fails the run; component and code say which check raised it.
 */

export type Severity = "ERROR" | "WARNING";

export const COMPONENTS = [
  "schema",
  "identity",
  "references",
  "offsets",
  "conformance",
  "multilabel",
  "qa",
] as const;

export type Component = (typeof COMPONENTS)[number];

export type FindingCode =
  // schema
  | "JSON_PARSE_ERROR"
  | "SCHEMA_VIOLATION"
  // identity
  | "DUPLICATE_ID"
  | "DUPLICATE_DOCUMENT_ID"
  // references
  | "UNRESOLVED_REFERENCE"
  // offsets
  | "OFFSET_MISMATCH"
  | "RAGGED_SPAN"
  | "PASSAGE_SHAPE"
  | "EMPTY_SPAN"
  // conformance
  | "MISSING_REQUIRED_FEATURE"
  | "UNDECLARED_FEATURE"
  // multilabel
  | "MULTILABEL_TYPE"
  | "MULTILABEL_DB_REFERENCE"
  // qa
  | "CHOICES_WITHOUT_CHOICE_TYPE"
  | "CHOICE_TYPE_WITHOUT_CHOICES"
  | "ANSWER_NOT_IN_CHOICES";

/**
 * Where a finding was raised; every field that is known gets filled in
 */
export interface FindingContext {
  split?: string;
  documentId?: string;
  annotationId?: string;
}

export interface Finding extends FindingContext {
  severity: Severity;
  component: Component;
  code: FindingCode;
  message: string;
  details?: Record<string, unknown>;
}

export function createFinding(
  severity: Severity,
  component: Component,
  code: FindingCode,
  message: string,
  context: FindingContext = {},
  details?: Record<string, unknown>
): Finding {
  const finding: Finding = { severity, component, code, message };
  if (context.split !== undefined) finding.split = context.split;
  if (context.documentId !== undefined) finding.documentId = context.documentId;
  if (context.annotationId !== undefined) finding.annotationId = context.annotationId;
  if (details !== undefined) finding.details = details;
  return finding;
}

function compareText(a: string | undefined, b: string | undefined): number {
  const left = a ?? "";
  const right = b ?? "";
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Order by (split, document id, component, annotation id), then code and message
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareText(a.split, b.split) ||
    compareText(a.documentId, b.documentId) ||
    compareText(a.component, b.component) ||
    compareText(a.annotationId, b.annotationId) ||
    compareText(a.code, b.code) ||
    compareText(a.message, b.message)
  );
}

export function sortFindings(findings: Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

export function hasErrors(findings: readonly Finding[]): boolean {
  return findings.some((finding) => finding.severity === "ERROR");
}

export interface SeverityCounts {
  ERROR: number;
  WARNING: number;
}

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = { ERROR: 0, WARNING: 0 };
  for (const finding of findings) {
    counts[finding.severity]++;
  }
  return counts;
}

export function countByComponent(findings: readonly Finding[]): Record<Component, SeverityCounts> {
  const counts: Record<Component, SeverityCounts> = {
    schema: { ERROR: 0, WARNING: 0 },
    identity: { ERROR: 0, WARNING: 0 },
    references: { ERROR: 0, WARNING: 0 },
    offsets: { ERROR: 0, WARNING: 0 },
    conformance: { ERROR: 0, WARNING: 0 },
    multilabel: { ERROR: 0, WARNING: 0 },
    qa: { ERROR: 0, WARNING: 0 },
  };

  for (const finding of findings) {
    counts[finding.component][finding.severity]++;
  }
  return counts;
}
