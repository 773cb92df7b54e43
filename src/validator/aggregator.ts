/**
 * corpuslint - Validation Report Aggregator
 *
 * Validates every split document by document on a bounded p-limit pool,
 * runs the conformance check once per split, and builds the report.
 * A failing document never stops the pass; only cancellation does.
 */

import pLimit from "p-limit";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { OffsetUnit, SchemaDocument } from "../schema/document.js";
import type { SchemaName, Task } from "../schema/tasks.js";
import { getLogger } from "../utils/logger.js";
import { CancellationError, ErrorCode } from "../utils/errors.js";
import { BypassRules, type BypassOptions } from "./bypass.js";
import { FeatureCounter, evaluateConformance } from "./conformance.js";
import { checkDocument } from "./documentChecks.js";
import {
  countByComponent,
  countBySeverity,
  createFinding,
  hasErrors,
  sortFindings,
  type Component,
  type Finding,
  type SeverityCounts,
} from "./findings.js";
import { DocumentIdRegistry } from "./identity.js";
import { dedupeMultilabelFindings } from "./multilabel.js";

// ============================================================================
// Types
// ============================================================================

export type DocumentSource = Iterable<SchemaDocument> | AsyncIterable<SchemaDocument>;

/**
 * A split read from disk: its documents plus the findings raised while
 * reading them (unparseable lines, schema violations). `findings` is read
 * after `documents` is exhausted.
 */
export interface LoadedSplit {
  documents: DocumentSource;
  findings: readonly Finding[];
}

export type SplitSource = DocumentSource | LoadedSplit;

export type DocumentsBySplit = Record<string, SplitSource> | Map<string, SplitSource>;

export interface ValidateOptions {
  /** Schema of every split; inferred from the first document when omitted */
  schema?: SchemaName;
  /** Ragged spans and malformed passages become ERROR */
  strict?: boolean;
  /** Documents validated concurrently (default: 8) */
  concurrency?: number;
  /** Global deadline for the whole run */
  timeoutMs?: number;
  /** Cooperative cancellation from the caller */
  signal?: AbortSignal;
  bypass?: BypassRules | BypassOptions;
  passageSeparator?: string;
  offsetUnit?: OffsetUnit;
  /** Called after each validated window of documents */
  onProgress?: (split: string, documentsChecked: number) => void;
}

export interface SplitReport {
  split: string;
  schema: SchemaName;
  /** True when the split was bypassed and not read at all */
  skipped: boolean;
  documentsChecked: number;
  hasFatalError: boolean;
  counts: SeverityCounts;
  byComponent: Record<Component, SeverityCounts>;
  featureCounts: Record<string, number>;
  findings: Finding[];
}

export interface ValidationReport {
  schema: SchemaName;
  declaredTasks: Task[];
  splits: SplitReport[];
  /** False iff any split has a fatal error */
  passed: boolean;
  durationMs: number;
}

export const DEFAULT_CONCURRENCY = 8;

// ============================================================================
// Cancellation
// ============================================================================

interface RunSignal {
  signal?: AbortSignal;
  timeoutSignal?: AbortSignal;
}

function createRunSignal(options: ValidateOptions): RunSignal {
  const timeoutSignal =
    options.timeoutMs !== undefined && options.timeoutMs > 0 ? AbortSignal.timeout(options.timeoutMs) : undefined;
  const signals = [options.signal, timeoutSignal].filter((s): s is AbortSignal => s !== undefined);

  if (signals.length === 0) {
    return {};
  }
  return {
    signal: signals.length === 1 ? signals[0] : AbortSignal.any(signals),
    timeoutSignal,
  };
}

function throwIfAborted(run: RunSignal, documentsChecked: number): void {
  if (!run.signal?.aborted) {
    return;
  }
  const code = run.timeoutSignal?.aborted ? ErrorCode.VALIDATION_TIMEOUT : ErrorCode.VALIDATION_CANCELLED;
  const reason: unknown = run.signal.reason;
  throw new CancellationError(code, documentsChecked, {
    cause: reason instanceof Error ? reason : undefined,
  });
}

// ============================================================================
// Split validation
// ============================================================================

function isLoadedSplit(source: SplitSource): source is LoadedSplit {
  return typeof source === "object" && source !== null && "documents" in source && "findings" in source;
}

function skippedReport(split: string, schema: SchemaName): SplitReport {
  return withFindings({ split, schema, skipped: true, documentsChecked: 0, featureCounts: {} }, []);
}

interface SplitRun {
  tasks: readonly Task[];
  bypass: BypassRules;
  run: RunSignal;
  options: ValidateOptions;
  checkedSoFar: () => number;
  onChecked: (count: number) => void;
}

async function validateSplit(split: string, source: SplitSource, ctx: SplitRun): Promise<SplitReport> {
  const logger = getLogger();
  const { options, bypass, run } = ctx;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const limit = pLimit(concurrency);
  const skipKeys = bypass.skippedKeys(split);
  const counter = new FeatureCounter();
  const documentIds = new DocumentIdRegistry();
  const findings: Finding[] = [];

  let schema = options.schema;
  let window: SchemaDocument[] = [];
  let documentsChecked = 0;

  const flush = async (): Promise<void> => {
    const batch = window;
    window = [];
    const results = await Promise.all(
      batch.map((doc) =>
        limit(async () => {
          await yieldToEventLoop();
          throwIfAborted(run, ctx.checkedSoFar());
          return checkDocument(doc, {
            split,
            strict: options.strict,
            passageSeparator: options.passageSeparator,
            offsetUnit: options.offsetUnit,
            skipKeys,
          });
        })
      )
    );
    // Single accumulation point for the split
    for (const result of results) {
      findings.push(...result);
    }
    documentsChecked += batch.length;
    ctx.onChecked(batch.length);
    options.onProgress?.(split, documentsChecked);
  };

  const documents = isLoadedSplit(source) ? source.documents : source;

  for await (const doc of documents) {
    throwIfAborted(run, ctx.checkedSoFar());

    schema ??= doc.schema;
    if (doc.schema !== schema) {
      findings.push(
        createFinding(
          "ERROR",
          "schema",
          "SCHEMA_VIOLATION",
          `document is a ${doc.schema} record but the split is validated as ${schema}`,
          { split, documentId: doc.document.id },
          { expected: schema, actual: doc.schema }
        )
      );
      continue;
    }

    const duplicate = documentIds.register(doc.document.id, split);
    if (duplicate) {
      findings.push(duplicate);
    }

    counter.add(doc);
    window.push(doc);
    if (window.length >= concurrency * 2) {
      await flush();
    }
  }
  await flush();

  if (isLoadedSplit(source)) {
    findings.push(...source.findings);
  }

  const splitSchema: SchemaName = schema ?? "KB";
  findings.push(...evaluateConformance(counter, splitSchema, ctx.tasks, { split, skipFeatures: skipKeys }));

  const sorted = sortFindings(findings);
  logger.debug(`Split ${split}: ${documentsChecked} documents, ${sorted.length} findings`);

  return withFindings(
    {
      split,
      schema: splitSchema,
      skipped: false,
      documentsChecked,
      featureCounts: counter.toJSON(),
    },
    sorted
  );
}

function withFindings(
  report: Omit<SplitReport, "findings" | "hasFatalError" | "counts" | "byComponent">,
  findings: Finding[]
): SplitReport {
  return {
    ...report,
    hasFatalError: hasErrors(findings),
    counts: countBySeverity(findings),
    byComponent: countByComponent(findings),
    findings,
  };
}

/**
 * Multi-label findings are reported once per run; the first split that
 * raises one keeps it.
 */
function dedupeAcrossSplits(splits: readonly SplitReport[]): SplitReport[] {
  const seen = new Set<string>();
  return splits.map((report) => withFindings(report, dedupeMultilabelFindings(report.findings, seen)));
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Validate documents grouped by split against the declared tasks
 *
 * @throws CancellationError when the timeout elapses or the signal aborts
 */
export async function validate(
  documentsBySplit: DocumentsBySplit,
  declaredTasks: readonly Task[],
  options: ValidateOptions = {}
): Promise<ValidationReport> {
  const logger = getLogger();
  const startTime = performance.now();
  const bypass = options.bypass instanceof BypassRules ? options.bypass : new BypassRules(options.bypass);
  const run = createRunSignal(options);
  const entries = documentsBySplit instanceof Map ? [...documentsBySplit.entries()] : Object.entries(documentsBySplit);

  for (const line of bypass.describe()) {
    logger.warn(line);
  }

  let totalChecked = 0;
  const ctx: SplitRun = {
    tasks: declaredTasks,
    bypass,
    run,
    options,
    checkedSoFar: () => totalChecked,
    onChecked: (count) => {
      totalChecked += count;
    },
  };

  const validated: SplitReport[] = [];
  for (const [split, source] of entries) {
    if (bypass.skipsSplit(split)) {
      logger.info(`Skipping split ${split}`);
      validated.push(skippedReport(split, options.schema ?? "KB"));
      continue;
    }
    logger.debug(`Validating split ${split}`);
    validated.push(await validateSplit(split, source, ctx));
  }
  const splits = dedupeAcrossSplits(validated);

  return {
    schema: options.schema ?? splits.find((s) => !s.skipped)?.schema ?? "KB",
    declaredTasks: [...declaredTasks],
    splits,
    passed: splits.every((split) => !split.hasFatalError),
    durationMs: performance.now() - startTime,
  };
}
