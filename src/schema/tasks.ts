/**
 * corpuslint - Tasks and Schema Dispatch Tables
 *
 * A dataset declares the tasks it supports. Each task maps to exactly one
 * interchange schema, and (for conformance checking) to the feature names
 * a split must populate for the task to be usable.
 */

import { z } from "zod";
import { ErrorCode, UsageError } from "../utils/errors.js";

// ============================================================================
// Schemas
// ============================================================================

export const SchemaNameSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.toUpperCase() : value),
  z.enum(["KB", "QA", "TE", "PAIRS", "T2T", "TEXT"])
);

export type SchemaName = z.infer<typeof SchemaNameSchema>;

// ============================================================================
// Tasks
// ============================================================================

export const TASKS = {
  named_entity_recognition: { code: "NER", schema: "KB" },
  named_entity_disambiguation: { code: "NED", schema: "KB" },
  event_extraction: { code: "EE", schema: "KB" },
  relation_extraction: { code: "RE", schema: "KB" },
  coreference_resolution: { code: "COREF", schema: "KB" },
  question_answering: { code: "QA", schema: "QA" },
  textual_entailment: { code: "TE", schema: "TE" },
  semantic_similarity: { code: "STS", schema: "PAIRS" },
  text_pairs_classification: { code: "TXT2CLASS", schema: "PAIRS" },
  paraphrasing: { code: "PARA", schema: "T2T" },
  translation: { code: "TRANSL", schema: "T2T" },
  summarization: { code: "SUM", schema: "T2T" },
  text_classification: { code: "TXTCLASS", schema: "TEXT" },
} as const satisfies Record<string, { code: string; schema: SchemaName }>;

export type Task = keyof typeof TASKS;

function isTask(value: string): value is Task {
  return Object.prototype.hasOwnProperty.call(TASKS, value);
}

const TASK_NAMES: Task[] = Object.keys(TASKS).filter(isTask);

/**
 * Feature names a KB task needs populated somewhere in a split
 */
export const TASK_TO_FEATURES: Partial<Record<Task, readonly string[]>> = {
  named_entity_recognition: ["entities"],
  relation_extraction: ["relations", "entities"],
  named_entity_disambiguation: ["entities", "normalized"],
  coreference_resolution: ["entities", "coreferences"],
  event_extraction: ["events"],
};

/**
 * Every feature some task can require; populated features outside this
 * set never raise an "undeclared" warning
 */
export const TASK_FEATURES: ReadonlySet<string> = new Set(
  Object.values(TASK_TO_FEATURES).flatMap((features) => features ?? [])
);

/**
 * Required features of the non-KB schemas, applied when any declared
 * task maps to that schema
 */
export const SCHEMA_REQUIRED_FEATURES: Record<Exclude<SchemaName, "KB">, readonly string[]> = {
  QA: ["question", "answer"],
  TE: ["premise", "hypothesis", "label"],
  PAIRS: ["text_1", "text_2", "label"],
  T2T: ["text_1", "text_2"],
  TEXT: ["text", "labels"],
};

/**
 * Resolve a task identifier given as snake_case name, enum name or short code
 *
 * @returns the canonical task, or null when unknown
 */
export function resolveTask(identifier: string): Task | null {
  const trimmed = identifier.trim();
  const lowered = trimmed.toLowerCase();

  if (isTask(lowered)) {
    return lowered;
  }

  const upper = trimmed.toUpperCase();
  return TASK_NAMES.find((task) => TASKS[task].code === upper) ?? null;
}

/**
 * Parse a declared task list, failing on anything unrecognised
 *
 * @throws UsageError listing every unknown identifier
 */
export function parseDeclaredTasks(identifiers: readonly string[]): Task[] {
  const tasks: Task[] = [];
  const unknown: string[] = [];

  for (const identifier of identifiers) {
    const task = resolveTask(identifier);
    if (task === null) {
      unknown.push(identifier);
    } else if (!tasks.includes(task)) {
      tasks.push(task);
    }
  }

  if (unknown.length > 0) {
    throw new UsageError(
      ErrorCode.USAGE_INVALID_TASKS,
      `Unknown task(s): ${unknown.join(", ")}. Valid tasks: ${TASK_NAMES.join(", ")}`,
      { argument: "tasks" }
    );
  }

  return tasks;
}

export function schemaForTask(task: Task): SchemaName {
  return TASKS[task].schema;
}

/**
 * Features that the declared tasks require for documents of `schema`
 */
export function requiredFeatures(schema: SchemaName, tasks: readonly Task[]): Set<string> {
  const required = new Set<string>();
  const relevant = tasks.filter((task) => schemaForTask(task) === schema);

  if (schema === "KB") {
    for (const task of relevant) {
      for (const feature of TASK_TO_FEATURES[task] ?? []) {
        required.add(feature);
      }
    }
    return required;
  }

  if (relevant.length > 0) {
    for (const feature of SCHEMA_REQUIRED_FEATURES[schema]) {
      required.add(feature);
    }
  }
  return required;
}
