/**
 * corpuslint - Document Loader
 *
 * Streams JSONL split files and validates each line against the config's
 * interchange schema with Zod. Lines that do not parse or do not match
 * the schema become findings; the stream moves on.
 */

import fs from "node:fs";
import readline from "node:readline";
import path from "node:path";
import type { ZodIssue } from "zod";
import { parseSchemaDocument, type SchemaDocument } from "../schema/document.js";
import type { SchemaName } from "../schema/tasks.js";
import type { LoadedSplit } from "../validator/aggregator.js";
import { createFinding, type Finding } from "../validator/findings.js";
import { ErrorCode, FileSystemError } from "../utils/errors.js";

// ============================================================================
// Types
// ============================================================================

export interface LoaderOptions {
  /** Split name attached to findings */
  split?: string;
  /** Skip blank lines (default: true) */
  skipEmptyLines?: boolean;
  /** Skip lines starting with # (default: true) */
  skipComments?: boolean;
  /** Called for each line that could not be turned into a document */
  onInvalidRecord?: (finding: Finding) => void;
  /** Called for each parsed document */
  onRecord?: (document: SchemaDocument, lineNumber: number) => void;
}

export interface LoadedRecord {
  document: SchemaDocument;
  /** Line number (1-based) */
  lineNumber: number;
}

export interface DocumentLoadResult {
  documents: SchemaDocument[];
  findings: Finding[];
  totalLines: number;
}

// ============================================================================
// Helpers
// ============================================================================

function rawDocumentId(raw: unknown): string | undefined {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const id: unknown = raw.id;
    if (typeof id === "string" || typeof id === "number") {
      return String(id);
    }
  }
  return undefined;
}

function describeIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join(", ");
}

// ============================================================================
// Stream Loader (AsyncGenerator)
// ============================================================================

/**
 * Stream the documents of one JSONL file
 *
 * @throws FileSystemError if the file does not exist
 *
 * @example
 * ```typescript
 * for await (const { document, lineNumber } of loadDocumentStream("train.jsonl", "KB")) {
 *   console.log(`Line ${lineNumber}: ${document.document.id}`);
 * }
 * ```
 */
export async function* loadDocumentStream(
  filePath: string,
  schema: SchemaName,
  options: LoaderOptions = {}
): AsyncGenerator<LoadedRecord, void, undefined> {
  const { split, skipEmptyLines = true, skipComments = true, onInvalidRecord, onRecord } = options;
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new FileSystemError(ErrorCode.FS_FILE_NOT_FOUND, `Split file not found: ${absolutePath}`, {
      path: absolutePath,
    });
  }

  const fileStream = fs.createReadStream(absolutePath, { encoding: "utf-8" });
  const rl = readline.createInterface({
    input: fileStream,
    crlfDelay: Infinity,
  });

  const fileName = path.basename(absolutePath);
  let lineNumber = 0;

  try {
    for await (const line of rl) {
      lineNumber++;

      if (skipEmptyLines && line.trim() === "") {
        continue;
      }
      if (skipComments && line.trim().startsWith("#")) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (parseError) {
        onInvalidRecord?.(
          createFinding(
            "ERROR",
            "schema",
            "JSON_PARSE_ERROR",
            `${fileName}:${lineNumber}: JSON parse error: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
            split !== undefined ? { split } : {},
            { file: absolutePath, line: lineNumber }
          )
        );
        continue;
      }

      const result = parseSchemaDocument(schema, parsed);
      if (!result.success) {
        const documentId = rawDocumentId(parsed);
        onInvalidRecord?.(
          createFinding(
            "ERROR",
            "schema",
            "SCHEMA_VIOLATION",
            `${fileName}:${lineNumber}: record does not match the ${schema} schema: ${describeIssues(result.issues)}`,
            { ...(split !== undefined ? { split } : {}), ...(documentId !== undefined ? { documentId } : {}) },
            { file: absolutePath, line: lineNumber, issues: result.issues }
          )
        );
        continue;
      }

      onRecord?.(result.value, lineNumber);
      yield { document: result.value, lineNumber };
    }
  } finally {
    rl.close();
    fileStream.destroy();
  }
}

// ============================================================================
// Split Loader
// ============================================================================

/**
 * Lazily stream a split spread over several files. `findings` fills up
 * while `documents` is consumed.
 */
export function loadSplit(files: readonly string[], schema: SchemaName, split: string): LoadedSplit {
  const findings: Finding[] = [];

  async function* documents(): AsyncGenerator<SchemaDocument, void, undefined> {
    for (const file of files) {
      for await (const { document } of loadDocumentStream(file, schema, {
        split,
        onInvalidRecord: (finding) => findings.push(finding),
      })) {
        yield document;
      }
    }
  }

  return { documents: documents(), findings };
}

/**
 * Build a lazily loaded split per entry of `splitFiles`
 */
export function loadSplits(splitFiles: ReadonlyMap<string, readonly string[]>, schema: SchemaName): Map<string, LoadedSplit> {
  const splits = new Map<string, LoadedSplit>();
  for (const [split, files] of splitFiles) {
    splits.set(split, loadSplit(files, schema, split));
  }
  return splits;
}

// ============================================================================
// Batch Loader
// ============================================================================

/**
 * Load a whole JSONL file into memory
 *
 * @example
 * ```typescript
 * const result = await loadDocuments("train.jsonl", "KB");
 * console.log(`Loaded ${result.documents.length} of ${result.totalLines} records`);
 * ```
 */
export async function loadDocuments(
  filePath: string,
  schema: SchemaName,
  options: Omit<LoaderOptions, "onInvalidRecord" | "onRecord"> = {}
): Promise<DocumentLoadResult> {
  const documents: SchemaDocument[] = [];
  const findings: Finding[] = [];

  for await (const { document } of loadDocumentStream(filePath, schema, {
    ...options,
    onInvalidRecord: (finding) => findings.push(finding),
  })) {
    documents.push(document);
  }

  return {
    documents,
    findings,
    totalLines: documents.length + findings.length,
  };
}
