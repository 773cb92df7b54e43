/**
 * corpuslint - Dataset Manifest
 *
 * dataset.yaml names the dataset, the tasks it declares support for, and
 * one entry per config: its interchange schema and the JSONL files of
 * each split.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { glob } from "glob";
import { z } from "zod";
import { SchemaNameSchema, parseDeclaredTasks, type Task } from "../schema/tasks.js";
import { parseSplitKeyPairs, type BypassOptions } from "../validator/bypass.js";
import {
  ConfigError,
  ErrorCode,
  FileSystemError,
  UsageError,
  isNodeError,
} from "../utils/errors.js";

// ============================================================================
// Schemas
// ============================================================================

export const MANIFEST_FILE_NAMES = ["dataset.yaml", "dataset.yml"] as const;

const SplitPatternsSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const ConfigEntrySchema = z.object({
  /** Config name passed with --config */
  name: z.string().min(1, "config name must not be empty"),
  schema: SchemaNameSchema,
  description: z.string().optional(),
  /** Split name → file path or glob pattern(s), relative to the data dir */
  splits: z.record(z.string(), SplitPatternsSchema).refine((splits) => Object.keys(splits).length > 0, {
    message: "a config must define at least one split",
  }),
});

export type ConfigEntry = z.infer<typeof ConfigEntrySchema>;

export const ManifestSchema = z.object({
  name: z.string().min(1, "name must not be empty"),
  display_name: z.string().optional(),
  description: z.string().optional(),
  /** Declared tasks; validated separately so unknown names are usage errors */
  tasks: z.array(z.string()).min(1, "tasks must list at least one task"),
  configs: z.array(ConfigEntrySchema).min(1, "configs must list at least one config"),
  bypass: z
    .object({
      splits: z.array(z.string()).default([]),
      keys: z.array(z.string()).default([]),
      /** "split:key" pairs */
      split_keys: z.array(z.string()).default([]),
    })
    .default({}),
});

export type ManifestFile = z.infer<typeof ManifestSchema>;

// ============================================================================
// Types
// ============================================================================

export interface DatasetManifest {
  name: string;
  displayName?: string;
  tasks: Task[];
  configs: ConfigEntry[];
  bypass: BypassOptions;
  /** Absolute path of the manifest file */
  manifestPath: string;
  /** Directory holding the manifest; default base for split patterns */
  rootDir: string;
}

// ============================================================================
// Loading
// ============================================================================

async function statOrNull(target: string) {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return null;
    }
    throw isNodeError(error) ? FileSystemError.fromNodeError(error, target) : error;
  }
}

/**
 * Find the manifest for a dataset path (directory or manifest file)
 *
 * @throws ConfigError when no manifest exists there
 */
export async function resolveManifestPath(datasetPath: string): Promise<string> {
  const absolutePath = path.resolve(datasetPath);
  const stats = await statOrNull(absolutePath);

  if (!stats) {
    throw new ConfigError(ErrorCode.CONFIG_NOT_FOUND, `Dataset path not found: ${absolutePath}`);
  }
  if (stats.isFile()) {
    return absolutePath;
  }

  for (const fileName of MANIFEST_FILE_NAMES) {
    const candidate = path.join(absolutePath, fileName);
    const candidateStats = await statOrNull(candidate);
    if (candidateStats?.isFile()) {
      return candidate;
    }
  }

  throw new ConfigError(
    ErrorCode.CONFIG_NOT_FOUND,
    `No ${MANIFEST_FILE_NAMES.join(" or ")} found in ${absolutePath}`
  );
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join(", ");
}

/**
 * Parse and validate manifest content
 *
 * @throws ConfigError on YAML or shape errors, UsageError on unknown tasks
 */
export function parseManifest(content: string, manifestPath: string): DatasetManifest {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Invalid YAML in ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      ErrorCode.CONFIG_INVALID_VALUE,
      `Invalid manifest ${manifestPath}: ${formatIssues(result.error.issues)}`
    );
  }

  const manifest = result.data;
  const names = manifest.configs.map((config) => config.name);
  const duplicate = names.find((name, index) => names.indexOf(name) !== index);
  if (duplicate !== undefined) {
    throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, `Config "${duplicate}" is defined twice in ${manifestPath}`, {
      configKey: "configs",
    });
  }

  return {
    name: manifest.name,
    displayName: manifest.display_name,
    tasks: parseDeclaredTasks(manifest.tasks),
    configs: manifest.configs,
    bypass: {
      splits: manifest.bypass.splits,
      keys: manifest.bypass.keys,
      splitKeys: parseSplitKeyPairs(manifest.bypass.split_keys),
    },
    manifestPath,
    rootDir: path.dirname(manifestPath),
  };
}

/**
 * Load the manifest of a dataset
 *
 * @example
 * ```typescript
 * const manifest = await loadManifest("datasets/gene_corpus");
 * const config = selectConfig(manifest, "gene_corpus_kb");
 * ```
 */
export async function loadManifest(datasetPath: string): Promise<DatasetManifest> {
  const manifestPath = await resolveManifestPath(datasetPath);

  let content: string;
  try {
    content = await fs.readFile(manifestPath, "utf-8");
  } catch (error) {
    throw isNodeError(error) ? FileSystemError.fromNodeError(error, manifestPath) : error;
  }

  return parseManifest(content, manifestPath);
}

/**
 * @throws UsageError when the manifest has no config of that name
 */
export function selectConfig(manifest: DatasetManifest, configName: string): ConfigEntry {
  const config = manifest.configs.find((entry) => entry.name === configName);
  if (!config) {
    throw new UsageError(
      ErrorCode.USAGE_UNKNOWN_CONFIG,
      `Unknown config "${configName}". Available configs: ${manifest.configs.map((c) => c.name).join(", ")}`,
      { argument: "config" }
    );
  }
  return config;
}

// ============================================================================
// Split files
// ============================================================================

/**
 * Expand each split's patterns into a sorted list of files
 *
 * @param baseDir - directory relative patterns resolve against
 * @param skipSplit - splits that are not read; they map to no files
 * @throws FileSystemError when baseDir is missing or a split matches no file
 */
export async function resolveSplitFiles(
  config: ConfigEntry,
  baseDir: string,
  skipSplit: (split: string) => boolean = () => false
): Promise<Map<string, string[]>> {
  const absoluteBase = path.resolve(baseDir);
  const baseStats = await statOrNull(absoluteBase);
  if (!baseStats?.isDirectory()) {
    throw new FileSystemError(ErrorCode.FS_DIRECTORY_NOT_FOUND, `Data directory not found: ${absoluteBase}`, {
      path: absoluteBase,
    });
  }

  const splitFiles = new Map<string, string[]>();

  for (const [split, patterns] of Object.entries(config.splits)) {
    if (skipSplit(split)) {
      splitFiles.set(split, []);
      continue;
    }

    const files = new Set<string>();
    for (const pattern of Array.isArray(patterns) ? patterns : [patterns]) {
      const matches = await glob(pattern, { cwd: absoluteBase, absolute: true, nodir: true });
      for (const match of matches) {
        files.add(match);
      }
    }

    if (files.size === 0) {
      throw new FileSystemError(
        ErrorCode.FS_NO_MATCHING_FILES,
        `Split "${split}" of config "${config.name}" matches no file (${String(patterns)}) under ${absoluteBase}`,
        { path: absoluteBase }
      );
    }

    splitFiles.set(split, [...files].sort());
  }

  return splitFiles;
}

