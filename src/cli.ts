/**
 * corpuslint CLI
 *
 * Subcommands:
 *   validate - Validate one config of a dataset
 *
 * Exit codes:
 *   0 - No ERROR finding
 *   1 - ERROR finding, or the run was cancelled / timed out
 *   2 - Usage or configuration error
 */

import path from "node:path";
import { loadManifest, resolveSplitFiles, selectConfig } from "./dataset/manifest.js";
import { loadSplits } from "./dataset/loader.js";
import { validate, DEFAULT_CONCURRENCY } from "./validator/aggregator.js";
import { BypassRules, parseSplitKeyPairs } from "./validator/bypass.js";
import { writeReport, DEFAULT_MAX_SAMPLES } from "./report/reportWriter.js";
import { getLogger, trackError } from "./utils/logger.js";
import { CancellationError, formatErrorMessage, isUsageError } from "./utils/errors.js";

// Exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION_FAILED = 1;
export const EXIT_USAGE_ERROR = 2;

// Types
export interface ValidateCommandOptions {
  datasetPath?: string;
  config?: string;
  dataDir?: string;
  /** Seconds; 0 disables the deadline */
  timeout: number;
  json: boolean;
  strict: boolean;
  concurrency: number;
  maxSamples: number;
  bypassSplits: string[];
  bypassKeys: string[];
  bypassSplitKeys: string[];
  verbose: boolean;
  help: boolean;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseNonNegative(value: string, integer: boolean): number | null {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    return null;
  }
  if (integer && !Number.isInteger(parsed)) {
    return null;
  }
  return parsed;
}

/**
 * Parse command line arguments (without the "validate" subcommand)
 */
export function parseArgs(args: string[]): ValidateCommandOptions | null {
  const options: ValidateCommandOptions = {
    timeout: 0,
    json: false,
    strict: false,
    concurrency: DEFAULT_CONCURRENCY,
    maxSamples: DEFAULT_MAX_SAMPLES,
    bypassSplits: [],
    bypassKeys: [],
    bypassSplitKeys: [],
    verbose: false,
    help: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === "--config" && next !== undefined) {
      options.config = next;
      i++;
    } else if (arg === "--data-dir" && next !== undefined) {
      options.dataDir = next;
      i++;
    } else if (arg === "--timeout" && next !== undefined) {
      const timeout = parseNonNegative(next, false);
      if (timeout === null) {
        console.error(`Error: Invalid timeout "${next}". Use a number of seconds`);
        return null;
      }
      options.timeout = timeout;
      i++;
    } else if (arg === "--concurrency" && next !== undefined) {
      const concurrency = parseNonNegative(next, true);
      if (concurrency === null || concurrency === 0) {
        console.error(`Error: Invalid concurrency "${next}". Use a positive integer`);
        return null;
      }
      options.concurrency = concurrency;
      i++;
    } else if (arg === "--max-samples" && next !== undefined) {
      const maxSamples = parseNonNegative(next, true);
      if (maxSamples === null) {
        console.error(`Error: Invalid max samples "${next}". Use a non-negative integer`);
        return null;
      }
      options.maxSamples = maxSamples;
      i++;
    } else if (arg === "--bypass-splits" && next !== undefined) {
      options.bypassSplits.push(...splitList(next));
      i++;
    } else if (arg === "--bypass-keys" && next !== undefined) {
      options.bypassKeys.push(...splitList(next));
      i++;
    } else if (arg === "--bypass-split-keys" && next !== undefined) {
      options.bypassSplitKeys.push(...splitList(next));
      i++;
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--strict") {
      options.strict = true;
    } else if (arg === "-v" || arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option "${arg}"`);
      return null;
    } else if (options.datasetPath === undefined) {
      options.datasetPath = arg;
    } else {
      console.error(`Error: Unexpected argument "${arg}"`);
      return null;
    }

    i++;
  }

  return options;
}

/**
 * Print usage information
 */
function printUsage(): void {
  console.log(`
corpuslint

Usage:
  corpuslint validate <dataset-path> --config <name> [options]

Arguments:
  <dataset-path>     Dataset directory holding dataset.yaml, or the manifest itself

Options:
  --config <name>          Config of the manifest to validate (required)
  --data-dir <path>        Directory split patterns resolve against (default: manifest dir)
  --timeout <seconds>      Abort the run after this many seconds (default: none)
  --json                   Print one JSON object per split
  --strict                 Treat ragged spans and malformed passages as errors
  --concurrency <n>        Documents validated concurrently (default: ${DEFAULT_CONCURRENCY})
  --max-samples <n>        Example findings per category (default: ${DEFAULT_MAX_SAMPLES})
  --bypass-splits <a,b>    Splits to skip
  --bypass-keys <a,b>      Features to skip in every split
  --bypass-split-keys <split:key,...>  Features to skip in one split
  -v, --verbose            Enable debug output
  -h, --help               Show this help message

Examples:
  corpuslint validate datasets/gene_corpus --config gene_corpus_kb
  corpuslint validate datasets/gene_corpus/dataset.yaml --config gene_corpus_kb --json
  corpuslint validate datasets/gene_corpus --config gene_corpus_kb --bypass-split-keys test:relations

Exit Codes:
  0 - No errors
  1 - Errors found, or the run was cancelled
  2 - Usage or configuration error
`);
}

interface RequiredArguments {
  datasetPath: string;
  config: string;
}

/**
 * Validate required options; returns the error message when one is missing
 */
function validateOptions(options: ValidateCommandOptions): RequiredArguments | string {
  if (!options.datasetPath) {
    return "Missing required argument: <dataset-path>";
  }
  if (!options.config) {
    return "Missing required option: --config";
  }
  return { datasetPath: options.datasetPath, config: options.config };
}

/**
 * Execute validation of one config
 */
async function runValidate(datasetPath: string, configName: string, options: ValidateCommandOptions): Promise<number> {
  const logger = getLogger();
  logger.setDebugMode(options.verbose);
  // Keep stdout for JSON lines
  logger.setMinLevel(options.json ? "warn" : options.verbose ? "debug" : "info");

  try {
    const manifest = await loadManifest(datasetPath);
    const config = selectConfig(manifest, configName);
    const bypass = BypassRules.merge(manifest.bypass, {
      splits: options.bypassSplits,
      keys: options.bypassKeys,
      splitKeys: parseSplitKeyPairs(options.bypassSplitKeys),
    });

    const baseDir = options.dataDir ? path.resolve(options.dataDir) : manifest.rootDir;
    logger.debug(`Manifest: ${manifest.manifestPath}`);
    logger.debug(`Config: ${config.name} (${config.schema}), data dir: ${baseDir}`);

    const splitFiles = await resolveSplitFiles(config, baseDir, (split) => bypass.skipsSplit(split));
    logger.info(`Validating ${manifest.displayName ?? manifest.name} / ${config.name}...`);

    const report = await validate(loadSplits(splitFiles, config.schema), manifest.tasks, {
      schema: config.schema,
      strict: options.strict,
      concurrency: options.concurrency,
      timeoutMs: options.timeout > 0 ? Math.round(options.timeout * 1000) : undefined,
      bypass,
      onProgress: (split, documentsChecked) => logger.debug(`${split}: ${documentsChecked} documents checked`),
    });

    writeReport(report, {
      format: options.json ? "jsonl" : "summary",
      maxSamples: options.maxSamples,
    });

    return report.passed ? EXIT_SUCCESS : EXIT_VALIDATION_FAILED;
  } catch (error) {
    if (isUsageError(error)) {
      console.error(`Error: ${formatErrorMessage(error)}`);
      return EXIT_USAGE_ERROR;
    }
    if (error instanceof CancellationError) {
      console.error(`Error: ${formatErrorMessage(error)}`);
      return EXIT_VALIDATION_FAILED;
    }
    if (error instanceof Error) {
      trackError(error, { component: "cli", action: "validate" });
    } else {
      console.error("Validation failed:", error);
    }
    return EXIT_VALIDATION_FAILED;
  }
}

/**
 * Main entry point
 */
export async function runCli(args: string[]): Promise<number> {
  // "validate" is the only subcommand; accept it being left out
  const commandArgs = args[0] === "validate" ? args.slice(1) : args;

  if (commandArgs.length === 0) {
    printUsage();
    return EXIT_SUCCESS;
  }

  const options = parseArgs(commandArgs);
  if (!options) {
    printUsage();
    return EXIT_USAGE_ERROR;
  }

  if (options.help) {
    printUsage();
    return EXIT_SUCCESS;
  }

  const required = validateOptions(options);
  if (typeof required === "string") {
    console.error(`Error: ${required}`);
    console.error('Use "corpuslint validate --help" for usage information.');
    return EXIT_USAGE_ERROR;
  }

  return runValidate(required.datasetPath, required.config, options);
}
