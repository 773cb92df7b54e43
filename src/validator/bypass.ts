/**
 * corpuslint - Bypass Rules
 *
 * Known-bad splits and features can be excluded from validation without
 * editing the data: a whole split, a feature everywhere, or a feature in
 * one split only.
 */

import { ErrorCode, UsageError } from "../utils/errors.js";

export interface SplitKeyPair {
  split: string;
  key: string;
}

export interface BypassOptions {
  splits?: readonly string[];
  keys?: readonly string[];
  splitKeys?: readonly SplitKeyPair[];
}

/**
 * Parse "split:key" (or "split,key") pairs
 *
 * @throws UsageError on a malformed pair
 */
export function parseSplitKeyPairs(values: readonly string[]): SplitKeyPair[] {
  return values.map((value) => {
    const parts = value.split(/[:,]/).map((part) => part.trim());
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new UsageError(
        ErrorCode.USAGE_INVALID_ARGUMENT,
        `Invalid split/key pair "${value}". Use the form split:key (e.g. test:entities)`,
        { argument: "bypass-split-keys" }
      );
    }
    return { split: parts[0], key: parts[1] };
  });
}

export class BypassRules {
  private readonly splits: ReadonlySet<string>;
  private readonly keys: ReadonlySet<string>;
  private readonly splitKeys: readonly SplitKeyPair[];

  constructor(options: BypassOptions = {}) {
    this.splits = new Set(options.splits ?? []);
    this.keys = new Set(options.keys ?? []);
    this.splitKeys = options.splitKeys ?? [];
  }

  /**
   * Merge two rule sets (manifest defaults + command line)
   */
  static merge(...options: BypassOptions[]): BypassRules {
    return new BypassRules({
      splits: options.flatMap((o) => o.splits ?? []),
      keys: options.flatMap((o) => o.keys ?? []),
      splitKeys: options.flatMap((o) => o.splitKeys ?? []),
    });
  }

  skipsSplit(split: string): boolean {
    return this.splits.has(split);
  }

  skipsKey(key: string, split: string): boolean {
    return this.keys.has(key) || this.splitKeys.some((pair) => pair.split === split && pair.key === key);
  }

  /**
   * Every key skipped in `split`
   */
  skippedKeys(split: string): Set<string> {
    const skipped = new Set(this.keys);
    for (const pair of this.splitKeys) {
      if (pair.split === split) {
        skipped.add(pair.key);
      }
    }
    return skipped;
  }

  isEmpty(): boolean {
    return this.splits.size === 0 && this.keys.size === 0 && this.splitKeys.length === 0;
  }

  describe(): string[] {
    const lines: string[] = [];
    if (this.splits.size > 0) lines.push(`Splits ignored: ${[...this.splits].join(", ")}`);
    if (this.keys.size > 0) lines.push(`Keys ignored: ${[...this.keys].join(", ")}`);
    if (this.splitKeys.length > 0) {
      lines.push(`Split/key pairs ignored: ${this.splitKeys.map((p) => `${p.split}:${p.key}`).join(", ")}`);
    }
    return lines;
  }
}
