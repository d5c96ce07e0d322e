import upath from "upath";
import {
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_EXTENSIONS,
  DEFAULT_MIN_CHARS,
  DEFAULT_TOP,
  DEFAULT_WINDOW,
} from "../const.js";

export interface ScanConfig {
  readonly root: string;
  readonly window: number;
  readonly minChars: number;
  readonly extensions: readonly string[];
  readonly excludedDirs: readonly string[];
  readonly excludedPaths: readonly string[];
  readonly top: number;
}

export type ScanConfigInput = Partial<{
  root: string;
  window: number;
  minChars: number;
  extensions: readonly string[];
  excludedDirs: readonly string[];
  excludedPaths: readonly string[];
  top: number;
}>;

// Baseline values for every run parameter; exported so the CLI can print them as flag defaults.
export const DEFAULT_CONFIG: Omit<ScanConfig, "root"> = Object.freeze({
  window: DEFAULT_WINDOW,
  minChars: DEFAULT_MIN_CHARS,
  extensions: DEFAULT_EXTENSIONS,
  excludedDirs: DEFAULT_EXCLUDED_DIRS,
  excludedPaths: [],
  top: DEFAULT_TOP,
});

/**
 * Splits a comma-separated flag value into trimmed, non-empty items.
 */
export function parseCsvList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Lower-cases an extension and gives it a leading dot so "TS" and ".ts" select the same files.
 */
export function normalizeExtension(ext: string): string {
  const lowered = ext.trim().toLowerCase();
  return lowered.startsWith(".") ? lowered : `.${lowered}`;
}

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, got ${value}`);
  }
  return value;
}

function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

/**
 * Builds the immutable configuration for one run. Missing fields fall back to
 * DEFAULT_CONFIG; out-of-range numbers throw before any file is touched.
 */
export function resolveScanConfig(input: ScanConfigInput = {}): ScanConfig {
  const extensions = (input.extensions ?? DEFAULT_CONFIG.extensions)
    .map(normalizeExtension)
    .filter((ext) => ext !== ".");
  const excludedDirs = (input.excludedDirs ?? DEFAULT_CONFIG.excludedDirs)
    .map((name) => name.trim())
    .filter(Boolean);
  const excludedPaths = (input.excludedPaths ?? DEFAULT_CONFIG.excludedPaths)
    .map((pattern) => pattern.trim())
    .filter(Boolean);

  return Object.freeze({
    root: upath.resolve(input.root ?? "."),
    window: requireInteger("window", input.window ?? DEFAULT_CONFIG.window, 1),
    minChars: requireInteger("minChars", input.minChars ?? DEFAULT_CONFIG.minChars, 0),
    extensions: Object.freeze(uniqueSorted(extensions)),
    excludedDirs: Object.freeze(uniqueSorted(excludedDirs)),
    excludedPaths: Object.freeze(uniqueSorted(excludedPaths)),
    top: requireInteger("top", input.top ?? DEFAULT_CONFIG.top, 0),
  });
}
