import upath from "upath";
import debug from "debug";
import { glob } from "glob";
import { minimatch } from "minimatch";
import type { ScanConfig } from "./types.js";

const log = debug("twinblocks:collector");

/**
 * Lists the candidate source files of a scan root. Directory names in
 * `excludedDirs` prune their whole subtree at any depth; `extensions` are
 * matched as case-insensitive filename suffixes.
 */
export class FileCollector {
  private readonly root: string;
  private readonly extensions: readonly string[];
  private readonly excludedDirs: ReadonlySet<string>;
  private readonly excludedPaths: readonly string[];

  constructor(config: Pick<ScanConfig, "root" | "extensions" | "excludedDirs" | "excludedPaths">) {
    this.root = config.root;
    this.extensions = config.extensions;
    this.excludedDirs = new Set(config.excludedDirs);
    this.excludedPaths = config.excludedPaths;
  }

  /**
   * Returns root-relative POSIX paths in lexical order.
   */
  async listSourceFiles(): Promise<string[]> {
    log("Listing source files under %s", this.root);
    const matches = await glob("**/*", {
      cwd: this.root,
      dot: true,
      nodir: true,
      follow: false,
      ignore: {
        childrenIgnored: (entry: { name: string; relative(): string }) =>
          entry.relative() !== "" && this.excludedDirs.has(entry.name),
      },
    });

    const files = matches
      .map((relPath) => this.normalizeRelPath(relPath))
      .filter((relPath) => this.hasSupportedExtension(relPath))
      .filter((relPath) => !this.pathExcluded(relPath))
      .sort();

    log("Collected %d of %d files", files.length, matches.length);
    return files;
  }

  absolutePath(relPath: string): string {
    return upath.join(this.root, relPath);
  }

  private hasSupportedExtension(relPath: string): boolean {
    const name = upath.basename(relPath).toLowerCase();
    return this.extensions.some((ext) => name.endsWith(ext));
  }

  private pathExcluded(relPath: string): boolean {
    if (this.excludedPaths.length === 0) return false;
    return this.excludedPaths.some((pattern) => minimatch(relPath, pattern, { dot: true }));
  }

  /**
   * Normalizes glob output to forward slashes and strips a leading "./".
   */
  private normalizeRelPath(relPath: string): string {
    const normalized = upath.normalizeTrim(relPath);
    return normalized.startsWith("./") ? normalized.slice(2) : normalized;
  }
}
