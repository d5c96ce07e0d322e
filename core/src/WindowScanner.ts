import fs from "fs/promises";
import crypto from "node:crypto";
import debug from "debug";
import { DIGEST_ALGO } from "./const.js";
import { normalizeLines, splitLines } from "./normalize.js";
import type { ScanConfig, WindowHit } from "./types.js";

const log = debug("twinblocks:scanner");

/**
 * Hashes a joined window. Used purely as a content-equality key; collisions are not checked.
 */
export function digestBlock(joined: string): string {
  return crypto.createHash(DIGEST_ALGO).update(joined, "utf8").digest("hex");
}

/**
 * Counts code points, so a character outside the BMP counts once rather than as two UTF-16 units.
 */
export function codePointLength(text: string): number {
  return [...text].length;
}

/**
 * Produces every fixed-size window of normalized lines that is eligible for comparison.
 * Each window is recomputed from scratch (no rolling hash).
 */
export class WindowScanner {
  private readonly window: number;
  private readonly minChars: number;

  constructor(config: Pick<ScanConfig, "window" | "minChars">) {
    this.window = config.window;
    this.minChars = config.minChars;
  }

  /**
   * Reads a file and scans it. A file that cannot be read contributes no windows.
   */
  async scanFile(absolutePath: string): Promise<WindowHit[]> {
    let content: string;
    try {
      content = await fs.readFile(absolutePath, "utf8");
    } catch (err) {
      log("Skipping unreadable file %s: %s", absolutePath, err instanceof Error ? err.message : String(err));
      return [];
    }
    const hits = this.scanLines(splitLines(content));
    log("Found %d windows in %s", hits.length, absolutePath);
    return hits;
  }

  scanLines(rawLines: readonly string[]): WindowHit[] {
    const normalized = normalizeLines(rawLines);
    const hits: WindowHit[] = [];

    for (let idx = 0; idx + this.window <= normalized.length; idx++) {
      const block = normalized.slice(idx, idx + this.window);
      if (block.some((line) => line === "")) continue;

      const joined = block.join("\n");
      if (codePointLength(joined) < this.minChars) continue;

      hits.push({ digest: digestBlock(joined), startLine: idx + 1 });
    }

    return hits;
  }
}
