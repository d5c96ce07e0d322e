import debug from "debug";
import type { DuplicateGroup, Occurrence, WindowHit } from "../types.js";
import { compareOccurrences } from "./ReportService.js";

const log = debug("twinblocks:index");

/**
 * Accumulates window digests from every scanned file and groups the locations
 * that share one. Append-only for the duration of a run.
 */
export class DuplicateIndex {
  private readonly occurrences = new Map<string, Occurrence[]>();

  get size(): number {
    return this.occurrences.size;
  }

  add(digest: string, occurrence: Occurrence): void {
    const current = this.occurrences.get(digest) ?? [];
    current.push(occurrence);
    this.occurrences.set(digest, current);
  }

  addAll(filePath: string, hits: readonly WindowHit[]): void {
    for (const hit of hits) {
      this.add(hit.digest, { filePath, startLine: hit.startLine });
    }
  }

  /**
   * Returns every digest seen at two or more distinct (filePath, startLine) locations.
   * Occurrences inside a group are sorted; groups themselves are unordered.
   */
  groups(): DuplicateGroup[] {
    const groups: DuplicateGroup[] = [];

    for (const [digest, recorded] of this.occurrences.entries()) {
      if (recorded.length < 2) continue;

      const unique = this.dedupe(recorded);
      if (unique.length < 2) continue;

      groups.push({ digest, occurrences: unique.sort(compareOccurrences) });
    }

    log("Collected %d duplicate groups from %d digests", groups.length, this.occurrences.size);
    return groups;
  }

  private dedupe(recorded: readonly Occurrence[]): Occurrence[] {
    const seen = new Set<string>();
    const unique: Occurrence[] = [];
    for (const occurrence of recorded) {
      const key = `${occurrence.filePath}\0${occurrence.startLine}`;
      if (seen.has(key)) continue;
      seen.add(key);
      unique.push({ ...occurrence });
    }
    return unique;
  }
}
