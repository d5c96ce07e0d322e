export type { ScanConfig } from "./config/scanConfig.js";

/**
 * One eligible window of a file: the digest of its joined normalized lines
 * and the 1-based line its first raw line sits on.
 */
export interface WindowHit {
  digest: string;
  startLine: number;
}

export interface Occurrence {
  filePath: string;
  startLine: number;
}

export interface DuplicateGroup {
  digest: string;
  occurrences: Occurrence[];
}

export interface DuplicateReport {
  root: string;
  filesScanned: number;
  duplicateGroups: number;
  shown: number;
  groups: DuplicateGroup[];
}
