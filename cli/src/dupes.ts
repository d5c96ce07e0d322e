import { TwinBlocks, resolveScanConfig } from '@twinblocks/core';
import type { DuplicateReport } from '@twinblocks/core';

export type ScanOptions = {
  root: string;
  window: number;
  minChars: number;
  extensions: string[];
  excludeDirs: string[];
  excludePaths?: string[];
  top: number;
  json?: boolean;
};

/**
 * Formats the report as plain text: the scan header, then one block per shown group.
 */
export function formatDuplicateReport(report: DuplicateReport): string {
  const lines = [`Scanned root: ${report.root}`, `Duplicate groups: ${report.duplicateGroups}`];

  for (const group of report.groups) {
    lines.push('', `Group size: ${group.occurrences.length}`);
    for (const occurrence of group.occurrences) {
      lines.push(`- ${occurrence.filePath}:${occurrence.startLine}`);
    }
  }

  return lines.join('\n');
}

export async function runScan(options: ScanOptions): Promise<DuplicateReport> {
  const config = resolveScanConfig({
    root: options.root,
    window: options.window,
    minChars: options.minChars,
    extensions: options.extensions,
    excludedDirs: options.excludeDirs,
    excludedPaths: options.excludePaths,
    top: options.top,
  });
  const scanner = new TwinBlocks(config);
  return scanner.findDuplicates();
}

export async function handleScanCommand(options: ScanOptions): Promise<void> {
  const report = await runScan(options);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatDuplicateReport(report));
  }
}
