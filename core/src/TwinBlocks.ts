import debug from "debug";
import type { DuplicateReport, ScanConfig } from "./types.js";
import { FileCollector } from "./FileCollector.js";
import { WindowScanner } from "./WindowScanner.js";
import { DuplicateIndex } from "./services/DuplicateIndex.js";
import { buildDuplicateReport } from "./services/ReportService.js";

const log = debug("twinblocks");

export class TwinBlocks {
  readonly config: ScanConfig;
  private readonly collector: FileCollector;
  private readonly scanner: WindowScanner;

  constructor(config: ScanConfig, collector?: FileCollector, scanner?: WindowScanner) {
    this.config = config;
    this.collector = collector ?? new FileCollector(config);
    this.scanner = scanner ?? new WindowScanner(config);
  }

  /**
   * Runs a full scan of the configured root:
   * Phase 1: List candidate files
   * Phase 2: Scan each file's windows into a fresh index, one file at a time
   * Phase 3: Group, rank and cap the duplicates
   */
  async findDuplicates(): Promise<DuplicateReport> {
    log("Scanning %s (window=%d, minChars=%d)", this.config.root, this.config.window, this.config.minChars);

    const files = await this.collector.listSourceFiles();
    const index = new DuplicateIndex();

    for (const relPath of files) {
      const hits = await this.scanner.scanFile(this.collector.absolutePath(relPath));
      index.addAll(relPath, hits);
    }
    log("Indexed %d distinct windows from %d files", index.size, files.length);

    const report = buildDuplicateReport(this.config.root, files.length, index.groups(), this.config.top);
    log("Found %d duplicate groups, showing %d", report.duplicateGroups, report.shown);
    return report;
  }
}
