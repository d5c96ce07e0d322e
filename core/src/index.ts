// Public surface: keep minimal API for consumers
export { TwinBlocks } from "./TwinBlocks.js";
export { FileCollector } from "./FileCollector.js";
export { WindowScanner, codePointLength, digestBlock } from "./WindowScanner.js";
export { normalizeLine, normalizeLines, splitLines } from "./normalize.js";
export { DuplicateIndex } from "./services/DuplicateIndex.js";
export { buildDuplicateReport, rankGroups, compareGroups, compareOccurrences } from "./services/ReportService.js";
export {
  resolveScanConfig,
  parseCsvList,
  normalizeExtension,
  DEFAULT_CONFIG,
} from "./config/scanConfig.js";
export type { ScanConfig, ScanConfigInput } from "./config/scanConfig.js";
export type { WindowHit, Occurrence, DuplicateGroup, DuplicateReport } from "./types.js";
