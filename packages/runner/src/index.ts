export * from "./types/index.js";
export { createResultSchema } from "./report/schema-registry.js";
export type { ResultSchema } from "./report/schema-registry.js";
export { DEFAULT_MARKERS, scanReport, toReportLines } from "./report/scan-sections.js";
export {
  LiteralSyntaxError,
  decodeParameterBlock,
  formatLiteral,
  formatParameterBlock,
  parseLiteral,
} from "./report/decode-literal.js";
export { decodeScalarLines, RECOGNIZED_SETTINGS } from "./report/decode-scalar-lines.js";
export { DEFAULT_LABEL_RULES, METRIC_KEYS, decodeMetricTable, decodeTotalRow } from "./report/decode-table.js";
export { parseDuration } from "./report/parse-duration.js";
export {
  DEFAULT_METRIC_PRECEDENCE,
  buildFailedRecord,
  formatUtcTimestamp,
  normalizeRecord,
  resolveMetricValue,
  resolveStrategyValue,
  strategyLookupChain,
} from "./report/normalize-record.js";
export { extractReport } from "./report/extract-report.js";
export type { ExtractOptions } from "./report/extract-report.js";
export { appendRecord, findNextFreeSlot, nextRunNumber, readHeaders } from "./sheet/append-writer.js";
export type { CellWrite, GridSize, TableStore } from "./sheet/table-store.js";
export { XlsxTableStore, readSheetRecords } from "./sheet/xlsx-store.js";
export { loadConfig } from "./lib/config.js";
export { runBatch } from "./loop/orchestrator.js";
