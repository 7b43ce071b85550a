export { type Analysis, type AnalyzeOptions, analyzeLines } from "./memcheck/analyze.js";
export {
  type AssemblerAction,
  type AssemblerInput,
  type AssemblerState,
  firstSourceLocation,
  IssueAssembler,
  type LineEvent,
  transition,
} from "./memcheck/assembler.js";
export {
  classify,
  computeStatistics,
  flatten,
  formatSourceLocation,
  primaryFunctionOf,
  primarySourceOf,
  severityCounts,
  type StatisticsOptions,
  UNKNOWN_SOURCE,
} from "./memcheck/classify.js";
export { MalformedNumberError, normalizeCount, normalizeCountToken, tryNormalizeCount } from "./memcheck/number.js";
export {
  DEFAULT_WRAP_LOOKAHEAD,
  MAX_WRAP_LOOKAHEAD,
  newScanContext,
  type ParseOptions,
  parseMemcheckLog,
  type ScanContext,
  scanMemcheckLog,
  splitLines,
} from "./memcheck/parse.js";
export {
  classifyLine,
  extractSourceLocation,
  type HeaderMatch,
  type LineMatch,
  matchFrame,
  matchHeader,
  matchSummaryLine,
  recoverWrappedHeader,
  stripPrefix,
} from "./memcheck/patterns.js";
export { compareIssues, criticalIssues, prioritize, severityLevelOf, severityScore } from "./memcheck/severity.js";
export * from "./memcheck/types.js";
export {
  defaultLeakscopeConfig,
  type LeakscopeConfig,
  type LeakscopeSettings,
  type ResolvedLeakscopeConfig,
  resolveLeakscopeConfigForCwd,
  settingsOf,
} from "./core/project-config.js";
export { renderCsv } from "./report/csv.js";
export { ReportWriteError } from "./report/errors.js";
export { buildWorkbook, type WorkbookInput, writeWorkbook } from "./report/workbook.js";
