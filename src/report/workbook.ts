import ExcelJS from "exceljs";
import type { Fill, Row, Workbook, Worksheet } from "exceljs";

import { writeFileAtomic } from "../core/fs.js";
import type { Analysis } from "../memcheck/analyze.js";
import { formatSourceLocation, primaryFunctionOf, severityCounts } from "../memcheck/classify.js";
import { prioritize } from "../memcheck/severity.js";
import {
  type ByteBlockTotal,
  ISSUE_TYPES,
  type IssueRecord,
  type IssueType,
  issueTypeLabel,
  type LeakCategory,
  type RunSummary,
  type SeverityLevel,
} from "../memcheck/types.js";
import { ReportWriteError } from "./errors.js";
import { formatTrace } from "./frames.js";

export type WorkbookInput = {
  analysis: Analysis;
  /** Path of the analyzed log, shown on the summary sheet. */
  sourceName: string;
  maxFrames: number;
  generatedAt?: Date;
};

export const SUMMARY_SHEET = "Summary";
export const STATISTICS_SHEET = "Statistics";
export const WARNINGS_SHEET = "Warnings";

const LEAK_TYPES: readonly IssueType[] = ["definitely_lost", "possibly_lost", "still_reachable"];

const LEAK_CATEGORY_LABELS: ReadonlyArray<[LeakCategory, string]> = [
  ["definitelyLost", "Definitely Lost"],
  ["indirectlyLost", "Indirectly Lost"],
  ["possiblyLost", "Possibly Lost"],
  ["stillReachable", "Still Reachable"],
  ["suppressed", "Suppressed"],
];

const PERCENT = "0.0%";

function solid(argb: string): Fill {
  return { type: "pattern", pattern: "solid", fgColor: { argb } };
}

const HEADER_FILL = solid("FFD9E1F2");
const LEVEL_FILL: Partial<Record<SeverityLevel, Fill>> = {
  critical: solid("FFFFC7CE"),
  high: solid("FFFFEB9C"),
};

function title(ws: Worksheet, text: string): void {
  const row = ws.addRow([text]);
  row.font = { bold: true, size: 16 };
}

function section(ws: Worksheet, text: string): void {
  if (ws.rowCount > 0) ws.addRow([]);
  const row = ws.addRow([text]);
  row.font = { bold: true, size: 13 };
}

function headerRow(ws: Worksheet, headers: readonly string[]): Row {
  const row = ws.addRow([...headers]);
  row.font = { bold: true };
  row.eachCell((cell) => {
    cell.fill = HEADER_FILL;
  });
  return row;
}

function fillRow(row: Row, fill: Fill | undefined, columns: number): void {
  if (!fill) return;
  for (let col = 1; col <= columns; col += 1) row.getCell(col).fill = fill;
}

function formatTotal(total: ByteBlockTotal): string {
  return `${total.bytes} bytes in ${total.blocks} blocks`;
}

function runSummaryRows(analysis: Analysis): Array<[string, string | number]> {
  const { run, summary } = analysis.parsed;
  const rows: Array<[string, string | number]> = [];
  if (run.tool) rows.push(["Tool", run.version ? `${run.tool} (Valgrind ${run.version})` : run.tool]);
  if (run.command) rows.push(["Command", run.command]);
  if (run.pid !== undefined) rows.push(["PID", run.pid]);
  return [...rows, ...summaryRows(summary)];
}

function summaryRows(summary: RunSummary): Array<[string, string]> {
  const rows: Array<[string, string]> = [];
  if (summary.inUseAtExit) rows.push(["In Use at Exit", formatTotal(summary.inUseAtExit)]);
  if (summary.heapUsage) {
    const h = summary.heapUsage;
    rows.push(["Heap Usage", `${h.allocs} allocs, ${h.frees} frees, ${h.bytesAllocated} bytes allocated`]);
  }
  for (const [category, label] of LEAK_CATEGORY_LABELS) {
    const total = summary.leaks[category];
    if (total) rows.push([`Reported ${label}`, formatTotal(total)]);
  }
  if (summary.errors) {
    const e = summary.errors;
    rows.push(["Error Summary", `${e.errors} errors from ${e.contexts} contexts (suppressed: ${e.suppressed} from ${e.suppressedContexts})`]);
  }
  return rows;
}

function addSummarySheet(workbook: Workbook, input: WorkbookInput): void {
  const { statistics } = input.analysis;
  const ws = workbook.addWorksheet(SUMMARY_SHEET);
  ws.columns = [{ width: 32 }, { width: 16 }, { width: 16 }, { width: 16 }];

  title(ws, "Memcheck Analysis Summary");
  ws.addRow(["Log File", input.sourceName]);
  ws.addRow(["Generated", (input.generatedAt ?? new Date()).toISOString()]);

  section(ws, "Overall Statistics");
  ws.addRow(["Total Issues", statistics.totalIssues]);
  ws.addRow(["Total Bytes", statistics.totalBytes]);
  ws.addRow(["Total Blocks", statistics.totalBlocks]);
  fillRow(ws.addRow(["Critical Issues", statistics.severityDistribution.critical]), LEVEL_FILL.critical, 2);
  fillRow(ws.addRow(["High Priority Issues", statistics.severityDistribution.high]), LEVEL_FILL.high, 2);
  ws.addRow(["Parse Warnings", input.analysis.parsed.warnings.length]);

  section(ws, "Issues by Type");
  headerRow(ws, ["Issue Type", "Count", "Percentage", "Bytes"]);
  for (const type of ISSUE_TYPES) {
    const count = statistics.issuesByType[type];
    if (count === 0) continue;
    const row = ws.addRow([issueTypeLabel(type), count, statistics.percentageByType[type], statistics.bytesByType[type]]);
    row.getCell(3).numFmt = PERCENT;
  }

  section(ws, "Memory Loss Distribution");
  headerRow(ws, ["Issue Type", "Bytes", "Share of Bytes", "Avg Bytes per Issue"]);
  for (const type of LEAK_TYPES) {
    const count = statistics.issuesByType[type];
    if (count === 0) continue;
    const bytes = statistics.bytesByType[type];
    const row = ws.addRow([issueTypeLabel(type), bytes, statistics.bytesPercentageByType[type], bytes / count]);
    row.getCell(3).numFmt = PERCENT;
    row.getCell(4).numFmt = "0.0";
  }

  if (statistics.topSources.length > 0) {
    section(ws, "Top Sources");
    headerRow(ws, ["Source", "Issues"]);
    for (const top of statistics.topSources) ws.addRow([top.source, top.count]);
  }

  const run = runSummaryRows(input.analysis);
  if (run.length > 0) {
    section(ws, "Run Summary");
    for (const [label, value] of run) ws.addRow([label, value]);
  }
}

const ISSUE_COLUMNS = [
  "#",
  "Severity",
  "Score",
  "Bytes",
  "Blocks",
  "Breakdown",
  "Loss Record",
  "Primary Function",
  "Source Location",
  "Stack Trace",
  "Related Traces",
  "Log Line",
] as const;

function relatedTraces(record: IssueRecord, maxFrames: number): string {
  return record.auxiliaryTraces
    .map((trace) => [trace.label, ...formatTrace(trace.frames, maxFrames).map((line) => `  ${line}`)].join("\n"))
    .join("\n");
}

function addIssueSheet(workbook: Workbook, type: IssueType, records: readonly IssueRecord[], maxFrames: number): void {
  const ws = workbook.addWorksheet(issueTypeLabel(type));
  ws.columns = [
    { width: 6 },
    { width: 10 },
    { width: 8 },
    { width: 12 },
    { width: 8 },
    { width: 24 },
    { width: 14 },
    { width: 28 },
    { width: 28 },
    { width: 60 },
    { width: 50 },
    { width: 10 },
  ];
  headerRow(ws, ISSUE_COLUMNS);
  ws.views = [{ state: "frozen", ySplit: 1 }];

  prioritize(records).forEach((record, idx) => {
    const row = ws.addRow([
      idx + 1,
      record.severityLevel,
      record.severity,
      record.bytesCount,
      record.blocksCount,
      record.bytesAnnotation ?? "",
      record.lossRecordId,
      primaryFunctionOf(record) ?? "",
      record.sourceLocation ? formatSourceLocation(record.sourceLocation) : "",
      formatTrace(record.stackTrace, maxFrames).join("\n"),
      relatedTraces(record, maxFrames),
      record.lineNumber,
    ]);
    row.alignment = { vertical: "top", wrapText: true };
    fillRow(row, LEVEL_FILL[record.severityLevel], ISSUE_COLUMNS.length);
  });
}

function addStatisticsSheet(workbook: Workbook, input: WorkbookInput): void {
  const { statistics } = input.analysis;
  const ws = workbook.addWorksheet(STATISTICS_SHEET);
  ws.columns = [{ width: 36 }, { width: 12 }, { width: 14 }, { width: 12 }, { width: 40 }];

  section(ws, "Severity Distribution");
  headerRow(ws, ["Severity", "Count", "Percentage"]);
  for (const { level, count } of severityCounts(statistics)) {
    const row = ws.addRow([level, count, statistics.totalIssues > 0 ? count / statistics.totalIssues : 0]);
    row.getCell(3).numFmt = PERCENT;
    fillRow(row, LEVEL_FILL[level], 3);
  }

  section(ws, "Source Analysis");
  headerRow(ws, ["Source", "Issues", "Bytes", "Blocks", "Issue Types"]);
  for (const entry of statistics.sourceAnalysis) {
    ws.addRow([entry.source, entry.count, entry.totalBytes, entry.totalBlocks, entry.issueTypes.map(issueTypeLabel).join(", ")]);
  }

  section(ws, "Leak Summary");
  const leak = statistics.leakSummary;
  ws.addRow(["Leak Issues", leak.totalLeakIssues]);
  ws.addRow(["Leaked Bytes", leak.totalLeakedBytes]);
  ws.addRow(["Leaked Blocks", leak.totalLeakedBlocks]);
  ws.addRow(["Share of All Bytes", leak.leakShareOfBytes]).getCell(2).numFmt = PERCENT;
}

function addWarningsSheet(workbook: Workbook, input: WorkbookInput): void {
  const ws = workbook.addWorksheet(WARNINGS_SHEET);
  ws.columns = [{ width: 10 }, { width: 24 }, { width: 60 }, { width: 80 }];
  headerRow(ws, ["Line", "Reason", "Message", "Text"]);
  for (const w of input.analysis.parsed.warnings) ws.addRow([w.lineNumber, w.reasonCode, w.message, w.rawText]);
}

export function buildWorkbook(input: WorkbookInput): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "leakscope";
  workbook.created = input.generatedAt ?? new Date();

  addSummarySheet(workbook, input);
  for (const type of ISSUE_TYPES) {
    const records = input.analysis.classified[type];
    if (records.length > 0) addIssueSheet(workbook, type, records, input.maxFrames);
  }
  addStatisticsSheet(workbook, input);
  if (input.analysis.parsed.warnings.length > 0) addWarningsSheet(workbook, input);
  return workbook;
}

/** Builds and saves the workbook; any failure comes back as a ReportWriteError. */
export async function writeWorkbook(outputPath: string, input: WorkbookInput): Promise<void> {
  try {
    const buffer = await buildWorkbook(input).xlsx.writeBuffer();
    await writeFileAtomic(outputPath, new Uint8Array(buffer));
  } catch (err) {
    throw new ReportWriteError(outputPath, err);
  }
}
