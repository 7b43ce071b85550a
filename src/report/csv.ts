import { stringify } from "csv-stringify/sync";

import { formatSourceLocation, primaryFunctionOf } from "../memcheck/classify.js";
import { prioritize } from "../memcheck/severity.js";
import { type ClassifiedIssues, ISSUE_TYPES, type IssueRecord, issueTypeLabel } from "../memcheck/types.js";

export const CSV_COLUMNS = ["Issue Type", "Severity", "Bytes", "Blocks", "Loss Record", "Primary Function", "Source Location"];

const UNKNOWN = "Unknown";

function csvRow(record: IssueRecord): Array<string | number> {
  return [
    issueTypeLabel(record.issueType),
    record.severityLevel.toUpperCase(),
    record.bytesCount,
    record.blocksCount,
    record.lossRecordId,
    primaryFunctionOf(record) ?? UNKNOWN,
    record.sourceLocation ? formatSourceLocation(record.sourceLocation) : UNKNOWN,
  ];
}

/** One row per record, grouped by type, most severe first inside a group. */
export function renderCsv(classified: ClassifiedIssues): string {
  const rows = ISSUE_TYPES.flatMap((type) => prioritize(classified[type]).map(csvRow));
  return stringify(rows, { header: true, columns: CSV_COLUMNS });
}

export function csvPathFor(outputPath: string): string {
  return outputPath.toLowerCase().endsWith(".xlsx") ? outputPath.slice(0, -".xlsx".length) + ".csv" : `${outputPath}.csv`;
}
