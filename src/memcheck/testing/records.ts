import { severityLevelOf, severityScore } from "../severity.js";
import type { IssueRecord, IssueType, SourceLocation, StackFrame } from "../types.js";

type RecordSeed = {
  issueType: IssueType;
  bytesCount: number;
  ordinal: number;
  blocksCount?: number;
  sourceLocation?: SourceLocation;
  stackTrace?: StackFrame[];
};

/** Builds a closed record the way the assembler would, for tests. */
export function makeRecord(seed: RecordSeed): IssueRecord {
  const base: IssueRecord = {
    issueType: seed.issueType,
    bytesCount: seed.bytesCount,
    blocksCount: seed.blocksCount ?? 1,
    lossRecordId: `${seed.ordinal + 1} of 99`,
    stackTrace: seed.stackTrace ?? [{ address: "0x1" }],
    auxiliaryTraces: [],
    severity: severityScore(seed.issueType, seed.bytesCount),
    severityLevel: severityLevelOf(seed.issueType),
    lineNumber: seed.ordinal * 4 + 1,
    ordinal: seed.ordinal,
    headerText: `${seed.bytesCount} bytes in ${seed.blocksCount ?? 1} blocks`,
  };
  return seed.sourceLocation ? { ...base, sourceLocation: seed.sourceLocation } : base;
}
