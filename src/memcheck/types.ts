export const ISSUE_TYPES = [
  "definitely_lost",
  "possibly_lost",
  "still_reachable",
  "invalid_read",
  "invalid_write",
  "use_after_free",
  "other",
] as const;

export type IssueType = (typeof ISSUE_TYPES)[number];

export type SeverityLevel = "critical" | "high" | "medium" | "low";

export const SEVERITY_LEVELS: readonly SeverityLevel[] = ["critical", "high", "medium", "low"];

export type StackFrame = {
  address: string;
  functionName?: string;
  library?: string;
  sourceFile?: string;
  lineNumber?: number;
};

export type SourceLocation = {
  file: string;
  line?: number;
};

export type AuxiliaryTrace = {
  /** The continuation line that introduced these frames, e.g. "Block was alloc'd at". */
  label: string;
  frames: StackFrame[];
};

export type IssueRecord = {
  issueType: IssueType;
  bytesCount: number;
  blocksCount: number;
  /** Parenthetical breakdown from the header, e.g. "16 direct, 56 indirect". */
  bytesAnnotation?: string;
  lossRecordId: string;
  /** Outermost (closest to the fault) first. */
  stackTrace: StackFrame[];
  auxiliaryTraces: AuxiliaryTrace[];
  sourceLocation?: SourceLocation;
  severity: number;
  severityLevel: SeverityLevel;
  /** 1-based line of the header in the input. */
  lineNumber: number;
  /** Encounter order among emitted records, starting at 0. */
  ordinal: number;
  headerText: string;
};

export type ClassifiedIssues = Record<IssueType, IssueRecord[]>;

export type SourceCount = {
  source: string;
  count: number;
};

export type SourceAnalysis = {
  source: string;
  count: number;
  totalBytes: number;
  totalBlocks: number;
  issueTypes: IssueType[];
};

export type LeakSummary = {
  totalLeakedBytes: number;
  totalLeakedBlocks: number;
  totalLeakIssues: number;
  /** Fraction of all bytes, 0..1. */
  leakShareOfBytes: number;
};

export type Statistics = {
  readonly totalIssues: number;
  readonly totalBytes: number;
  readonly totalBlocks: number;
  readonly issuesByType: Readonly<Record<IssueType, number>>;
  readonly bytesByType: Readonly<Record<IssueType, number>>;
  readonly blocksByType: Readonly<Record<IssueType, number>>;
  /** count / totalIssues, 0..1. */
  readonly percentageByType: Readonly<Record<IssueType, number>>;
  /** bytes / totalBytes, 0..1. */
  readonly bytesPercentageByType: Readonly<Record<IssueType, number>>;
  readonly severityDistribution: Readonly<Record<SeverityLevel, number>>;
  readonly topSources: readonly SourceCount[];
  readonly sourceAnalysis: readonly SourceAnalysis[];
  readonly leakSummary: LeakSummary;
};

export type ParseWarningCode =
  | "malformed_number"
  | "unrecoverable_wrap"
  | "orphan_frame"
  | "unrecognized_issue_type"
  | "incomplete_trace";

export type ParseWarning = {
  lineNumber: number;
  rawText: string;
  reasonCode: ParseWarningCode;
  message: string;
};

export type ByteBlockTotal = {
  bytes: number;
  blocks: number;
};

export type LeakCategory = "definitelyLost" | "indirectlyLost" | "possiblyLost" | "stillReachable" | "suppressed";

export type RunSummary = {
  inUseAtExit?: ByteBlockTotal;
  heapUsage?: { allocs: number; frees: number; bytesAllocated: number };
  leaks: Partial<Record<LeakCategory, ByteBlockTotal>>;
  errors?: { errors: number; contexts: number; suppressed: number; suppressedContexts: number };
};

export type RunInfo = {
  hasBanner: boolean;
  pid?: number;
  tool?: string;
  version?: string;
  command?: string;
};

export type ParsedLog = {
  records: IssueRecord[];
  warnings: ParseWarning[];
  run: RunInfo;
  summary: RunSummary;
  lineCount: number;
};

export function emptyByType<T>(make: () => T): Record<IssueType, T> {
  return {
    definitely_lost: make(),
    possibly_lost: make(),
    still_reachable: make(),
    invalid_read: make(),
    invalid_write: make(),
    use_after_free: make(),
    other: make(),
  };
}

export function issueTypeLabel(type: IssueType): string {
  switch (type) {
    case "definitely_lost":
      return "Definitely Lost";
    case "possibly_lost":
      return "Possibly Lost";
    case "still_reachable":
      return "Still Reachable";
    case "invalid_read":
      return "Invalid Read";
    case "invalid_write":
      return "Invalid Write";
    case "use_after_free":
      return "Use After Free";
    case "other":
      return "Other";
  }
}

export function isIssueType(value: string): value is IssueType {
  return ISSUE_TYPES.some((type) => type === value);
}
