import {
  type ClassifiedIssues,
  emptyByType,
  ISSUE_TYPES,
  type IssueRecord,
  type IssueType,
  SEVERITY_LEVELS,
  type SeverityLevel,
  type SourceAnalysis,
  type SourceCount,
  type SourceLocation,
  type Statistics,
} from "./types.js";

const LEAK_TYPES: readonly IssueType[] = ["definitely_lost", "possibly_lost", "still_reachable"];

export const UNKNOWN_SOURCE = "Unknown";

/** Groups by issue type; order within a type follows the input. */
export function classify(records: readonly IssueRecord[]): ClassifiedIssues {
  const out = emptyByType<IssueRecord[]>(() => []);
  for (const record of records) out[record.issueType].push(record);
  return out;
}

/** Type-major order, the inverse of `classify`. */
export function flatten(classified: ClassifiedIssues): IssueRecord[] {
  return ISSUE_TYPES.flatMap((type) => classified[type]);
}

export function formatSourceLocation(location: SourceLocation): string {
  return location.line !== undefined ? `${location.file}:${location.line}` : location.file;
}

/** Source location, else the function of the outermost frame that has one. */
export function primarySourceOf(record: IssueRecord): string | undefined {
  if (record.sourceLocation) return formatSourceLocation(record.sourceLocation);
  for (const frame of record.stackTrace) {
    if (frame.functionName) return frame.functionName;
  }
  return undefined;
}

export function primaryFunctionOf(record: IssueRecord): string | undefined {
  return record.stackTrace.find((f) => f.functionName !== undefined)?.functionName;
}

type Tally = { count: number; firstSeen: number };

function rankByCount<T extends Tally>(entries: Map<string, T>): Array<[string, T]> {
  return [...entries.entries()].sort(([, a], [, b]) => b.count - a.count || a.firstSeen - b.firstSeen);
}

export type StatisticsOptions = {
  /** Maximum number of top sources; all when omitted. */
  topSourcesLimit?: number;
};

export function computeStatistics(classified: ClassifiedIssues, options: StatisticsOptions = {}): Statistics {
  const issuesByType = emptyByType(() => 0);
  const bytesByType = emptyByType(() => 0);
  const blocksByType = emptyByType(() => 0);
  const severityDistribution: Record<SeverityLevel, number> = { critical: 0, high: 0, medium: 0, low: 0 };

  let totalIssues = 0;
  let totalBytes = 0;
  let totalBlocks = 0;

  for (const type of ISSUE_TYPES) {
    for (const record of classified[type]) {
      issuesByType[type] += 1;
      bytesByType[type] += record.bytesCount;
      blocksByType[type] += record.blocksCount;
      severityDistribution[record.severityLevel] += 1;
      totalIssues += 1;
      totalBytes += record.bytesCount;
      totalBlocks += record.blocksCount;
    }
  }

  const percentageByType = emptyByType(() => 0);
  const bytesPercentageByType = emptyByType(() => 0);
  for (const type of ISSUE_TYPES) {
    percentageByType[type] = totalIssues > 0 ? issuesByType[type] / totalIssues : 0;
    bytesPercentageByType[type] = totalBytes > 0 ? bytesByType[type] / totalBytes : 0;
  }

  // First-seen means encounter order, not the type-major order of `classified`.
  const inEncounterOrder = flatten(classified).sort((a, b) => a.ordinal - b.ordinal);

  const sources = new Map<string, Tally>();
  const analysis = new Map<string, Tally & { totalBytes: number; totalBlocks: number; issueTypes: IssueType[] }>();
  inEncounterOrder.forEach((record, index) => {
    const source = primarySourceOf(record);
    if (source !== undefined) {
      const tally = sources.get(source) ?? { count: 0, firstSeen: index };
      tally.count += 1;
      sources.set(source, tally);
    }

    const key = source ?? UNKNOWN_SOURCE;
    const entry = analysis.get(key) ?? { count: 0, firstSeen: index, totalBytes: 0, totalBlocks: 0, issueTypes: [] };
    entry.count += 1;
    entry.totalBytes += record.bytesCount;
    entry.totalBlocks += record.blocksCount;
    if (!entry.issueTypes.includes(record.issueType)) entry.issueTypes.push(record.issueType);
    analysis.set(key, entry);
  });

  const ranked = rankByCount(sources).map(([source, t]): SourceCount => ({ source, count: t.count }));
  const limit = options.topSourcesLimit;
  const topSources = limit !== undefined ? ranked.slice(0, Math.max(0, limit)) : ranked;

  const sourceAnalysis = rankByCount(analysis).map(
    ([source, e]): SourceAnalysis => ({
      source,
      count: e.count,
      totalBytes: e.totalBytes,
      totalBlocks: e.totalBlocks,
      issueTypes: e.issueTypes,
    }),
  );

  let leakBytes = 0;
  let leakBlocks = 0;
  let leakIssues = 0;
  for (const type of LEAK_TYPES) {
    leakBytes += bytesByType[type];
    leakBlocks += blocksByType[type];
    leakIssues += issuesByType[type];
  }

  return {
    totalIssues,
    totalBytes,
    totalBlocks,
    issuesByType,
    bytesByType,
    blocksByType,
    percentageByType,
    bytesPercentageByType,
    severityDistribution,
    topSources,
    sourceAnalysis,
    leakSummary: {
      totalLeakedBytes: leakBytes,
      totalLeakedBlocks: leakBlocks,
      totalLeakIssues: leakIssues,
      leakShareOfBytes: totalBytes > 0 ? leakBytes / totalBytes : 0,
    },
  };
}

export function severityCounts(statistics: Statistics): Array<{ level: SeverityLevel; count: number }> {
  return SEVERITY_LEVELS.map((level) => ({ level, count: statistics.severityDistribution[level] }));
}
