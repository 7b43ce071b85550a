import type { IssueRecord, IssueType, SeverityLevel } from "./types.js";

// Leak certainty and memory-corruption risk outrank benign retention.
const TYPE_RANK: Record<IssueType, number> = {
  definitely_lost: 6,
  invalid_write: 5,
  invalid_read: 4,
  use_after_free: 3,
  possibly_lost: 2,
  still_reachable: 1,
  other: 0,
};

const MAGNITUDE_SLOTS = 64;

export function typeRank(type: IssueType): number {
  return TYPE_RANK[type];
}

function bitLength(n: number): number {
  if (!Number.isFinite(n) || n <= 0) return 0;
  return Math.floor(n).toString(2).length;
}

/**
 * Integer severity: the type rank dominates, the byte magnitude (bit length,
 * capped) breaks ties inside a type. Higher is more severe.
 */
export function severityScore(type: IssueType, bytesCount: number): number {
  return TYPE_RANK[type] * MAGNITUDE_SLOTS + Math.min(MAGNITUDE_SLOTS - 1, bitLength(bytesCount));
}

export function severityLevelOf(type: IssueType): SeverityLevel {
  switch (type) {
    case "definitely_lost":
    case "invalid_read":
    case "invalid_write":
    case "use_after_free":
      return "critical";
    case "possibly_lost":
      return "high";
    case "other":
      return "medium";
    case "still_reachable":
      return "low";
  }
}

export function compareIssues(a: IssueRecord, b: IssueRecord): number {
  const byType = TYPE_RANK[b.issueType] - TYPE_RANK[a.issueType];
  if (byType !== 0) return byType;
  const byBytes = b.bytesCount - a.bytesCount;
  if (byBytes !== 0) return byBytes;
  return a.ordinal - b.ordinal;
}

/** Critical issues first; never mutates the input. */
export function prioritize(records: readonly IssueRecord[]): IssueRecord[] {
  return [...records].sort(compareIssues);
}

export function criticalIssues(records: readonly IssueRecord[]): IssueRecord[] {
  return prioritize(records.filter((r) => r.severityLevel === "critical"));
}
