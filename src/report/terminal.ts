import type { Analysis } from "../memcheck/analyze.js";
import { severityCounts } from "../memcheck/classify.js";
import { ISSUE_TYPES, type ParseWarningCode } from "../memcheck/types.js";

function percent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function warningCounts(analysis: Analysis): Partial<Record<ParseWarningCode, number>> {
  const counts: Partial<Record<ParseWarningCode, number>> = {};
  for (const w of analysis.parsed.warnings) counts[w.reasonCode] = (counts[w.reasonCode] ?? 0) + 1;
  return counts;
}

/** Plain key=value lines for the terminal. */
export function renderTerminalSummary(analysis: Analysis, sourceName: string): string[] {
  const { statistics, parsed } = analysis;
  const lines: string[] = [`log: ${sourceName}`];

  if (parsed.run.tool) {
    const parts = [parsed.run.tool];
    if (parsed.run.version) parts.push(`version=${parsed.run.version}`);
    if (parsed.run.pid !== undefined) parts.push(`pid=${parsed.run.pid}`);
    lines.push(`run: ${parts.join(" ")}`);
    if (parsed.run.command) lines.push(`command: ${parsed.run.command}`);
  }

  lines.push(`issues: total=${statistics.totalIssues} bytes=${statistics.totalBytes} blocks=${statistics.totalBlocks}`);
  for (const type of ISSUE_TYPES) {
    const count = statistics.issuesByType[type];
    if (count === 0) continue;
    lines.push(
      `- ${type}: count=${count} bytes=${statistics.bytesByType[type]} blocks=${statistics.blocksByType[type]} share=${percent(statistics.percentageByType[type])}`,
    );
  }

  lines.push(`severity: ${severityCounts(statistics).map(({ level, count }) => `${level}=${count}`).join(" ")}`);

  if (statistics.topSources.length > 0) {
    lines.push("top sources:");
    for (const top of statistics.topSources) lines.push(`- ${top.source} (${top.count})`);
  }

  const warnings = Object.entries(warningCounts(analysis));
  lines.push(
    warnings.length === 0 ? "warnings: 0" : `warnings: ${parsed.warnings.length} (${warnings.map(([code, n]) => `${code}=${n}`).join(" ")})`,
  );
  return lines;
}
