import { classify, computeStatistics, type StatisticsOptions } from "./classify.js";
import { parseMemcheckLog, type ParseOptions } from "./parse.js";
import type { ClassifiedIssues, ParsedLog, Statistics } from "./types.js";

export type AnalyzeOptions = ParseOptions & StatisticsOptions;

export type Analysis = {
  parsed: ParsedLog;
  classified: ClassifiedIssues;
  statistics: Statistics;
};

export function analyzeLines(lines: readonly string[], options: AnalyzeOptions = {}): Analysis {
  const parsed = parseMemcheckLog(lines, options);
  const classified = classify(parsed.records);
  const statistics = computeStatistics(classified, options);
  return { parsed, classified, statistics };
}
