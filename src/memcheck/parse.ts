import { IssueAssembler, type AssemblerInput } from "./assembler.js";
import { tryNormalizeCount } from "./number.js";
import { type BannerLine, classifyLine, type LineMatch, recoverWrappedHeader, stripPrefix, type SummaryLine } from "./patterns.js";
import type { IssueRecord, ParsedLog, ParseWarning, RunInfo, RunSummary } from "./types.js";

export const DEFAULT_WRAP_LOOKAHEAD = 2;
export const MAX_WRAP_LOOKAHEAD = 5;
export const BANNER_SCAN_LINES = 50;

export type ParseOptions = {
  /** Extra physical lines tried when re-joining a wrapped header. */
  wrapLookahead?: number;
};

export type ScanContext = {
  warnings: ParseWarning[];
  run: RunInfo;
  summary: RunSummary;
};

export function newScanContext(): ScanContext {
  return { warnings: [], run: { hasBanner: false }, summary: { leaks: {} } };
}

function resolveLookahead(value: number | undefined): number {
  if (value === undefined) return DEFAULT_WRAP_LOOKAHEAD;
  if (!Number.isInteger(value) || value < 0) return 0;
  return Math.min(value, MAX_WRAP_LOOKAHEAD);
}

function applyBanner(context: ScanContext, banner: BannerLine, lineNumber: number): void {
  switch (banner.kind) {
    case "tool":
      context.run.tool ??= banner.tool;
      if (lineNumber <= BANNER_SCAN_LINES) context.run.hasBanner = true;
      return;
    case "version":
      context.run.version ??= banner.version;
      return;
    case "command":
      context.run.command ??= banner.command;
      return;
  }
}

function applySummary(context: ScanContext, summary: SummaryLine, lineNumber: number, rawText: string): void {
  const counts = (tokens: string[]): number[] | undefined => {
    const out: number[] = [];
    for (const token of tokens) {
      const n = tryNormalizeCount(token);
      if (n === undefined) {
        context.warnings.push({
          lineNumber,
          rawText,
          reasonCode: "malformed_number",
          message: `Summary total ignored: could not read count ${JSON.stringify(token)}.`,
        });
        return undefined;
      }
      out.push(n);
    }
    return out;
  };

  switch (summary.kind) {
    case "heading":
      return;
    case "leak_total": {
      const n = counts([summary.bytesToken, summary.blocksToken]);
      if (n) context.summary.leaks[summary.category] = { bytes: n[0] ?? 0, blocks: n[1] ?? 0 };
      return;
    }
    case "in_use": {
      const n = counts([summary.bytesToken, summary.blocksToken]);
      if (n) context.summary.inUseAtExit = { bytes: n[0] ?? 0, blocks: n[1] ?? 0 };
      return;
    }
    case "heap_usage": {
      const n = counts([summary.allocsToken, summary.freesToken, summary.bytesToken]);
      if (n) context.summary.heapUsage = { allocs: n[0] ?? 0, frees: n[1] ?? 0, bytesAllocated: n[2] ?? 0 };
      return;
    }
    case "error_summary": {
      const n = counts([
        summary.errorsToken,
        summary.contextsToken,
        summary.suppressedToken ?? "0",
        summary.suppressedContextsToken ?? "0",
      ]);
      if (n) {
        context.summary.errors = {
          errors: n[0] ?? 0,
          contexts: n[1] ?? 0,
          suppressed: n[2] ?? 0,
          suppressedContexts: n[3] ?? 0,
        };
      }
      return;
    }
  }
}

function toAssemblerInput(match: LineMatch, context: ScanContext, lineNumber: number, rawText: string): AssemblerInput {
  switch (match.kind) {
    case "header":
      return { event: "header", header: match.header };
    case "frame":
      return { event: "frame", frame: match.frame };
    case "continuation":
      return { event: "continuation", label: match.label, freed: match.freed };
    case "summary":
      applySummary(context, match.summary, lineNumber, rawText);
      return { event: "other" };
    case "banner":
      applyBanner(context, match.banner, lineNumber);
      return { event: "other" };
    case "fragment":
    case "blank":
    case "other":
      return { event: "other" };
  }
}

/**
 * Yields each issue record as soon as its block closes. Warnings, run banner
 * and run summary accumulate on `context`.
 */
export function* scanMemcheckLog(
  lines: readonly string[],
  options: ParseOptions = {},
  context: ScanContext = newScanContext(),
): Generator<IssueRecord, void, undefined> {
  const lookahead = resolveLookahead(options.wrapLookahead);
  const assembler = new IssueAssembler({ onWarning: (w) => context.warnings.push(w) });

  let i = 0;
  while (i < lines.length) {
    const raw = lines[i] ?? "";
    const lineNumber = i + 1;
    const { pid } = stripPrefix(raw);
    if (pid !== undefined) context.run.pid ??= pid;

    let match = classifyLine(raw);
    let rawText = raw;
    let consumed = 1;

    if (match.kind === "fragment") {
      const recovered = recoverWrappedHeader(lines, i, lookahead);
      if (recovered) {
        match = { kind: "header", header: recovered.header };
        rawText = recovered.text;
        consumed = recovered.consumed;
      } else {
        context.warnings.push({
          lineNumber,
          rawText: raw,
          reasonCode: "unrecoverable_wrap",
          message: `Line looks like a split issue header but could not be re-joined within ${lookahead} line(s).`,
        });
      }
    }

    yield* assembler.feed(lineNumber, rawText, toAssemblerInput(match, context, lineNumber, raw));
    i += consumed;
  }

  yield* assembler.end();
}

export function parseMemcheckLog(lines: readonly string[], options: ParseOptions = {}): ParsedLog {
  const context = newScanContext();
  const records = [...scanMemcheckLog(lines, options, context)];
  return {
    records,
    warnings: context.warnings,
    run: context.run,
    summary: context.summary,
    lineCount: lines.length,
  };
}

export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}
