import * as path from "node:path";

import { commandScope } from "../core/brand.js";
import { Logger } from "../core/log.js";
import { resolveUserPath } from "../core/paths.js";
import { type LeakscopeSettings, resolveLeakscopeConfigForCwd, settingsOf } from "../core/project-config.js";
import { checkInputFile, loadTextLines } from "../core/text.js";
import { type Analysis, analyzeLines } from "../memcheck/analyze.js";
import { BANNER_SCAN_LINES } from "../memcheck/parse.js";

export type CommandResult<T> = { ok: true; value: T } | { ok: false; error: string; exitCode: number };

/** Unusable input or configuration. */
export const EXIT_BAD_INPUT = 2;
/** A report or log could not be written. */
export const EXIT_WRITE_FAILED = 1;

export type SharedOptions = {
  verbose?: boolean;
  logFile?: string;
  strict?: boolean;
};

export async function loadSettings(cwd: string): Promise<CommandResult<LeakscopeSettings>> {
  try {
    const resolved = await resolveLeakscopeConfigForCwd(cwd);
    return { ok: true, value: settingsOf(resolved.config) };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: msg, exitCode: EXIT_BAD_INPUT };
  }
}

export function createCommandLogger(command: string, opts: SharedOptions, settings: LeakscopeSettings, cwd: string): Logger {
  const logFile = opts.logFile ?? settings.logFile;
  return new Logger({
    scope: commandScope(command),
    verbose: opts.verbose === true,
    ...(logFile ? { logFile: resolveUserPath(logFile, cwd) } : {}),
  });
}

export function parseIntOption(
  value: string | undefined,
  flag: string,
  range: { min: number; max?: number },
): CommandResult<number | undefined> {
  if (value === undefined) return { ok: true, value: undefined };
  const trimmed = value.trim();
  const n = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isSafeInteger(n) || n < range.min || (range.max !== undefined && n > range.max)) {
    const bounds = range.max === undefined ? `>= ${range.min}` : `${range.min}..${range.max}`;
    return { ok: false, error: `Invalid ${flag}: ${JSON.stringify(value)} (expected integer ${bounds})`, exitCode: EXIT_BAD_INPUT };
  }
  return { ok: true, value: n };
}

export type LogAnalysis = {
  logPath: string;
  analysis: Analysis;
};

export async function analyzeLogFile(params: {
  logArg: string;
  cwd: string;
  settings: LeakscopeSettings;
  strict: boolean;
  topSources?: number;
  logger: Logger;
}): Promise<CommandResult<LogAnalysis>> {
  const logPath = resolveUserPath(params.logArg, params.cwd);
  const check = await checkInputFile(logPath);
  if (!check.ok) return { ok: false, error: check.error, exitCode: EXIT_BAD_INPUT };

  params.logger.debug(`Reading ${logPath}`, { path: logPath });
  const lines = await loadTextLines(logPath);
  const analysis = analyzeLines(lines, {
    wrapLookahead: params.settings.parser.wrapLookahead,
    topSourcesLimit: params.topSources ?? params.settings.report.topSources,
  });
  params.logger.debug(`Parsed ${lines.length} line(s) into ${analysis.parsed.records.length} record(s)`, {
    lines: lines.length,
    records: analysis.parsed.records.length,
    warnings: analysis.parsed.warnings.length,
  });

  const requireBanner = params.strict || params.settings.parser.requireBanner;
  if (requireBanner && lines.length > 0 && !analysis.parsed.run.hasBanner) {
    return {
      ok: false,
      error: `No Memcheck banner in the first ${BANNER_SCAN_LINES} lines of ${path.basename(logPath)}; is this a Valgrind log?`,
      exitCode: EXIT_BAD_INPUT,
    };
  }

  for (const w of analysis.parsed.warnings) {
    params.logger.debug(`line ${w.lineNumber}: ${w.reasonCode}: ${w.message}`, { lineNumber: w.lineNumber, reasonCode: w.reasonCode });
  }
  return { ok: true, value: { logPath, analysis } };
}

/** Flushes the logger; a failed log write turns a successful run into exit 1. */
export async function finishCommand(logger: Logger): Promise<void> {
  try {
    await logger.flush();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[${logger.scope}] Error: could not write log file: ${msg}\n`);
    process.exitCode = EXIT_WRITE_FAILED;
  }
}
