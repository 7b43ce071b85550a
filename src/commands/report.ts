import type { Command } from "commander";

import { commandScope } from "../core/brand.js";
import { createBackup, fileExists, writeFileAtomic } from "../core/fs.js";
import type { Logger } from "../core/log.js";
import { reportNotification, sendOsNotification } from "../core/notify.js";
import { resolveUserPath } from "../core/paths.js";
import type { ReportFormat } from "../core/project-config.js";
import type { Analysis } from "../memcheck/analyze.js";
import { csvPathFor, renderCsv } from "../report/csv.js";
import { ReportWriteError } from "../report/errors.js";
import { writeWorkbook } from "../report/workbook.js";
import {
  analyzeLogFile,
  type CommandResult,
  createCommandLogger,
  EXIT_BAD_INPUT,
  EXIT_WRITE_FAILED,
  finishCommand,
  loadSettings,
  parseIntOption,
  type SharedOptions,
} from "./common.js";

type ReportCommandOptions = SharedOptions & {
  output?: string;
  format?: string;
  csvFallback?: boolean;
  maxFrames?: string;
  backup?: boolean;
  notify?: boolean;
};

type WrittenReport = {
  path: string;
  format: ReportFormat;
  fellBack: boolean;
};

function parseFormat(value: string | undefined): CommandResult<ReportFormat | undefined> {
  if (value === undefined) return { ok: true, value: undefined };
  const v = value.trim().toLowerCase();
  if (v === "xlsx" || v === "csv") return { ok: true, value: v };
  return { ok: false, error: `Invalid --format: ${JSON.stringify(value)} (expected xlsx|csv)`, exitCode: EXIT_BAD_INPUT };
}

function inferFormat(outputPath: string): ReportFormat | undefined {
  const lower = outputPath.toLowerCase();
  if (lower.endsWith(".csv")) return "csv";
  if (lower.endsWith(".xlsx")) return "xlsx";
  return undefined;
}

async function backupIfPresent(outputPath: string, logger: Logger): Promise<void> {
  if (!(await fileExists(outputPath))) return;
  const { backupPath } = await createBackup(outputPath);
  logger.info(`Backed up existing report to ${backupPath}`, { backupPath });
}

async function writeCsv(outputPath: string, analysis: Analysis): Promise<void> {
  try {
    await writeFileAtomic(outputPath, renderCsv(analysis.classified));
  } catch (err) {
    throw new ReportWriteError(outputPath, err);
  }
}

async function writeReport(params: {
  analysis: Analysis;
  outputPath: string;
  format: ReportFormat;
  csvFallback: boolean;
  maxFrames: number;
  sourceName: string;
  backup: boolean;
  logger: Logger;
}): Promise<CommandResult<WrittenReport>> {
  const { analysis, outputPath, logger } = params;

  try {
    if (params.backup) await backupIfPresent(outputPath, logger);

    if (params.format === "csv") {
      await writeCsv(outputPath, analysis);
      return { ok: true, value: { path: outputPath, format: "csv", fellBack: false } };
    }

    try {
      await writeWorkbook(outputPath, { analysis, sourceName: params.sourceName, maxFrames: params.maxFrames });
      return { ok: true, value: { path: outputPath, format: "xlsx", fellBack: false } };
    } catch (err) {
      if (!(err instanceof ReportWriteError) || !params.csvFallback) throw err;
      logger.warn(`${err.message}; writing CSV instead`);
      const csvPath = csvPathFor(outputPath);
      if (params.backup) await backupIfPresent(csvPath, logger);
      await writeCsv(csvPath, analysis);
      return { ok: true, value: { path: csvPath, format: "csv", fellBack: true } };
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    const hint = params.format === "xlsx" && !params.csvFallback ? "\nUse --csv-fallback to write a CSV report instead." : "";
    return { ok: false, error: msg + hint, exitCode: EXIT_WRITE_FAILED };
  }
}

export function registerReportCommand(program: Command): void {
  program
    .command("report")
    .description("Write an Excel (or CSV) report of the issues in a Valgrind Memcheck log")
    .argument("<log>", "path to the Memcheck log")
    .option("-o, --output <path>", "report path (default from config: memcheck_report.xlsx)")
    .option("--format <format>", "xlsx|csv (default: from the output extension, then config)")
    .option("--csv-fallback", "write CSV when the workbook cannot be written")
    .option("--no-csv-fallback", "fail when the workbook cannot be written")
    .option("--max-frames <n>", "stack frames shown per issue")
    .option("--backup", "copy an existing report aside before overwriting it")
    .option("--no-backup", "overwrite an existing report without a copy")
    .option("--notify", "show a desktop notification when done")
    .option("--strict", "fail when the input has no Memcheck banner")
    .option("-v, --verbose", "print debug messages")
    .option("--log-file <path>", "append JSON log lines to this file")
    .action(async (logArg: string, opts: ReportCommandOptions) => {
      const scope = commandScope("report");
      const cwd = process.cwd();
      const fail = (error: string, exitCode: number): void => {
        process.stderr.write(`[${scope}] Error: ${error}\n`);
        process.exitCode = exitCode;
      };

      const settings = await loadSettings(cwd);
      if (!settings.ok) return fail(settings.error, settings.exitCode);
      const format = parseFormat(opts.format);
      if (!format.ok) return fail(format.error, format.exitCode);
      const maxFrames = parseIntOption(opts.maxFrames, "--max-frames", { min: 1 });
      if (!maxFrames.ok) return fail(maxFrames.error, maxFrames.exitCode);

      const cfg = settings.value;
      const outputPath = resolveUserPath(opts.output ?? cfg.report.output, cwd);
      const logger = createCommandLogger("report", opts, cfg, cwd);
      try {
        const analyzed = await analyzeLogFile({ logArg, cwd, settings: cfg, strict: opts.strict === true, logger });
        if (!analyzed.ok) {
          logger.error(analyzed.error);
          process.exitCode = analyzed.exitCode;
          return;
        }

        const { analysis } = analyzed.value;
        const total = analysis.statistics.totalIssues;
        if (total === 0) {
          logger.info("No memory issues found in the log; no report written.");
          process.exitCode = 0;
          return;
        }
        logger.info(`Found ${total} memory issue(s)`, { issues: total });

        const written = await writeReport({
          analysis,
          outputPath,
          format: format.value ?? (opts.output !== undefined ? inferFormat(outputPath) : undefined) ?? cfg.report.format,
          csvFallback: opts.csvFallback ?? cfg.report.csvFallback,
          maxFrames: maxFrames.value ?? cfg.report.maxFrames,
          sourceName: logArg,
          backup: opts.backup ?? cfg.backup,
          logger,
        });
        if (!written.ok) {
          logger.error(written.error);
          process.exitCode = written.exitCode;
          return;
        }

        const label = written.value.format === "csv" ? "CSV" : "Excel";
        process.stdout.write(`✓ Wrote ${label} report: ${written.value.path}\n`);

        if (opts.notify ?? cfg.notify) {
          await sendOsNotification(
            reportNotification({
              outputPath: written.value.path,
              totalIssues: total,
              criticalIssues: analysis.statistics.severityDistribution.critical,
            }),
          );
        }
        process.exitCode = 0;
      } finally {
        await finishCommand(logger);
      }
    });
}
