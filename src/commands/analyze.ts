import type { Command } from "commander";

import { commandScope } from "../core/brand.js";
import { flatten } from "../memcheck/classify.js";
import { prioritize } from "../memcheck/severity.js";
import { renderTerminalSummary } from "../report/terminal.js";
import { analyzeLogFile, createCommandLogger, finishCommand, loadSettings, parseIntOption, type SharedOptions } from "./common.js";

type AnalyzeCommandOptions = SharedOptions & {
  json?: boolean;
  top?: string;
};

export function registerAnalyzeCommand(program: Command): void {
  program
    .command("analyze")
    .description("Parse a Valgrind Memcheck log and print a summary of the issues found")
    .argument("<log>", "path to the Memcheck log")
    .option("--json", "print the full result as JSON")
    .option("--strict", "fail when the input has no Memcheck banner")
    .option("--top <n>", "number of top sources to list")
    .option("-v, --verbose", "print debug messages")
    .option("--log-file <path>", "append JSON log lines to this file")
    .action(async (logArg: string, opts: AnalyzeCommandOptions) => {
      const scope = commandScope("analyze");
      const cwd = process.cwd();

      const settings = await loadSettings(cwd);
      if (!settings.ok) {
        process.stderr.write(`[${scope}] Error: ${settings.error}\n`);
        process.exitCode = settings.exitCode;
        return;
      }

      const top = parseIntOption(opts.top, "--top", { min: 1 });
      if (!top.ok) {
        process.stderr.write(`[${scope}] Error: ${top.error}\n`);
        process.exitCode = top.exitCode;
        return;
      }

      const logger = createCommandLogger("analyze", opts, settings.value, cwd);
      try {
        const result = await analyzeLogFile({
          logArg,
          cwd,
          settings: settings.value,
          strict: opts.strict === true,
          ...(top.value !== undefined ? { topSources: top.value } : {}),
          logger,
        });
        if (!result.ok) {
          logger.error(result.error);
          process.exitCode = result.exitCode;
          return;
        }

        const { logPath, analysis } = result.value;
        if (opts.json) {
          const report = {
            log: logPath,
            run: analysis.parsed.run,
            summary: analysis.parsed.summary,
            statistics: analysis.statistics,
            issues: prioritize(flatten(analysis.classified)),
            warnings: analysis.parsed.warnings,
          };
          process.stdout.write(JSON.stringify(report, null, 2) + "\n");
        } else {
          for (const line of renderTerminalSummary(analysis, logArg)) process.stdout.write(line + "\n");
        }
        logger.debug("Analysis complete", { issues: analysis.statistics.totalIssues });
        process.exitCode = 0;
      } finally {
        await finishCommand(logger);
      }
    });
}
