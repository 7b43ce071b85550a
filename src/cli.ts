#!/usr/bin/env node
import { Command } from "commander";

import { registerAnalyzeCommand } from "./commands/analyze.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerReportCommand } from "./commands/report.js";
import { BRAND } from "./core/brand.js";

function hasErrorCode(err: unknown): err is { code: unknown } {
  return err !== null && typeof err === "object" && "code" in err;
}

function installEpipeHandlers(): void {
  const handle = (err: unknown): void => {
    const code = hasErrorCode(err) ? String(err.code) : undefined;
    if (code === "EPIPE") {
      // Downstream consumer closed the pipe (e.g. `leakscope analyze vg.log --json | head`).
      process.exit(0);
    }
  };

  process.stdout.on("error", handle);
  process.stderr.on("error", handle);
}

installEpipeHandlers();

const program = new Command();
program
  .name(BRAND.cli.primary)
  .description("Turn Valgrind Memcheck logs into classified issue reports")
  .version("0.1.0");

registerAnalyzeCommand(program);
registerReportCommand(program);
registerConfigCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
  process.stderr.write(message + "\n");
  process.exitCode = 1;
});
