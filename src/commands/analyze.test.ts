import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { INVENTORY_LOG_PATH } from "../memcheck/testing/fixtures.js";
import { registerAnalyzeCommand } from "./analyze.js";

async function runAnalyze(args: string[]): Promise<{ stdout: string; stderr: string; exitCode: number }> {
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const spyOut = vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdoutChunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    return true;
  });
  const spyErr = vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderrChunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    return true;
  });

  const prevExitCode = process.exitCode;
  process.exitCode = undefined;

  try {
    const program = new Command();
    program.exitOverride();
    registerAnalyzeCommand(program);
    await program.parseAsync(["node", "leakscope", ...args]);

    const exitCode = process.exitCode ?? 0;
    return { stdout: stdoutChunks.join(""), stderr: stderrChunks.join(""), exitCode };
  } finally {
    process.exitCode = prevExitCode;
    spyOut.mockRestore();
    spyErr.mockRestore();
  }
}

describe("cli analyze", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "leakscope-analyze-"));
    vi.stubEnv("LEAKSCOPE_CONFIG_PATH", join(dir, "global-config.json"));
    vi.spyOn(process, "cwd").mockReturnValue(dir);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("prints a summary of the log", async () => {
    const res = await runAnalyze(["analyze", INVENTORY_LOG_PATH]);
    expect(res.exitCode).toBe(0);
    expect(res.stderr).toBe("");
    expect(res.stdout.split("\n")).toEqual([
      `log: ${INVENTORY_LOG_PATH}`,
      "run: Memcheck version=3.22.0 pid=9001",
      "command: ./inventory --load items.db",
      "issues: total=5 bytes=4440 blocks=7",
      "- definitely_lost: count=1 bytes=216 blocks=1 share=20.0%",
      "- possibly_lost: count=1 bytes=4000 blocks=1 share=20.0%",
      "- still_reachable: count=1 bytes=24 blocks=1 share=20.0%",
      "- use_after_free: count=1 bytes=8 blocks=1 share=20.0%",
      "- other: count=1 bytes=192 blocks=3 share=20.0%",
      "severity: critical=2 high=1 medium=1 low=1",
      "top sources:",
      "- item.c:20 (3)",
      "- item.c:44 (1)",
      "- config.c:12 (1)",
      "warnings: 0",
      "",
    ]);
  });

  it("limits top sources with --top", async () => {
    const res = await runAnalyze(["analyze", INVENTORY_LOG_PATH, "--top", "1"]);
    expect(res.exitCode).toBe(0);
    const lines = res.stdout.split("\n");
    const at = lines.indexOf("top sources:");
    expect(lines.slice(at, at + 3)).toEqual(["top sources:", "- item.c:20 (3)", "warnings: 0"]);
  });

  it("prints prioritized issues as JSON", async () => {
    const res = await runAnalyze(["analyze", INVENTORY_LOG_PATH, "--json"]);
    expect(res.exitCode).toBe(0);
    const report: unknown = JSON.parse(res.stdout);
    expect(report).toMatchObject({
      log: INVENTORY_LOG_PATH,
      run: { tool: "Memcheck", version: "3.22.0", pid: 9001, hasBanner: true },
      statistics: { totalIssues: 5, totalBytes: 4440, totalBlocks: 7 },
      issues: [
        { issueType: "definitely_lost", bytesCount: 216, severity: 392 },
        { issueType: "use_after_free", bytesCount: 8, severity: 196 },
        { issueType: "possibly_lost", bytesCount: 4000, severity: 140 },
        { issueType: "still_reachable", bytesCount: 24, severity: 69 },
        { issueType: "other", bytesCount: 192, severity: 8 },
      ],
      warnings: [],
    });
  });

  it("resolves a relative log path against the working directory", async () => {
    await writeFile(join(dir, "vg.log"), "==7== 8 bytes in 1 blocks are definitely lost in loss record 1 of 1\n==7==    at 0x1: main (m.c:2)\n", "utf8");
    const res = await runAnalyze(["analyze", "vg.log"]);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toContain("issues: total=1 bytes=8 blocks=1\n");
  });

  it("exits 2 for a missing input file", async () => {
    const missing = join(dir, "nope.log");
    const res = await runAnalyze(["analyze", missing]);
    expect(res.exitCode).toBe(2);
    expect(res.stdout).toBe("");
    expect(res.stderr).toBe(`[leakscope analyze] Error: Input file not found: ${missing}\n`);
  });

  it("rejects input without a banner under --strict", async () => {
    const p = join(dir, "plain.log");
    await writeFile(p, "==7== 8 bytes in 1 blocks are definitely lost in loss record 1 of 1\n", "utf8");

    const lenient = await runAnalyze(["analyze", p]);
    expect(lenient.exitCode).toBe(0);

    const strict = await runAnalyze(["analyze", p, "--strict"]);
    expect(strict.exitCode).toBe(2);
    expect(strict.stderr).toBe(
      "[leakscope analyze] Error: No Memcheck banner in the first 50 lines of plain.log; is this a Valgrind log?\n",
    );
  });

  it("rejects an invalid --top", async () => {
    const res = await runAnalyze(["analyze", INVENTORY_LOG_PATH, "--top", "0"]);
    expect(res.exitCode).toBe(2);
    expect(res.stderr).toBe('[leakscope analyze] Error: Invalid --top: "0" (expected integer >= 1)\n');
  });

  it("reports an invalid config file", async () => {
    await writeFile(join(dir, "global-config.json"), JSON.stringify({ schemaVersion: 1, color: true }), "utf8");
    const res = await runAnalyze(["analyze", INVENTORY_LOG_PATH]);
    expect(res.exitCode).toBe(2);
    expect(res.stderr).toBe(`[leakscope analyze] Error: Invalid config: ${join(dir, "global-config.json")}\n- Unknown field: color\n`);
  });

  it("prints debug lines and appends a log file when asked", async () => {
    const logFile = join(dir, "logs", "leakscope.jsonl");
    const res = await runAnalyze(["analyze", INVENTORY_LOG_PATH, "-v", "--log-file", logFile]);
    expect(res.exitCode).toBe(0);
    expect(res.stderr).toContain("[leakscope analyze] debug: Parsed 46 line(s) into 5 record(s)\n");
  });
});
