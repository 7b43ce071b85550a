import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { fileExists } from "../core/fs.js";
import { registerConfigCommand } from "./config.js";

async function runConfig(args: string[]): Promise<{ stdout: string; stderr: string; exitCode: number }> {
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
    registerConfigCommand(program);
    await program.parseAsync(["node", "leakscope", "config", ...args]);

    const exitCode = process.exitCode ?? 0;
    return { stdout: stdoutChunks.join(""), stderr: stderrChunks.join(""), exitCode };
  } finally {
    process.exitCode = prevExitCode;
    spyOut.mockRestore();
    spyErr.mockRestore();
  }
}

describe("cli config", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "leakscope-config-"));
    configPath = join(dir, ".leakscope", "config.json");
    vi.stubEnv("LEAKSCOPE_CONFIG_PATH", join(dir, "global-config.json"));
    vi.spyOn(process, "cwd").mockReturnValue(dir);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("prints the local path even before a config exists", async () => {
    const res = await runConfig(["path"]);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe(`${configPath}\n`);
  });

  it("init writes the defaults once", async () => {
    const first = await runConfig(["init"]);
    expect(first.stdout).toBe(`✓ Wrote config: ${configPath}\n`);
    const written: unknown = JSON.parse(await readFile(configPath, "utf8"));
    expect(written).toEqual({
      schemaVersion: 1,
      backup: false,
      notify: false,
      parser: { wrapLookahead: 2, requireBanner: false },
      report: { format: "xlsx", output: "memcheck_report.xlsx", csvFallback: true, maxFrames: 5, topSources: 10 },
    });

    await writeFile(configPath, JSON.stringify({ schemaVersion: 1, notify: true }), "utf8");
    const second = await runConfig(["init"]);
    expect(second.stdout).toBe(`○ Config already exists: ${configPath}\n`);
    expect(JSON.parse(await readFile(configPath, "utf8"))).toEqual({ schemaVersion: 1, notify: true });

    const forced = await runConfig(["init", "--force"]);
    expect(forced.stdout).toBe(`✓ Wrote config: ${configPath}\n`);
    expect(JSON.parse(await readFile(configPath, "utf8"))).toMatchObject({ notify: false });
  });

  it("show prints values and where they came from", async () => {
    await mkdir(join(dir, ".leakscope"));
    await writeFile(configPath, JSON.stringify({ schemaVersion: 1, report: { maxFrames: 9 } }), "utf8");

    const res = await runConfig(["show"]);
    expect(res.exitCode).toBe(0);
    const shown: unknown = JSON.parse(res.stdout);
    expect(shown).toMatchObject({
      config: { report: { maxFrames: 9, topSources: 10 } },
      files: { local: { path: configPath, exists: true, discovered: true } },
      sourceByPath: { "report.maxFrames": "local", "report.topSources": "default" },
    });
  });

  it("show fails on an invalid config", async () => {
    await mkdir(join(dir, ".leakscope"));
    await writeFile(configPath, JSON.stringify({ schemaVersion: 1, parser: { wrapLookahead: 9 } }), "utf8");

    const res = await runConfig(["show"]);
    expect(res.exitCode).toBe(2);
    expect(res.stderr).toBe(
      `[leakscope config show] Error: Invalid config: ${configPath}\n- Invalid value at parser.wrapLookahead (expected integer 0..5)\n`,
    );
  });

  it("remove deletes the config and its empty directory", async () => {
    await runConfig(["init"]);
    const res = await runConfig(["remove"]);
    expect(res.stdout).toBe(`✓ Removed config: ${configPath}\n`);
    expect(await fileExists(join(dir, ".leakscope"))).toBe(false);

    const again = await runConfig(["remove"]);
    expect(again.stdout).toBe("○ No config to remove.\n");
  });
});
