import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseLeakscopeConfigStrict, resolveLeakscopeConfigForCwd, settingsOf } from "./project-config.js";

async function writeJson(path: string, value: unknown): Promise<void> {
  await writeFile(path, JSON.stringify(value, null, 2) + "\n", "utf8");
}

describe("core/project-config", () => {
  const prevEnv = { LEAKSCOPE_CONFIG_PATH: process.env.LEAKSCOPE_CONFIG_PATH };

  afterEach(() => {
    if (prevEnv.LEAKSCOPE_CONFIG_PATH === undefined) delete process.env.LEAKSCOPE_CONFIG_PATH;
    else process.env.LEAKSCOPE_CONFIG_PATH = prevEnv.LEAKSCOPE_CONFIG_PATH;
  });

  it("does not treat the global config path as a discovered local config", async () => {
    const root = await mkdtemp(join(tmpdir(), "leakscope-project-config-"));
    try {
      const globalPath = join(root, ".leakscope", "config.json");
      await mkdir(join(root, ".leakscope"), { recursive: true });
      await writeJson(globalPath, { schemaVersion: 1, backup: true });

      process.env.LEAKSCOPE_CONFIG_PATH = globalPath;

      const projectDir = join(root, "project");
      await mkdir(projectDir, { recursive: true });

      const resolved = await resolveLeakscopeConfigForCwd(projectDir);

      expect(resolved.files.global.path).toBe(globalPath);
      expect(resolved.files.local.discovered).toBe(false);
      expect(resolved.files.local.path).toBe(join(projectDir, ".leakscope", "config.json"));
      expect(resolved.config.backup).toBe(true);
      expect(resolved.sourceByPath.backup).toBe("global");
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("layers a local config found by walking up over the global one", async () => {
    const root = await mkdtemp(join(tmpdir(), "leakscope-project-config-"));
    try {
      process.env.LEAKSCOPE_CONFIG_PATH = join(root, "global.json");
      await writeJson(join(root, "global.json"), { schemaVersion: 1, report: { maxFrames: 8, topSources: 3 } });

      const projectDir = join(root, "project");
      await mkdir(join(projectDir, ".leakscope"), { recursive: true });
      await mkdir(join(projectDir, "build", "logs"), { recursive: true });
      await writeJson(join(projectDir, ".leakscope", "config.json"), { schemaVersion: 1, report: { maxFrames: 12 } });

      const resolved = await resolveLeakscopeConfigForCwd(join(projectDir, "build", "logs"));

      expect(resolved.files.local.discovered).toBe(true);
      expect(resolved.config.report).toEqual({
        format: "xlsx",
        output: "memcheck_report.xlsx",
        csvFallback: true,
        maxFrames: 12,
        topSources: 3,
      });
      expect(resolved.sourceByPath["report.maxFrames"]).toBe("local");
      expect(resolved.sourceByPath["report.topSources"]).toBe("global");
      expect(resolved.sourceByPath["report.format"]).toBe("default");
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("rejects an invalid config file with every problem listed", async () => {
    const root = await mkdtemp(join(tmpdir(), "leakscope-project-config-"));
    try {
      const globalPath = join(root, "global.json");
      process.env.LEAKSCOPE_CONFIG_PATH = globalPath;
      await writeJson(globalPath, { schemaVersion: 1, color: true, parser: { wrapLookahead: 9 } });

      await expect(resolveLeakscopeConfigForCwd(root)).rejects.toThrow(
        `Invalid config: ${globalPath}\n- Unknown field: color\n- Invalid value at parser.wrapLookahead (expected integer 0..5)`,
      );
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("validates types, enums and ranges strictly", () => {
    const result = parseLeakscopeConfigStrict({
      schemaVersion: 2,
      notify: "yes",
      report: { format: "pdf", maxFrames: 0, output: "" },
    });
    expect(result).toEqual({
      ok: false,
      errors: [
        "Invalid value at schemaVersion (expected number 1).",
        "Invalid value at notify (expected boolean)",
        'Invalid value at report.format (expected "xlsx"|"csv")',
        "Invalid value at report.output (expected non-empty string)",
        "Invalid value at report.maxFrames (expected integer >= 1)",
      ],
    });
  });

  it("fills every setting from defaults", () => {
    expect(settingsOf({ schemaVersion: 1, parser: { wrapLookahead: 0 } })).toEqual({
      backup: false,
      notify: false,
      parser: { wrapLookahead: 0, requireBanner: false },
      report: { format: "xlsx", output: "memcheck_report.xlsx", csvFallback: true, maxFrames: 5, topSources: 10 },
    });
  });
});
