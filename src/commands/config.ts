import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { Command } from "commander";

import { BRAND, commandScope } from "../core/brand.js";
import { fileExists } from "../core/fs.js";
import {
  defaultLeakscopeConfig,
  findLocalConfigPath,
  localConfigPathForDir,
  resolveLeakscopeConfigForCwd,
  writeLeakscopeConfig,
} from "../core/project-config.js";
import { EXIT_BAD_INPUT } from "./common.js";

async function findOrDefaultConfigPath(cwd: string): Promise<string> {
  const existing = await findLocalConfigPath(cwd);
  if (existing) return existing;
  return localConfigPathForDir(cwd);
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command("config")
    .description(`Manage project defaults (${BRAND.storage.configDirName}/${BRAND.storage.configFileName})`);

  config
    .command("path")
    .description("Print the local config path used for this directory")
    .action(async () => {
      const configPath = await findOrDefaultConfigPath(process.cwd());
      process.stdout.write(configPath + "\n");
      process.exitCode = 0;
    });

  config
    .command("show")
    .description("Print the resolved config and where each value came from")
    .action(async () => {
      try {
        const resolved = await resolveLeakscopeConfigForCwd(process.cwd());
        process.stdout.write(JSON.stringify(resolved, null, 2) + "\n");
        process.exitCode = 0;
      } catch (error) {
        const msg = error instanceof Error ? error.message : "Unknown error";
        process.stderr.write(`[${commandScope("config show")}] Error: ${msg}\n`);
        process.exitCode = EXIT_BAD_INPUT;
      }
    });

  config
    .command("init")
    .description(`Create ${BRAND.storage.configDirName}/${BRAND.storage.configFileName} with the defaults`)
    .option("-f, --force", "overwrite existing config")
    .action(async (opts: { force?: boolean }) => {
      const configPath = await findOrDefaultConfigPath(process.cwd());
      const exists = await fileExists(configPath);
      if (exists && opts.force !== true) {
        process.stdout.write(`○ Config already exists: ${configPath}\n`);
        process.exitCode = 0;
        return;
      }

      await writeLeakscopeConfig({ configPath, config: defaultLeakscopeConfig() });
      process.stdout.write(`✓ Wrote config: ${configPath}\n`);
      process.exitCode = 0;
    });

  config
    .command("remove")
    .description("Remove the nearest local config (if present)")
    .action(async () => {
      const existing = await findLocalConfigPath(process.cwd());
      if (!existing) {
        process.stdout.write("○ No config to remove.\n");
        process.exitCode = 0;
        return;
      }

      await fs.unlink(existing);

      const dir = path.dirname(existing);
      const entries = await fs.readdir(dir);
      if (entries.length === 0) await fs.rmdir(dir);

      process.stdout.write(`✓ Removed config: ${existing}\n`);
      process.exitCode = 0;
    });
}
