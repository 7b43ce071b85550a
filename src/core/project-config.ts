import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { DEFAULT_WRAP_LOOKAHEAD, MAX_WRAP_LOOKAHEAD } from "../memcheck/parse.js";
import { BRAND } from "./brand.js";
import { fileExists, writeFileAtomic } from "./fs.js";
import { asBoolean, asInteger, asString, isJsonObject } from "./json.js";
import { expandHome } from "./paths.js";

export type ReportFormat = "xlsx" | "csv";

export type ParserConfig = {
  /** Lines to look ahead when re-joining a header split by a terminal wrap. */
  wrapLookahead?: number;
  requireBanner?: boolean;
};

export type ReportConfig = {
  format?: ReportFormat;
  output?: string;
  csvFallback?: boolean;
  maxFrames?: number;
  topSources?: number;
};

export type LeakscopeConfigV1 = {
  schemaVersion: 1;
  /** When true, an existing report is copied aside before it is overwritten. */
  backup?: boolean;
  notify?: boolean;
  logFile?: string;
  parser?: ParserConfig;
  report?: ReportConfig;
};

export type LeakscopeConfig = LeakscopeConfigV1;

export type ConfigValueSource = "default" | "global" | "local";

export type ResolvedLeakscopeConfig = {
  config: LeakscopeConfig;
  files: {
    global: { path: string; exists: boolean };
    local: { path: string; exists: boolean; discovered: boolean };
  };
  sourceByPath: Record<string, ConfigValueSource>;
};

/** Every setting with a value; what the commands actually run with. */
export type LeakscopeSettings = {
  backup: boolean;
  notify: boolean;
  logFile?: string;
  parser: Required<ParserConfig>;
  report: Required<ReportConfig>;
};

const DEFAULT_PARSER: Required<ParserConfig> = {
  wrapLookahead: DEFAULT_WRAP_LOOKAHEAD,
  requireBanner: false,
};

const DEFAULT_REPORT: Required<ReportConfig> = {
  format: "xlsx",
  output: "memcheck_report.xlsx",
  csvFallback: true,
  maxFrames: 5,
  topSources: 10,
};

export function defaultLeakscopeConfig(): LeakscopeConfig {
  return {
    schemaVersion: 1,
    backup: false,
    notify: false,
    parser: { ...DEFAULT_PARSER },
    report: { ...DEFAULT_REPORT },
  };
}

export function settingsOf(config: LeakscopeConfig): LeakscopeSettings {
  return {
    backup: config.backup ?? false,
    notify: config.notify ?? false,
    ...(config.logFile ? { logFile: config.logFile } : {}),
    parser: { ...DEFAULT_PARSER, ...config.parser },
    report: { ...DEFAULT_REPORT, ...config.report },
  };
}

export function localConfigPathForDir(dir: string): string {
  return path.join(dir, BRAND.storage.configDirName, BRAND.storage.configFileName);
}

export function globalConfigPath(): string {
  const override = process.env[BRAND.env.configPath]?.trim();
  if (override && override.length > 0) {
    if (override === "~") return localConfigPathForDir(os.homedir());
    return path.resolve(expandHome(override));
  }
  return localConfigPathForDir(os.homedir());
}

function isSamePath(a: string, b: string): boolean {
  const aResolved = path.resolve(a);
  const bResolved = path.resolve(b);
  if (process.platform === "win32") return aResolved.toLowerCase() === bResolved.toLowerCase();
  return aResolved === bResolved;
}

export async function findLocalConfigPath(startDir: string): Promise<string | undefined> {
  const globalPath = globalConfigPath();
  let dir = path.resolve(startDir);
  for (let i = 0; i < 50; i += 1) {
    const candidate = localConfigPathForDir(dir);
    if (!isSamePath(candidate, globalPath) && (await fileExists(candidate))) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return undefined;
}

function parseReportFormat(value: unknown): ReportFormat | undefined {
  const v = asString(value)?.trim();
  if (v === "xlsx" || v === "csv") return v;
  return undefined;
}

function parseParserConfig(value: unknown): ParserConfig | undefined {
  if (!isJsonObject(value)) return undefined;
  const wrapLookahead = asInteger(value.wrapLookahead);
  const requireBanner = asBoolean(value.requireBanner);
  return {
    ...(wrapLookahead !== undefined ? { wrapLookahead } : {}),
    ...(requireBanner !== undefined ? { requireBanner } : {}),
  };
}

function parseReportConfig(value: unknown): ReportConfig | undefined {
  if (!isJsonObject(value)) return undefined;
  const format = parseReportFormat(value.format);
  const output = asString(value.output)?.trim();
  const csvFallback = asBoolean(value.csvFallback);
  const maxFrames = asInteger(value.maxFrames);
  const topSources = asInteger(value.topSources);
  return {
    ...(format ? { format } : {}),
    ...(output ? { output } : {}),
    ...(csvFallback !== undefined ? { csvFallback } : {}),
    ...(maxFrames !== undefined ? { maxFrames } : {}),
    ...(topSources !== undefined ? { topSources } : {}),
  };
}

export function parseLeakscopeConfig(value: unknown): LeakscopeConfig | undefined {
  if (!isJsonObject(value)) return undefined;
  if (value.schemaVersion !== 1) return undefined;

  const backup = asBoolean(value.backup);
  const notify = asBoolean(value.notify);
  const logFile = asString(value.logFile)?.trim();
  const parser = parseParserConfig(value.parser);
  const report = parseReportConfig(value.report);

  return {
    schemaVersion: 1,
    ...(backup !== undefined ? { backup } : {}),
    ...(notify !== undefined ? { notify } : {}),
    ...(logFile ? { logFile } : {}),
    ...(parser ? { parser } : {}),
    ...(report ? { report } : {}),
  };
}

type ParseConfigStrictResult = { ok: true; config: LeakscopeConfig } | { ok: false; errors: string[] };

const ROOT_KEYS = new Set<string>(["schemaVersion", "backup", "notify", "logFile", "parser", "report"]);
const PARSER_KEYS = new Set<string>(["wrapLookahead", "requireBanner"]);
const REPORT_KEYS = new Set<string>(["format", "output", "csvFallback", "maxFrames", "topSources"]);

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateAllowedKeys(obj: JsonRecord, allowed: Set<string>, prefix: string, errors: string[]): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.has(key)) {
      errors.push(`Unknown field: ${prefix ? `${prefix}.${key}` : key}`);
    }
  }
}

function validateOptionalBoolean(value: unknown, pathLabel: string, errors: string[]): void {
  if (value === undefined) return;
  if (typeof value !== "boolean") errors.push(`Invalid value at ${pathLabel} (expected boolean)`);
}

function validateOptionalString(value: unknown, pathLabel: string, errors: string[]): void {
  if (value === undefined) return;
  if (typeof value !== "string" || value.trim().length === 0) errors.push(`Invalid value at ${pathLabel} (expected non-empty string)`);
}

function validateOptionalInteger(value: unknown, pathLabel: string, range: { min: number; max?: number }, errors: string[]): void {
  if (value === undefined) return;
  const n = asInteger(value);
  const inRange = n !== undefined && n >= range.min && (range.max === undefined || n <= range.max);
  if (!inRange) {
    const bounds = range.max === undefined ? `>= ${range.min}` : `${range.min}..${range.max}`;
    errors.push(`Invalid value at ${pathLabel} (expected integer ${bounds})`);
  }
}

function validateParserObject(value: unknown, prefix: string, errors: string[]): void {
  if (value === undefined) return;
  if (!isRecord(value)) {
    errors.push(`Invalid value at ${prefix} (expected object)`);
    return;
  }
  validateAllowedKeys(value, PARSER_KEYS, prefix, errors);
  validateOptionalInteger(value.wrapLookahead, `${prefix}.wrapLookahead`, { min: 0, max: MAX_WRAP_LOOKAHEAD }, errors);
  validateOptionalBoolean(value.requireBanner, `${prefix}.requireBanner`, errors);
}

function validateReportObject(value: unknown, prefix: string, errors: string[]): void {
  if (value === undefined) return;
  if (!isRecord(value)) {
    errors.push(`Invalid value at ${prefix} (expected object)`);
    return;
  }
  validateAllowedKeys(value, REPORT_KEYS, prefix, errors);
  if (value.format !== undefined && parseReportFormat(value.format) === undefined) {
    errors.push(`Invalid value at ${prefix}.format (expected "xlsx"|"csv")`);
  }
  validateOptionalString(value.output, `${prefix}.output`, errors);
  validateOptionalBoolean(value.csvFallback, `${prefix}.csvFallback`, errors);
  validateOptionalInteger(value.maxFrames, `${prefix}.maxFrames`, { min: 1 }, errors);
  validateOptionalInteger(value.topSources, `${prefix}.topSources`, { min: 1 }, errors);
}

export function parseLeakscopeConfigStrict(value: unknown): ParseConfigStrictResult {
  const errors: string[] = [];
  if (!isRecord(value)) return { ok: false, errors: ["Config must be a JSON object."] };

  validateAllowedKeys(value, ROOT_KEYS, "", errors);

  if (value.schemaVersion !== 1) {
    errors.push("Invalid value at schemaVersion (expected number 1).");
  }

  if ("backup" in value) validateOptionalBoolean(value.backup, "backup", errors);
  if ("notify" in value) validateOptionalBoolean(value.notify, "notify", errors);
  if ("logFile" in value) validateOptionalString(value.logFile, "logFile", errors);
  if ("parser" in value) validateParserObject(value.parser, "parser", errors);
  if ("report" in value) validateReportObject(value.report, "report", errors);

  if (errors.length > 0) return { ok: false, errors };

  const parsed = parseLeakscopeConfig(value);
  if (!parsed) return { ok: false, errors: ["Unrecognized config format."] };
  return { ok: true, config: parsed };
}

function deepMerge(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) return override;
  const out: JsonRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    if (isRecord(existing) && isRecord(value)) out[key] = deepMerge(existing, value);
    else out[key] = value;
  }
  return out;
}

function collectLeafPaths(value: unknown, prefix: string, out: Set<string>): void {
  if (!isRecord(value)) {
    out.add(prefix);
    return;
  }
  const entries = Object.entries(value);
  if (entries.length === 0) {
    out.add(prefix);
    return;
  }
  for (const [key, v] of entries) {
    const next = prefix ? `${prefix}.${key}` : key;
    collectLeafPaths(v, next, out);
  }
}

function leafPathsOf(value: unknown): Set<string> {
  const out = new Set<string>();
  collectLeafPaths(value, "", out);
  out.delete("");
  return out;
}

async function readConfigFileIfPresent(configPath: string): Promise<LeakscopeConfig | undefined> {
  if (!(await fileExists(configPath))) return undefined;
  const text = await fs.readFile(configPath, "utf8");
  let obj: unknown;
  try {
    obj = JSON.parse(text);
  } catch {
    throw new Error(`Invalid JSON in config: ${configPath}`);
  }

  const strict = parseLeakscopeConfigStrict(obj);
  if (!strict.ok) {
    const bulletList = strict.errors.map((e) => `- ${e}`).join("\n");
    throw new Error(`Invalid config: ${configPath}\n${bulletList}`);
  }
  return strict.config;
}

function applySourcePaths(sourceByPath: Record<string, ConfigValueSource>, partial: LeakscopeConfig, source: ConfigValueSource): void {
  for (const p of leafPathsOf(partial)) sourceByPath[p] = source;
}

export async function resolveLeakscopeConfigForCwd(cwd: string): Promise<ResolvedLeakscopeConfig> {
  const globalPath = globalConfigPath();
  const localFound = await findLocalConfigPath(cwd);
  const localPath = localFound ?? localConfigPathForDir(path.resolve(cwd));

  const base = defaultLeakscopeConfig();
  const sourceByPath: Record<string, ConfigValueSource> = {};
  for (const p of leafPathsOf(base)) sourceByPath[p] = "default";

  const globalCfg = await readConfigFileIfPresent(globalPath);
  const localCfg = localFound ? await readConfigFileIfPresent(localFound) : undefined;

  let merged: unknown = base;
  if (globalCfg) {
    merged = deepMerge(merged, globalCfg);
    applySourcePaths(sourceByPath, globalCfg, "global");
  }
  if (localCfg) {
    merged = deepMerge(merged, localCfg);
    applySourcePaths(sourceByPath, localCfg, "local");
  }

  return {
    config: parseLeakscopeConfig(merged) ?? base,
    files: {
      global: { path: globalPath, exists: globalCfg !== undefined },
      local: { path: localPath, exists: localCfg !== undefined, discovered: localFound !== undefined },
    },
    sourceByPath,
  };
}

export async function writeLeakscopeConfig(params: { configPath: string; config: LeakscopeConfig }): Promise<void> {
  await writeFileAtomic(params.configPath, JSON.stringify(params.config, null, 2) + "\n");
}
