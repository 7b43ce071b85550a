import * as fs from "node:fs/promises";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type LogEvent = { level: LogLevel; scope: string; msg: string } & LogFields;

export async function appendLogLine(logPath: string, event: LogEvent): Promise<void> {
  const line = JSON.stringify({ ts: new Date().toISOString(), ...event }) + "\n";
  await fs.appendFile(logPath, line, "utf8");
}

export type LoggerOptions = {
  /** Shown in brackets before every stderr line, e.g. "leakscope report". */
  scope: string;
  verbose?: boolean;
  logFile?: string;
};

const STDERR_LABEL: Record<LogLevel, string> = {
  debug: "debug: ",
  info: "",
  warn: "Warning: ",
  error: "Error: ",
};

export class Logger {
  readonly scope: string;
  private readonly verbose: boolean;
  private readonly logFile: string | undefined;
  private pending: Promise<void> = Promise.resolve();
  private failure: Error | undefined;
  private logDirReady = false;

  constructor(options: LoggerOptions) {
    this.scope = options.scope;
    this.verbose = options.verbose ?? false;
    this.logFile = options.logFile ? path.resolve(options.logFile) : undefined;
  }

  debug(msg: string, fields?: LogFields): void {
    this.emit("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.emit("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.emit("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.emit("error", msg, fields);
  }

  /** Waits for queued log-file appends; rethrows the first append failure. */
  async flush(): Promise<void> {
    await this.pending;
    const failure = this.failure;
    this.failure = undefined;
    if (failure) throw failure;
  }

  private emit(level: LogLevel, msg: string, fields: LogFields | undefined): void {
    if (level !== "debug" || this.verbose) {
      process.stderr.write(`[${this.scope}] ${STDERR_LABEL[level]}${msg}\n`);
    }

    const logFile = this.logFile;
    if (!logFile) return;
    const event: LogEvent = { ...fields, level, scope: this.scope, msg };
    this.pending = this.pending
      .then(async () => {
        if (!this.logDirReady) {
          await fs.mkdir(path.dirname(logFile), { recursive: true });
          this.logDirReady = true;
        }
        await appendLogLine(logFile, event);
      })
      .catch((err: unknown) => {
        this.failure ??= err instanceof Error ? err : new Error(String(err));
      });
  }
}
