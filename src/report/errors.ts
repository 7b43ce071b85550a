export class ReportWriteError extends Error {
  readonly outputPath: string;

  constructor(outputPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`[Report] Failed to write ${outputPath}: ${reason}`, { cause });
    this.name = "ReportWriteError";
    this.outputPath = outputPath;
  }
}
