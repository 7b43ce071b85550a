import type { StackFrame } from "../memcheck/types.js";

export function formatFrame(frame: StackFrame): string {
  const fn = frame.functionName ?? "???";
  if (frame.sourceFile) {
    const loc = frame.lineNumber !== undefined ? `${frame.sourceFile}:${frame.lineNumber}` : frame.sourceFile;
    return `${frame.address}: ${fn} (${loc})`;
  }
  if (frame.library) return `${frame.address}: ${fn} (in ${frame.library})`;
  return `${frame.address}: ${fn}`;
}

/** At most `maxFrames` lines, plus a "... and N more frames" line when cut. */
export function formatTrace(frames: readonly StackFrame[], maxFrames: number): string[] {
  const limit = Math.max(1, maxFrames);
  const lines = frames.slice(0, limit).map(formatFrame);
  const hidden = frames.length - limit;
  if (hidden > 0) lines.push(`... and ${hidden} more ${hidden === 1 ? "frame" : "frames"}`);
  return lines;
}
