import { MalformedNumberError, type NormalizedCount, normalizeCount, normalizeCountToken } from "./number.js";
import type { HeaderMatch } from "./patterns.js";
import { severityLevelOf, severityScore } from "./severity.js";
import type { AuxiliaryTrace, IssueRecord, ParseWarning, SourceLocation, StackFrame } from "./types.js";

export type AssemblerState = "scanning" | "in_trace";

export type LineEvent = "header" | "frame" | "continuation" | "other" | "end";

export type AssemblerAction = "open" | "append" | "annotate" | "close" | "close_and_open" | "orphan" | "skip";

export type Transition = {
  next: AssemblerState | "done";
  action: AssemblerAction;
};

const TRANSITIONS: Record<AssemblerState, Record<LineEvent, Transition>> = {
  scanning: {
    header: { next: "in_trace", action: "open" },
    frame: { next: "scanning", action: "orphan" },
    continuation: { next: "scanning", action: "skip" },
    other: { next: "scanning", action: "skip" },
    end: { next: "done", action: "skip" },
  },
  in_trace: {
    header: { next: "in_trace", action: "close_and_open" },
    frame: { next: "in_trace", action: "append" },
    continuation: { next: "in_trace", action: "annotate" },
    other: { next: "scanning", action: "close" },
    end: { next: "done", action: "close" },
  },
};

export function transition(state: AssemblerState, event: LineEvent): Transition {
  return TRANSITIONS[state][event];
}

export type AssemblerInput =
  | { event: "header"; header: HeaderMatch }
  | { event: "frame"; frame: StackFrame }
  | { event: "continuation"; label: string; freed: boolean }
  | { event: "other" };

export type AssemblerOptions = {
  onWarning?: (warning: ParseWarning) => void;
};

type PendingIssue = {
  header: HeaderMatch;
  bytes: NormalizedCount;
  blocks: number;
  lineNumber: number;
  headerText: string;
  stackTrace: StackFrame[];
  auxiliaryTraces: AuxiliaryTrace[];
  freed: boolean;
};

export function firstSourceLocation(frames: readonly StackFrame[]): SourceLocation | undefined {
  for (const frame of frames) {
    if (!frame.sourceFile) continue;
    return frame.lineNumber !== undefined ? { file: frame.sourceFile, line: frame.lineNumber } : { file: frame.sourceFile };
  }
  return undefined;
}

/**
 * Single-pass grouping of a header line and the frame lines that follow it.
 * Every `feed` returns the records closed by that line, so any prefix of the
 * input yields a valid list of closed records.
 */
export class IssueAssembler {
  private current: AssemblerState | "done" = "scanning";
  private pending: PendingIssue | undefined;
  private emitted = 0;
  private readonly onWarning: ((warning: ParseWarning) => void) | undefined;

  constructor(options: AssemblerOptions = {}) {
    this.onWarning = options.onWarning;
  }

  get state(): AssemblerState | "done" {
    return this.current;
  }

  get emittedCount(): number {
    return this.emitted;
  }

  feed(lineNumber: number, rawText: string, input: AssemblerInput): IssueRecord[] {
    if (this.current === "done") throw new Error("[Parse] Assembler already reached end of input.");

    let opened: PendingIssue | undefined;
    let event: LineEvent = input.event;
    if (input.event === "header") {
      opened = this.openPending(lineNumber, rawText, input.header);
      // A header whose counts cannot be read is dropped and behaves like prose.
      if (!opened) event = "other";
    }

    const step = transition(this.current, event);
    const out: IssueRecord[] = [];

    switch (step.action) {
      case "open":
        this.pending = opened;
        break;
      case "close_and_open":
        out.push(...this.closePending());
        this.pending = opened;
        break;
      case "append":
        if (input.event === "frame") this.appendFrame(input.frame);
        break;
      case "annotate":
        if (input.event === "continuation" && this.pending) {
          this.pending.auxiliaryTraces.push({ label: input.label, frames: [] });
          if (input.freed) this.pending.freed = true;
        }
        break;
      case "close":
        out.push(...this.closePending());
        break;
      case "orphan":
        this.warn({
          lineNumber,
          rawText,
          reasonCode: "orphan_frame",
          message: "Stack frame outside any issue block was skipped.",
        });
        break;
      case "skip":
        break;
    }

    this.current = step.next;
    return out;
  }

  end(): IssueRecord[] {
    if (this.current === "done") return [];
    const step = transition(this.current, "end");
    const pending = this.pending;
    if (step.action === "close" && pending) {
      this.warn({
        lineNumber: pending.lineNumber,
        rawText: pending.headerText,
        reasonCode: "incomplete_trace",
        message: `Input ended inside an issue block; emitted with ${pending.stackTrace.length} frame(s).`,
      });
    }
    const out = step.action === "close" ? this.closePending() : [];
    this.current = step.next;
    return out;
  }

  private warn(warning: ParseWarning): void {
    this.onWarning?.(warning);
  }

  private openPending(lineNumber: number, rawText: string, header: HeaderMatch): PendingIssue | undefined {
    let bytes: NormalizedCount;
    let blocks: number;
    try {
      bytes = normalizeCountToken(header.bytesToken);
      blocks = normalizeCount(header.blocksToken);
    } catch (err) {
      if (!(err instanceof MalformedNumberError)) throw err;
      this.warn({
        lineNumber,
        rawText,
        reasonCode: "malformed_number",
        message: `Issue header dropped: could not read count ${JSON.stringify(err.token)}.`,
      });
      return undefined;
    }

    if (!header.recognized) {
      this.warn({
        lineNumber,
        rawText,
        reasonCode: "unrecognized_issue_type",
        message: `Unknown verdict ${JSON.stringify(header.verdict)}; classified as other.`,
      });
    }

    return {
      header,
      bytes,
      blocks,
      lineNumber,
      headerText: rawText,
      stackTrace: [],
      auxiliaryTraces: [],
      freed: false,
    };
  }

  private appendFrame(frame: StackFrame): void {
    const pending = this.pending;
    if (!pending) return;
    const aux = pending.auxiliaryTraces[pending.auxiliaryTraces.length - 1];
    if (aux) aux.frames.push(frame);
    else pending.stackTrace.push(frame);
  }

  private closePending(): IssueRecord[] {
    const p = this.pending;
    this.pending = undefined;
    if (!p) return [];

    let issueType = p.header.issueType;
    if (p.freed && (issueType === "invalid_read" || issueType === "invalid_write")) issueType = "use_after_free";

    const sourceLocation = firstSourceLocation(p.stackTrace);
    const record: IssueRecord = {
      issueType,
      bytesCount: p.bytes.value,
      blocksCount: p.blocks,
      ...(p.bytes.annotation !== undefined ? { bytesAnnotation: p.bytes.annotation } : {}),
      lossRecordId: p.header.lossRecordId,
      stackTrace: p.stackTrace,
      auxiliaryTraces: p.auxiliaryTraces,
      ...(sourceLocation ? { sourceLocation } : {}),
      severity: severityScore(issueType, p.bytes.value),
      severityLevel: severityLevelOf(issueType),
      lineNumber: p.lineNumber,
      ordinal: this.emitted,
      headerText: p.headerText,
    };
    this.emitted += 1;
    return [record];
  }
}
