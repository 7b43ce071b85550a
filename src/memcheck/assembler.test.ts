import { describe, expect, it } from "vitest";

import { type AssemblerInput, firstSourceLocation, IssueAssembler, transition } from "./assembler.js";
import type { HeaderMatch } from "./patterns.js";
import type { IssueRecord, ParseWarning } from "./types.js";

function leakHeader(bytesToken: string, overrides: Partial<HeaderMatch> = {}): AssemblerInput {
  return {
    event: "header",
    header: {
      issueType: "definitely_lost",
      bytesToken,
      blocksToken: "1",
      lossRecordId: "1 of 1",
      verdict: "definitely lost",
      recognized: true,
      ...overrides,
    },
  };
}

function frame(address: string, functionName?: string): AssemblerInput {
  return { event: "frame", frame: functionName ? { address, functionName } : { address } };
}

const OTHER: AssemblerInput = { event: "other" };

function run(inputs: AssemblerInput[]): { records: IssueRecord[]; warnings: ParseWarning[] } {
  const warnings: ParseWarning[] = [];
  const assembler = new IssueAssembler({ onWarning: (w) => warnings.push(w) });
  const records: IssueRecord[] = [];
  inputs.forEach((input, idx) => records.push(...assembler.feed(idx + 1, `line ${idx + 1}`, input)));
  records.push(...assembler.end());
  return { records, warnings };
}

describe("memcheck/assembler", () => {
  describe("transition table", () => {
    it("opens on a header while scanning", () => {
      expect(transition("scanning", "header")).toEqual({ next: "in_trace", action: "open" });
    });

    it("skips prose while scanning and flags stray frames", () => {
      expect(transition("scanning", "other")).toEqual({ next: "scanning", action: "skip" });
      expect(transition("scanning", "frame")).toEqual({ next: "scanning", action: "orphan" });
    });

    it("appends frames and annotations while in a trace", () => {
      expect(transition("in_trace", "frame")).toEqual({ next: "in_trace", action: "append" });
      expect(transition("in_trace", "continuation")).toEqual({ next: "in_trace", action: "annotate" });
    });

    it("closes on a new header, on prose and at end of input", () => {
      expect(transition("in_trace", "header")).toEqual({ next: "in_trace", action: "close_and_open" });
      expect(transition("in_trace", "other")).toEqual({ next: "scanning", action: "close" });
      expect(transition("in_trace", "end")).toEqual({ next: "done", action: "close" });
      expect(transition("scanning", "end")).toEqual({ next: "done", action: "skip" });
    });
  });

  it("closes exactly one record with three frames in encounter order", () => {
    const { records, warnings } = run([leakHeader("32"), frame("0x1", "malloc"), frame("0x2", "make"), frame("0x3", "main"), OTHER]);
    expect(records).toHaveLength(1);
    expect(records[0]?.stackTrace.map((f) => f.address)).toEqual(["0x1", "0x2", "0x3"]);
    expect(warnings).toEqual([]);
  });

  it("tracks its state across feeds", () => {
    const assembler = new IssueAssembler();
    expect(assembler.state).toBe("scanning");
    assembler.feed(1, "h", leakHeader("8"));
    expect(assembler.state).toBe("in_trace");
    expect(assembler.feed(2, "", OTHER)).toHaveLength(1);
    expect(assembler.state).toBe("scanning");
    assembler.end();
    expect(assembler.state).toBe("done");
    expect(() => assembler.feed(3, "", OTHER)).toThrow(/already reached end/);
  });

  it("closes the pending record when a new header arrives", () => {
    const { records } = run([leakHeader("8"), frame("0x1"), leakHeader("16"), frame("0x2"), frame("0x3")]);
    expect(records.map((r) => [r.bytesCount, r.stackTrace.length])).toEqual([
      [8, 1],
      [16, 2],
    ]);
    expect(records.map((r) => r.ordinal)).toEqual([0, 1]);
  });

  it("emits a partial trace at end of input with a diagnostic", () => {
    const { records, warnings } = run([leakHeader("40"), frame("0x1"), frame("0x2")]);
    expect(records).toHaveLength(1);
    expect(records[0]?.stackTrace).toHaveLength(2);
    expect(warnings).toEqual([
      {
        lineNumber: 1,
        rawText: "line 1",
        reasonCode: "incomplete_trace",
        message: "Input ended inside an issue block; emitted with 2 frame(s).",
      },
    ]);
  });

  it("drops a header with a malformed count and reports orphaned frames", () => {
    const { records, warnings } = run([leakHeader("???"), frame("0x1"), OTHER, leakHeader("4"), OTHER]);
    expect(records.map((r) => r.bytesCount)).toEqual([4]);
    expect(records[0]?.ordinal).toBe(0);
    expect(warnings.map((w) => [w.lineNumber, w.reasonCode])).toEqual([
      [1, "malformed_number"],
      [2, "orphan_frame"],
    ]);
  });

  it("closes the pending record when a malformed header interrupts it", () => {
    const { records, warnings } = run([leakHeader("8"), frame("0x1"), leakHeader("x,y"), frame("0x2")]);
    expect(records).toHaveLength(1);
    expect(records[0]?.stackTrace).toHaveLength(1);
    expect(warnings.map((w) => w.reasonCode)).toEqual(["malformed_number", "orphan_frame"]);
  });

  it("keeps unrecognized verdicts as other with a diagnostic", () => {
    const { records, warnings } = run([leakHeader("8", { issueType: "other", recognized: false, verdict: "gone" }), OTHER]);
    expect(records[0]?.issueType).toBe("other");
    expect(warnings[0]?.reasonCode).toBe("unrecognized_issue_type");
  });

  it("routes frames after a continuation into an auxiliary trace", () => {
    const { records } = run([
      leakHeader("4", { issueType: "invalid_read", lossRecordId: "N/A" }),
      frame("0x1", "read_it"),
      { event: "continuation", label: "Address 0x5 is 0 bytes inside a block of size 4 free'd", freed: true },
      frame("0x2", "free"),
      frame("0x3", "main"),
      OTHER,
    ]);
    const record = records[0];
    expect(record?.issueType).toBe("use_after_free");
    expect(record?.stackTrace.map((f) => f.address)).toEqual(["0x1"]);
    expect(record?.auxiliaryTraces).toEqual([
      {
        label: "Address 0x5 is 0 bytes inside a block of size 4 free'd",
        frames: [
          { address: "0x2", functionName: "free" },
          { address: "0x3", functionName: "main" },
        ],
      },
    ]);
  });

  it("keeps the breakdown annotation and derives severity", () => {
    const { records } = run([leakHeader("72 (16 direct, 56 indirect)"), OTHER]);
    expect(records[0]?.bytesCount).toBe(72);
    expect(records[0]?.bytesAnnotation).toBe("16 direct, 56 indirect");
    expect(records[0]?.severityLevel).toBe("critical");
    // rank 6 * 64 + bit length of 72 (7)
    expect(records[0]?.severity).toBe(391);
  });

  it("any prefix of the input yields only closed records", () => {
    const assembler = new IssueAssembler();
    const closed: IssueRecord[] = [];
    closed.push(...assembler.feed(1, "", leakHeader("8")));
    closed.push(...assembler.feed(2, "", frame("0x1")));
    expect(closed).toEqual([]);
    closed.push(...assembler.feed(3, "", leakHeader("9")));
    expect(closed.map((r) => r.bytesCount)).toEqual([8]);
  });

  it("firstSourceLocation takes the first frame carrying a file", () => {
    expect(
      firstSourceLocation([
        { address: "0x1", functionName: "malloc", library: "vgpreload.so" },
        { address: "0x2", functionName: "f", sourceFile: "a.c" },
        { address: "0x3", functionName: "g", sourceFile: "b.c", lineNumber: 3 },
      ]),
    ).toEqual({ file: "a.c" });
    expect(firstSourceLocation([{ address: "0x1" }])).toBeUndefined();
  });
});
