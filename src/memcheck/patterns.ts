import type { IssueType, LeakCategory, StackFrame, SourceLocation } from "./types.js";

export type PrefixedLine = {
  pid?: number;
  prefixed: boolean;
  body: string;
};

export type HeaderMatch = {
  issueType: IssueType;
  bytesToken: string;
  blocksToken: string;
  lossRecordId: string;
  verdict: string;
  /** False when the verdict had the leak shape but named no known category. */
  recognized: boolean;
};

export type SummaryLine =
  | { kind: "heading"; title: string }
  | { kind: "leak_total"; category: LeakCategory; bytesToken: string; blocksToken: string }
  | { kind: "in_use"; bytesToken: string; blocksToken: string }
  | { kind: "heap_usage"; allocsToken: string; freesToken: string; bytesToken: string }
  | {
      kind: "error_summary";
      errorsToken: string;
      contextsToken: string;
      suppressedToken?: string;
      suppressedContextsToken?: string;
    };

export type BannerLine =
  | { kind: "tool"; tool: string }
  | { kind: "version"; version: string }
  | { kind: "command"; command: string };

export type LineMatch =
  | { kind: "blank" }
  | { kind: "summary"; summary: SummaryLine }
  | { kind: "banner"; banner: BannerLine }
  | { kind: "header"; header: HeaderMatch }
  | { kind: "frame"; frame: StackFrame }
  | { kind: "fragment" }
  | { kind: "continuation"; label: string; freed: boolean }
  | { kind: "other" };

const PREFIX = /^\s*(==|--|\*\*)(\d+)\1\s?/;

export function stripPrefix(raw: string): PrefixedLine {
  const m = raw.match(PREFIX);
  if (!m) return { prefixed: false, body: raw.trim() };
  return { pid: Number(m[2]), prefixed: true, body: raw.slice(m[0].length).trim() };
}

// ---------------------------------------------------------------------------
// Summary lines (checked before headers: the per-category totals carry the
// same verdict words as leak headers)

const SUMMARY_HEADING = /^(HEAP|LEAK|ERROR) SUMMARY:?\s*$/i;
const ERROR_SUMMARY =
  /^ERROR SUMMARY:\s+(\S+)\s+errors?\s+from\s+(\S+)\s+contexts?(?:\s+\(suppressed:\s+(\S+)\s+from\s+([^)\s]+)\))?/i;
const LEAK_TOTAL = /^(definitely lost|indirectly lost|possibly lost|still reachable|suppressed):\s+(.+?)\s+bytes?\s+in\s+(\S+)\s+blocks?\s*$/i;
const IN_USE = /^in use at exit:\s+(\S+)\s+bytes?\s+in\s+(\S+)\s+blocks?/i;
const HEAP_USAGE = /^total heap usage:\s+(\S+)\s+allocs?,\s+(\S+)\s+frees?,\s+(\S+)\s+bytes?\s+allocated/i;
const REACHABLE_HEURISTIC = /^of which reachable via heuristic:\s*$/i;

const LEAK_CATEGORIES: Record<string, LeakCategory> = {
  "definitely lost": "definitelyLost",
  "indirectly lost": "indirectlyLost",
  "possibly lost": "possiblyLost",
  "still reachable": "stillReachable",
  suppressed: "suppressed",
};

export function matchSummaryLine(body: string): SummaryLine | undefined {
  const heading = body.match(SUMMARY_HEADING);
  if (heading) return { kind: "heading", title: `${(heading[1] ?? "").toUpperCase()} SUMMARY` };

  const errors = body.match(ERROR_SUMMARY);
  if (errors) {
    return {
      kind: "error_summary",
      errorsToken: errors[1] ?? "",
      contextsToken: errors[2] ?? "",
      ...(errors[3] !== undefined ? { suppressedToken: errors[3] } : {}),
      ...(errors[4] !== undefined ? { suppressedContextsToken: errors[4] } : {}),
    };
  }

  const leak = body.match(LEAK_TOTAL);
  if (leak) {
    const category = LEAK_CATEGORIES[(leak[1] ?? "").toLowerCase()];
    if (category) return { kind: "leak_total", category, bytesToken: leak[2] ?? "", blocksToken: leak[3] ?? "" };
  }

  const inUse = body.match(IN_USE);
  if (inUse) return { kind: "in_use", bytesToken: inUse[1] ?? "", blocksToken: inUse[2] ?? "" };

  const heap = body.match(HEAP_USAGE);
  if (heap) {
    return { kind: "heap_usage", allocsToken: heap[1] ?? "", freesToken: heap[2] ?? "", bytesToken: heap[3] ?? "" };
  }

  if (REACHABLE_HEURISTIC.test(body)) return { kind: "heading", title: "REACHABLE VIA HEURISTIC" };
  return undefined;
}

// ---------------------------------------------------------------------------
// Banner

export function matchBannerLine(body: string): BannerLine | undefined {
  const tool = body.match(/^(\w+), a memory error detector\b/i);
  if (tool) return { kind: "tool", tool: tool[1] ?? "" };
  const version = body.match(/^Using Valgrind-(\S+)/i);
  if (version) return { kind: "version", version: version[1] ?? "" };
  const command = body.match(/^Command:\s+(.+)$/);
  if (command) return { kind: "command", command: (command[1] ?? "").trim() };
  return undefined;
}

// ---------------------------------------------------------------------------
// Issue headers

const LEAK_HEADER =
  /^(\S+(?:\s+\([^)]*\))?)\s+bytes?\s+in\s+(\S+)\s+blocks?\s+are\s+(.+?)\s+in\s+loss\s+record\s+(\d[\d,]*\s+of\s+\d[\d,]*)\s*$/i;
const ACCESS_HEADER = /^Invalid\s+(read|write)\s+of\s+size\s+(\S+)\s*$/i;
const INVALID_FREE = /^Invalid free\(\) \/ delete \/ delete\[\] \/ realloc\(\)/i;

const OTHER_ERROR_HEADERS: RegExp[] = [
  /^Mismatched free\(\) \/ delete \/ delete ?\[\]/i,
  /^Conditional jump or move depends on uninitialised value\(s\)/i,
  /^Use of uninitialised value of size\s+\S+/i,
  /^Syscall param .+ (?:points to|contains) (?:unaddressable|uninitialised) byte\(s\)/i,
  /^Source and destination overlap in \S+/i,
  /^(?:Illegal|Invalid) memory pool\b/i,
  /^Invalid (?:alignment|size) value\b/i,
];

function classifyLeakVerdict(verdict: string): { issueType: IssueType; recognized: boolean } {
  const v = verdict.toLowerCase().replace(/\s+/g, " ");
  if (/^definit\w* lost$/.test(v)) return { issueType: "definitely_lost", recognized: true };
  if (/^possib\w* lost$/.test(v)) return { issueType: "possibly_lost", recognized: true };
  if (/^still reach\w*$/.test(v)) return { issueType: "still_reachable", recognized: true };
  if (/^indirect\w* lost$/.test(v)) return { issueType: "other", recognized: true };
  return { issueType: "other", recognized: false };
}

export function matchHeader(body: string): HeaderMatch | undefined {
  const leak = body.match(LEAK_HEADER);
  if (leak) {
    const verdict = (leak[3] ?? "").trim();
    return {
      ...classifyLeakVerdict(verdict),
      bytesToken: leak[1] ?? "",
      blocksToken: leak[2] ?? "",
      lossRecordId: (leak[4] ?? "").trim(),
      verdict,
    };
  }

  const access = body.match(ACCESS_HEADER);
  if (access) {
    const kind = (access[1] ?? "").toLowerCase();
    return {
      issueType: kind === "read" ? "invalid_read" : "invalid_write",
      bytesToken: access[2] ?? "",
      blocksToken: "1",
      lossRecordId: "N/A",
      verdict: `invalid ${kind}`,
      recognized: true,
    };
  }

  if (INVALID_FREE.test(body)) {
    return {
      issueType: "use_after_free",
      bytesToken: "0",
      blocksToken: "1",
      lossRecordId: "N/A",
      verdict: "invalid free",
      recognized: true,
    };
  }

  for (const re of OTHER_ERROR_HEADERS) {
    if (!re.test(body)) continue;
    const size = body.match(/of size\s+(\S+)/i);
    return {
      issueType: "other",
      bytesToken: size?.[1] ?? "0",
      blocksToken: "1",
      lossRecordId: "N/A",
      verdict: body,
      recognized: true,
    };
  }

  return undefined;
}

// ---------------------------------------------------------------------------
// Stack frames

const FRAME = /^(?:at|by)\s+(0x[0-9a-f]+):?\s*(.*)$/i;
const TRAILING_PAREN = /^(.*?)(\s*)\(([^()]*)\)\s*$/;

// A bare "(file.c)" only counts after a space; "f(a.b)" is a signature.
function looksLikeLocation(text: string, spaced: boolean): boolean {
  const t = text.trim();
  if (t.startsWith("in ")) return true;
  if (/:\d+$/.test(t)) return true;
  return spaced && /^[^\s:()]+\.[A-Za-z0-9+]+$/.test(t);
}

export function extractSourceLocation(text: string): SourceLocation | undefined {
  const t = text.trim();
  if (t.length === 0 || t.startsWith("in ") || t === "???") return undefined;
  const m = t.match(/^(.+):(\d+)$/);
  if (m) return { file: (m[1] ?? "").trim(), line: Number(m[2]) };
  if (/^[^\s:()]+\.[A-Za-z0-9+]+$/.test(t)) return { file: t };
  return undefined;
}

export function matchFrame(body: string): StackFrame | undefined {
  const m = body.match(FRAME);
  if (!m) return undefined;
  const address = m[1] ?? "";
  const description = (m[2] ?? "").trim();

  let functionText = description;
  let locationText: string | undefined;
  const paren = description.match(TRAILING_PAREN);
  if (paren && looksLikeLocation(paren[3] ?? "", (paren[2] ?? "").length > 0)) {
    functionText = (paren[1] ?? "").trim();
    locationText = (paren[3] ?? "").trim();
  }

  const frame: StackFrame = { address };
  if (functionText.length > 0 && functionText !== "???") frame.functionName = functionText;
  if (locationText?.startsWith("in ")) {
    const library = locationText.slice(3).trim();
    if (library.length > 0) frame.library = library;
  } else if (locationText) {
    const loc = extractSourceLocation(locationText);
    if (loc) {
      frame.sourceFile = loc.file;
      if (loc.line !== undefined) frame.lineNumber = loc.line;
    }
  }
  return frame;
}

// ---------------------------------------------------------------------------
// Continuations and fragments

const CONTINUATIONS: RegExp[] = [
  /^Address 0x[0-9a-f]+ is .+$/i,
  /^Block was alloc'd at$/i,
  /^Uninitialised value was created by .+$/i,
];

export function matchContinuation(body: string): { label: string; freed: boolean } | undefined {
  if (!CONTINUATIONS.some((re) => re.test(body))) return undefined;
  return { label: body, freed: /\bfree'd\b/i.test(body) };
}

const LEAK_FRAGMENT = /^\d[\d,]*(?:\s+\([^)]*$|(?:\s+\([^)]*\))?\s+(?:b|by|byt|byte|bytes)\b)/i;
const ACCESS_FRAGMENT =
  /^Invalid(?:\s+(?:r|re|rea|read|w|wr|wri|writ|write)(?:\s+(?:o|of)(?:\s+(?:s|si|siz|size))?)?)?$/i;

/** A line that starts like an issue header but does not complete one. */
export function isHeaderFragment(body: string): boolean {
  return LEAK_FRAGMENT.test(body) || ACCESS_FRAGMENT.test(body);
}

export function classifyLine(raw: string): LineMatch {
  const { body, prefixed } = stripPrefix(raw);
  if (body.length === 0) return { kind: "blank" };

  const summary = matchSummaryLine(body);
  if (summary) return { kind: "summary", summary };

  const banner = matchBannerLine(body);
  if (banner) return { kind: "banner", banner };

  const header = matchHeader(body);
  if (header) return { kind: "header", header };

  const frame = matchFrame(body);
  if (frame) return { kind: "frame", frame };

  if (prefixed && isHeaderFragment(body)) return { kind: "fragment" };

  const continuation = matchContinuation(body);
  if (continuation) return { kind: "continuation", ...continuation };

  return { kind: "other" };
}

export type RecoveredHeader = {
  header: HeaderMatch;
  /** Physical lines used, including the first. */
  consumed: number;
  text: string;
};

/**
 * Re-joins a header that a line wrap split across physical lines. Each
 * following line is tried both glued (a severed word) and space-joined
 * (a wrap at whitespace), up to `lookahead` extra lines.
 */
export function recoverWrappedHeader(
  lines: readonly string[],
  index: number,
  lookahead: number,
): RecoveredHeader | undefined {
  const first = lines[index];
  if (first === undefined) return undefined;

  let prefixes = [stripPrefix(first).body];
  for (let k = 1; k <= lookahead; k += 1) {
    const nextRaw = lines[index + k];
    if (nextRaw === undefined) break;
    const next = stripPrefix(nextRaw).body;
    if (next.length === 0) break;
    if (matchHeader(next) || matchFrame(next) || matchSummaryLine(next)) break;

    const candidates: string[] = [];
    for (const p of prefixes) candidates.push(p + next, `${p} ${next}`);
    // A glued word can still parse as a header with a nonsense verdict.
    let fallback: RecoveredHeader | undefined;
    for (const text of candidates) {
      const header = matchHeader(text);
      if (!header) continue;
      if (header.recognized) return { header, consumed: k + 1, text };
      fallback ??= { header, consumed: k + 1, text };
    }
    if (fallback) return fallback;
    prefixes = candidates;
  }
  return undefined;
}
