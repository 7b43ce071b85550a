import { createReadStream } from "node:fs";
import * as readline from "node:readline";

import { pathKind } from "./fs.js";

export type InputCheck = { ok: true } | { ok: false; error: string };

export async function checkInputFile(path: string): Promise<InputCheck> {
  const kind = await pathKind(path);
  switch (kind) {
    case "file":
      return { ok: true };
    case "missing":
      return { ok: false, error: `Input file not found: ${path}` };
    case "directory":
      return { ok: false, error: `Input path is a directory: ${path}` };
    case "other":
      return { ok: false, error: `Input path is not a regular file: ${path}` };
  }
}

/** Lines of a UTF-8 text file; undecodable bytes come through as U+FFFD. */
export async function* readTextLines(path: string): AsyncGenerator<string> {
  const stream = createReadStream(path, { encoding: "utf8" });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  for await (const line of rl) yield line;
}

export async function loadTextLines(path: string): Promise<string[]> {
  const out: string[] = [];
  for await (const line of readTextLines(path)) out.push(line);
  return out;
}
