import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";

import { createBackup, fileExists, pathKind, writeFileAtomic } from "./fs.js";

describe("core/fs", () => {
  it("writeFileAtomic creates directories and leaves no temp files behind", async () => {
    const dir = await mkdtemp(join(tmpdir(), "leakscope-fs-"));
    const nested = join(dir, "a", "b", "report.csv");

    await writeFileAtomic(nested, "hello");
    expect(await readFile(nested, "utf8")).toBe("hello");

    const files = await readdir(join(dir, "a", "b"));
    expect(files).toEqual(["report.csv"]);

    await rm(dir, { recursive: true, force: true });
  });

  it("writeFileAtomic writes binary data unchanged", async () => {
    const dir = await mkdtemp(join(tmpdir(), "leakscope-fs-"));
    const file = join(dir, "report.xlsx");

    await writeFileAtomic(file, new Uint8Array([0x50, 0x4b, 0x03, 0x04]));
    expect([...(await readFile(file))]).toEqual([0x50, 0x4b, 0x03, 0x04]);

    await rm(dir, { recursive: true, force: true });
  });

  it("createBackup copies the original file next to it", async () => {
    const dir = await mkdtemp(join(tmpdir(), "leakscope-fs-"));
    const file = join(dir, "memcheck_report.csv");
    await writeFile(file, "data\n", "utf8");

    const { backupPath } = await createBackup(file);
    expect(backupPath.startsWith(file + ".backup-")).toBe(true);
    expect(await readFile(backupPath, "utf8")).toBe("data\n");

    await rm(dir, { recursive: true, force: true });
  });

  it("fileExists and pathKind never throw", async () => {
    const dir = await mkdtemp(join(tmpdir(), "leakscope-fs-"));
    const existing = join(dir, "exists.txt");
    const missing = join(dir, "missing.txt");
    await writeFile(existing, "ok", "utf8");

    expect(await fileExists(existing)).toBe(true);
    expect(await fileExists(missing)).toBe(false);
    expect(await pathKind(existing)).toBe("file");
    expect(await pathKind(dir)).toBe("directory");
    expect(await pathKind(missing)).toBe("missing");

    await rm(dir, { recursive: true, force: true });
  });
});
