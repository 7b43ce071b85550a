import { access, copyFile, mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

export type BackupResult = {
  backupPath: string;
};

export type PathKind = "file" | "directory" | "missing" | "other";

function timestampForFilename(date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const yyyy = date.getFullYear();
  const mm = pad(date.getMonth() + 1);
  const dd = pad(date.getDate());
  const hh = pad(date.getHours());
  const mi = pad(date.getMinutes());
  const ss = pad(date.getSeconds());
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export async function createBackup(path: string): Promise<BackupResult> {
  const backupPath = `${path}.backup-${timestampForFilename()}`;
  await copyFile(path, backupPath);
  return { backupPath };
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function pathKind(path: string): Promise<PathKind> {
  try {
    const info = await stat(path);
    if (info.isFile()) return "file";
    if (info.isDirectory()) return "directory";
    return "other";
  } catch {
    return "missing";
  }
}

/** Writes through a temp file in the target directory, then renames over `path`. */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.tmp-${timestampForFilename()}-${Math.random().toString(16).slice(2)}`);
  try {
    if (typeof data === "string") await writeFile(tmpPath, data, "utf8");
    else await writeFile(tmpPath, data);
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
