import * as os from "node:os";
import * as path from "node:path";

export function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return value;
}

export function resolveUserPath(value: string, cwd: string): string {
  return path.resolve(cwd, expandHome(value.trim()));
}
