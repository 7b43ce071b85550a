import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { splitLines } from "../parse.js";

export const INVENTORY_LOG_PATH = fileURLToPath(new URL("../../../fixtures/memcheck/inventory.log", import.meta.url));

export function loadInventoryLog(): string[] {
  return splitLines(readFileSync(INVENTORY_LOG_PATH, "utf8"));
}
