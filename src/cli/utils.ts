import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { VERSION } from "../shared/constants.js";

/** Version from the project package.json, or the built-in one when it cannot be read. */
export function getPackageJsonVersion(): string {
  try {
    const raw = readFileSync(fileURLToPath(new URL("../../package.json", import.meta.url)), "utf8");
    const pkg: unknown = JSON.parse(raw);
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return VERSION;
  } catch {
    return VERSION;
  }
}

/** Parse a non-negative integer flag; undefined when not given. */
export function parseMillis(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${flag}: expected a non-negative integer, got "${value}"`);
  }
  return n;
}
