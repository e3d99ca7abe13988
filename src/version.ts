import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { isRecord } from "./config.js";

let cached: string | null = null;

/**
 * Package version, read from package.json beside the sources or the build.
 */
export function getVersion(): string {
  if (cached !== null) return cached;
  cached = "0.0.0";
  for (const rel of ["../package.json", "../../package.json"]) {
    const path = fileURLToPath(new URL(rel, import.meta.url));
    if (!existsSync(path)) continue;
    const pkg: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (isRecord(pkg) && typeof pkg.version === "string") {
      cached = pkg.version;
      break;
    }
  }
  return cached;
}
