import fs from "node:fs";
import path from "node:path";
import { getProjectRootDir } from "./config.js";
import { isNonEmptyString, isRecord } from "./utils.js";

/**
 * Minimal subset of `package.json` metadata that we treat as authoritative at runtime.
 */
export interface PackageMeta {
  /** Package name (from `package.json`). */
  name: string;
  /** Package version (from `package.json`). */
  version: string;
}

/**
 * Load server metadata from `package.json`, so the MCP server info and
 * `fleet_about` always report the installed build.
 *
 * @throws If `package.json` is missing or malformed.
 */
export function loadPackageMeta(): PackageMeta {
  const packageJsonPath = path.join(getProjectRootDir(), "package.json");

  const raw = fs.readFileSync(packageJsonPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Invalid package.json: expected JSON object at ${packageJsonPath}`);
  }

  const { name, version } = parsed;
  if (!isNonEmptyString(name)) {
    throw new Error(`Invalid package.json: expected non-empty string name at ${packageJsonPath}`);
  }
  if (!isNonEmptyString(version)) {
    throw new Error(`Invalid package.json: expected non-empty string version at ${packageJsonPath}`);
  }

  return { name, version };
}
