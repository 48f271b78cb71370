import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { LogLevel } from "./logger.js";
import { isNonEmptyString, isRecord } from "./utils.js";

/** Module-level config cache to avoid redundant fs.readFileSync calls. */
let cachedConfig: FleetConfig | null = null;

export type FleetTransport = "stdio";

/** Port appended to connect addresses that do not name one. */
export const DEFAULT_CONNECT_PORT = 5555;

/** Mapping file used when `devicesPath` is not configured. */
export const DEFAULT_DEVICES_PATH = "config/devices.txt";

export interface FleetConfig {
  /**
   * MCP transport mode.
   *
   * Currently only `stdio` is supported.
   */
  transport: FleetTransport;

  /** Logging verbosity for the host process. */
  logLevel: LogLevel;

  /**
   * Optional path to the `adb` binary. When set it is the only candidate;
   * a missing file makes every bridge call fail with "adb tool not found".
   */
  adbPath?: string;

  /**
   * MAC-to-name mapping file (`mac=name` per line). Relative paths resolve
   * against the project root.
   */
  devicesPath: string;

  /** Port appended by `fleet_devices_connect` when the caller gives a bare host. */
  defaultConnectPort: number;
}

/**
 * Get the project root directory by resolving from this file's location.
 * Works regardless of the process's current working directory.
 */
export function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  const thisDir = path.dirname(thisFile);
  // src/config.ts under tsx, dist/config.js when built: root is one level up either way
  return path.resolve(thisDir, "..");
}

function isLogLevel(v: unknown): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

/**
 * Validate a parsed config object.
 *
 * @param parsed - Result of `JSON.parse` on the config file.
 * @param source - Path used in error messages.
 * @throws If a field is missing or malformed.
 */
export function parseConfig(parsed: unknown, source: string): FleetConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: expected JSON object at ${source}`);
  }

  const transport = parsed.transport;
  const logLevel = parsed.logLevel;
  const adbPath = parsed.adbPath;
  const devicesPath = parsed.devicesPath ?? DEFAULT_DEVICES_PATH;
  const defaultConnectPort = parsed.defaultConnectPort ?? DEFAULT_CONNECT_PORT;

  if (transport !== "stdio") {
    throw new Error(`Invalid config.transport: expected "stdio" at ${source}`);
  }
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid config.logLevel: expected debug|info|warn|error at ${source}`);
  }
  if (adbPath !== undefined && !isNonEmptyString(adbPath)) {
    throw new Error(`Invalid config.adbPath: expected non-empty string at ${source}`);
  }
  if (!isNonEmptyString(devicesPath)) {
    throw new Error(`Invalid config.devicesPath: expected non-empty string at ${source}`);
  }
  if (
    typeof defaultConnectPort !== "number" ||
    !Number.isInteger(defaultConnectPort) ||
    defaultConnectPort < 1 ||
    defaultConnectPort > 65535
  ) {
    throw new Error(`Invalid config.defaultConnectPort: expected integer 1-65535 at ${source}`);
  }

  return {
    transport,
    logLevel,
    adbPath: adbPath?.trim(),
    devicesPath: devicesPath.trim(),
    defaultConnectPort,
  };
}

/**
 * Load runtime configuration from `config.json`.
 *
 * Precedence:
 * - `FLEETDECK_CONFIG_PATH` env var
 * - `<projectRoot>/config.json`
 *
 * @throws If the config file is missing or malformed.
 */
export function loadConfig(): FleetConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = process.env.FLEETDECK_CONFIG_PATH
    ? path.resolve(process.env.FLEETDECK_CONFIG_PATH)
    : path.join(getProjectRootDir(), "config.json");

  const raw = fs.readFileSync(configPath, "utf-8");
  cachedConfig = parseConfig(JSON.parse(raw), configPath);
  return cachedConfig;
}

/**
 * Resolve a configured path: absolute paths are returned as-is, relative ones
 * are resolved against the project root.
 */
export function resolveProjectPath(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(getProjectRootDir(), p);
}
