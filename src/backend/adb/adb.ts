import { spawnSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { getProjectRootDir, type FleetConfig } from "../../config.js";
import type { Logger } from "../../logger.js";
import { execTool, type CommandResult, type ToolExecutor } from "../process/execTool.js";

export type { CommandFailureKind, CommandResult } from "../process/execTool.js";

/** Fixed error returned for every call once `adb` cannot be resolved. */
export const ADB_NOT_FOUND_MESSAGE = "adb tool not found";

/** Time budget for control commands (devices, connect, getprop, ...). */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface AdbRunOptions {
  /** ADB device serial; if provided, `-s <serial>` is prepended to args. */
  serial?: string;
  /** Timeout in milliseconds. Defaults to {@link DEFAULT_COMMAND_TIMEOUT_MS}. */
  timeoutMs?: number;
}

/**
 * Anything that can run an adb command line. The backend depends on this
 * interface only; tests substitute scripted runners.
 */
export interface CommandRunner {
  run(args: readonly string[], options?: AdbRunOptions): Promise<CommandResult>;
}

/**
 * Where to look for `adb`. Split out of {@link AdbRunner} so resolution can be
 * pinned in tests.
 */
export type AdbLocator = () => string | null;

/**
 * Resolve an `adb` executable.
 *
 * Preference order:
 * - `config.adbPath` when provided (no fallback if it does not exist)
 * - `<projectRoot>/adb/adb` (`adb.exe` on Windows)
 * - `adb` from PATH, if `adb version` runs
 *
 * @returns Resolved executable path/name, or null when none is usable.
 */
export function locateAdb(config: Pick<FleetConfig, "adbPath">): string | null {
  if (config.adbPath) {
    return fs.existsSync(config.adbPath) ? config.adbPath : null;
  }

  const localName = process.platform === "win32" ? "adb.exe" : "adb";
  const local = path.join(getProjectRootDir(), "adb", localName);
  if (fs.existsSync(local)) {
    return local;
  }

  const pathProbe = spawnSync("adb", ["version"], { encoding: "utf-8", timeout: 10_000 });
  if (!pathProbe.error && pathProbe.status === 0) {
    return "adb";
  }
  return null;
}

/**
 * Runs adb commands for one process.
 *
 * The executable is resolved on first use and the answer (including "not
 * found") is kept for the lifetime of the runner.
 */
export class AdbRunner implements CommandRunner {
  private resolved: { executable: string | null } | undefined;

  public constructor(
    private readonly locate: AdbLocator,
    private readonly logger: Logger,
    private readonly exec: ToolExecutor = (file, args, timeoutMs) =>
      execTool(file, args, timeoutMs, ADB_NOT_FOUND_MESSAGE)
  ) {}

  /** Build a runner that locates adb from runtime configuration. */
  public static fromConfig(config: FleetConfig, logger: Logger): AdbRunner {
    return new AdbRunner(() => locateAdb(config), logger);
  }

  /**
   * The executable in use, or null when adb is unavailable.
   */
  public executable(): string | null {
    if (!this.resolved) {
      const executable = this.locate();
      this.resolved = { executable };
      if (executable) {
        this.logger.debug("adb resolved", { executable });
      } else {
        this.logger.error(ADB_NOT_FOUND_MESSAGE);
      }
    }
    return this.resolved.executable;
  }

  public async run(args: readonly string[], options?: AdbRunOptions): Promise<CommandResult> {
    const fullArgs = options?.serial ? ["-s", options.serial, ...args] : [...args];
    const adb = this.executable();
    if (!adb) {
      return { success: false, error: ADB_NOT_FOUND_MESSAGE, failure: "missing" };
    }

    const timeoutMs = options?.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.logger.debug(`adb ${fullArgs.join(" ")}`, { timeoutMs });

    const result = await this.exec(adb, fullArgs, timeoutMs);
    if (!result.success) {
      this.logger.error(`adb ${fullArgs.join(" ")} failed`, {
        failure: result.failure,
        error: result.error,
      });
    }
    return result;
  }
}
