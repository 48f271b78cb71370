import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { AdbRunOptions, CommandResult, CommandRunner } from "../backend/adb/adb.js";
import type { NeighborScanner } from "../backend/identity/neighborScan.js";
import { Logger, stripAnsi } from "../logger.js";

export interface RecordedCall {
  args: string[];
  options?: AdbRunOptions;
}

export type RunnerScript = (args: string[], options?: AdbRunOptions) => CommandResult | Promise<CommandResult>;

/**
 * CommandRunner stand-in that records every call and answers from a script.
 */
export class ScriptedRunner implements CommandRunner {
  public readonly calls: RecordedCall[] = [];

  public constructor(public script: RunnerScript = () => ok("")) {}

  public async run(args: readonly string[], options?: AdbRunOptions): Promise<CommandResult> {
    this.calls.push({ args: [...args], options });
    return this.script([...args], options);
  }

  /** Calls rendered as "-s <serial> <args>" strings. */
  public commandLines(): string[] {
    return this.calls.map((c) => [...(c.options?.serial ? ["-s", c.options.serial] : []), ...c.args].join(" "));
  }
}

export class StaticScanner implements NeighborScanner {
  public scans = 0;

  public constructor(public result: CommandResult) {}

  public async scan(): Promise<CommandResult> {
    this.scans++;
    return this.result;
  }
}

export function ok(output: string): CommandResult {
  return { success: true, output };
}

export function fail(error: string, output = ""): CommandResult {
  return { success: false, output, error, failure: "failed" };
}

/** Logger that keeps plain-text lines instead of writing to stderr. */
export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger("debug", (chunk) => {
    lines.push(...stripAnsi(chunk).split("\n").filter((l) => l.length > 0));
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return new Logger("error", () => {});
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "fleetdeck-test-"));
}

export function writeFile(dir: string, name: string, content: string | Buffer): string {
  const p = path.join(dir, name);
  fs.writeFileSync(p, content);
  return p;
}

export const DEVICES_HEADER = "List of devices attached";
