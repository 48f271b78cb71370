import { stat } from "node:fs/promises";
import type { CommandRunner } from "../adb/adb.js";
import { getDeviceInfo } from "../devices/adbDeviceDetails.js";
import { listDevices } from "../devices/adbDevices.js";
import { errorMessage } from "../../utils.js";

export const DIAGNOSIS_HEADER = "Install diagnosis:";

type DiagnosisCheck = (lines: string[]) => Promise<void>;

async function checkArtifact(apkPath: string, lines: string[]): Promise<void> {
  try {
    const info = await stat(apkPath);
    lines.push("[ok]   artifact exists");
    lines.push(`[info] artifact size: ${info.size} bytes`);
  } catch {
    lines.push("[fail] artifact does not exist");
  }
}

async function checkDevice(runner: CommandRunner, deviceId: string, lines: string[]): Promise<void> {
  const devices = await listDevices(runner);
  if (!devices.some((d) => d.id === deviceId)) {
    lines.push(`[fail] device ${deviceId} is not connected`);
    return;
  }
  lines.push(`[ok]   device ${deviceId} is connected`);
  const info = await getDeviceInfo(runner, deviceId);
  lines.push(`[info] device model: ${info.model ?? "unknown"}`);
  lines.push(`[info] Android version: ${info.androidVersion ?? "unknown"}`);
}

async function checkBridge(runner: CommandRunner, lines: string[]): Promise<void> {
  const res = await runner.run(["version"]);
  if (res.success) {
    lines.push("[ok]   adb server responds");
    lines.push(`[info] adb version: ${(res.output ?? "").split(/\r?\n/)[0]}`);
  } else {
    lines.push("[fail] adb server does not respond");
    lines.push(`[info] adb error: ${res.error ?? "unknown error"}`);
  }
}

async function checkStorage(runner: CommandRunner, deviceId: string, lines: string[]): Promise<void> {
  const res = await runner.run(["shell", "df", "/data"], { serial: deviceId });
  lines.push(res.success ? "[ok]   device storage is accessible" : "[warn] device storage is not accessible");
}

/**
 * Read-only checks run after every install strategy failed.
 *
 * Each check appends its lines independently; a check that throws becomes a
 * report line too, so this never rejects.
 */
export async function diagnoseInstall(runner: CommandRunner, deviceId: string, apkPath: string): Promise<string[]> {
  const checks: Array<[string, DiagnosisCheck]> = [
    ["artifact", (lines) => checkArtifact(apkPath, lines)],
    ["device", (lines) => checkDevice(runner, deviceId, lines)],
    ["adb", (lines) => checkBridge(runner, lines)],
    ["storage", (lines) => checkStorage(runner, deviceId, lines)],
  ];

  const report: string[] = [];
  for (const [name, check] of checks) {
    const lines: string[] = [];
    try {
      await check(lines);
    } catch (err) {
      lines.push(`[fail] ${name} check errored: ${errorMessage(err)}`);
    }
    report.push(...lines);
  }
  return report;
}
