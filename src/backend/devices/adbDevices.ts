import type { CommandRunner } from "../adb/adb.js";
import { splitLines } from "../../utils.js";
import { USABLE_DEVICE_STATUS, type Device } from "./types.js";

/**
 * Parse a single `adb devices` row.
 *
 * Example rows:
 * - "emulator-5554\tdevice"
 * - "192.168.0.10:5555\tdevice"
 * - "R58M123ABC\tunauthorized"
 *
 * Lines starting with `*` are daemon chatter ("* daemon started successfully").
 */
function parseDeviceRow(line: string): Device | null {
  if (!line.trim() || line.startsWith("*")) {
    return null;
  }

  const fields = line.split("\t");
  if (fields.length < 2) return null;

  const id = fields[0].trim();
  const status = fields[1].trim();
  if (!id || !status) return null;

  return {
    id,
    status,
    transport: id.includes(":") ? "TCP" : "USB",
  };
}

/**
 * Parse `adb devices` output into every listed device, whatever its state.
 * The first line is the "List of devices attached" header and is skipped.
 */
export function parseDeviceTable(output: string): Device[] {
  const devices: Device[] = [];
  for (const line of splitLines(output).slice(1)) {
    const d = parseDeviceRow(line);
    if (d) devices.push(d);
  }
  return devices;
}

/**
 * Enumerate usable devices (state `device`).
 *
 * Enumeration failures of any kind read as "no devices".
 */
export async function listDevices(runner: CommandRunner): Promise<Device[]> {
  const res = await runner.run(["devices"]);
  if (!res.success || res.output === undefined) {
    return [];
  }
  return parseDeviceTable(res.output).filter((d) => d.status === USABLE_DEVICE_STATUS);
}
