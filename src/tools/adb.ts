import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { FleetService } from "../backend/fleet.js";
import { toolBusy, toolCommandErr, toolErr, toolOk } from "./result.js";

/**
 * Execute a raw adb command through the resolved adb executable.
 *
 * @param args.device_id - Optional device serial (uses -s flag)
 * @param args.command - adb arguments (e.g., ["shell", "pm", "list", "packages"])
 * @param args.timeout_ms - Timeout in milliseconds (default: 30000)
 */
export async function fleetAdbCommand(
  fleet: FleetService,
  args: { device_id?: string; command: string[]; timeout_ms?: number }
): Promise<CallToolResult> {
  const tool = "fleet_adb_command";

  if (args.command.length === 0) {
    return toolErr({
      code: "INVALID_ARGUMENT",
      tool,
      message: "command must be a non-empty array of strings",
      retryable: false,
      suggestion: "Provide command as an array, e.g., [\"shell\", \"pm\", \"list\", \"packages\"]",
    });
  }

  const ran = await fleet.runAdb(args.command, {
    serial: args.device_id,
    timeoutMs: args.timeout_ms ?? 30000,
  });
  if (ran.busy) {
    return toolBusy(tool, ran.active);
  }
  const res = ran.value;
  if (!res.success) {
    return toolCommandErr(tool, res, "Check command syntax and device connection");
  }
  return toolOk({
    stdout: res.output ?? "",
    command: args.command.join(" "),
    device_id: args.device_id,
  });
}
