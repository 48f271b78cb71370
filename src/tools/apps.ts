import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { FleetService } from "../backend/fleet.js";
import type { AppAction } from "../backend/packages/appCommands.js";
import { errorMessage } from "../utils.js";
import { toolBusy, toolCommandErr, toolErr, toolOk } from "./result.js";

/**
 * Uninstall, clear data of, or force-stop an installed package.
 */
export async function fleetAppControl(
  fleet: FleetService,
  args: { device_id: string; package: string; action: AppAction }
): Promise<CallToolResult> {
  const tool = "fleet_app_control";
  try {
    const res = await fleet.appAction(args.device_id, args.action, args.package);
    if (res.busy) {
      return toolBusy(tool, res.active);
    }
    if (!res.value.success) {
      return toolCommandErr(tool, res.value, "Check that the package is installed and the device is connected");
    }
    return toolOk({
      device_id: args.device_id,
      package: args.package,
      action: args.action,
      output: res.value.output ?? "",
    });
  } catch (err) {
    return toolErr({ code: "INTERNAL", tool, message: errorMessage(err), retryable: false });
  }
}
