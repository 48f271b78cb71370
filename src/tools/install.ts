import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { FleetService } from "../backend/fleet.js";
import { toolErr, toolOk } from "./result.js";

/**
 * Submit an APK install and return immediately with its install record.
 *
 * Installs are not single-flight: several may run at once, on the same or
 * different devices. Poll `fleet_install_status` for the outcome.
 */
export function fleetInstallStart(fleet: FleetService, args: { device_id: string; apk_path: string }): CallToolResult {
  const install = fleet.startInstall(args.device_id, args.apk_path);
  return toolOk({ install });
}

/**
 * Status of one install. A finished install carries its outcome, including
 * the diagnosis report when every strategy failed.
 */
export function fleetInstallStatus(fleet: FleetService, args: { install_id: string }): CallToolResult {
  const install = fleet.getInstall(args.install_id);
  if (!install) {
    return toolErr({
      code: "NOT_FOUND",
      tool: "fleet_install_status",
      message: `Unknown install_id: ${args.install_id}`,
      retryable: false,
      suggestion: "Finished installs are kept for one hour; list current ones with fleet_install_list",
    });
  }
  return toolOk({ install });
}

export function fleetInstallList(fleet: FleetService): CallToolResult {
  return toolOk({ installs: fleet.listInstalls() });
}
