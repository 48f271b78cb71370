import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { FleetService } from "../backend/fleet.js";
import { errorMessage } from "../utils.js";
import { toolBusy, toolErr, toolOk } from "./result.js";

/**
 * List usable devices (state `device`) with their mapped names.
 *
 * Enumeration failures read as an empty list; the only error is BUSY.
 */
export async function fleetDevicesList(fleet: FleetService): Promise<CallToolResult> {
  const tool = "fleet_devices_list";
  try {
    const res = await fleet.refreshDevices();
    if (res.busy) {
      return toolBusy(tool, res.active);
    }
    return toolOk({ devices: res.value });
  } catch (err) {
    return toolErr({ code: "INTERNAL", tool, message: `Failed to list devices: ${errorMessage(err)}`, retryable: false });
  }
}

/**
 * Get name and properties of one connected device.
 */
export async function fleetDevicesGet(fleet: FleetService, args: { device_id: string }): Promise<CallToolResult> {
  const tool = "fleet_devices_get";
  try {
    const res = await fleet.getDevice(args.device_id);
    if (res.busy) {
      return toolBusy(tool, res.active);
    }
    const found = res.value;
    if (!found) {
      return toolErr({
        code: "NOT_FOUND",
        tool,
        message: `Device not found (or not authorized): ${args.device_id}`,
        retryable: false,
        suggestion: "Verify device_id using fleet_devices_list",
      });
    }
    return toolOk({ device: found.device, info: found.info });
  } catch (err) {
    return toolErr({ code: "INTERNAL", tool, message: errorMessage(err), retryable: false });
  }
}

/**
 * List mapped LAN devices currently visible in the neighbor table.
 */
export async function fleetDevicesUsable(fleet: FleetService): Promise<CallToolResult> {
  const tool = "fleet_devices_usable";
  try {
    const res = await fleet.listUsableDevices();
    if (res.busy) {
      return toolBusy(tool, res.active);
    }
    return toolOk({ devices: res.value });
  } catch (err) {
    return toolErr({ code: "INTERNAL", tool, message: errorMessage(err), retryable: false });
  }
}
