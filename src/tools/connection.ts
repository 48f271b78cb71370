import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { normalizeConnectAddress } from "../backend/connection/address.js";
import type { FleetService } from "../backend/fleet.js";
import { errorMessage } from "../utils.js";
import { toolBusy, toolCommandErr, toolErr, toolOk } from "./result.js";

/**
 * Connect to a device over the network. A bare host gets `defaultPort`.
 */
export async function fleetDevicesConnect(
  fleet: FleetService,
  args: { address: string },
  defaultPort: number
): Promise<CallToolResult> {
  const tool = "fleet_devices_connect";

  const normalized = normalizeConnectAddress(args.address, defaultPort);
  if (!normalized.ok) {
    return toolErr({
      code: "INVALID_ARGUMENT",
      tool,
      message: normalized.reason,
      retryable: false,
      suggestion: "Pass an address like 192.168.1.50 or 192.168.1.50:5555",
    });
  }

  try {
    const res = await fleet.connect(normalized.address);
    if (res.busy) {
      return toolBusy(tool, res.active);
    }
    const result = res.value;
    if (!result.success) {
      if (result.failure === "failed") {
        return toolErr({
          code: "UNAVAILABLE",
          tool,
          message: result.error ?? "connection failed",
          retryable: true,
          details: { address: normalized.address, output: result.output ?? "" },
          suggestion: "Enable wireless debugging (adb tcpip) on the device and confirm it is on the same network",
        });
      }
      return toolCommandErr(tool, result);
    }
    return toolOk({ address: normalized.address, output: result.output ?? "" });
  } catch (err) {
    return toolErr({ code: "INTERNAL", tool, message: errorMessage(err), retryable: false });
  }
}

/**
 * Disconnect a network device.
 */
export async function fleetDevicesDisconnect(
  fleet: FleetService,
  args: { device_id: string }
): Promise<CallToolResult> {
  const tool = "fleet_devices_disconnect";
  try {
    const res = await fleet.disconnect(args.device_id);
    if (res.busy) {
      return toolBusy(tool, res.active);
    }
    if (!res.value.success) {
      return toolCommandErr(tool, res.value);
    }
    return toolOk({ device_id: args.device_id, output: res.value.output ?? "" });
  } catch (err) {
    return toolErr({ code: "INTERNAL", tool, message: errorMessage(err), retryable: false });
  }
}
