import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { FleetService } from "../backend/fleet.js";
import { toolOk } from "./result.js";

export interface AboutContext {
  serverName: string;
  serverVersion: string;
  transport: string;
  logLevel: string;
  devicesPath: string;
  defaultConnectPort: number;
}

/** Every registered tool, in the order an operator typically uses them. */
export const TOOL_NAMES = [
  "fleet_about",
  "fleet_devices_list",
  "fleet_devices_get",
  "fleet_devices_usable",
  "fleet_devices_connect",
  "fleet_devices_disconnect",
  "fleet_install_start",
  "fleet_install_status",
  "fleet_install_list",
  "fleet_app_control",
  "fleet_adb_command",
] as const;

/**
 * Server identity, effective configuration and the tool inventory.
 */
export function fleetAbout(fleet: FleetService, ctx: AboutContext): CallToolResult {
  return toolOk({
    name: ctx.serverName,
    version: ctx.serverVersion,
    transport: ctx.transport,
    log_level: ctx.logLevel,
    devices_path: ctx.devicesPath,
    mapped_devices: fleet.identity.mappedCount,
    default_connect_port: ctx.defaultConnectPort,
    active_operation: fleet.activeOperation(),
    tools: [...TOOL_NAMES],
  });
}
