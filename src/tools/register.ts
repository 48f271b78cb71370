import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod/v4";
import type { FleetService } from "../backend/fleet.js";
import { fleetAbout, type AboutContext } from "./about.js";
import { fleetAdbCommand } from "./adb.js";
import { fleetAppControl } from "./apps.js";
import { fleetDevicesConnect, fleetDevicesDisconnect } from "./connection.js";
import { fleetDevicesGet, fleetDevicesList, fleetDevicesUsable } from "./devices.js";
import { fleetInstallList, fleetInstallStart, fleetInstallStatus } from "./install.js";
import {
  zApkPath,
  zAppAction,
  zConnectAddress,
  zDeviceId,
  zInstallId,
  zOutAbout,
  zOutAdbCommand,
  zOutAppControl,
  zOutDevicesConnect,
  zOutDevicesDisconnect,
  zOutDevicesGet,
  zOutDevicesList,
  zOutDevicesUsable,
  zOutInstallList,
  zOutInstallStart,
  zOutInstallStatus,
  zPackageName,
} from "./schemas.js";

/**
 * Register the MCP tool surface for the fleet.
 *
 * Schema-first: stable tool names, descriptive docs, strict input/output
 * schemas.
 */
export function registerTools(server: McpServer, fleet: FleetService, about: AboutContext): void {
  registerAboutTool(server, fleet, about);
  registerDeviceTools(server, fleet, about.defaultConnectPort);
  registerInstallTools(server, fleet);
  registerAppTools(server, fleet);
  registerAdbTools(server, fleet);
}

function registerAboutTool(server: McpServer, fleet: FleetService, about: AboutContext): void {
  server.registerTool(
    "fleet_about",
    {
      title: "About this fleet server",
      description:
        "Returns the server name and version, the effective configuration (mapping file, default connect port), how many MAC addresses are mapped, the operation currently holding the single-flight slot, and the tool inventory.",
      inputSchema: {},
      outputSchema: zOutAbout,
    },
    async () => fleetAbout(fleet, about)
  );
}

function registerDeviceTools(server: McpServer, fleet: FleetService, defaultConnectPort: number): void {
  server.registerTool(
    "fleet_devices_list",
    {
      title: "List connected devices",
      description:
        "Enumerates devices attached to adb (USB and network) in the usable `device` state. Network devices are named from the MAC mapping file when their address appears in the host's ARP table; otherwise the name is the id. Fails with BUSY while another device operation runs.",
      inputSchema: {},
      outputSchema: zOutDevicesList,
    },
    async () => fleetDevicesList(fleet)
  );

  server.registerTool(
    "fleet_devices_get",
    {
      title: "Get device details",
      description:
        "Returns the device row, mapped name, and model / Android version / brand for a connected device. A property that cannot be read is omitted. Fails with BUSY while another device operation runs.",
      inputSchema: {
        device_id: zDeviceId,
      },
      outputSchema: zOutDevicesGet,
    },
    async (args) => fleetDevicesGet(fleet, args)
  );

  server.registerTool(
    "fleet_devices_usable",
    {
      title: "List mapped LAN devices",
      description:
        "Cross-references the MAC mapping file with the host's ARP table and returns `{ ip, name, mac }` for each mapped device currently seen on the LAN. Use the ip with fleet_devices_connect. Returns an empty list when the mapping is empty or the scan fails.",
      inputSchema: {},
      outputSchema: zOutDevicesUsable,
    },
    async () => fleetDevicesUsable(fleet)
  );

  server.registerTool(
    "fleet_devices_connect",
    {
      title: "Connect to a network device",
      description:
        `Runs \`adb connect\` and confirms the result, re-checking the device list when adb's output is inconclusive. A bare host gets port ${defaultConnectPort}.`,
      inputSchema: {
        address: zConnectAddress,
      },
      outputSchema: zOutDevicesConnect,
    },
    async (args) => fleetDevicesConnect(fleet, args, defaultConnectPort)
  );

  server.registerTool(
    "fleet_devices_disconnect",
    {
      title: "Disconnect a network device",
      description: "Runs `adb disconnect <device_id>`.",
      inputSchema: {
        device_id: zDeviceId,
      },
      outputSchema: zOutDevicesDisconnect,
    },
    async (args) => fleetDevicesDisconnect(fleet, args)
  );
}

function registerInstallTools(server: McpServer, fleet: FleetService): void {
  server.registerTool(
    "fleet_install_start",
    {
      title: "Install an APK",
      description:
        "Starts a background install of a local APK onto a connected device and returns an install_id. The file must exist, end in .apk, be non-empty and start with the ZIP magic. Several flag combinations (-r -d, -r -t -d, -r, -r -t, none) are tried in order; terminal package-manager errors stop early, and when every strategy fails the outcome carries a diagnosis report. Installs may run concurrently.",
      inputSchema: {
        device_id: zDeviceId,
        apk_path: zApkPath,
      },
      outputSchema: zOutInstallStart,
    },
    async (args) => fleetInstallStart(fleet, args)
  );

  server.registerTool(
    "fleet_install_status",
    {
      title: "Get install status",
      description: "Returns the install record: running, succeeded or failed, plus the outcome once finished.",
      inputSchema: {
        install_id: zInstallId,
      },
      outputSchema: zOutInstallStatus,
    },
    async (args) => fleetInstallStatus(fleet, args)
  );

  server.registerTool(
    "fleet_install_list",
    {
      title: "List installs",
      description: "Returns all running installs and those finished within the last hour.",
      inputSchema: {},
      outputSchema: zOutInstallList,
    },
    async () => fleetInstallList(fleet)
  );
}

function registerAppTools(server: McpServer, fleet: FleetService): void {
  server.registerTool(
    "fleet_app_control",
    {
      title: "Control an installed app",
      description:
        "Uninstalls a package, clears its data (`pm clear`), or force-stops it (`am force-stop`) on a connected device.",
      inputSchema: {
        device_id: zDeviceId,
        package: zPackageName,
        action: zAppAction,
      },
      outputSchema: zOutAppControl,
    },
    async (args) => fleetAppControl(fleet, args)
  );
}

function registerAdbTools(server: McpServer, fleet: FleetService): void {
  server.registerTool(
    "fleet_adb_command",
    {
      title: "Execute ADB command",
      description:
        "Execute an arbitrary adb command with the resolved adb executable and return stdout. For device-specific commands, provide device_id. " +
        "Common commands: `['shell', 'pm', 'list', 'packages']`, `['shell', 'getprop', 'ro.build.version.release']`. " +
        "Shares the single-flight slot with the device tools and fails with BUSY while another device operation runs.",
      inputSchema: {
        device_id: zDeviceId.optional().describe("Optional device serial. If provided, command runs on that device."),
        command: z.array(z.string()).min(1).describe("adb arguments as array, e.g., ['shell', 'pm', 'list', 'packages']"),
        timeout_ms: z.number().int().positive().optional().default(30000).describe("Command timeout in milliseconds (default: 30000)."),
      },
      outputSchema: zOutAdbCommand,
    },
    async (args) => fleetAdbCommand(fleet, args)
  );
}
