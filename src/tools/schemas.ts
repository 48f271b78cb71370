import { z } from "zod/v4";
import { APP_ACTIONS, PACKAGE_NAME_PATTERN } from "../backend/packages/appCommands.js";

/**
 * Shared Zod schemas for fleet MCP tool inputs and outputs.
 *
 * Output models use `passthrough` so fields can be added without breaking
 * older clients.
 */

export const zNonEmptyString = z
  .string()
  .min(1, "Must be a non-empty string")
  .describe("A non-empty string.");

export const zDeviceId = zNonEmptyString.describe(
  "Device identifier as listed by `fleet_devices_list` (USB serial or `host:port`)."
);

export const zConnectAddress = zNonEmptyString.describe(
  "Device network address, `host` or `host:port`. The configured default port is appended when omitted."
);

export const zApkPath = zNonEmptyString.describe("Absolute path to an `.apk` file on the host running this server.");

export const zInstallId = zNonEmptyString.describe("Install identifier returned by `fleet_install_start`.");

export const zPackageName = z
  .string()
  .regex(PACKAGE_NAME_PATTERN, "Must be a package name like com.example.app")
  .describe("Android package identifier (e.g., `com.example.app`).");

export const zAppAction = z
  .enum(APP_ACTIONS)
  .describe("Package operation: uninstall the app, clear its data, or force-stop it.");

export const zJsonObject = z.record(z.string(), z.unknown()).describe("Arbitrary JSON object.");

export const zFleetErrorCode = z
  .enum(["INVALID_ARGUMENT", "NOT_FOUND", "UNAVAILABLE", "TIMEOUT", "BUSY", "INTERNAL"])
  .describe("Stable machine-readable error code.");

export const zFleetToolError = z
  .object({
    code: zFleetErrorCode,
    message: zNonEmptyString.describe("Human-readable error message."),
    tool: zNonEmptyString.describe("Tool name that produced this error."),
    retryable: z.boolean().optional().describe("Whether a retry may succeed."),
    details: zJsonObject.optional().describe("Optional structured details for debugging/triage."),
    suggestion: zNonEmptyString.optional().describe("Actionable suggestion on how to resolve."),
  })
  .describe("Standard fleet tool error envelope.");

/**
 * Object-shaped envelope for tool outputs.
 *
 * NOTE: The MCP SDK normalizes tool output schemas to an object schema for
 * validation, so the envelope is a `z.object(...)` rather than a union.
 */
export function zFleetToolResult<T extends z.ZodTypeAny>(dataSchema: T) {
  return z
    .object({
      ok: z.boolean().describe("True on success; false on failure."),
      data: dataSchema.optional().describe("Success payload when ok=true."),
      error: zFleetToolError.optional().describe("Error payload when ok=false."),
    })
    .passthrough()
    .describe("Standard fleet tool result envelope.");
}

export const zDevice = z
  .object({
    id: zDeviceId,
    status: zNonEmptyString.describe("adb state token; only `device` is listed."),
    transport: z.enum(["USB", "TCP"]).describe("Transport inferred from the id."),
    name: zNonEmptyString.describe("Name from the MAC mapping, or the id when unmapped."),
  })
  .passthrough()
  .describe("A usable device.");

export const zDeviceInfo = z
  .object({
    model: z.string().optional(),
    androidVersion: z.string().optional(),
    brand: z.string().optional(),
  })
  .passthrough()
  .describe("Device properties; a field is absent when its query failed.");

export const zUsableDevice = z
  .object({
    ip: zNonEmptyString,
    name: zNonEmptyString,
    mac: zNonEmptyString,
  })
  .passthrough()
  .describe("A mapped LAN device currently present in the neighbor table.");

export const zInstallOutcome = z
  .object({
    success: z.boolean(),
    output: z.string().optional(),
    error: z.string().optional().describe("Failure text; embeds the diagnosis report when every strategy failed."),
    failure: z.enum(["validation", "fast_fail", "exhausted"]).optional(),
    strategy: z.string().optional(),
    attempts: z.array(
      z.object({
        strategy: z.string(),
        success: z.boolean(),
        error: z.string().optional(),
      })
    ),
  })
  .passthrough();

export const zInstallRecord = z
  .object({
    install_id: zInstallId,
    device_id: zDeviceId,
    apk_path: zNonEmptyString,
    state: z.enum(["running", "succeeded", "failed"]),
    created_at: z.string(),
    updated_at: z.string(),
    outcome: zInstallOutcome.optional(),
  })
  .passthrough()
  .describe("Tracked install.");

/**
 * Tool output schemas (public contract).
 */
export const zOutAbout = zFleetToolResult(
  z
    .object({
      name: zNonEmptyString,
      version: zNonEmptyString,
      transport: zNonEmptyString,
      log_level: zNonEmptyString,
      devices_path: zNonEmptyString,
      mapped_devices: z.number().int().nonnegative(),
      default_connect_port: z.number().int().positive(),
      active_operation: z.string().nullable(),
      tools: z.array(zNonEmptyString),
    })
    .passthrough()
);

export const zOutDevicesList = zFleetToolResult(
  z.object({
    devices: z.array(zDevice),
  })
);

export const zOutDevicesGet = zFleetToolResult(
  z.object({
    device: zDevice,
    info: zDeviceInfo,
  })
);

export const zOutDevicesUsable = zFleetToolResult(
  z.object({
    devices: z.array(zUsableDevice),
  })
);

export const zOutDevicesConnect = zFleetToolResult(
  z.object({
    address: zNonEmptyString,
    output: z.string(),
  })
);

export const zOutDevicesDisconnect = zFleetToolResult(
  z.object({
    device_id: zDeviceId,
    output: z.string(),
  })
);

export const zOutInstallStart = zFleetToolResult(
  z.object({
    install: zInstallRecord,
  })
);

export const zOutInstallStatus = zFleetToolResult(
  z.object({
    install: zInstallRecord,
  })
);

export const zOutInstallList = zFleetToolResult(
  z.object({
    installs: z.array(zInstallRecord),
  })
);

export const zOutAppControl = zFleetToolResult(
  z.object({
    device_id: zDeviceId,
    package: zNonEmptyString,
    action: zAppAction,
    output: z.string(),
  })
);

export const zOutAdbCommand = zFleetToolResult(
  z.object({
    stdout: z.string().describe("Command stdout output."),
    command: z.string().describe("The command that was executed."),
    device_id: z.string().optional().describe("Device serial if specified."),
  })
);
