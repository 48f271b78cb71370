import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { CommandResult } from "../backend/adb/adb.js";

/**
 * Machine-readable error codes for fleet tool responses.
 *
 * Keep this list stable once clients depend on it.
 */
export type FleetToolErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "UNAVAILABLE"
  | "TIMEOUT"
  | "BUSY"
  | "INTERNAL";

/**
 * Standard machine-readable error envelope for all fleet tools.
 */
export interface FleetToolError {
  /** Stable error code for programmatic branching. */
  code: FleetToolErrorCode;
  /** Human-readable message (safe for operator display). */
  message: string;
  /** Tool name that produced the error (e.g., `fleet_devices_connect`). */
  tool: string;
  /** Whether retrying the exact same request may succeed. */
  retryable?: boolean;
  /** Optional structured details (do not put massive payloads here). */
  details?: Record<string, unknown>;
  /** Actionable suggestion for the AI/operator on how to resolve this error. */
  suggestion?: string;
}

export interface FleetToolOk<T> extends Record<string, unknown> {
  ok: true;
  data: T;
}

export interface FleetToolFail extends Record<string, unknown> {
  ok: false;
  error: FleetToolError;
}

/**
 * Build a successful MCP tool response with both:
 * - `structuredContent` (primary; validated when outputSchema is present)
 * - `content[].text` JSON (fallback for clients that only read text)
 */
export function toolOk<T extends Record<string, unknown>>(data: T): CallToolResult {
  const structuredContent: FleetToolOk<T> = { ok: true, data };
  return {
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Build an error MCP tool response. `isError=true` makes MCP clients treat it
 * as a tool failure.
 */
export function toolErr(error: FleetToolError): CallToolResult {
  const structuredContent: FleetToolFail = { ok: false, error };
  return {
    isError: true,
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Response for a request turned away by the single-flight guard.
 */
export function toolBusy(tool: string, active: string): CallToolResult {
  return toolErr({
    code: "BUSY",
    tool,
    message: `Another device operation is in progress (${active}).`,
    retryable: true,
    details: { active_operation: active },
    suggestion: "Retry once the current operation has finished",
  });
}

/**
 * Map a failed bridge command onto the tool error envelope.
 */
export function toolCommandErr(tool: string, res: CommandResult, suggestion?: string): CallToolResult {
  switch (res.failure) {
    case "missing":
      return toolErr({
        code: "UNAVAILABLE",
        tool,
        message: res.error ?? "adb tool not found",
        retryable: false,
        suggestion: "Place adb in the project adb/ directory, set config.adbPath, or put adb on PATH",
      });
    case "timeout":
      return toolErr({
        code: "TIMEOUT",
        tool,
        message: res.error ?? "timed out",
        retryable: true,
        suggestion: suggestion ?? "Check that the device is responsive and retry",
      });
    default:
      return toolErr({
        code: "INTERNAL",
        tool,
        message: res.error ?? "command failed",
        retryable: false,
        details: res.output ? { output: res.output } : undefined,
        suggestion,
      });
  }
}
