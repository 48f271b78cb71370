import { execTool, type CommandResult, type ToolExecutor } from "../process/execTool.js";

/** Time budget for one neighbor table read. */
export const NEIGHBOR_SCAN_TIMEOUT_MS = 30_000;

const MAC_PATTERN = /([0-9a-f]{2}[:-]){5}[0-9a-f]{2}/i;
const IPV4_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}\b/g;

/**
 * Source of the host's neighbor (ARP) table as free text.
 */
export interface NeighborScanner {
  scan(): Promise<CommandResult>;
}

/**
 * Neighbor scanner backed by `arp -a`, which prints the table on Windows,
 * macOS and Linux (net-tools) alike.
 */
export class ArpScanner implements NeighborScanner {
  public constructor(private readonly exec: ToolExecutor = execTool) {}

  public scan(): Promise<CommandResult> {
    return this.exec("arp", ["-a"], NEIGHBOR_SCAN_TIMEOUT_MS);
  }
}

/**
 * First MAC address in a neighbor table line, as written (not normalized).
 */
export function extractMac(line: string): string | null {
  return MAC_PATTERN.exec(line)?.[0] ?? null;
}

/**
 * First IPv4 address in a neighbor table line.
 */
export function extractIPv4(line: string): string | null {
  return extractAllIPv4(line)[0] ?? null;
}

/**
 * Every IPv4 address in a line, in order of appearance.
 */
export function extractAllIPv4(line: string): string[] {
  return line.match(IPV4_PATTERN) ?? [];
}

/**
 * Whether `host` is a dotted-quad IPv4 address.
 */
export function isIPv4(host: string): boolean {
  const parts = host.split(".");
  return parts.length === 4 && parts.every((p) => /^\d{1,3}$/.test(p) && Number(p) <= 255);
}
