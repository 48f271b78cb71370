import type { Logger } from "../../logger.js";
import { splitLines } from "../../utils.js";
import type { UsableDevice } from "../devices/types.js";
import { normalizeMac, type AddressMapping } from "./addressMapping.js";
import { extractAllIPv4, extractIPv4, extractMac, isIPv4, type NeighborScanner } from "./neighborScan.js";

/**
 * Bare host of a device id: `192.168.1.50:5555` -> `192.168.1.50`.
 */
export function hostOf(deviceId: string): string {
  const idx = deviceId.indexOf(":");
  return idx === -1 ? deviceId : deviceId.slice(0, idx);
}

/**
 * Turns network addresses into the names an operator gave their devices.
 *
 * Every operation here is best-effort and total: scan failures and mapping
 * misses degrade to raw addresses (or an empty list), never to an error.
 */
export class IdentityResolver {
  public constructor(
    private readonly mapping: AddressMapping,
    private readonly scanner: NeighborScanner,
    private readonly logger: Logger
  ) {}

  /** Number of MAC entries known to this resolver. */
  public get mappedCount(): number {
    return this.mapping.size;
  }

  /**
   * Name for a device id, or the id itself when it cannot be resolved.
   */
  public async resolveName(deviceId: string): Promise<string> {
    const [name] = await this.resolveNames([deviceId]);
    return name;
  }

  /**
   * Resolve several ids against a single neighbor scan. Output order matches
   * input order.
   */
  public async resolveNames(deviceIds: readonly string[]): Promise<string[]> {
    const needsScan = this.mapping.size > 0 && deviceIds.some((id) => isIPv4(hostOf(id)));
    if (!needsScan) {
      return [...deviceIds];
    }

    const lines = await this.scanLines();
    if (!lines) {
      return [...deviceIds];
    }
    return deviceIds.map((id) => this.nameFromTable(id, lines));
  }

  /**
   * Mapped devices currently present in the neighbor table. The scan is
   * skipped entirely when the mapping is empty.
   */
  public async listUsableDevices(): Promise<UsableDevice[]> {
    if (this.mapping.size === 0) {
      this.logger.warn("No device mapping loaded; cannot list LAN devices");
      return [];
    }

    const lines = await this.scanLines();
    if (!lines) {
      return [];
    }
    const normalizedLines = lines.map((l) => l.toLowerCase().replace(/-/g, ":"));

    const usable: UsableDevice[] = [];
    for (const [mac, name] of this.mapping) {
      const idx = normalizedLines.findIndex((l) => l.includes(mac));
      if (idx === -1) continue;

      // First matching line decides, whether or not it carries an address.
      const ip = extractIPv4(lines[idx]);
      if (ip) {
        usable.push({ ip, name, mac });
      }
    }
    return usable;
  }

  private nameFromTable(deviceId: string, lines: readonly string[]): string {
    const host = hostOf(deviceId);
    if (!isIPv4(host)) {
      return deviceId;
    }

    for (const line of lines) {
      if (!extractAllIPv4(line).includes(host)) continue;
      const mac = extractMac(line);
      if (!mac) continue;
      return this.mapping.get(normalizeMac(mac)) ?? deviceId;
    }
    return deviceId;
  }

  private async scanLines(): Promise<string[] | null> {
    const res = await this.scanner.scan();
    if (!res.success || res.output === undefined) {
      this.logger.error("Neighbor table scan failed", { failure: res.failure, error: res.error });
      return null;
    }
    return splitLines(res.output);
  }
}
