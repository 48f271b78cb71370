import fs from "node:fs";
import type { Logger } from "../../logger.js";
import { errorMessage, splitLines } from "../../utils.js";

/**
 * MAC address (lowercase, colon separated) to device name.
 */
export type AddressMapping = ReadonlyMap<string, string>;

/**
 * Canonical MAC form: lowercase with `:` separators. `AA-BB-...` and
 * `aa:bb:...` normalize to the same key.
 */
export function normalizeMac(mac: string): string {
  return mac.trim().toLowerCase().replace(/-/g, ":");
}

/**
 * Parse mapping file text. Later duplicates overwrite earlier ones.
 *
 * Skipped lines: blank, `#` comments, anything that does not split into
 * exactly one key and one value on `=`, and entries with an empty side.
 */
export function parseAddressMapping(text: string): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const raw of splitLines(text)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const parts = line.split("=");
    if (parts.length !== 2) continue;

    const mac = normalizeMac(parts[0]);
    const name = parts[1].trim();
    if (!mac || !name) continue;

    mapping.set(mac, name);
  }
  return mapping;
}

/**
 * Load the MAC mapping file.
 *
 * Best-effort and total: a missing or unreadable file yields an empty mapping
 * and a log line, never an error. Callers then show raw addresses.
 */
export function loadAddressMapping(filePath: string, logger: Logger): AddressMapping {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      logger.warn("Device mapping file not found", { path: filePath });
    } else {
      logger.error("Failed to read device mapping file", { path: filePath, error: errorMessage(err) });
    }
    return new Map();
  }

  const mapping = parseAddressMapping(text);
  logger.debug(`Loaded ${mapping.size} device mapping(s)`, { path: filePath });
  return mapping;
}
