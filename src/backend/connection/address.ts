/**
 * Result of normalizing a user supplied connect address.
 */
export type ConnectAddress = { ok: true; address: string } | { ok: false; reason: string };

/**
 * Normalize a connect target to `host:port`, appending `defaultPort` when the
 * caller gave a bare host.
 */
export function normalizeConnectAddress(input: string, defaultPort: number): ConnectAddress {
  const trimmed = input.trim();
  if (!trimmed) {
    return { ok: false, reason: "address must not be empty" };
  }

  const idx = trimmed.lastIndexOf(":");
  if (idx === -1) {
    return { ok: true, address: `${trimmed}:${defaultPort}` };
  }

  const host = trimmed.slice(0, idx);
  const port = trimmed.slice(idx + 1);
  if (!host) {
    return { ok: false, reason: `missing host in "${trimmed}"` };
  }
  if (!/^\d+$/.test(port) || Number(port) < 1 || Number(port) > 65535) {
    return { ok: false, reason: `invalid port in "${trimmed}"` };
  }
  return { ok: true, address: trimmed };
}

/**
 * Whether an enumerated device id refers to the requested connect address.
 *
 * Exact match, or host match when the address carries no port. Plain substring
 * matching would let `192.168.1.5` claim `192.168.1.50:5555`.
 */
export function deviceMatchesAddress(deviceId: string, address: string): boolean {
  if (deviceId === address) {
    return true;
  }
  if (address.includes(":")) {
    return false;
  }
  const idx = deviceId.lastIndexOf(":");
  return idx !== -1 && deviceId.slice(0, idx) === address;
}
