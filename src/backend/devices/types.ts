/**
 * One row of the `adb devices` table.
 */
export interface Device {
  /** ADB serial, or `host:port` for network-attached devices. */
  id: string;
  /** Raw state token (`device`, `unauthorized`, `offline`, ...). Only `device` is usable. */
  status: string;
  /** Transport type inferred from the ADB serial. */
  transport: "USB" | "TCP";
}

/** State token adb reports for a device that accepts commands. */
export const USABLE_DEVICE_STATUS = "device";

/**
 * Properties read from a device. Each field is absent when its query failed.
 */
export interface DeviceInfo {
  model?: string;
  /** Android release string (e.g., "14"). */
  androidVersion?: string;
  brand?: string;
}

/**
 * A LAN device that appears in both the MAC mapping and the neighbor table.
 */
export interface UsableDevice {
  ip: string;
  name: string;
  /** Lowercase, colon separated. */
  mac: string;
}
