import type { CommandRunner } from "../adb/adb.js";
import type { DeviceInfo } from "./types.js";

const PROPERTY_KEYS = {
  model: "ro.product.model",
  androidVersion: "ro.build.version.release",
  brand: "ro.product.brand",
} as const satisfies Record<keyof DeviceInfo, string>;

async function getprop(runner: CommandRunner, deviceId: string, key: string): Promise<string | undefined> {
  const res = await runner.run(["shell", "getprop", key], { serial: deviceId });
  const value = res.output?.trim();
  return res.success && value ? value : undefined;
}

/**
 * Read model, Android version and brand of a device.
 *
 * The three queries are independent: a failure in one leaves that field unset
 * and does not affect the others.
 */
export async function getDeviceInfo(runner: CommandRunner, deviceId: string): Promise<DeviceInfo> {
  const [model, androidVersion, brand] = await Promise.all([
    getprop(runner, deviceId, PROPERTY_KEYS.model),
    getprop(runner, deviceId, PROPERTY_KEYS.androidVersion),
    getprop(runner, deviceId, PROPERTY_KEYS.brand),
  ]);

  const info: DeviceInfo = {};
  if (model) info.model = model;
  if (androidVersion) info.androidVersion = androidVersion;
  if (brand) info.brand = brand;
  return info;
}
