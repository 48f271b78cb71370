import type { Logger } from "../logger.js";
import type { AdbRunOptions, CommandResult, CommandRunner } from "./adb/adb.js";
import { ConnectionController } from "./connection/connectionController.js";
import { getDeviceInfo } from "./devices/adbDeviceDetails.js";
import { listDevices } from "./devices/adbDevices.js";
import type { Device, DeviceInfo, UsableDevice } from "./devices/types.js";
import type { AddressMapping } from "./identity/addressMapping.js";
import { IdentityResolver } from "./identity/identityResolver.js";
import type { NeighborScanner } from "./identity/neighborScan.js";
import { InstallEngine } from "./install/installEngine.js";
import { InstallTracker, type InstallRecord } from "./ops/installTracker.js";
import { SingleFlightGuard, type SingleFlightResult } from "./ops/singleFlight.js";
import { runAppAction, type AppAction } from "./packages/appCommands.js";

/** A usable device with its resolved display name (the id when unmapped). */
export interface NamedDevice extends Device {
  name: string;
}

export interface FleetDependencies {
  runner: CommandRunner;
  scanner: NeighborScanner;
  mapping: AddressMapping;
  logger: Logger;
}

/**
 * One process's view of the device fleet.
 *
 * Device listing, LAN discovery, connect/disconnect and app control share a
 * single-flight slot; installs run concurrently through the tracker.
 */
export class FleetService {
  public readonly identity: IdentityResolver;
  private readonly runner: CommandRunner;
  private readonly connection: ConnectionController;
  private readonly installs: InstallTracker;
  private readonly guard = new SingleFlightGuard();

  public constructor(deps: FleetDependencies) {
    this.runner = deps.runner;
    this.identity = new IdentityResolver(deps.mapping, deps.scanner, deps.logger.child("identity"));
    this.connection = new ConnectionController(deps.runner, deps.logger.child("connection"));
    const engine = new InstallEngine(deps.runner, deps.logger.child("install"));
    this.installs = new InstallTracker((id, apk) => engine.install(id, apk), deps.logger.child("installs"));
  }

  /** Operation currently holding the single-flight slot, if any. */
  public activeOperation(): string | null {
    return this.guard.active();
  }

  public refreshDevices(): Promise<SingleFlightResult<NamedDevice[]>> {
    return this.guard.run("devices.refresh", async () => {
      const devices = await listDevices(this.runner);
      const names = await this.identity.resolveNames(devices.map((d) => d.id));
      return devices.map((d, i) => ({ ...d, name: names[i] }));
    });
  }

  public listUsableDevices(): Promise<SingleFlightResult<UsableDevice[]>> {
    return this.guard.run("devices.usable", () => this.identity.listUsableDevices());
  }

  /** @param address - Already normalized `host:port`. */
  public connect(address: string): Promise<SingleFlightResult<CommandResult>> {
    return this.guard.run("devices.connect", () => this.connection.connect(address));
  }

  public disconnect(deviceId: string): Promise<SingleFlightResult<CommandResult>> {
    return this.guard.run("devices.disconnect", () => this.connection.disconnect(deviceId));
  }

  public appAction(
    deviceId: string,
    action: AppAction,
    packageName: string
  ): Promise<SingleFlightResult<CommandResult>> {
    return this.guard.run(`app.${action}`, () => runAppAction(this.runner, deviceId, action, packageName));
  }

  /**
   * Device row, display name and properties; `value` is null when the device
   * is not currently usable.
   */
  public getDevice(
    deviceId: string
  ): Promise<SingleFlightResult<{ device: NamedDevice; info: DeviceInfo } | null>> {
    return this.guard.run("devices.get", async () => {
      const devices = await listDevices(this.runner);
      const device = devices.find((d) => d.id === deviceId);
      if (!device) {
        return null;
      }
      const [name, info] = await Promise.all([
        this.identity.resolveName(deviceId),
        getDeviceInfo(this.runner, deviceId),
      ]);
      return { device: { ...device, name }, info };
    });
  }

  public startInstall(deviceId: string, apkPath: string): InstallRecord {
    return this.installs.start(deviceId, apkPath);
  }

  public getInstall(installId: string): InstallRecord | undefined {
    return this.installs.get(installId);
  }

  public listInstalls(): InstallRecord[] {
    return this.installs.list();
  }

  /**
   * Raw adb pass-through. Holds the single-flight slot, since a raw command
   * may well be `connect`, `disconnect` or `devices`.
   */
  public runAdb(args: readonly string[], options?: AdbRunOptions): Promise<SingleFlightResult<CommandResult>> {
    return this.guard.run("adb.command", () => this.runner.run(args, options));
  }
}
