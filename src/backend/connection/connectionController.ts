import type { Logger } from "../../logger.js";
import type { CommandResult, CommandRunner } from "../adb/adb.js";
import { listDevices } from "../devices/adbDevices.js";
import { deviceMatchesAddress } from "./address.js";

/** Fixed message for every failed connect that adb itself reported as a success. */
export const CONNECT_FAILED_MESSAGE =
  "connection failed: check that the device is reachable and network debugging is enabled";

const CONNECT_FAILURE_PHRASES = ["cannot connect to", "failed to connect"] as const;
// "already connected to" contains this as well
const CONNECT_SUCCESS_PHRASE = "connected to";

/**
 * Network connect/disconnect for TCP-attached devices.
 *
 * `adb connect` exits 0 for most outcomes, so its text is inspected and, when
 * inconclusive, the device table decides.
 */
export class ConnectionController {
  public constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  /**
   * Connect to `address` (`host:port`; port normalization is the caller's job).
   */
  public async connect(address: string): Promise<CommandResult> {
    const res = await this.runner.run(["connect", address]);
    if (!res.success) {
      return res;
    }

    const output = res.output ?? "";
    const text = output.toLowerCase();

    if (CONNECT_FAILURE_PHRASES.some((p) => text.includes(p))) {
      this.logger.warn("adb reported connect failure", { address, output });
      return { success: false, output, error: CONNECT_FAILED_MESSAGE, failure: "failed" };
    }
    if (text.includes(CONNECT_SUCCESS_PHRASE)) {
      this.logger.info("Connected", { address });
      return res;
    }

    this.logger.debug("Ambiguous connect output; checking device table", { address, output });
    const devices = await listDevices(this.runner);
    if (devices.some((d) => deviceMatchesAddress(d.id, address))) {
      this.logger.info("Connected (verified via device table)", { address });
      return res;
    }
    return { success: false, output, error: CONNECT_FAILED_MESSAGE, failure: "failed" };
  }

  /**
   * Disconnect a TCP device. Single pass-through, no verification.
   */
  public disconnect(deviceId: string): Promise<CommandResult> {
    return this.runner.run(["disconnect", deviceId]);
  }
}
