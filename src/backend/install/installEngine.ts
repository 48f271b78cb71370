import type { Logger } from "../../logger.js";
import type { CommandRunner } from "../adb/adb.js";
import { listDevices } from "../devices/adbDevices.js";
import { fileExists, validateApk } from "./apkValidation.js";
import { DIAGNOSIS_HEADER, diagnoseInstall } from "./diagnosis.js";

/** Per-strategy time budget; shorter than a plain install would get. */
export const INSTALL_STRATEGY_TIMEOUT_MS = 30_000;

export const ARTIFACT_NOT_FOUND_MESSAGE = "artifact not found";
export const INVALID_ARTIFACT_MESSAGE = "invalid artifact";
export const ALL_STRATEGIES_FAILED_MESSAGE = "all install strategies failed";

/**
 * One `adb install` flag combination.
 */
export interface InstallStrategy {
  name: string;
  flags: readonly string[];
}

/**
 * Tried in order: most common success first, bare install last.
 */
export const INSTALL_STRATEGIES: readonly InstallStrategy[] = [
  { name: "reinstall+downgrade", flags: ["-r", "-d"] },
  { name: "reinstall+test+downgrade", flags: ["-r", "-t", "-d"] },
  { name: "reinstall", flags: ["-r"] },
  { name: "reinstall+test", flags: ["-r", "-t"] },
  { name: "plain", flags: [] },
];

/**
 * Package manager errors no other flag combination can get past.
 */
export const FAST_FAIL_SIGNATURES: readonly string[] = [
  "INSTALL_FAILED_ALREADY_EXISTS",
  "INSTALL_FAILED_UPDATE_INCOMPATIBLE",
  "INSTALL_FAILED_INVALID_APK",
  "INSTALL_FAILED_INSUFFICIENT_STORAGE",
];

export type InstallFailureKind = "validation" | "fast_fail" | "exhausted";

export interface InstallAttempt {
  strategy: string;
  success: boolean;
  error?: string;
}

export interface InstallOutcome {
  success: boolean;
  output?: string;
  /** On exhaustion, embeds the multi-line diagnosis report. */
  error?: string;
  failure?: InstallFailureKind;
  /** Strategy that succeeded, or that hit a fast-fail signature. */
  strategy?: string;
  attempts: InstallAttempt[];
}

/**
 * Installs APKs through an ordered ladder of `adb install` variants.
 *
 * adb's exit status and messages vary across versions and devices, so a
 * failure of one flag combination is not taken as final unless the error is a
 * known terminal one.
 */
export class InstallEngine {
  public constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly strategies: readonly InstallStrategy[] = INSTALL_STRATEGIES
  ) {}

  public async install(deviceId: string, apkPath: string): Promise<InstallOutcome> {
    if (!(await fileExists(apkPath))) {
      return { success: false, error: ARTIFACT_NOT_FOUND_MESSAGE, failure: "validation", attempts: [] };
    }

    const devices = await listDevices(this.runner);
    if (!devices.some((d) => d.id === deviceId)) {
      return {
        success: false,
        error: `device ${deviceId} is not connected`,
        failure: "validation",
        attempts: [],
      };
    }

    const check = await validateApk(apkPath);
    if (!check.ok) {
      this.logger.warn("Rejected artifact", { apkPath, reason: check.reason });
      return {
        success: false,
        output: check.reason,
        error: INVALID_ARTIFACT_MESSAGE,
        failure: "validation",
        attempts: [],
      };
    }

    this.logger.info("Installing", { deviceId, apkPath, sizeBytes: check.sizeBytes });

    const attempts: InstallAttempt[] = [];
    for (const [i, strategy] of this.strategies.entries()) {
      this.logger.info(`Install strategy ${i + 1}/${this.strategies.length}: ${strategy.name}`, { deviceId });
      const res = await this.runner.run(["install", ...strategy.flags, apkPath], {
        serial: deviceId,
        timeoutMs: INSTALL_STRATEGY_TIMEOUT_MS,
      });

      if (res.success) {
        attempts.push({ strategy: strategy.name, success: true });
        this.logger.info("Install succeeded", { deviceId, strategy: strategy.name });
        return { success: true, output: res.output, strategy: strategy.name, attempts };
      }

      const error = res.error ?? "";
      attempts.push({ strategy: strategy.name, success: false, error });
      this.logger.warn("Install strategy failed", { deviceId, strategy: strategy.name, error });

      const haystack = `${error}\n${res.output ?? ""}`;
      const signature = FAST_FAIL_SIGNATURES.find((s) => haystack.includes(s));
      if (signature) {
        this.logger.info("Terminal install error; skipping remaining strategies", { deviceId, signature });
        return {
          success: false,
          output: res.output,
          error,
          failure: "fast_fail",
          strategy: strategy.name,
          attempts,
        };
      }
    }

    this.logger.warn("All install strategies failed; diagnosing", { deviceId });
    const diagnosis = await diagnoseInstall(this.runner, deviceId, apkPath);
    return {
      success: false,
      error: [ALL_STRATEGIES_FAILED_MESSAGE, DIAGNOSIS_HEADER, ...diagnosis].join("\n"),
      failure: "exhausted",
      attempts,
    };
  }
}
