import crypto from "node:crypto";
import type { Logger } from "../../logger.js";
import { errorMessage, isoNow } from "../../utils.js";
import type { InstallOutcome } from "../install/installEngine.js";

export type InstallState = "running" | "succeeded" | "failed";

export interface InstallRecord {
  install_id: string;
  device_id: string;
  apk_path: string;
  state: InstallState;
  created_at: string;
  updated_at: string;
  /** Present once the install finished. */
  outcome?: InstallOutcome;
}

/** Anything that installs an APK onto a device. */
export type InstallFn = (deviceId: string, apkPath: string) => Promise<InstallOutcome>;

/** How long finished installs stay queryable (1 hour). */
const INSTALL_HISTORY_RETENTION_MS = 60 * 60 * 1000;

function newInstallId(): string {
  return `install_${crypto.randomUUID()}`;
}

/**
 * Runs installs in the background, any number at once, each tracked by id.
 *
 * Unlike the single-flight operations, installs never reject one another:
 * each gets its own record and finishes independently.
 */
export class InstallTracker {
  private readonly installs = new Map<string, InstallRecord>();
  private readonly pending = new Map<string, Promise<InstallRecord>>();

  public constructor(
    private readonly installFn: InstallFn,
    private readonly logger: Logger,
    private readonly retentionMs: number = INSTALL_HISTORY_RETENTION_MS
  ) {}

  /**
   * Submit an install and return its record immediately (state `running`).
   */
  public start(deviceId: string, apkPath: string): InstallRecord {
    this.pruneFinished();

    const now = isoNow();
    const record: InstallRecord = {
      install_id: newInstallId(),
      device_id: deviceId,
      apk_path: apkPath,
      state: "running",
      created_at: now,
      updated_at: now,
    };
    this.installs.set(record.install_id, record);

    const done = this.execute(record);
    this.pending.set(record.install_id, done);
    this.logger.info("Install submitted", { install_id: record.install_id, deviceId, running: this.runningCount() });
    return { ...record };
  }

  /** Snapshot of one install, or undefined for an unknown (or pruned) id. */
  public get(installId: string): InstallRecord | undefined {
    const record = this.installs.get(installId);
    return record ? { ...record } : undefined;
  }

  /** Snapshots of all retained installs, oldest first. */
  public list(): InstallRecord[] {
    return [...this.installs.values()].map((r) => ({ ...r }));
  }

  public runningCount(): number {
    return this.pending.size;
  }

  /**
   * Resolve once the given install has finished.
   */
  public async wait(installId: string): Promise<InstallRecord | undefined> {
    const done = this.pending.get(installId);
    if (done) {
      return { ...(await done) };
    }
    return this.get(installId);
  }

  private async execute(record: InstallRecord): Promise<InstallRecord> {
    let outcome: InstallOutcome;
    try {
      outcome = await this.installFn(record.device_id, record.apk_path);
    } catch (err) {
      outcome = { success: false, error: errorMessage(err), attempts: [] };
    }

    record.outcome = outcome;
    record.state = outcome.success ? "succeeded" : "failed";
    record.updated_at = isoNow();
    this.pending.delete(record.install_id);
    this.logger.info(`Install ${record.state}`, {
      install_id: record.install_id,
      deviceId: record.device_id,
      running: this.runningCount(),
    });
    return record;
  }

  /**
   * Drop finished installs older than the retention period. Called from
   * {@link start} so there is no timer to manage.
   */
  private pruneFinished(): void {
    const cutoff = Date.now() - this.retentionMs;
    for (const [id, record] of this.installs) {
      if (record.state === "running") continue;
      if (new Date(record.updated_at).getTime() < cutoff) {
        this.installs.delete(id);
      }
    }
  }
}
