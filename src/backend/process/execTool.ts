import { execFile } from "node:child_process";

/**
 * Why a command did not succeed.
 *
 * - `missing`: the executable could not be located or spawned
 * - `timeout`: the process exceeded its time budget and was killed
 * - `failed`: the process exited with a nonzero status
 */
export type CommandFailureKind = "missing" | "timeout" | "failed";

/**
 * Normalized result of one external command invocation.
 */
export interface CommandResult {
  readonly success: boolean;
  /** Trimmed stdout. Absent on timeout or when the tool never ran. */
  readonly output?: string;
  /** Trimmed stderr, or a fixed message for timeouts and missing tools. */
  readonly error?: string;
  readonly failure?: CommandFailureKind;
}

export const TIMED_OUT_MESSAGE = "timed out";

/** Upper bound on captured stdout/stderr per invocation. */
export const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

/**
 * Function shape used to run an external tool. Injected wherever a process is
 * spawned so the backend can be exercised without one.
 */
export type ToolExecutor = (file: string, args: readonly string[], timeoutMs: number) => Promise<CommandResult>;

/**
 * Run `file` with `args` and classify the outcome. Never rejects.
 *
 * @param missingMessage - Error text used when the executable cannot be spawned.
 */
export function execTool(
  file: string,
  args: readonly string[],
  timeoutMs: number,
  missingMessage = `${file}: executable not found`,
  maxBuffer = MAX_BUFFER_BYTES
): Promise<CommandResult> {
  return new Promise((resolve) => {
    execFile(
      file,
      args,
      { encoding: "utf-8", timeout: timeoutMs, maxBuffer, windowsHide: true },
      (err, stdout, stderr) => {
        const output = String(stdout ?? "").trim();
        const errText = String(stderr ?? "").trim();

        if (!err) {
          resolve({ success: true, output });
          return;
        }
        if (err.code === "ENOENT") {
          resolve({ success: false, error: missingMessage, failure: "missing" });
          return;
        }
        // overflowing maxBuffer also kills the child; that is not a timeout
        if (err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
          resolve({ success: false, output, error: err.message.trim(), failure: "failed" });
          return;
        }
        // execFile kills the child with SIGTERM once `timeout` elapses
        if (err.killed && timeoutMs > 0) {
          resolve({ success: false, error: TIMED_OUT_MESSAGE, failure: "timeout" });
          return;
        }
        resolve({
          success: false,
          output,
          error: errText.length > 0 ? errText : err.message.trim(),
          failure: "failed",
        });
      }
    );
  });
}
