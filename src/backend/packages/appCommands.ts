import type { CommandResult, CommandRunner } from "../adb/adb.js";

export const APP_ACTIONS = ["uninstall", "clear_data", "force_stop"] as const;

export type AppAction = (typeof APP_ACTIONS)[number];

/** Java-style package name, e.g. `com.example.app`. */
export const PACKAGE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)+$/;

function argsFor(action: AppAction, packageName: string): string[] {
  switch (action) {
    case "uninstall":
      return ["uninstall", packageName];
    case "clear_data":
      return ["shell", "pm", "clear", packageName];
    case "force_stop":
      return ["shell", "am", "force-stop", packageName];
  }
}

/**
 * Run one package management command on a device. `pm` and `am` report some
 * failures on stdout with exit 0, so a `Failure`/`Error` prefix is treated as
 * a failure too.
 */
export async function runAppAction(
  runner: CommandRunner,
  deviceId: string,
  action: AppAction,
  packageName: string
): Promise<CommandResult> {
  const res = await runner.run(argsFor(action, packageName), { serial: deviceId });
  const output = res.output ?? "";
  if (res.success && /^(Failure|Error)\b/.test(output)) {
    return { success: false, output, error: output, failure: "failed" };
  }
  return res;
}
