import * as assert from "node:assert";
import path from "node:path";
import { execTool, TIMED_OUT_MESSAGE } from "../../backend/process/execTool.js";
import { makeTempDir } from "../helpers.js";

/** Run a JavaScript snippet in a fresh Node process. */
function runScript(script: string, timeoutMs = 10_000, maxBuffer?: number) {
  return execTool(process.execPath, ["-e", script], timeoutMs, undefined, maxBuffer);
}

suite("execTool Test Suite", () => {
  test("returns trimmed stdout on exit 0", async () => {
    const res = await runScript('process.stdout.write("  List of devices attached\\n\\n")');
    assert.deepStrictEqual(res, { success: true, output: "List of devices attached" });
  });

  test("returns trimmed stdout and stderr on a nonzero exit", async () => {
    const res = await runScript(
      'process.stdout.write(" partial \\n"); process.stderr.write(" error: device offline \\n"); process.exit(1)'
    );
    assert.deepStrictEqual(res, {
      success: false,
      output: "partial",
      error: "error: device offline",
      failure: "failed",
    });
  });

  test("falls back to the process error message when stderr is empty", async () => {
    const res = await runScript("process.exit(3)");
    assert.strictEqual(res.success, false);
    assert.strictEqual(res.failure, "failed");
    assert.strictEqual(res.output, "");
    assert.ok(res.error?.startsWith("Command failed:"));
  });

  test("reports a timeout without output", async () => {
    const res = await runScript('process.stdout.write("started"); setTimeout(() => {}, 60_000)', 300);
    assert.deepStrictEqual(res, { success: false, error: TIMED_OUT_MESSAGE, failure: "timeout" });
  });

  test("reports a missing executable with the given message", async () => {
    const res = await execTool(path.join(makeTempDir(), "no-such-tool"), ["version"], 1_000, "adb tool not found");
    assert.deepStrictEqual(res, { success: false, error: "adb tool not found", failure: "missing" });
  });

  test("classifies output beyond the buffer limit as a failure, not a timeout", async () => {
    const res = await runScript('process.stdout.write("x".repeat(4096)); setTimeout(() => {}, 60_000)', 10_000, 64);
    assert.strictEqual(res.success, false);
    assert.strictEqual(res.failure, "failed");
    assert.notStrictEqual(res.error, TIMED_OUT_MESSAGE);
  });
});
