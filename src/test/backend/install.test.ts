import * as assert from "node:assert";
import path from "node:path";
import { validateApk } from "../../backend/install/apkValidation.js";
import { DIAGNOSIS_HEADER, diagnoseInstall } from "../../backend/install/diagnosis.js";
import {
  ALL_STRATEGIES_FAILED_MESSAGE,
  ARTIFACT_NOT_FOUND_MESSAGE,
  INSTALL_STRATEGY_TIMEOUT_MS,
  InstallEngine,
  INVALID_ARTIFACT_MESSAGE,
} from "../../backend/install/installEngine.js";
import type { CommandResult } from "../../backend/adb/adb.js";
import { DEVICES_HEADER, fail, makeTempDir, ok, ScriptedRunner, silentLogger, writeFile } from "../helpers.js";

const SERIAL = "emulator-5554";
const APK_BYTES = Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x00, 0x00]);

const GETPROPS: Record<string, string> = {
  "ro.product.model": "Pixel 7",
  "ro.build.version.release": "14",
  "ro.product.brand": "google",
};

/**
 * A device that is attached and answers every query; `install` replies come
 * from `installReplies` in order.
 */
function deviceRunner(installReplies: CommandResult[]): ScriptedRunner {
  let installIdx = 0;
  return new ScriptedRunner((args) => {
    switch (args[0]) {
      case "devices":
        return ok(`${DEVICES_HEADER}\n${SERIAL}\tdevice\n`);
      case "install":
        return installReplies[installIdx++] ?? fail("no scripted reply");
      case "version":
        return ok("Android Debug Bridge version 1.0.41\nVersion 35.0.1-11580240");
      case "shell":
        if (args[1] === "getprop") {
          return ok(GETPROPS[args[2]] ?? "");
        }
        return ok("Filesystem 1K-blocks Used Available Use% Mounted on");
      default:
        return fail(`unexpected command: ${args.join(" ")}`);
    }
  });
}

function installLines(runner: ScriptedRunner): string[] {
  return runner.commandLines().filter((l) => l.includes(" install "));
}

suite("APK validation Test Suite", () => {
  test("accepts a non-empty .apk with a ZIP header", async () => {
    const apk = writeFile(makeTempDir(), "app.apk", APK_BYTES);
    assert.deepStrictEqual(await validateApk(apk), { ok: true, sizeBytes: 6 });
  });

  test("rejects wrong suffix, empty files and missing ZIP magic", async () => {
    const dir = makeTempDir();
    assert.deepStrictEqual(await validateApk(writeFile(dir, "app.zip", APK_BYTES)), {
      ok: false,
      reason: "expected a .apk file",
    });
    assert.deepStrictEqual(await validateApk(writeFile(dir, "empty.apk", "")), { ok: false, reason: "file is empty" });
    assert.deepStrictEqual(await validateApk(writeFile(dir, "text.apk", "not an archive")), {
      ok: false,
      reason: "missing ZIP header",
    });
  });

  test("accepts an upper-case suffix", async () => {
    const apk = writeFile(makeTempDir(), "APP.APK", APK_BYTES);
    assert.strictEqual((await validateApk(apk)).ok, true);
  });
});

suite("InstallEngine Test Suite", () => {
  test("rejects a missing artifact without touching adb", async () => {
    const runner = deviceRunner([]);
    const engine = new InstallEngine(runner, silentLogger());

    const outcome = await engine.install(SERIAL, path.join(makeTempDir(), "missing.apk"));

    assert.deepStrictEqual(outcome, {
      success: false,
      error: ARTIFACT_NOT_FOUND_MESSAGE,
      failure: "validation",
      attempts: [],
    });
    assert.strictEqual(runner.calls.length, 0);
  });

  test("rejects a device that is not listed as usable", async () => {
    const apk = writeFile(makeTempDir(), "app.apk", APK_BYTES);
    const runner = new ScriptedRunner(() => ok(`${DEVICES_HEADER}\n${SERIAL}\tunauthorized\n`));

    const outcome = await new InstallEngine(runner, silentLogger()).install(SERIAL, apk);

    assert.deepStrictEqual(outcome, {
      success: false,
      error: `device ${SERIAL} is not connected`,
      failure: "validation",
      attempts: [],
    });
    assert.deepStrictEqual(runner.commandLines(), ["devices"]);
  });

  test("rejects invalid artifacts before any install attempt", async () => {
    const dir = makeTempDir();
    const cases: Array<[string, string | Buffer, string]> = [
      ["empty.apk", "", "file is empty"],
      ["app.zip", APK_BYTES, "expected a .apk file"],
      ["text.apk", "plain text", "missing ZIP header"],
    ];

    for (const [name, content, reason] of cases) {
      const runner = deviceRunner([]);
      const outcome = await new InstallEngine(runner, silentLogger()).install(SERIAL, writeFile(dir, name, content));

      assert.deepStrictEqual(outcome, {
        success: false,
        output: reason,
        error: INVALID_ARTIFACT_MESSAGE,
        failure: "validation",
        attempts: [],
      });
      assert.deepStrictEqual(installLines(runner), []);
    }
  });

  test("stops at the first strategy that succeeds", async () => {
    const apk = writeFile(makeTempDir(), "app.apk", APK_BYTES);
    const runner = deviceRunner([
      fail("adb: failed to install: Failure [INSTALL_FAILED_VERSION_DOWNGRADE]"),
      fail("adb: failed to install: Failure [INSTALL_FAILED_TEST_ONLY]"),
      ok("Performing Streamed Install\nSuccess"),
    ]);

    const outcome = await new InstallEngine(runner, silentLogger()).install(SERIAL, apk);

    assert.deepStrictEqual(outcome, {
      success: true,
      output: "Performing Streamed Install\nSuccess",
      strategy: "reinstall",
      attempts: [
        {
          strategy: "reinstall+downgrade",
          success: false,
          error: "adb: failed to install: Failure [INSTALL_FAILED_VERSION_DOWNGRADE]",
        },
        {
          strategy: "reinstall+test+downgrade",
          success: false,
          error: "adb: failed to install: Failure [INSTALL_FAILED_TEST_ONLY]",
        },
        { strategy: "reinstall", success: true },
      ],
    });
    assert.deepStrictEqual(installLines(runner), [
      `-s ${SERIAL} install -r -d ${apk}`,
      `-s ${SERIAL} install -r -t -d ${apk}`,
      `-s ${SERIAL} install -r ${apk}`,
    ]);
    assert.ok(runner.calls.filter((c) => c.args[0] === "install").every((c) => c.options?.timeoutMs === INSTALL_STRATEGY_TIMEOUT_MS));
  });

  test("short-circuits on a terminal package manager error", async () => {
    const apk = writeFile(makeTempDir(), "app.apk", APK_BYTES);
    const runner = deviceRunner([
      fail("adb: failed to install: Failure [INSTALL_FAILED_VERSION_DOWNGRADE]"),
      fail("adb: failed to install", "Failure [INSTALL_FAILED_UPDATE_INCOMPATIBLE: signatures do not match]"),
    ]);

    const outcome = await new InstallEngine(runner, silentLogger()).install(SERIAL, apk);

    assert.strictEqual(outcome.success, false);
    assert.strictEqual(outcome.failure, "fast_fail");
    assert.strictEqual(outcome.strategy, "reinstall+test+downgrade");
    assert.strictEqual(outcome.error, "adb: failed to install");
    assert.strictEqual(outcome.attempts.length, 2);
    // no third strategy and no diagnosis
    assert.deepStrictEqual(runner.commandLines(), [
      "devices",
      `-s ${SERIAL} install -r -d ${apk}`,
      `-s ${SERIAL} install -r -t -d ${apk}`,
    ]);
  });

  test("runs the whole ladder and embeds a diagnosis when every strategy fails", async () => {
    const apk = writeFile(makeTempDir(), "app.apk", APK_BYTES);
    const error = "adb: failed to install: Failure [INSTALL_FAILED_NO_MATCHING_ABIS]";
    const runner = deviceRunner(Array.from({ length: 5 }, () => fail(error)));

    const outcome = await new InstallEngine(runner, silentLogger()).install(SERIAL, apk);

    assert.deepStrictEqual(
      outcome.error?.split("\n"),
      [
        ALL_STRATEGIES_FAILED_MESSAGE,
        DIAGNOSIS_HEADER,
        "[ok]   artifact exists",
        "[info] artifact size: 6 bytes",
        `[ok]   device ${SERIAL} is connected`,
        "[info] device model: Pixel 7",
        "[info] Android version: 14",
        "[ok]   adb server responds",
        "[info] adb version: Android Debug Bridge version 1.0.41",
        "[ok]   device storage is accessible",
      ]
    );
    assert.strictEqual(outcome.failure, "exhausted");
    assert.deepStrictEqual(
      outcome.attempts.map((a) => a.strategy),
      ["reinstall+downgrade", "reinstall+test+downgrade", "reinstall", "reinstall+test", "plain"]
    );
    assert.deepStrictEqual(installLines(runner).at(-1), `-s ${SERIAL} install ${apk}`);
  });

  test("accepts a custom strategy list", async () => {
    const apk = writeFile(makeTempDir(), "app.apk", APK_BYTES);
    const runner = deviceRunner([ok("Success")]);

    const outcome = await new InstallEngine(runner, silentLogger(), [{ name: "grant", flags: ["-g"] }]).install(SERIAL, apk);

    assert.strictEqual(outcome.strategy, "grant");
    assert.deepStrictEqual(installLines(runner), [`-s ${SERIAL} install -g ${apk}`]);
  });
});

suite("Install diagnosis Test Suite", () => {
  test("reports each failing check on its own line", async () => {
    const runner = new ScriptedRunner(() => fail("error: no devices/emulators found"));

    const report = await diagnoseInstall(runner, SERIAL, path.join(makeTempDir(), "gone.apk"));

    assert.deepStrictEqual(report, [
      "[fail] artifact does not exist",
      `[fail] device ${SERIAL} is not connected`,
      "[fail] adb server does not respond",
      "[info] adb error: error: no devices/emulators found",
      "[warn] device storage is not accessible",
    ]);
  });

  test("turns a check that throws into a report line", async () => {
    const runner = new ScriptedRunner((args) => {
      if (args[0] === "version") {
        throw new Error("boom");
      }
      return fail("offline");
    });

    const report = await diagnoseInstall(runner, SERIAL, path.join(makeTempDir(), "gone.apk"));

    assert.strictEqual(report[2], "[fail] adb check errored: boom");
    assert.strictEqual(report.length, 4);
  });
});
