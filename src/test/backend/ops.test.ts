import * as assert from "node:assert";
import type { InstallOutcome } from "../../backend/install/installEngine.js";
import { InstallTracker } from "../../backend/ops/installTracker.js";
import { SingleFlightGuard } from "../../backend/ops/singleFlight.js";
import { silentLogger } from "../helpers.js";

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: Error): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const SUCCESS: InstallOutcome = { success: true, output: "Success", strategy: "reinstall", attempts: [] };

suite("SingleFlightGuard Test Suite", () => {
  test("turns away a second acquirer until the lease is released", () => {
    const guard = new SingleFlightGuard();

    const lease = guard.tryAcquire("devices.connect");
    assert.ok(lease);
    assert.strictEqual(guard.active(), "devices.connect");
    assert.strictEqual(guard.tryAcquire("devices.refresh"), null);

    lease.release();
    assert.strictEqual(guard.active(), null);
    assert.ok(guard.tryAcquire("devices.refresh"));
  });

  test("a stale lease cannot release a newer holder", () => {
    const guard = new SingleFlightGuard();
    const first = guard.tryAcquire("devices.connect");
    first?.release();
    guard.tryAcquire("devices.refresh");

    first?.release();

    assert.strictEqual(guard.active(), "devices.refresh");
  });

  test("run reports busy while another operation is in flight", async () => {
    const guard = new SingleFlightGuard();
    const gate = deferred<string>();

    const running = guard.run("devices.refresh", () => gate.promise);
    const rejected = await guard.run("devices.connect", async () => "never");

    assert.deepStrictEqual(rejected, { busy: true, active: "devices.refresh" });

    gate.resolve("done");
    assert.deepStrictEqual(await running, { busy: false, value: "done" });
    assert.strictEqual(guard.active(), null);
  });

  test("run releases the slot when the operation throws", async () => {
    const guard = new SingleFlightGuard();

    await assert.rejects(
      guard.run("app.uninstall", async () => {
        throw new Error("adb crashed");
      }),
      /adb crashed/
    );
    assert.strictEqual(guard.active(), null);
  });
});

suite("InstallTracker Test Suite", () => {
  test("runs installs concurrently, each with its own record", async () => {
    const gates = new Map<string, Deferred<InstallOutcome>>();
    const tracker = new InstallTracker((deviceId) => {
      const gate = deferred<InstallOutcome>();
      gates.set(deviceId, gate);
      return gate.promise;
    }, silentLogger());

    const a = tracker.start("emulator-5554", "/apks/a.apk");
    const b = tracker.start("192.168.1.50:5555", "/apks/b.apk");

    assert.notStrictEqual(a.install_id, b.install_id);
    assert.strictEqual(a.state, "running");
    assert.strictEqual(b.state, "running");
    assert.strictEqual(tracker.runningCount(), 2);
    assert.strictEqual(gates.size, 2);

    gates.get("192.168.1.50:5555")?.resolve({ success: false, error: "all install strategies failed", attempts: [] });
    const finishedB = await tracker.wait(b.install_id);
    assert.strictEqual(finishedB?.state, "failed");
    assert.strictEqual(tracker.get(a.install_id)?.state, "running");

    gates.get("emulator-5554")?.resolve(SUCCESS);
    const finishedA = await tracker.wait(a.install_id);
    assert.strictEqual(finishedA?.state, "succeeded");
    assert.deepStrictEqual(finishedA?.outcome, SUCCESS);
    assert.strictEqual(tracker.runningCount(), 0);
    assert.deepStrictEqual(
      tracker.list().map((r) => r.install_id),
      [a.install_id, b.install_id]
    );
  });

  test("records a thrown install error as a failed outcome", async () => {
    const tracker = new InstallTracker(async () => {
      throw new Error("device vanished");
    }, silentLogger());

    const started = tracker.start("emulator-5554", "/apks/a.apk");
    const finished = await tracker.wait(started.install_id);

    assert.strictEqual(finished?.state, "failed");
    assert.deepStrictEqual(finished?.outcome, { success: false, error: "device vanished", attempts: [] });
  });

  test("hands out snapshots, not live records", async () => {
    const tracker = new InstallTracker(async () => SUCCESS, silentLogger());
    const started = tracker.start("emulator-5554", "/apks/a.apk");

    await tracker.wait(started.install_id);

    assert.strictEqual(started.state, "running");
    assert.strictEqual(tracker.get(started.install_id)?.state, "succeeded");
    assert.strictEqual(tracker.get("install_unknown"), undefined);
    assert.strictEqual(await tracker.wait("install_unknown"), undefined);
  });

  test("prunes finished installs past the retention period on the next start", async () => {
    // negative retention: everything finished is already expired
    const tracker = new InstallTracker(async () => SUCCESS, silentLogger(), -1);
    const first = tracker.start("emulator-5554", "/apks/a.apk");
    await tracker.wait(first.install_id);

    const second = tracker.start("emulator-5554", "/apks/b.apk");

    assert.strictEqual(tracker.get(first.install_id), undefined);
    assert.deepStrictEqual(
      tracker.list().map((r) => r.install_id),
      [second.install_id]
    );
  });
});
