import { assert, describe, test } from "@termline/testkit";
import { RESTORE_TERMINAL } from "../ansi.js";
import { type CrashReport, Recovery, formatCrashReport, installRecovery } from "../recovery.js";
import { FakePlatform } from "./fixtures.js";

describe("Recovery", () => {
  test("restores the terminal before running handlers", async () => {
    const order: string[] = [];
    const recovery = new Recovery({
      restore: () => {
        order.push("restore");
      },
      handlers: [() => order.push("handler")],
      clock: () => 42,
    });
    const report = await recovery.handle(new Error("bad frame"), "render");
    assert.deepEqual(order, ["restore", "handler"]);
    assert.equal(report.task, "render");
    assert.equal(report.error, "Error: bad frame");
    assert.equal(report.at, 42);
    assert.equal(typeof report.stack, "string");
    assert.equal(report.env.pid, process.pid);
    assert.equal(report.env.node, process.version);
  });

  test("a throwing handler does not stop the others", async () => {
    const seen: string[] = [];
    const recovery = new Recovery({
      handlers: [
        () => {
          throw new Error("handler broke");
        },
        (r) => seen.push(r.error),
      ],
    });
    await recovery.handle("plain string");
    assert.deepEqual(seen, ["plain string"]);
  });

  test("runSafely rethrows under the rethrow policy", async () => {
    const exits: number[] = [];
    const recovery = new Recovery({ exit: (code) => exits.push(code) });
    const boom = new Error("boom");
    await assert.rejects(
      recovery.runSafely("main", () => {
        throw boom;
      }),
      (e: unknown) => e === boom,
    );
    assert.deepEqual(exits, []);
    assert.equal(recovery.reports().length, 1);
  });

  test("the exit policy exits with code 1", async () => {
    const exits: number[] = [];
    const recovery = new Recovery({ policy: "exit", exit: (code) => exits.push(code) });
    await recovery.handle(new Error("fatal"));
    assert.deepEqual(exits, [1]);
  });

  test("runSafely passes results through", async () => {
    const recovery = new Recovery();
    assert.equal(await recovery.runSafely("main", async () => 7), 7);
    assert.equal(recovery.reports().length, 0);
  });

  test("addHandler returns an idempotent unsubscribe", async () => {
    const recovery = new Recovery();
    const seen: CrashReport[] = [];
    const off = recovery.addHandler((r) => seen.push(r));
    off();
    off();
    await recovery.handle(new Error("x"));
    assert.equal(seen.length, 0);
  });

  test("installRecovery writes the restore sequence and closes the platform", async () => {
    const platform = new FakePlatform();
    const recovery = installRecovery(platform);
    await recovery.handle(new Error("x"));
    assert.deepEqual(platform.writes, [RESTORE_TERMINAL]);
    assert.equal(platform.closes, 1);
  });

  test("formatCrashReport renders a readable summary", () => {
    const text = formatCrashReport({
      error: "Error: x",
      stack: null,
      task: "main",
      at: 0,
      env: { node: "v20.0.0", platform: "linux", arch: "x64", pid: 9 },
    });
    assert.equal(
      text,
      "fault in main: Error: x\nat: 1970-01-01T00:00:00.000Z\nenv: node v20.0.0 linux/x64 pid 9",
    );
  });
});
