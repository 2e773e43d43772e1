import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import test from "node:test";
import { setImmediate as nextTurn } from "node:timers/promises";
import { Runtime, type RuntimeConfigOverrides, createLogger } from "@termline/core";
import { NodePlatform } from "../platform/nodePlatform.js";
import { createCrashReportWriter, installProcessHooks } from "../process/hooks.js";
import { FakeProcess, RecordingOutput } from "./support/fakeTerminal.js";

function makeRuntime(config: RuntimeConfigOverrides = {}, crashDir?: string): Runtime {
  return new Runtime({
    platform: new NodePlatform({ stdin: new PassThrough(), stdout: new RecordingOutput() }),
    env: {},
    config,
    logger: createLogger("test", { enabled: false, env: {} }),
    clock: () => 1000,
    crashHandlers: crashDir === undefined ? [] : [createCrashReportWriter(crashDir)],
  });
}

test("termination signals become quit through the input queue", () => {
  const runtime = makeRuntime();
  const proc = new FakeProcess();
  const uninstall = installProcessHooks(runtime, { proc });
  try {
    proc.emit("SIGTERM");
    assert.equal(runtime.inputQueue.size, 1);
    assert.equal(runtime.stopRequested, false);
    assert.equal(runtime.update(), 1);
    assert.equal(runtime.stopRequested, true);
  } finally {
    uninstall();
  }
});

test("a signal that cannot be queued stops the runtime directly", () => {
  const runtime = makeRuntime({ inputQueueCapacity: 1 });
  const proc = new FakeProcess();
  const uninstall = installProcessHooks(runtime, { proc, signals: ["SIGINT"] });
  try {
    proc.emit("SIGINT");
    assert.equal(runtime.stopRequested, false);
    proc.emit("SIGINT");
    assert.equal(runtime.stopRequested, true);
  } finally {
    uninstall();
  }
});

test("uncaught faults go through recovery and mark the process failed", async () => {
  const dir = mkdtempSync(join(tmpdir(), "termline-hooks-test-"));
  try {
    const runtime = makeRuntime({}, dir);
    const proc = new FakeProcess();
    const uninstall = installProcessHooks(runtime, { proc });
    try {
      proc.emit("unhandledRejection", new Error("boom"));
      await nextTurn();

      assert.equal(proc.exitCode, 1);
      assert.equal(runtime.stopRequested, true);
      const reports = runtime.recovery.reports();
      assert.equal(reports.length, 1);
      assert.equal(reports[0]?.task, "unhandled-rejection");
      assert.equal(reports[0]?.error, "Error: boom");

      const files = readdirSync(dir);
      assert.deepEqual(files, [`termline-crash-1000-${String(process.pid)}.log`]);
      const body = readFileSync(join(dir, files[0] ?? ""), "utf8");
      assert.equal(body.split("\n")[0], "fault in unhandled-rejection: Error: boom");
      assert.equal(body.split("\n")[1], "at: 1970-01-01T00:00:01.000Z");
    } finally {
      uninstall();
    }
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("exit restores the terminal only while the runtime runs", async () => {
  const runtime = makeRuntime();
  const proc = new FakeProcess();
  let restored = 0;
  const uninstall = installProcessHooks(runtime, { proc, restoreOnExit: () => restored++ });
  try {
    await runtime.start();
    proc.emit("exit");
    assert.equal(restored, 1);
    await runtime.stop();
    proc.emit("exit");
    assert.equal(restored, 1);
  } finally {
    uninstall();
  }
});

test("uninstall detaches every listener and is idempotent", () => {
  const runtime = makeRuntime();
  const proc = new FakeProcess();
  const uninstall = installProcessHooks(runtime, { proc });
  assert.equal(proc.listenerCount("SIGINT"), 1);
  assert.equal(proc.listenerCount("uncaughtException"), 1);
  uninstall();
  uninstall();
  for (const event of ["SIGINT", "SIGTERM", "uncaughtException", "unhandledRejection", "exit"]) {
    assert.equal(proc.listenerCount(event), 0, event);
  }
});
