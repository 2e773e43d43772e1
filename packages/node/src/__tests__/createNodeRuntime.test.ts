import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import test from "node:test";
import { ALT_SCREEN_ENTER, RESTORE_TERMINAL } from "@termline/core";
import { createNodeRuntime } from "../createNodeRuntime.js";
import { FakeProcess, RecordingOutput } from "./support/fakeTerminal.js";

test("ctrl+c on stdin ends run() with the terminal restored and the session logged", async () => {
  const dir = mkdtempSync(join(tmpdir(), "termline-node-runtime-test-"));
  try {
    const logFile = join(dir, "app.log");
    const stdin = new PassThrough();
    const stdout = new RecordingOutput({ columns: 20, rows: 5 });
    const proc = new FakeProcess();
    const host = createNodeRuntime({
      platform: { stdin, stdout },
      env: { TERMLINE_LOG: "1", TERMLINE_LOG_FILE: logFile },
      proc,
    });
    try {
      const done = host.runtime.run();
      stdin.write("\u0003");
      await done;
      assert.equal(host.runtime.running, false);
      assert.deepEqual(host.runtime.size, { cols: 20, rows: 5 });
    } finally {
      host.dispose();
      host.dispose();
    }

    assert.equal(stdout.text.startsWith(ALT_SCREEN_ENTER), true);
    assert.equal(stdout.text.endsWith(RESTORE_TERMINAL), true);
    assert.equal(proc.listenerCount("SIGINT"), 0);

    const started = readFileSync(logFile, "utf8")
      .split("\n")
      .find((line) => line.includes('"msg":"runtime started"'));
    assert.match(
      started ?? "",
      /^\{"ts":"[^"]+","level":"info","scope":"termline","msg":"runtime started","cols":20,"rows":5\}$/,
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("explicit options win over the environment and hooks can be left out", () => {
  const proc = new FakeProcess();
  const host = createNodeRuntime({
    platform: { stdin: new PassThrough(), stdout: new RecordingOutput() },
    env: { TERMLINE_MAX_HISTORY: "7" },
    config: { maxHistory: 3 },
    processHooks: false,
    proc,
  });
  try {
    assert.equal(host.runtime.config.maxHistory, 3);
    assert.equal(proc.listenerCount("SIGINT"), 0);
  } finally {
    host.dispose();
  }
});
