import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import test from "node:test";
import {
  ALT_SCREEN_ENTER,
  CLEAR_SCREEN,
  CURSOR_HIDE,
  CURSOR_HOME,
  MOUSE_ENABLE,
  PASTE_ENABLE,
  RESTORE_TERMINAL,
  type TerminalSize,
} from "@termline/core";
import { NodePlatform } from "../platform/nodePlatform.js";
import { FakeTtyInput, RecordingOutput, text } from "./support/fakeTerminal.js";

test("init enters raw mode and writes the preamble; close undoes both once", async () => {
  const stdin = new FakeTtyInput();
  const stdout = new RecordingOutput();
  const platform = new NodePlatform({ stdin, stdout });

  await platform.init();
  assert.equal(platform.initialized, true);
  assert.deepEqual(stdin.rawModes, [true]);
  assert.equal(stdout.text, ALT_SCREEN_ENTER + CURSOR_HIDE + MOUSE_ENABLE + PASTE_ENABLE);

  stdout.text = "";
  await platform.close();
  await platform.close();
  assert.equal(platform.initialized, false);
  assert.deepEqual(stdin.rawModes, [true, false]);
  assert.equal(stdout.text, RESTORE_TERMINAL);
});

test("optional modes are left out and an already-raw input stays raw", async () => {
  const stdin = new FakeTtyInput(true);
  const stdout = new RecordingOutput();
  const platform = new NodePlatform({ stdin, stdout, altScreen: false, mouse: false });

  await platform.init();
  assert.equal(stdout.text, CURSOR_HIDE + PASTE_ENABLE);
  await platform.close();
  assert.deepEqual(stdin.rawModes, []);
});

test("readInput delivers chunks in order, buffered or awaited", async () => {
  const stdin = new PassThrough();
  const platform = new NodePlatform({ stdin, stdout: new RecordingOutput() });
  await platform.init();
  const signal = new AbortController().signal;
  try {
    const pending = platform.readInput(signal);
    stdin.write("a");
    assert.equal(text(await pending), "a");

    stdin.write("b");
    stdin.write("c");
    assert.equal(text(await platform.readInput(signal)), "b");
    assert.equal(text(await platform.readInput(signal)), "c");
  } finally {
    await platform.close();
  }
});

test("readInput resolves an empty chunk on abort and null at end of input", async () => {
  const stdin = new PassThrough();
  const platform = new NodePlatform({ stdin, stdout: new RecordingOutput() });
  await platform.init();
  try {
    const ac = new AbortController();
    const aborted = platform.readInput(ac.signal);
    ac.abort();
    const chunk = await aborted;
    assert.ok(chunk !== null);
    assert.equal(chunk.length, 0);

    const signal = new AbortController().signal;
    const ended = platform.readInput(signal);
    stdin.end();
    assert.equal(await ended, null);
    assert.equal(await platform.readInput(signal), null);
  } finally {
    await platform.close();
  }
});

test("close resolves pending readers with null", async () => {
  const platform = new NodePlatform({ stdin: new PassThrough(), stdout: new RecordingOutput() });
  await platform.init();
  const pending = platform.readInput(new AbortController().signal);
  await platform.close();
  assert.equal(await pending, null);
});

test("stream errors reject pending and later reads", async () => {
  const stdin = new PassThrough();
  const platform = new NodePlatform({ stdin, stdout: new RecordingOutput() });
  await platform.init();
  const signal = new AbortController().signal;
  try {
    const pending = platform.readInput(signal);
    stdin.emit("error", new Error("tty gone"));
    await assert.rejects(pending, /tty gone/);
    await assert.rejects(platform.readInput(signal), /tty gone/);
  } finally {
    await platform.close();
  }
});

test("size prefers the stream, then the probe, then the fallback", () => {
  const sized = new NodePlatform({
    stdout: new RecordingOutput({ columns: 120, rows: 40 }),
    probeSize: () => ({ columns: 1, rows: 1 }),
  });
  assert.deepEqual(sized.size(), { cols: 120, rows: 40 });

  const probed = new NodePlatform({
    stdout: new RecordingOutput(),
    probeSize: () => ({ columns: 100, rows: 0 }),
    fallbackSize: { cols: 60, rows: 20 },
  });
  assert.deepEqual(probed.size(), { cols: 100, rows: 20 });

  const failing = new NodePlatform({
    stdout: new RecordingOutput(),
    probeSize: () => {
      throw new Error("no tty");
    },
  });
  assert.deepEqual(failing.size(), { cols: 80, rows: 24 });
});

test("clear and writeString go straight to the output", () => {
  const stdout = new RecordingOutput();
  const platform = new NodePlatform({ stdout });
  platform.writeString("hi");
  platform.clear();
  assert.equal(stdout.text, `hi${CLEAR_SCREEN}${CURSOR_HOME}`);
});

test("resize events report the current size until unsubscribed", () => {
  const stdout = new RecordingOutput({ columns: 80, rows: 24 });
  const platform = new NodePlatform({ stdout });
  const seen: TerminalSize[] = [];
  const unsubscribe = platform.onResize((size) => seen.push(size));

  stdout.columns = 100;
  stdout.rows = 30;
  stdout.emit("resize");
  unsubscribe();
  unsubscribe();
  stdout.emit("resize");
  assert.deepEqual(seen, [{ cols: 100, rows: 30 }]);
});
