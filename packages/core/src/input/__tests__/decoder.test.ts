import { assert, describe, test } from "@termline/testkit";
import { InputDecoder, decodeInput } from "../decoder.js";
import { EMPTY_MODS, charInput, keyInput } from "../types.js";

const NO_MODS = { shift: false, alt: false, ctrl: false, meta: false };

function bytes(s: string): Uint8Array {
  return Buffer.from(s, "utf8");
}

describe("decodeInput - single bytes", () => {
  test("printable ASCII and space", () => {
    assert.deepEqual(decodeInput(bytes("a ")), [charInput("a"), keyInput("space", " ")]);
  });

  test("control keys", () => {
    assert.deepEqual(decodeInput(bytes("\r\t\x7f")), [
      keyInput("enter"),
      keyInput("tab"),
      keyInput("backspace"),
    ]);
  });

  test("ctrl+letter", () => {
    assert.deepEqual(decodeInput([0x01, 0x1a]), [
      charInput("a", { ...NO_MODS, ctrl: true }),
      charInput("z", { ...NO_MODS, ctrl: true }),
    ]);
  });

  test("UTF-8 multi-byte characters", () => {
    assert.deepEqual(decodeInput(bytes("é€")), [charInput("é"), charInput("€")]);
  });

  test("ESC + printable is alt+key", () => {
    assert.deepEqual(decodeInput(bytes("\x1bx")), [charInput("x", { ...NO_MODS, alt: true })]);
  });
});

describe("decodeInput - escape sequences", () => {
  test("arrows, home/end and back-tab", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[A\x1b[D\x1b[H\x1b[F")), [
      keyInput("up"),
      keyInput("left"),
      keyInput("home"),
      keyInput("end"),
    ]);
    assert.deepEqual(decodeInput(bytes("\x1b[Z")), [keyInput("tab", null, { ...NO_MODS, shift: true })]);
  });

  test("modifier parameter", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[1;5A")), [keyInput("up", null, { ...NO_MODS, ctrl: true })]);
    assert.deepEqual(decodeInput(bytes("\x1b[1;2C")), [keyInput("right", null, { ...NO_MODS, shift: true })]);
  });

  test("tilde keys", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[3~\x1b[5~\x1b[15~\x1b[24~")), [
      keyInput("delete"),
      keyInput("pageup"),
      keyInput("f5"),
      keyInput("f12"),
    ]);
  });

  test("SS3 function keys and arrows", () => {
    assert.deepEqual(decodeInput(bytes("\x1bOP\x1bOS\x1bOB")), [
      keyInput("f1"),
      keyInput("f4"),
      keyInput("down"),
    ]);
  });

  test("focus reports are ignored", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[I\x1b[O")), []);
  });

  test("unterminated sequence longer than the lookahead is discarded", () => {
    const out = decodeInput(bytes(`\x1b[${"1".repeat(40)}A`));
    // The first 32 bytes go; the rest decode as plain characters.
    assert.equal(out.length, 11);
    assert.deepEqual(out[0], charInput("1"));
    assert.deepEqual(out[10], charInput("A"));
  });
});

describe("decodeInput - mouse", () => {
  test("SGR press and release are 1-based on the wire", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[<0;10;5M\x1b[<0;10;5m")), [
      { kind: "mouse", action: "press", button: "left", x: 9, y: 4, mods: NO_MODS },
      { kind: "mouse", action: "release", button: "left", x: 9, y: 4, mods: NO_MODS },
    ]);
  });

  test("SGR wheel and modifiers", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[<65;3;3M")), [
      { kind: "mouse", action: "wheel", button: "wheel_down", x: 2, y: 2, mods: NO_MODS },
    ]);
    assert.deepEqual(decodeInput(bytes("\x1b[<18;1;1M")), [
      { kind: "mouse", action: "press", button: "right", x: 0, y: 0, mods: { ...NO_MODS, ctrl: true } },
    ]);
  });

  test("SGR motion with a held button", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[<32;4;2M")), [
      { kind: "mouse", action: "motion", button: "left", x: 3, y: 1, mods: NO_MODS },
    ]);
  });

  test("legacy X10 encoding", () => {
    assert.deepEqual(decodeInput([0x1b, 0x5b, 0x4d, 0x20, 0x25, 0x23]), [
      { kind: "mouse", action: "press", button: "left", x: 4, y: 2, mods: NO_MODS },
    ]);
    assert.deepEqual(decodeInput([0x1b, 0x5b, 0x4d, 0x23, 0x21, 0x21]), [
      { kind: "mouse", action: "release", button: "none", x: 0, y: 0, mods: NO_MODS },
    ]);
  });
});

describe("InputDecoder - buffering", () => {
  test("holds a sequence split across reads", () => {
    const d = new InputDecoder();
    assert.deepEqual(d.push([0x1b, 0x5b]), []);
    assert.equal(d.hasPending, true);
    assert.deepEqual(d.push([0x41]), [keyInput("up")]);
    assert.equal(d.hasPending, false);
  });

  test("holds a split UTF-8 character", () => {
    const d = new InputDecoder();
    assert.deepEqual(d.push([0xe2, 0x82]), []);
    assert.deepEqual(d.push([0xac]), [charInput("€")]);
  });

  test("a lone ESC waits for flush", () => {
    const d = new InputDecoder();
    assert.deepEqual(d.push([0x1b]), []);
    assert.deepEqual(d.flush(), [keyInput("escape")]);
    assert.equal(d.hasPending, false);
  });

  test("double ESC yields escape then waits on the second", () => {
    const d = new InputDecoder();
    assert.deepEqual(d.push([0x1b, 0x1b]), [keyInput("escape")]);
    assert.deepEqual(d.flush(), [keyInput("escape")]);
  });

  test("bracketed paste becomes one event", () => {
    assert.deepEqual(decodeInput(bytes("\x1b[200~hi \x1b[A there\x1b[201~x")), [
      { kind: "paste", text: "hi \x1b[A there" },
      charInput("x"),
    ]);
  });

  test("paste end marker split across reads", () => {
    const d = new InputDecoder();
    assert.deepEqual(d.push(bytes("\x1b[200~ab\x1b[2")), []);
    assert.equal(d.hasPending, true);
    assert.deepEqual(d.push(bytes("01~")), [{ kind: "paste", text: "ab" }]);
    assert.equal(d.hasPending, false);
  });

  test("reset drops held bytes", () => {
    const d = new InputDecoder();
    d.push([0x1b, 0x5b, 0x31]);
    d.reset();
    assert.equal(d.hasPending, false);
    assert.deepEqual(d.push(bytes("q")), [charInput("q", EMPTY_MODS)]);
  });
});
