/**
 * packages/core/src/input/decoder.ts — Terminal byte stream -> RawInput.
 *
 * Handles:
 *   - printable ASCII and UTF-8 multi-byte characters
 *   - control bytes: enter, tab, backspace, ctrl+letter (0x01..0x1a)
 *   - ESC-prefixed printable as alt+key
 *   - CSI sequences: arrows, home/end, "~" keys, back-tab, xterm F1..F4,
 *     modifier parameter ("1;5A" = ctrl+up)
 *   - SS3 sequences (ESC O x): F1..F4, arrows, home/end
 *   - mouse: legacy X10 (ESC [ M cb cx cy, offsets 32/33) and SGR
 *     (ESC [ < cb ; cx ; cy M|m, 1-based)
 *   - bracketed paste (ESC [200~ ... ESC [201~) as one paste event
 *
 * A sequence split across reads is held until more bytes arrive. A sequence
 * still unterminated after MAX_LOOKAHEAD bytes is discarded. `flush()`
 * resolves held bytes: a lone ESC becomes the escape key.
 */

import {
  EMPTY_MODS,
  charInput,
  type KeyMods,
  type KeyName,
  keyInput,
  type MouseButton,
  type MouseInput,
  type RawInput,
} from "./types.js";

const ESC = 0x1b;
export const MAX_LOOKAHEAD = 32;

const PASTE_END = Object.freeze([0x1b, 0x5b, 0x32, 0x30, 0x31, 0x7e]);

type Step =
  | Readonly<{ kind: "emit"; len: number; input: RawInput | null }>
  | Readonly<{ kind: "paste"; len: number }>
  | Readonly<{ kind: "incomplete" }>;

const INCOMPLETE: Step = Object.freeze({ kind: "incomplete" });

function emit(len: number, input: RawInput | null): Step {
  return { kind: "emit", len, input };
}

function byteAt(buf: readonly number[], i: number): number {
  return buf[i] ?? -1;
}

const ALT: KeyMods = Object.freeze({ ...EMPTY_MODS, alt: true });

/* ---------- Plain bytes ---------- */

function utf8Length(lead: number): number {
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

function decodePlain(buf: readonly number[], i: number, final: boolean, mods: KeyMods): Step {
  const b = byteAt(buf, i);
  if (b === 0x0d || b === 0x0a) return emit(1, keyInput("enter", null, mods));
  if (b === 0x09) return emit(1, keyInput("tab", null, mods));
  if (b === 0x7f || b === 0x08) return emit(1, keyInput("backspace", null, mods));
  if (b === 0x00) return emit(1, keyInput("space", " ", { ...mods, ctrl: true }));
  if (b >= 0x01 && b <= 0x1a) {
    return emit(1, charInput(String.fromCharCode(0x60 + b), { ...mods, ctrl: true }));
  }
  if (b < 0x20) return emit(1, null);
  if (b < 0x7f) return emit(1, charInput(String.fromCharCode(b), mods));

  const len = utf8Length(b);
  if (len === 0) return emit(1, null);
  if (i + len > buf.length) return final ? emit(buf.length - i, null) : INCOMPLETE;

  let cp = b & (0xff >> (len + 1));
  for (let k = 1; k < len; k++) {
    const cont = byteAt(buf, i + k);
    if ((cont & 0xc0) !== 0x80) return emit(1, null);
    cp = (cp << 6) | (cont & 0x3f);
  }
  return emit(len, charInput(String.fromCodePoint(cp), mods));
}

/* ---------- Mouse ---------- */

const BUTTONS: readonly MouseButton[] = ["left", "middle", "right", "none"];

/**
 * `release` is explicit for SGR ("m" terminator); for X10 it is null and a
 * release is encoded as button bits 3.
 */
export function decodeMouseCode(
  cb: number,
  x: number,
  y: number,
  release: boolean | null,
): MouseInput | null {
  const mods: KeyMods = Object.freeze({
    shift: (cb & 4) !== 0,
    alt: (cb & 8) !== 0,
    ctrl: (cb & 16) !== 0,
    meta: false,
  });
  const low = cb & 3;
  const px = Math.max(0, x);
  const py = Math.max(0, y);
  const mk = (action: MouseInput["action"], button: MouseButton): MouseInput =>
    Object.freeze({ kind: "mouse", action, button, x: px, y: py, mods });

  if ((cb & 64) !== 0) {
    if (low === 0) return mk("wheel", "wheel_up");
    if (low === 1) return mk("wheel", "wheel_down");
    return null;
  }
  const button = BUTTONS[low] ?? "none";
  if ((cb & 32) !== 0) return mk("motion", button);
  if (release === true) return mk("release", button);
  if (release === null && low === 3) return mk("release", "none");
  return mk("press", button);
}

/* ---------- Escape sequences ---------- */

function modsFromParam(raw: string | undefined): KeyMods {
  const m = raw === undefined ? Number.NaN : Number.parseInt(raw, 10);
  if (!Number.isFinite(m) || m < 2) return EMPTY_MODS;
  const bits = m - 1;
  return Object.freeze({
    shift: (bits & 1) !== 0,
    alt: (bits & 2) !== 0,
    ctrl: (bits & 4) !== 0,
    meta: (bits & 8) !== 0,
  });
}

const TILDE_KEYS: ReadonlyMap<number, KeyName> = new Map<number, KeyName>([
  [1, "home"],
  [2, "insert"],
  [3, "delete"],
  [4, "end"],
  [5, "pageup"],
  [6, "pagedown"],
  [7, "home"],
  [8, "end"],
  [11, "f1"],
  [12, "f2"],
  [13, "f3"],
  [14, "f4"],
  [15, "f5"],
  [17, "f6"],
  [18, "f7"],
  [19, "f8"],
  [20, "f9"],
  [21, "f10"],
  [23, "f11"],
  [24, "f12"],
]);

/** Final bytes shared by CSI and SS3 ("A" = up, "P" = F1, ...). */
const LETTER_KEYS: ReadonlyMap<string, KeyName> = new Map<string, KeyName>([
  ["A", "up"],
  ["B", "down"],
  ["C", "right"],
  ["D", "left"],
  ["H", "home"],
  ["F", "end"],
  ["P", "f1"],
  ["Q", "f2"],
  ["R", "f3"],
  ["S", "f4"],
]);

type CsiResult = RawInput | null | "paste_start";

function decodeCsiBody(params: string, finalByte: number): CsiResult {
  const fin = String.fromCharCode(finalByte);

  if (params.startsWith("<")) {
    if (fin !== "M" && fin !== "m") return null;
    const nums = params.slice(1).split(";").map((p) => Number.parseInt(p, 10));
    const [cb, cx, cy] = nums;
    if (nums.length !== 3 || cb === undefined || cx === undefined || cy === undefined) return null;
    if (!Number.isFinite(cb) || !Number.isFinite(cx) || !Number.isFinite(cy)) return null;
    return decodeMouseCode(cb, cx - 1, cy - 1, fin === "m");
  }

  const parts = params.split(";");
  const mods = modsFromParam(parts[1]);

  if (fin === "~") {
    const code = Number.parseInt(parts[0] ?? "", 10);
    if (code === 200) return "paste_start";
    const key = TILDE_KEYS.get(code);
    return key === undefined ? null : keyInput(key, null, mods);
  }
  if (fin === "Z") return keyInput("tab", null, { ...mods, shift: true });

  const key = LETTER_KEYS.get(fin);
  return key === undefined ? null : keyInput(key, null, mods);
}

function decodeCsi(buf: readonly number[], i: number, final: boolean): Step {
  const start = i + 2;
  if (start >= buf.length) return final ? emit(2, charInput("[", ALT)) : INCOMPLETE;

  if (byteAt(buf, start) === 0x4d) {
    if (buf.length - i < 6) return final ? emit(buf.length - i, null) : INCOMPLETE;
    const cb = byteAt(buf, i + 3) - 32;
    const x = byteAt(buf, i + 4) - 33;
    const y = byteAt(buf, i + 5) - 33;
    return emit(6, decodeMouseCode(cb, x, y, null));
  }

  let j = start;
  while (j < buf.length) {
    if (j - i >= MAX_LOOKAHEAD) return emit(j - i, null);
    const c = byteAt(buf, j);
    if (c >= 0x40 && c <= 0x7e) break;
    if (c < 0x20 || c > 0x3f) return emit(j - i, null);
    j++;
  }
  if (j >= buf.length) return final ? emit(buf.length - i, null) : INCOMPLETE;

  const params = String.fromCharCode(...buf.slice(start, j));
  const result = decodeCsiBody(params, byteAt(buf, j));
  if (result === "paste_start") return { kind: "paste", len: j - i + 1 };
  return emit(j - i + 1, result);
}

function decodeSs3(buf: readonly number[], i: number, final: boolean): Step {
  if (i + 2 >= buf.length) return final ? emit(2, charInput("O", ALT)) : INCOMPLETE;
  const fin = String.fromCharCode(byteAt(buf, i + 2));
  if (fin === "M") return emit(3, keyInput("enter"));
  const key = LETTER_KEYS.get(fin);
  return emit(3, key === undefined ? null : keyInput(key));
}

function decodeOne(buf: readonly number[], i: number, final: boolean): Step {
  if (byteAt(buf, i) !== ESC) return decodePlain(buf, i, final, EMPTY_MODS);

  if (i + 1 >= buf.length) return final ? emit(1, keyInput("escape")) : INCOMPLETE;
  const next = byteAt(buf, i + 1);
  if (next === 0x5b) return decodeCsi(buf, i, final);
  if (next === 0x4f) return decodeSs3(buf, i, final);
  if (next === ESC) return emit(1, keyInput("escape"));

  const inner = decodePlain(buf, i + 1, final, ALT);
  if (inner.kind !== "emit") return inner;
  return emit(inner.len + 1, inner.input);
}

/* ---------- Stateful decoder ---------- */

function indexOfSequence(buf: readonly number[], seq: readonly number[], from: number): number {
  outer: for (let i = from; i + seq.length <= buf.length; i++) {
    for (let k = 0; k < seq.length; k++) {
      if (buf[i + k] !== seq[k]) continue outer;
    }
    return i;
  }
  return -1;
}

const utf8 = new TextDecoder("utf-8");

export class InputDecoder {
  #pending: number[] = [];
  #paste: number[] | null = null;

  /** True while bytes are held for a possibly incomplete sequence or paste. */
  get hasPending(): boolean {
    return this.#pending.length > 0 || this.#paste !== null;
  }

  push(bytes: Iterable<number>): RawInput[] {
    for (const b of bytes) this.#pending.push(b);
    return this.#drain(false);
  }

  /** Resolve held bytes. An unterminated paste keeps waiting for its end marker. */
  flush(): RawInput[] {
    return this.#drain(true);
  }

  reset(): void {
    this.#pending = [];
    this.#paste = null;
  }

  #drain(final: boolean): RawInput[] {
    const out: RawInput[] = [];
    const buf = this.#pending;
    let i = 0;

    while (i < buf.length) {
      if (this.#paste !== null) {
        const end = indexOfSequence(buf, PASTE_END, i);
        if (end < 0) {
          // The end marker may straddle reads; hold its possible prefix.
          const keep = Math.max(i, buf.length - (PASTE_END.length - 1));
          this.#paste = this.#paste.concat(buf.slice(i, keep));
          i = keep;
          break;
        }
        const text = utf8.decode(Uint8Array.from(this.#paste.concat(buf.slice(i, end))));
        out.push(Object.freeze({ kind: "paste", text }));
        this.#paste = null;
        i = end + PASTE_END.length;
        continue;
      }

      const step = decodeOne(buf, i, final);
      if (step.kind === "incomplete") break;
      if (step.kind === "paste") {
        this.#paste = [];
      } else if (step.input !== null) {
        out.push(step.input);
      }
      i += step.len;
    }

    this.#pending = buf.slice(i);
    return out;
  }
}

/** One-shot decode of a complete chunk. */
export function decodeInput(bytes: Iterable<number>): RawInput[] {
  const d = new InputDecoder();
  return [...d.push(bytes), ...d.flush()];
}
