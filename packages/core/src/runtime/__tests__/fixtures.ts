import { expectChar } from "../../actions/payload.js";
import type { Action } from "../../actions/types.js";
import { createLayoutNode } from "../../layout/node.js";
import type { LayoutNode, Size } from "../../layout/types.js";
import type { CapturedState, PaintContext } from "../component.js";
import type { Platform, TerminalSize } from "../platform.js";

type Reader = (chunk: Uint8Array | null) => void;

/** In-process terminal: scripted input, recorded output. */
export class FakePlatform implements Platform {
  readonly writes: string[] = [];
  inits = 0;
  closes = 0;
  clears = 0;
  #size: TerminalSize;
  readonly #pending: Uint8Array[] = [];
  readonly #readers: Reader[] = [];
  readonly #resizeListeners: Array<(size: TerminalSize) => void> = [];
  #ended = false;
  #failWith: Error | null = null;

  constructor(size: TerminalSize = { cols: 20, rows: 5 }) {
    this.#size = size;
  }

  init(): Promise<void> {
    this.inits++;
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.closes++;
    return Promise.resolve();
  }

  size(): TerminalSize {
    return this.#size;
  }

  readInput(signal: AbortSignal): Promise<Uint8Array | null> {
    if (this.#failWith !== null) {
      const error = this.#failWith;
      this.#failWith = null;
      return Promise.reject(error);
    }
    const next = this.#pending.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.#ended) return Promise.resolve(null);
    if (signal.aborted) return Promise.resolve(new Uint8Array(0));
    return new Promise<Uint8Array | null>((resolve) => {
      const onAbort = (): void => {
        const idx = this.#readers.indexOf(reader);
        if (idx >= 0) this.#readers.splice(idx, 1);
        resolve(new Uint8Array(0));
      };
      const reader: Reader = (chunk) => {
        signal.removeEventListener("abort", onAbort);
        resolve(chunk);
      };
      this.#readers.push(reader);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  writeString(text: string): void {
    this.writes.push(text);
  }

  clear(): void {
    this.clears++;
  }

  onResize(listener: (size: TerminalSize) => void): () => void {
    this.#resizeListeners.push(listener);
    return () => {
      const idx = this.#resizeListeners.indexOf(listener);
      if (idx >= 0) this.#resizeListeners.splice(idx, 1);
    };
  }

  /* ---------- Test controls ---------- */

  push(bytes: Uint8Array): void {
    const reader = this.#readers.shift();
    if (reader) reader(bytes);
    else this.#pending.push(bytes);
  }

  type(text: string): void {
    this.push(new TextEncoder().encode(text));
  }

  end(): void {
    this.#ended = true;
    for (const reader of this.#readers.splice(0)) reader(null);
  }

  /** The next readInput call rejects with `error`. */
  failNextRead(error: Error): void {
    this.#failWith = error;
  }

  resize(cols: number, rows: number): void {
    this.#size = { cols, rows };
    for (const listener of this.#resizeListeners.slice()) listener(this.#size);
  }

  get resizeListeners(): number {
    return this.#resizeListeners.length;
  }
}

/** Single-line text input implementing every capability. */
export class TextField {
  readonly id: string;
  readonly type = "text";
  value = "";
  disabled = false;
  clicks = 0;
  readonly received: string[] = [];

  constructor(id: string) {
    this.id = id;
  }

  isFocusable(): boolean {
    return !this.disabled;
  }

  measure(): Size {
    return { w: 10, h: 1 };
  }

  handleAction(action: Action): boolean {
    switch (action.type) {
      case "input_char": {
        const ch = expectChar(action);
        if (!ch.ok) return false;
        this.value += ch.value;
        this.received.push(ch.value);
        return true;
      }
      case "backspace":
        this.value = this.value.slice(0, -1);
        return true;
      case "mouse_click":
        this.clicks++;
        return true;
      default:
        return false;
    }
  }

  captureState(): CapturedState {
    return { state: { value: this.value }, disabled: this.disabled };
  }

  applyState(key: string, value: unknown): void {
    if (key === "value" && typeof value === "string") this.value = value;
  }

  paint(ctx: PaintContext): void {
    ctx.buffer.writeText(ctx.rect.x, ctx.rect.y, this.value, ctx.focused ? "7" : "", ctx.rect.w);
  }
}

/** root (20x5 column) > field1, field2 — fields measure 10x1. */
export function formTree(): LayoutNode {
  return createLayoutNode("root", "box", {
    style: { width: 20, height: 5 },
    children: [createLayoutNode("field1", "text"), createLayoutNode("field2", "text")],
  });
}
