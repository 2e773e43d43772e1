/**
 * packages/node/src/platform/nodePlatform.ts — Platform over process stdio.
 *
 * Why: The core runtime only knows the Platform interface. This binding owns
 * the TTY: raw mode, the alternate screen, mouse and bracketed-paste
 * reporting, and resize notifications. init() and close() are symmetric; the
 * terminal is returned to the mode it was in before init().
 */

import {
  ALT_SCREEN_ENTER,
  CLEAR_SCREEN,
  CURSOR_HIDE,
  CURSOR_HOME,
  DEFAULT_TERMINAL_SIZE,
  type Logger,
  MOUSE_ENABLE,
  PASTE_ENABLE,
  type Platform,
  RESTORE_TERMINAL,
  SILENT_LOGGER,
  type TerminalSize,
  TermlineError,
} from "@termline/core";
import terminalSize from "terminal-size";

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type TerminalOutput = NodeJS.WritableStream & {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
};

export type NodePlatformOptions = Readonly<{
  stdin?: TerminalInput;
  stdout?: TerminalOutput;
  /** Draw on the alternate screen. Default true. */
  altScreen?: boolean;
  /** Request SGR mouse reporting. Default true. */
  mouse?: boolean;
  /** Fallback when neither the stream nor the OS reports a size. */
  fallbackSize?: TerminalSize;
  /** Size probe used when the output stream has no columns/rows. */
  probeSize?: () => { columns: number; rows: number };
  logger?: Logger;
}>;

type Reader = Readonly<{
  resolve: (chunk: Uint8Array | null) => void;
  reject: (error: Error) => void;
}>;

const EMPTY = new Uint8Array(0);

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return new TextEncoder().encode(chunk);
  return EMPTY;
}

export class NodePlatform implements Platform {
  readonly #stdin: TerminalInput;
  readonly #stdout: TerminalOutput;
  readonly #altScreen: boolean;
  readonly #mouse: boolean;
  readonly #fallback: TerminalSize;
  readonly #probe: () => { columns: number; rows: number };
  readonly #log: Logger;

  readonly #chunks: Uint8Array[] = [];
  readonly #readers: Reader[] = [];
  #initialized = false;
  #restoreRaw = false;
  #ended = false;
  #failure: Error | null = null;

  readonly #onData = (chunk: unknown): void => {
    const bytes = toBytes(chunk);
    if (bytes.length === 0) return;
    const reader = this.#readers.shift();
    if (reader) reader.resolve(bytes);
    else this.#chunks.push(bytes);
  };

  readonly #onEnd = (): void => {
    this.#ended = true;
    for (const reader of this.#readers.splice(0)) reader.resolve(null);
  };

  readonly #onError = (error: unknown): void => {
    const failure =
      error instanceof Error ? error : new TermlineError("PLATFORM_ERROR", `stdin error: ${String(error)}`);
    this.#failure = failure;
    for (const reader of this.#readers.splice(0)) reader.reject(failure);
  };

  constructor(opts: NodePlatformOptions = {}) {
    this.#stdin = opts.stdin ?? process.stdin;
    this.#stdout = opts.stdout ?? process.stdout;
    this.#altScreen = opts.altScreen ?? true;
    this.#mouse = opts.mouse ?? true;
    this.#fallback = opts.fallbackSize ?? DEFAULT_TERMINAL_SIZE;
    this.#probe = opts.probeSize ?? terminalSize;
    this.#log = opts.logger ?? SILENT_LOGGER;
  }

  get initialized(): boolean {
    return this.#initialized;
  }

  async init(): Promise<void> {
    if (this.#initialized) return;
    const stdin = this.#stdin;
    if (stdin.isTTY === true && typeof stdin.setRawMode === "function") {
      if (stdin.isRaw !== true) {
        stdin.setRawMode(true);
        this.#restoreRaw = true;
      }
    }
    stdin.on("data", this.#onData);
    stdin.on("end", this.#onEnd);
    stdin.on("error", this.#onError);
    stdin.resume();

    let preamble = CURSOR_HIDE;
    if (this.#altScreen) preamble = ALT_SCREEN_ENTER + preamble;
    if (this.#mouse) preamble += MOUSE_ENABLE;
    preamble += PASTE_ENABLE;
    this.#stdout.write(preamble);
    this.#initialized = true;
    this.#log.debug("platform initialized", { raw: this.#restoreRaw, altScreen: this.#altScreen });
  }

  async close(): Promise<void> {
    if (!this.#initialized) return;
    this.#initialized = false;
    const stdin = this.#stdin;
    stdin.off("data", this.#onData);
    stdin.off("end", this.#onEnd);
    stdin.off("error", this.#onError);
    stdin.pause();
    for (const reader of this.#readers.splice(0)) reader.resolve(null);
    try {
      this.#stdout.write(RESTORE_TERMINAL);
    } finally {
      if (this.#restoreRaw && typeof stdin.setRawMode === "function") {
        this.#restoreRaw = false;
        stdin.setRawMode(false);
      }
    }
    this.#log.debug("platform closed");
  }

  /** Stream-reported size, then the OS probe, then the fallback. */
  size(): TerminalSize {
    const cols = toPositiveIntOr(this.#stdout.columns, 0);
    const rows = toPositiveIntOr(this.#stdout.rows, 0);
    if (cols > 0 && rows > 0) return { cols, rows };
    try {
      const probed = this.#probe();
      return {
        cols: toPositiveIntOr(probed.columns, this.#fallback.cols),
        rows: toPositiveIntOr(probed.rows, this.#fallback.rows),
      };
    } catch (error: unknown) {
      this.#log.debug("terminal size probe failed", { error });
      return this.#fallback;
    }
  }

  readInput(signal: AbortSignal): Promise<Uint8Array | null> {
    if (this.#failure !== null) return Promise.reject(this.#failure);
    const next = this.#chunks.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.#ended) return Promise.resolve(null);
    if (signal.aborted) return Promise.resolve(EMPTY);
    return new Promise<Uint8Array | null>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.#readers.indexOf(reader);
        if (idx >= 0) this.#readers.splice(idx, 1);
        resolve(EMPTY);
      };
      const reader: Reader = {
        resolve: (chunk) => {
          signal.removeEventListener("abort", onAbort);
          resolve(chunk);
        },
        reject: (error) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      this.#readers.push(reader);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  writeString(text: string): void {
    this.#stdout.write(text);
  }

  clear(): void {
    this.#stdout.write(CLEAR_SCREEN + CURSOR_HOME);
  }

  /** Node raises "resize" on the output stream for SIGWINCH. */
  onResize(listener: (size: TerminalSize) => void): () => void {
    const handler = (): void => listener(this.size());
    this.#stdout.on("resize", handler);
    let active = true;
    return () => {
      if (!active) return;
      active = false;
      this.#stdout.off("resize", handler);
    };
  }
}
