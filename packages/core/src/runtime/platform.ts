/**
 * packages/core/src/runtime/platform.ts — Host terminal contract.
 *
 * The runtime is host-agnostic: everything that touches a real terminal
 * (raw mode, reading bytes, writing frames) goes through a Platform. The
 * Node implementation lives in @termline/node; tests use an in-process fake.
 *
 * Rules:
 * - `init()` enters raw mode / the alternate screen; `close()` MUST undo
 *   whatever init did and MUST be safe to call more than once.
 * - `readInput(signal)` resolves with the next chunk of bytes, an empty
 *   chunk when its poll window elapsed without input, or null at end of
 *   input. It MUST resolve promptly once `signal` aborts.
 * - `onResize` is optional; a platform without it never reports resizes.
 */

export type TerminalSize = Readonly<{ cols: number; rows: number }>;

export const DEFAULT_TERMINAL_SIZE: TerminalSize = Object.freeze({ cols: 80, rows: 24 });

export interface Platform {
  init(): Promise<void>;
  close(): Promise<void>;
  size(): TerminalSize;
  readInput(signal: AbortSignal): Promise<Uint8Array | null>;
  writeString(text: string): void;
  clear(): void;
  onResize?(listener: (size: TerminalSize) => void): () => void;
}
