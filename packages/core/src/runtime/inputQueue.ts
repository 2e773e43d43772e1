/**
 * packages/core/src/runtime/inputQueue.ts — Bounded hand-off between the input reader and the main loop.
 *
 * Back-pressure: a full queue blocks the producer (up to its timeout)
 * rather than dropping input. A producer that times out sets `skipFrame`,
 * telling the main loop to spend its next tick draining instead of
 * rendering. Waiting producers are admitted in FIFO order as the consumer
 * drains.
 */

import { TermlineError } from "../errors.js";

type Producer<T> = {
  readonly item: T;
  readonly resolve: (accepted: boolean) => void;
  timer: ReturnType<typeof setTimeout> | undefined;
};

export class InputQueue<T> {
  readonly #capacity: number;
  #items: T[] = [];
  readonly #producers: Producer<T>[] = [];
  readonly #waiters: Array<() => void> = [];
  #closed = false;
  #skipFrame = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new TermlineError("INVALID_ARGUMENT", `InputQueue: capacity must be a positive integer, got ${capacity}`);
    }
    this.#capacity = capacity;
  }

  get capacity(): number {
    return this.#capacity;
  }

  get size(): number {
    return this.#items.length;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /** Producers currently blocked on a full queue. */
  get blocked(): number {
    return this.#producers.length;
  }

  get skipFrame(): boolean {
    return this.#skipFrame;
  }

  /** Reads and clears the skip-frame flag. */
  consumeSkipFrame(): boolean {
    const v = this.#skipFrame;
    this.#skipFrame = false;
    return v;
  }

  tryOffer(item: T): boolean {
    if (this.#closed) return false;
    if (this.#producers.length > 0 || this.#items.length >= this.#capacity) return false;
    this.#push(item);
    return true;
  }

  offer(item: T, timeoutMs: number): Promise<boolean> {
    if (this.tryOffer(item)) return Promise.resolve(true);
    if (this.#closed) return Promise.resolve(false);
    if (timeoutMs <= 0) {
      this.#skipFrame = true;
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      const producer: Producer<T> = { item, resolve, timer: undefined };
      producer.timer = setTimeout(() => {
        const idx = this.#producers.indexOf(producer);
        if (idx < 0) return;
        this.#producers.splice(idx, 1);
        this.#skipFrame = true;
        resolve(false);
      }, timeoutMs);
      this.#producers.push(producer);
    });
  }

  /** Takes everything queued, then admits blocked producers into the freed space. */
  drain(): T[] {
    const out = this.#items;
    this.#items = [];
    while (this.#producers.length > 0 && this.#items.length < this.#capacity) {
      const p = this.#producers.shift();
      if (!p) break;
      if (p.timer !== undefined) clearTimeout(p.timer);
      this.#push(p.item);
      p.resolve(true);
    }
    return out;
  }

  /**
   * Resolves true as soon as something is queued, false when `timeoutMs`
   * elapses, `signal` aborts or the queue closes.
   */
  waitForItems(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.#items.length > 0) return Promise.resolve(true);
    if (this.#closed || signal?.aborted === true) return Promise.resolve(false);
    return new Promise<boolean>((resolve) => {
      let settled = false;
      const finish = (value: boolean): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        const idx = this.#waiters.indexOf(wake);
        if (idx >= 0) this.#waiters.splice(idx, 1);
        resolve(value);
      };
      const wake = (): void => finish(this.#items.length > 0);
      const onAbort = (): void => finish(false);
      const timer = setTimeout(() => finish(false), Math.max(0, timeoutMs));
      signal?.addEventListener("abort", onAbort, { once: true });
      this.#waiters.push(wake);
    });
  }

  /** Releases blocked producers (false) and waiting consumers. Queued items stay drainable. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    for (const p of this.#producers.splice(0)) {
      if (p.timer !== undefined) clearTimeout(p.timer);
      p.resolve(false);
    }
    for (const wake of this.#waiters.splice(0)) wake();
  }

  #push(item: T): void {
    this.#items.push(item);
    for (const wake of this.#waiters.splice(0)) wake();
  }
}
