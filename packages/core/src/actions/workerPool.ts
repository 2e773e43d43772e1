/**
 * packages/core/src/actions/workerPool.ts — Fixed-size pool draining a bounded queue.
 *
 * Invariants:
 *   - At most `workers` units execute at once.
 *   - submit() never blocks; it returns false when the queue is full or the
 *     pool is stopped.
 *   - stop() aborts the pool signal, drops queued units, and resolves once
 *     every worker loop has exited.
 */

import { TermlineError } from "../errors.js";
import { type ActionResult, type Executable, errResult, sleep } from "./composite.js";

export type WorkerPoolOptions = Readonly<{
  workers: number;
  queueCapacity?: number;
  onResult?: (result: ActionResult) => void;
}>;

const DEFAULT_QUEUE_CAPACITY = 100;

export class WorkerPool {
  readonly #workers: number;
  readonly #capacity: number;
  readonly #onResult: ((result: ActionResult) => void) | undefined;
  readonly #queue: Executable[] = [];
  readonly #controller = new AbortController();
  readonly #idle: Array<() => void> = [];
  #loops: Promise<void>[] = [];
  #started = false;
  #stopped = false;

  constructor(opts: WorkerPoolOptions) {
    if (!Number.isInteger(opts.workers) || opts.workers <= 0) {
      throw new TermlineError("INVALID_ARGUMENT", "WorkerPool: workers must be a positive integer");
    }
    this.#workers = opts.workers;
    this.#capacity = opts.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    this.#onResult = opts.onResult;
  }

  get pending(): number {
    return this.#queue.length;
  }

  start(): void {
    if (this.#started || this.#stopped) return;
    this.#started = true;
    for (let i = 0; i < this.#workers; i++) this.#loops.push(this.#loop());
  }

  submit(unit: Executable): boolean {
    if (this.#stopped || this.#queue.length >= this.#capacity) return false;
    this.#queue.push(unit);
    this.#idle.shift()?.();
    return true;
  }

  /** Retry submit() until it succeeds or `timeoutMs` elapses. */
  async submitWithTimeout(unit: Executable, timeoutMs: number, pollMs = 5): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (!this.#stopped) {
      if (this.submit(unit)) return true;
      if (Date.now() >= deadline) return false;
      await sleep(Math.min(pollMs, Math.max(0, deadline - Date.now())), this.#controller.signal);
    }
    return false;
  }

  async stop(): Promise<void> {
    if (this.#stopped) {
      await Promise.all(this.#loops);
      return;
    }
    this.#stopped = true;
    this.#controller.abort();
    this.#queue.length = 0;
    while (this.#idle.length > 0) this.#idle.shift()?.();
    await Promise.all(this.#loops);
    this.#loops = [];
  }

  async #loop(): Promise<void> {
    const signal = this.#controller.signal;
    while (!signal.aborted) {
      const unit = this.#queue.shift();
      if (unit === undefined) {
        await new Promise<void>((resolve) => this.#idle.push(resolve));
        continue;
      }
      let result: ActionResult;
      try {
        result = await unit.execute(signal);
      } catch (error: unknown) {
        result = errResult(error);
      }
      this.#onResult?.(result);
    }
  }
}
