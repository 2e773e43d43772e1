/**
 * packages/core/src/runtime/taskScope.ts — Managed-lifetime task spawner.
 *
 * Every task receives the scope's AbortSignal and is expected to observe it
 * in its loop. cancel() only signals; shutdown() signals and then waits,
 * bounded, for every task to settle. Tasks still running at the deadline are
 * abandoned and reported as SHUTDOWN_TIMEOUT.
 */

import { linkSignal } from "../actions/composite.js";
import { SILENT_LOGGER, type Logger } from "../diagnostics/logger.js";
import { TermlineError, describeError } from "../errors.js";

export type TaskFn = (signal: AbortSignal) => Promise<void> | void;

export type TaskErrorHandler = (error: unknown, task: string) => void;

export type TaskScopeOptions = Readonly<{
  signal?: AbortSignal;
  logger?: Logger;
  onError?: TaskErrorHandler;
}>;

type RunningTask = { readonly name: string; done: Promise<void> };

export class TaskScope {
  readonly #controller: AbortController;
  readonly #dispose: () => void;
  readonly #running = new Map<number, RunningTask>();
  readonly #log: Logger;
  readonly #onError: TaskErrorHandler | undefined;
  #nextId = 1;

  constructor(opts: TaskScopeOptions = {}) {
    const link = linkSignal(opts.signal);
    this.#controller = link.controller;
    this.#dispose = link.dispose;
    this.#log = opts.logger ?? SILENT_LOGGER;
    this.#onError = opts.onError;
  }

  get signal(): AbortSignal {
    return this.#controller.signal;
  }

  get canceled(): boolean {
    return this.#controller.signal.aborted;
  }

  /** Number of tasks that have not settled yet. */
  get active(): number {
    return this.#running.size;
  }

  taskNames(): readonly string[] {
    return Object.freeze([...this.#running.values()].map((t) => t.name));
  }

  go(name: string, fn: TaskFn): void {
    if (this.canceled) {
      throw new TermlineError("INVALID_STATE", `TaskScope: cannot start "${name}" after cancel`);
    }
    const id = this.#nextId++;
    const signal = this.#controller.signal;
    // Registered first: a task that throws synchronously settles before go() returns.
    const task: RunningTask = { name, done: Promise.resolve() };
    this.#running.set(id, task);
    task.done = (async () => {
      try {
        await fn(signal);
      } catch (error: unknown) {
        if (signal.aborted && isAbortError(error)) return;
        this.#log.error("task failed", { task: name, error: describeError(error) });
        try {
          this.#onError?.(error, name);
        } catch (handlerError: unknown) {
          this.#log.error("task error handler threw", { task: name, error: describeError(handlerError) });
        }
      } finally {
        this.#running.delete(id);
      }
    })();
    this.#log.debug("task started", { task: name });
  }

  cancel(reason?: unknown): void {
    if (this.canceled) return;
    this.#controller.abort(reason);
    this.#dispose();
  }

  async shutdown(timeoutMs: number): Promise<void> {
    this.cancel();
    if (this.#running.size === 0) return;
    const all = Promise.all([...this.#running.values()].map((t) => t.done));
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), Math.max(0, timeoutMs));
    });
    try {
      const outcome = await Promise.race([all.then(() => "done" as const), deadline]);
      if (outcome === "timeout") {
        const names = this.taskNames();
        this.#log.warn("shutdown timed out", { tasks: names });
        throw new TermlineError(
          "SHUTDOWN_TIMEOUT",
          `shutdown timed out after ${timeoutMs}ms with ${names.length} task(s) running: ${names.join(", ")}`,
        );
      }
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
