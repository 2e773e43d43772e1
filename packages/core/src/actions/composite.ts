/**
 * packages/core/src/actions/composite.ts — Composable orchestration primitives.
 *
 * Why: Automation and multi-step commands need to run several units with a
 * clear failure contract: in order, fanned out, bounded, retried, raced
 * against a deadline, or with a fallback. All primitives share one shape
 * (Executable) so they nest freely.
 *
 * Cancellation is cooperative. An AbortSignal is checked before each unit
 * starts; units already running are never force-terminated, they observe
 * the signal themselves.
 */

import { TermlineError } from "../errors.js";
import type { ActionDispatcher } from "./dispatcher.js";
import { ActionError, MultipleError, canceledError, timeoutError, toError } from "./errors.js";
import { type Action, formatAction } from "./types.js";

export type ActionResult = Readonly<{
  ok: boolean;
  error?: Error;
  message?: string;
  data?: unknown;
}>;

export const OK_RESULT: ActionResult = Object.freeze({ ok: true });

export function okResult(data?: unknown, message?: string): ActionResult {
  if (data === undefined && message === undefined) return OK_RESULT;
  return Object.freeze({
    ok: true,
    ...(data !== undefined ? { data } : {}),
    ...(message !== undefined ? { message } : {}),
  });
}

export function errResult(error: unknown): ActionResult {
  return Object.freeze({ ok: false, error: toError(error) });
}

export interface Executable {
  execute(signal: AbortSignal): Promise<ActionResult>;
}

export type ActionFn = (signal: AbortSignal) => ActionResult | Promise<ActionResult>;

/** Wrap a function; throws and rejections become error results. */
export function actionFn(fn: ActionFn): Executable {
  return Object.freeze({
    async execute(signal: AbortSignal): Promise<ActionResult> {
      try {
        return await fn(signal);
      } catch (error: unknown) {
        return errResult(error);
      }
    },
  });
}

/** Adapt a void task: success unless it throws. */
export function fromTask(task: (signal: AbortSignal) => void | Promise<void>): Executable {
  return actionFn(async (signal) => {
    await task(signal);
    return OK_RESULT;
  });
}

/** Dispatch an Action as a unit; an unhandled action is a dispatch_failed error. */
export function dispatchUnit(dispatcher: ActionDispatcher, action: Action): Executable {
  return actionFn(() => {
    if (dispatcher.dispatch(action)) return OK_RESULT;
    return errResult(
      new ActionError("dispatch_failed", `action not handled: ${formatAction(action)}`, {
        action,
      }),
    );
  });
}

async function executeSafely(unit: Executable, signal: AbortSignal): Promise<ActionResult> {
  try {
    return await unit.execute(signal);
  } catch (error: unknown) {
    return errResult(error);
  }
}

/** Cancellation and deadline errors do not abort a sequence. */
export function isRecoverable(error: Error | undefined): boolean {
  if (error === undefined) return true;
  if (error instanceof ActionError) return error.kind === "canceled" || error.kind === "timeout";
  return error.name === "AbortError" || error.name === "TimeoutError";
}

/** Child controller that aborts when `parent` does. Call dispose() to unlink. */
export function linkSignal(parent: AbortSignal | undefined): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (!parent) return { controller, dispose: () => {} };
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => {} };
  }
  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return { controller, dispose: () => parent.removeEventListener("abort", onAbort) };
}

/** Resolves after `ms`, or false early when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type CompositeMode = "sequential" | "concurrent";

export type CompletionCallback = (results: readonly ActionResult[]) => void;

export class CompositeAction implements Executable {
  readonly mode: CompositeMode;
  readonly #units: Executable[];
  #callback: CompletionCallback | null = null;
  #canceled = false;
  #controller: AbortController | null = null;

  constructor(mode: CompositeMode, units: readonly Executable[] = []) {
    this.mode = mode;
    this.#units = [...units];
  }

  add(unit: Executable): this {
    this.#units.push(unit);
    return this;
  }

  get size(): number {
    return this.#units.length;
  }

  onComplete(callback: CompletionCallback | null): this {
    this.#callback = callback;
    return this;
  }

  /** Stop starting new units; in-flight units see an aborted signal. */
  cancel(): void {
    this.#canceled = true;
    this.#controller?.abort(canceledError());
  }

  isCanceled(): boolean {
    return this.#canceled;
  }

  async execute(signal?: AbortSignal): Promise<ActionResult> {
    if (this.#canceled) return errResult(canceledError());
    const link = linkSignal(signal);
    this.#controller = link.controller;
    try {
      return this.mode === "concurrent"
        ? await this.#runConcurrent(link.controller.signal)
        : await this.#runSequential(link.controller.signal);
    } finally {
      link.dispose();
      this.#controller = null;
    }
  }

  /** Alias of execute() for call sites that read better as "run". */
  run(signal?: AbortSignal): Promise<ActionResult> {
    return this.execute(signal);
  }

  async #runSequential(signal: AbortSignal): Promise<ActionResult> {
    const results: ActionResult[] = [];
    let failure: Error | undefined;

    for (const unit of this.#units) {
      if (this.#canceled || signal.aborted) {
        this.#complete(results);
        return errResult(canceledError());
      }
      const result = await executeSafely(unit, signal);
      results.push(result);
      if (!result.ok && !isRecoverable(result.error)) {
        failure = result.error ?? new ActionError("action_failed", "action failed");
        break;
      }
    }

    this.#complete(results);
    return failure === undefined ? OK_RESULT : errResult(failure);
  }

  async #runConcurrent(signal: AbortSignal): Promise<ActionResult> {
    const started: Promise<ActionResult>[] = [];
    for (const unit of this.#units) {
      if (this.#canceled || signal.aborted) break;
      started.push(executeSafely(unit, signal));
    }

    const results = await Promise.all(started);
    this.#complete(results);

    const errors: Error[] = [];
    for (const r of results) {
      if (!r.ok) errors.push(r.error ?? new ActionError("action_failed", "action failed"));
    }
    return errors.length > 0 ? errResult(new MultipleError(errors)) : OK_RESULT;
  }

  #complete(results: readonly ActionResult[]): void {
    this.#callback?.(Object.freeze([...results]));
  }
}

/** Fan out all units concurrently. */
export function batch(...units: readonly Executable[]): CompositeAction {
  return new CompositeAction("concurrent", units);
}

/** Run units one after another. */
export function sequence(...units: readonly Executable[]): CompositeAction {
  return new CompositeAction("sequential", units);
}

/**
 * Counting semaphore. Waiters are served FIFO.
 */
export class Semaphore {
  #available: number;
  readonly #waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits <= 0) {
      throw new TermlineError("INVALID_ARGUMENT", "Semaphore: permits must be a positive integer");
    }
    this.#available = permits;
  }

  get available(): number {
    return this.#available;
  }

  async acquire(): Promise<void> {
    if (this.#available > 0) {
      this.#available--;
      return;
    }
    await new Promise<void>((resolve) => this.#waiters.push(resolve));
  }

  release(): void {
    const next = this.#waiters.shift();
    if (next) next();
    else this.#available++;
  }
}

/** Concurrent execution with at most `limit` units in flight. */
export function parallelWithLimit(limit: number, ...units: readonly Executable[]): Executable {
  const sem = new Semaphore(Math.max(1, Math.floor(limit)));
  return actionFn(async (signal) => {
    const runs: Promise<ActionResult>[] = [];
    for (const unit of units) {
      if (signal.aborted) break;
      runs.push(
        (async () => {
          await sem.acquire();
          try {
            if (signal.aborted) return errResult(canceledError());
            return await executeSafely(unit, signal);
          } finally {
            sem.release();
          }
        })(),
      );
    }
    const results = await Promise.all(runs);
    const errors: Error[] = [];
    for (const r of results) {
      if (!r.ok) errors.push(r.error ?? new ActionError("action_failed", "action failed"));
    }
    return errors.length > 0 ? errResult(new MultipleError(errors)) : OK_RESULT;
  });
}

export type RetryOptions = Readonly<{
  maxRetries: number;
  delayMs?: number;
}>;

/**
 * Up to maxRetries + 1 attempts with a fixed delay between them. The first
 * success is returned as-is; exhaustion wraps the last error.
 */
export function retry(unit: Executable, opts: RetryOptions): Executable {
  const maxRetries = Math.max(0, Math.floor(opts.maxRetries));
  const delayMs = opts.delayMs ?? 0;
  return actionFn(async (signal) => {
    let lastError: Error | undefined;
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0 && delayMs > 0) {
        const slept = await sleep(delayMs, signal);
        if (!slept) return errResult(canceledError());
      }
      const result = await executeSafely(unit, signal);
      if (result.ok) return result;
      lastError = result.error;
    }
    const detail = lastError ? lastError.message : "unknown error";
    return errResult(
      new ActionError("action_failed", `after ${String(maxRetries)} retries: ${detail}`, {
        cause: lastError,
        details: { attempts: maxRetries + 1 },
      }),
    );
  });
}

/**
 * Race `unit` against a deadline. On expiry the unit's signal is aborted and
 * a timeout error returned; the unit itself keeps running until it notices.
 */
export function withTimeout(unit: Executable, ms: number): Executable {
  return actionFn(async (signal) => {
    const link = linkSignal(signal);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<ActionResult>((resolve) => {
      timer = setTimeout(() => {
        const error = timeoutError(ms);
        link.controller.abort(error);
        resolve(errResult(error));
      }, Math.max(0, ms));
    });
    try {
      return await Promise.race([executeSafely(unit, link.controller.signal), deadline]);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      link.dispose();
    }
  });
}

/** Run `secondary` only when `primary` fails. */
export function fallback(primary: Executable, secondary: Executable): Executable {
  return actionFn(async (signal) => {
    const first = await executeSafely(primary, signal);
    if (first.ok) return first;
    return executeSafely(secondary, signal);
  });
}

/** Build the unit on first execution. */
export function lazy(factory: () => Executable): Executable {
  return actionFn((signal) => factory().execute(signal));
}
