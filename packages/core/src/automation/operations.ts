/**
 * packages/core/src/automation/operations.ts — Composable automation steps.
 *
 * Each factory returns an Operation; run them with controller.execute() or
 * nest them in batchOp/atomicBatchOp/repeatOp/retryOp.
 */

import { sleep } from "../actions/composite.js";
import type { Action } from "../actions/types.js";
import { err, ok } from "../errors.js";
import type {
  AutomationController,
  AutomationResult,
  Direction,
  Operation,
  SnapshotCondition,
} from "./controller.js";
import { AutomationError, operationFailed } from "./errors.js";

function op(
  name: string,
  run: (ctrl: AutomationController, signal?: AbortSignal) => AutomationResult | Promise<AutomationResult>,
): Operation {
  return Object.freeze({
    name,
    async run(ctrl: AutomationController, signal?: AbortSignal): Promise<AutomationResult> {
      return run(ctrl, signal);
    },
  });
}

function canceled(name: string): AutomationResult {
  return err(new AutomationError("CANCELED", `${name} canceled`));
}

export function clickOp(id: string): Operation {
  return op(`click(${id})`, (ctrl) => ctrl.click(id));
}

export function inputOp(id: string, text: string): Operation {
  return op(`input(${id})`, (ctrl) => ctrl.input(id, text));
}

export function navigateOp(direction: Direction): Operation {
  return op(`navigate(${direction})`, (ctrl) => ctrl.navigate(direction));
}

export function waitOp(condition: SnapshotCondition, timeoutMs: number): Operation {
  return op("wait", (ctrl, signal) => ctrl.waitUntil(condition, timeoutMs, signal));
}

export function waitValueOp(id: string, key: string, expected: unknown, timeoutMs: number): Operation {
  return op(`waitValue(${id}.${key})`, (ctrl, signal) =>
    ctrl.waitForValue(id, key, expected, timeoutMs, signal),
  );
}

/** The action is built when the step runs, so it carries a fresh timestamp. */
export function dispatchOp(build: () => Action): Operation {
  return op("dispatch", (ctrl) => ctrl.dispatch(build()));
}

/** Run in order; the first failure stops the batch. Applied steps stay applied. */
export function batchOp(...ops: readonly Operation[]): Operation {
  return op("batch", async (ctrl, signal) => {
    const result = await ctrl.executeWith(signal, ...ops);
    return result.ok ? result : err(operationFailed("batch operation failed", result.error));
  });
}

/**
 * Like batchOp, but on failure every history entry recorded since the batch
 * began is undone, restoring live components. Rollback reaches back at most
 * `maxHistory` entries.
 */
export function atomicBatchOp(...ops: readonly Operation[]): Operation {
  return op("atomicBatch", async (ctrl, signal) => {
    const runtime = ctrl.runtime;
    const depth = runtime.tracker.history().past.length;
    const result = await ctrl.executeWith(signal, ...ops);
    if (result.ok) return result;
    let undone = 0;
    while (runtime.tracker.history().past.length > depth && runtime.undoState()) undone++;
    runtime.logger.debug("atomic batch rolled back", { undone, error: result.error.message });
    return err(operationFailed("atomic batch rolled back", result.error));
  });
}

/** Run `operation` `count` times, pausing `delayMs` between runs. */
export function repeatOp(operation: Operation, count: number, delayMs = 0): Operation {
  const name = `repeat(${operation.name})`;
  return op(name, async (ctrl, signal) => {
    for (let i = 0; i < count; i++) {
      const result = await operation.run(ctrl, signal);
      if (!result.ok) return err(operationFailed(`repeat failed at iteration ${i}`, result.error));
      if (delayMs > 0 && i < count - 1 && !(await sleep(delayMs, signal))) return canceled(name);
    }
    return ok(undefined);
  });
}

export type RetryOpOptions = Readonly<{
  delayMs?: number;
  /** Return false to stop retrying on this error. Defaults to always retrying. */
  shouldRetry?: (error: AutomationError) => boolean;
}>;

export function retryOp(operation: Operation, attempts: number, opts: RetryOpOptions = {}): Operation {
  const name = `retry(${operation.name})`;
  const max = Math.max(1, Math.floor(attempts));
  const delayMs = opts.delayMs ?? 0;
  return op(name, async (ctrl, signal) => {
    let last: AutomationError | null = null;
    for (let attempt = 0; attempt < max; attempt++) {
      const result = await operation.run(ctrl, signal);
      if (result.ok) return result;
      last = result.error;
      if (opts.shouldRetry && !opts.shouldRetry(last)) break;
      if (attempt < max - 1 && delayMs > 0 && !(await sleep(delayMs, signal))) return canceled(name);
    }
    const cause = last ?? new AutomationError("OPERATION_FAILED", "no attempts made");
    return err(operationFailed(`retry failed after ${max} attempts`, cause));
  });
}
