/**
 * packages/core/src/actions/dispatcher.ts — Priority-ordered action routing.
 *
 * Why: One place decides who consumes an Action. Resolution order, first
 * handler returning true wins:
 *   1. global subscribers for the action's type, in registration order
 *   2. the registered target for action.target (when non-empty)
 *   3. the default handler
 *
 * Unmatched actions are reported as unhandled; the caller decides severity.
 * A handler that throws is logged and treated as "not handled" so one
 * faulty subscriber cannot starve the rest of the chain.
 *
 * Registries are instance state: every Runtime owns its own dispatcher.
 */

import { DEFAULT_RUNTIME_CONFIG } from "../config.js";
import { type Logger, SILENT_LOGGER } from "../diagnostics/logger.js";
import { describeError } from "../errors.js";
import type { ActionTarget } from "./target.js";
import { type Action, type ActionType, formatAction, withTarget } from "./types.js";

export type ActionHandler = (action: Action) => boolean;

export type DispatchStage = "subscriber" | "target" | "default" | "none";

export type DispatchLogEntry = Readonly<{
  action: Action;
  handled: boolean;
  stage: DispatchStage;
  at: number;
}>;

export type DispatcherStats = Readonly<{
  dispatched: number;
  handled: number;
  unhandled: number;
  byType: Readonly<Partial<Record<ActionType, number>>>;
}>;

export type DispatcherOptions = Readonly<{
  logCapacity?: number;
  logger?: Logger;
  now?: () => number;
}>;

type Subscription = { readonly handler: ActionHandler; active: boolean };

export class ActionDispatcher {
  readonly #targets = new Map<string, ActionTarget>();
  readonly #subscribers = new Map<ActionType, Subscription[]>();
  #defaultHandler: ActionHandler | null = null;

  readonly #logCapacity: number;
  readonly #logger: Logger;
  readonly #now: () => number;
  #logEnabled = false;
  #log: DispatchLogEntry[] = [];

  #dispatched = 0;
  #handled = 0;
  #byType = new Map<ActionType, number>();

  constructor(opts: DispatcherOptions = {}) {
    const cap = opts.logCapacity ?? DEFAULT_RUNTIME_CONFIG.dispatchLogCapacity;
    this.#logCapacity = Number.isInteger(cap) && cap > 0 ? cap : 1;
    this.#logger = opts.logger ?? SILENT_LOGGER;
    this.#now = opts.now ?? Date.now;
  }

  register(target: ActionTarget): void {
    this.#targets.set(target.id, target);
  }

  unregister(id: string): boolean {
    return this.#targets.delete(id);
  }

  getTarget(id: string): ActionTarget | undefined {
    return this.#targets.get(id);
  }

  targetIds(): readonly string[] {
    return Object.freeze([...this.#targets.keys()]);
  }

  /**
   * Add a global handler for `type`. Returns an unsubscribe function; calling
   * it more than once is harmless.
   */
  subscribe(type: ActionType, handler: ActionHandler): () => void {
    const sub: Subscription = { handler, active: true };
    const list = this.#subscribers.get(type);
    if (list) list.push(sub);
    else this.#subscribers.set(type, [sub]);

    return () => {
      if (!sub.active) return;
      sub.active = false;
      const cur = this.#subscribers.get(type);
      if (!cur) return;
      const idx = cur.indexOf(sub);
      if (idx >= 0) cur.splice(idx, 1);
      if (cur.length === 0) this.#subscribers.delete(type);
    };
  }

  setDefaultHandler(handler: ActionHandler | null): void {
    this.#defaultHandler = handler;
  }

  dispatch(action: Action): boolean {
    this.#dispatched++;
    this.#byType.set(action.type, (this.#byType.get(action.type) ?? 0) + 1);

    const stage = this.#resolve(action);
    const handled = stage !== "none";
    if (handled) this.#handled++;
    else this.#logger.debug("unhandled action", { action: formatAction(action) });

    if (this.#logEnabled) {
      this.#log.push(Object.freeze({ action, handled, stage, at: this.#now() }));
      if (this.#log.length > this.#logCapacity) {
        this.#log.splice(0, this.#log.length - this.#logCapacity);
      }
    }
    return handled;
  }

  /** Address the action to the focused component, then dispatch. */
  dispatchToFocus(action: Action, focusedId: string | null): boolean {
    if (focusedId === null || focusedId.length === 0) return this.dispatch(action);
    return this.dispatch(withTarget(action, focusedId));
  }

  dispatchToTarget(action: Action, targetId: string): boolean {
    return this.dispatch(withTarget(action, targetId));
  }

  #resolve(action: Action): DispatchStage {
    const subs = this.#subscribers.get(action.type);
    if (subs && subs.length > 0) {
      // Snapshot: a handler may unsubscribe itself mid-dispatch.
      for (const sub of [...subs]) {
        if (!sub.active) continue;
        if (this.#invoke("subscriber", sub.handler, action)) return "subscriber";
      }
    }

    if (action.target.length > 0) {
      const target = this.#targets.get(action.target);
      if (target && this.#invoke("target", (a) => target.handleAction(a), action)) {
        return "target";
      }
    }

    const fallback = this.#defaultHandler;
    if (fallback && this.#invoke("default", fallback, action)) return "default";
    return "none";
  }

  #invoke(stage: DispatchStage, handler: ActionHandler, action: Action): boolean {
    try {
      return handler(action) === true;
    } catch (error: unknown) {
      this.#logger.error("action handler threw", {
        stage,
        action: formatAction(action),
        error: describeError(error),
      });
      return false;
    }
  }

  enableLog(enabled: boolean): void {
    this.#logEnabled = enabled;
  }

  getLog(): readonly DispatchLogEntry[] {
    return Object.freeze([...this.#log]);
  }

  clearLog(): void {
    this.#log = [];
  }

  getStats(): DispatcherStats {
    const byType: Partial<Record<ActionType, number>> = {};
    for (const [type, n] of this.#byType) byType[type] = n;
    return Object.freeze({
      dispatched: this.#dispatched,
      handled: this.#handled,
      unhandled: this.#dispatched - this.#handled,
      byType: Object.freeze(byType),
    });
  }

  resetStats(): void {
    this.#dispatched = 0;
    this.#handled = 0;
    this.#byType = new Map();
  }
}
