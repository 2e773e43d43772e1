import type { Action } from "./types.js";

/**
 * Anything that can receive an addressed Action.
 * handleAction returns true when the action was consumed.
 */
export interface ActionTarget {
  readonly id: string;
  handleAction(action: Action): boolean;
}

export function targetFn(id: string, fn: (action: Action) => boolean): ActionTarget {
  return Object.freeze({ id, handleAction: fn });
}

/** Offers the action to each target in order; the first to handle it wins. */
export function targetChain(id: string, ...targets: readonly ActionTarget[]): ActionTarget {
  const chain = Object.freeze([...targets]);
  return Object.freeze({
    id,
    handleAction(action: Action): boolean {
      for (const t of chain) {
        if (t.handleAction(action)) return true;
      }
      return false;
    },
  });
}

export const NOOP_TARGET: ActionTarget = Object.freeze({
  id: "",
  handleAction: () => false,
});
