/**
 * packages/core/src/state/tracker.ts — Current snapshot plus undo/redo history.
 *
 * Each update is bracketed:
 *
 *   const before = tracker.beforeAction();
 *   ...apply the action...
 *   tracker.afterAction(before);
 *
 * afterAction records `before` in the past stack only when the state actually
 * changed, and clears the redo branch when it does. Subscribers run
 * synchronously, in registration order, on every committed change.
 */

import { SILENT_LOGGER, type Logger } from "../diagnostics/logger.js";
import { TermlineError } from "../errors.js";
import type { FocusPath } from "./focusPath.js";
import {
  type ComponentInit,
  type DirtyRegion,
  type ModalState,
  type ComponentState,
  type Snapshot,
  componentsEqual,
  createComponentState,
  createSnapshot,
  getComponent,
  snapshotsEqual,
  withComponent,
  withDirty,
  withFocusPath,
  withMetadata,
  withModals,
  withoutComponent,
} from "./snapshot.js";

export type StateListener = (prev: Snapshot, next: Snapshot) => void;

export type StateHistory = Readonly<{
  /** Oldest first. */
  past: readonly Snapshot[];
  /** Next redo last. */
  future: readonly Snapshot[];
}>;

export type StateTrackerOptions = Readonly<{
  maxHistory?: number;
  initial?: Snapshot;
  clock?: () => number;
  logger?: Logger;
}>;

export type ComponentPatch = ComponentInit;

export class StateTracker {
  #current: Snapshot;
  #past: Snapshot[] = [];
  #future: Snapshot[] = [];
  #maxHistory: number;
  readonly #listeners: StateListener[] = [];
  readonly #clock: () => number;
  readonly #log: Logger;

  constructor(opts: StateTrackerOptions = {}) {
    this.#clock = opts.clock ?? Date.now;
    this.#log = opts.logger ?? SILENT_LOGGER;
    this.#maxHistory = validMax(opts.maxHistory ?? 100);
    this.#current = opts.initial ?? createSnapshot({ timestamp: this.#clock() });
  }

  /** The live snapshot. It is frozen, so handing it out is safe. */
  current(): Snapshot {
    return this.#current;
  }

  /* ---------- Bracketing ---------- */

  beforeAction(): Snapshot {
    return this.#current;
  }

  /** True when a history entry was recorded. */
  afterAction(before: Snapshot): boolean {
    if (snapshotsEqual(this.#current, before)) return false;
    this.#future = [];
    this.#past.push(before);
    this.#trimPast();
    this.#notify(before, this.#current);
    return true;
  }

  /* ---------- Committed replacement ---------- */

  /**
   * Replace the whole snapshot, outside of before/after bracketing.
   * No history entry is recorded.
   */
  update(next: Snapshot | ((current: Snapshot) => Snapshot)): void {
    const prev = this.#current;
    this.#current = typeof next === "function" ? next(prev) : next;
    if (this.#current !== prev) this.#notify(prev, this.#current);
  }

  /* ---------- In-tick edits ---------- */

  /**
   * Merge a patch into a component, creating it when absent. `props` and
   * `state` merge key by key; other fields replace.
   */
  setComponentState(id: string, patch: ComponentPatch): void {
    const existing = getComponent(this.#current, id) ?? createComponentState(id);
    const next = createComponentState(id, {
      type: patch.type ?? existing.type,
      props: patch.props === undefined ? existing.props : { ...existing.props, ...patch.props },
      state: patch.state === undefined ? existing.state : { ...existing.state, ...patch.state },
      rect: patch.rect ?? existing.rect,
      visible: patch.visible ?? existing.visible,
      disabled: patch.disabled ?? existing.disabled,
    });
    this.#current = withComponent(this.#current, next, this.#clock());
  }

  /** Replace a component wholesale; unchanged components keep the current snapshot. */
  putComponent(component: ComponentState): void {
    const existing = getComponent(this.#current, component.id);
    if (existing !== undefined && componentsEqual(existing, component)) return;
    this.#current = withComponent(this.#current, component, this.#clock());
  }

  removeComponent(id: string): boolean {
    if (getComponent(this.#current, id) === undefined) return false;
    this.#current = withoutComponent(this.#current, id, this.#clock());
    return true;
  }

  getComponentState(id: string): Readonly<Record<string, unknown>> | undefined {
    return getComponent(this.#current, id)?.state;
  }

  setFocusPath(path: FocusPath): void {
    this.#current = withFocusPath(this.#current, path, this.#clock());
  }

  focusPath(): FocusPath {
    return this.#current.focusPath;
  }

  pushModal(modal: ModalState): void {
    this.#current = withModals(this.#current, [...this.#current.modals, modal], this.#clock());
  }

  popModal(): ModalState | null {
    const modals = this.#current.modals;
    const top = modals[modals.length - 1];
    if (top === undefined) return null;
    this.#current = withModals(this.#current, modals.slice(0, -1), this.#clock());
    return top;
  }

  setMetadata(key: string, value: unknown): void {
    this.#current = withMetadata(this.#current, key, value, this.#clock());
  }

  setDirty(dirty: DirtyRegion): void {
    this.#current = withDirty(this.#current, dirty);
  }

  /* ---------- History ---------- */

  undo(): boolean {
    const prev = this.#past.pop();
    if (prev === undefined) return false;
    const replaced = this.#current;
    this.#future.push(replaced);
    this.#current = prev;
    this.#notify(replaced, prev);
    return true;
  }

  redo(): boolean {
    const next = this.#future.pop();
    if (next === undefined) return false;
    const replaced = this.#current;
    this.#past.push(replaced);
    this.#trimPast();
    this.#current = next;
    this.#notify(replaced, next);
    return true;
  }

  canUndo(): boolean {
    return this.#past.length > 0;
  }

  canRedo(): boolean {
    return this.#future.length > 0;
  }

  history(): StateHistory {
    return Object.freeze({
      past: Object.freeze([...this.#past]),
      future: Object.freeze([...this.#future]),
    });
  }

  clearHistory(): void {
    this.#past = [];
    this.#future = [];
  }

  get maxHistory(): number {
    return this.#maxHistory;
  }

  setMaxHistory(max: number): void {
    this.#maxHistory = validMax(max);
    this.#trimPast();
  }

  /* ---------- Notifications ---------- */

  subscribe(listener: StateListener): () => void {
    this.#listeners.push(listener);
    let active = true;
    return () => {
      if (!active) return;
      active = false;
      const idx = this.#listeners.indexOf(listener);
      if (idx >= 0) this.#listeners.splice(idx, 1);
    };
  }

  #trimPast(): void {
    const overflow = this.#past.length - this.#maxHistory;
    if (overflow > 0) this.#past.splice(0, overflow);
  }

  #notify(prev: Snapshot, next: Snapshot): void {
    for (const listener of this.#listeners.slice()) {
      try {
        listener(prev, next);
      } catch (error: unknown) {
        this.#log.error("state listener threw", { error });
      }
    }
  }
}

function validMax(max: number): number {
  if (!Number.isInteger(max) || max <= 0) {
    throw new TermlineError("INVALID_ARGUMENT", `maxHistory must be a positive integer, got ${max}`);
  }
  return max;
}
