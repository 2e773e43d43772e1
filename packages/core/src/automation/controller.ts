/**
 * packages/core/src/automation/controller.ts — Programmatic control of a Runtime.
 *
 * Why: Test scripts and agents need the same reach a person at the keyboard
 * has, expressed in components instead of keystrokes. Every operation here
 * becomes an Action dispatched through the Runtime, so routing, focus,
 * tracker bracketing and history behave exactly as for human input. Reads go
 * to the tracker's live snapshot.
 *
 * Failures come back as Results carrying an AutomationError; nothing here
 * throws for an ordinary miss.
 */

import { linkSignal, sleep } from "../actions/composite.js";
import { type Action, type ActionType, createAction, formatAction, withSource } from "../actions/types.js";
import { type Result, err, ok } from "../errors.js";
import { capabilitiesOf } from "../runtime/component.js";
import type { Runtime } from "../runtime/runtime.js";
import { type ComponentState, type Rect, type Snapshot, getComponent } from "../state/snapshot.js";
import {
  AutomationError,
  componentDisabled,
  componentNotFound,
  waitTimeout,
} from "./errors.js";
import { parseSelector, selectComponents } from "./selector.js";

export const AUTOMATION_SOURCE = "automation";

export type Direction = "up" | "down" | "left" | "right" | "next" | "prev" | "first" | "last";

const DIRECTION_ACTIONS: Readonly<Record<Direction, ActionType>> = Object.freeze({
  up: "navigate_up",
  down: "navigate_down",
  left: "navigate_left",
  right: "navigate_right",
  next: "navigate_next",
  prev: "navigate_prev",
  first: "navigate_first",
  last: "navigate_last",
});

export function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(DIRECTION_ACTIONS, value);
}

/** A component as seen by automation: snapshot fields plus its place in the tree. */
export type ComponentInfo = Readonly<{
  id: string;
  type: string;
  props: Readonly<Record<string, unknown>>;
  state: Readonly<Record<string, unknown>>;
  rect: Rect;
  visible: boolean;
  disabled: boolean;
  parentId: string | null;
  children: readonly string[];
}>;

/**
 * - componentId (+ stateKey): that component's state, or just the one key
 * - componentType: `{ [id]: state }` for every component of the type
 * - neither: `{ [id]: state }` for every component
 */
export type StateQuery = Readonly<{
  componentId?: string;
  componentType?: string;
  stateKey?: string;
}>;

export type SnapshotCondition = (snapshot: Snapshot) => boolean;

export type AutomationControllerOptions = Readonly<{
  /** Poll interval for waits. Defaults to the runtime's `waitPollIntervalMs`. */
  pollIntervalMs?: number;
  /** Wall clock for wait deadlines. */
  now?: () => number;
}>;

export type AutomationResult<T = void> = Result<T, AutomationError>;

const DONE: AutomationResult = ok(undefined);

export class AutomationController {
  readonly #runtime: Runtime;
  readonly #pollMs: number;
  readonly #now: () => number;

  constructor(runtime: Runtime, opts: AutomationControllerOptions = {}) {
    this.#runtime = runtime;
    this.#pollMs = Math.max(1, opts.pollIntervalMs ?? runtime.config.waitPollIntervalMs);
    this.#now = opts.now ?? Date.now;
  }

  get runtime(): Runtime {
    return this.#runtime;
  }

  /* ---------- Perception ---------- */

  inspect(): Snapshot {
    return this.#runtime.tracker.current();
  }

  find(selector: string): AutomationResult<readonly ComponentInfo[]> {
    const parsed = parseSelector(selector);
    if (!parsed.ok) return parsed;
    const snapshot = this.inspect();
    const found = selectComponents(snapshot, parsed.value);
    if (parsed.value.kind === "id" && found.length === 0) return err(componentNotFound(parsed.value.id));
    return ok(Object.freeze(found.map((c) => this.#info(c))));
  }

  query(q: StateQuery = {}): AutomationResult<Readonly<Record<string, unknown>>> {
    const snapshot = this.inspect();
    if (q.componentId !== undefined && q.componentId.length > 0) {
      const component = getComponent(snapshot, q.componentId);
      if (component === undefined) return err(componentNotFound(q.componentId));
      if (q.stateKey !== undefined && q.stateKey.length > 0) {
        return ok(Object.freeze({ [q.stateKey]: component.state[q.stateKey] }));
      }
      return ok(component.state);
    }
    const out: Record<string, unknown> = {};
    for (const component of Object.values(snapshot.components)) {
      if (q.componentType !== undefined && q.componentType.length > 0 && component.type !== q.componentType) {
        continue;
      }
      out[component.id] = component.state;
    }
    return ok(Object.freeze(out));
  }

  getState(id: string, key: string): AutomationResult<unknown> {
    const result = this.query({ componentId: id, stateKey: key });
    return result.ok ? ok(result.value[key]) : result;
  }

  isVisible(id: string): AutomationResult<boolean> {
    const component = getComponent(this.inspect(), id);
    return component === undefined ? err(componentNotFound(id)) : ok(component.visible);
  }

  isDisabled(id: string): AutomationResult<boolean> {
    const component = getComponent(this.inspect(), id);
    return component === undefined ? err(componentNotFound(id)) : ok(component.disabled);
  }

  getFocused(): AutomationResult<string> {
    const id = this.#runtime.focusManager.getFocused();
    return id === null ? err(new AutomationError("NO_FOCUS", "no focused component")) : ok(id);
  }

  /** Subscribe to committed state changes. Returns an idempotent unsubscribe. */
  watch(callback: (snapshot: Snapshot) => void): () => void {
    return this.#runtime.tracker.subscribe((_prev, next) => callback(next));
  }

  /* ---------- Operation ---------- */

  dispatch(action: Action): AutomationResult {
    const stamped = action.source.length > 0 ? action : withSource(action, AUTOMATION_SOURCE);
    if (this.#runtime.dispatch(stamped)) return DONE;
    return err(new AutomationError("NOT_HANDLED", `action not handled: ${formatAction(stamped)}`));
  }

  /** Left click at the component's center. Focusable components take focus. */
  click(id: string): AutomationResult {
    const component = getComponent(this.inspect(), id);
    if (component === undefined) return err(componentNotFound(id));
    if (component.disabled) return err(componentDisabled(id));
    const { rect } = component;
    return this.dispatch(
      this.#action("mouse_click", id, {
        x: rect.x + Math.floor(rect.width / 2),
        y: rect.y + Math.floor(rect.height / 2),
        button: "left",
        clicks: 1,
      }),
    );
  }

  /**
   * Type `text` into a component, one input_char per character, the way a
   * keyboard would deliver it. Stops at the first character not handled.
   */
  input(id: string, text: string): AutomationResult {
    const component = getComponent(this.inspect(), id);
    if (component === undefined) return err(componentNotFound(id));
    if (component.disabled) return err(componentDisabled(id));
    for (const ch of text) {
      const result = this.dispatch(this.#action("input_char", id, ch));
      if (!result.ok) return result;
    }
    return DONE;
  }

  navigate(direction: Direction): AutomationResult {
    if (!isDirection(direction)) {
      return err(new AutomationError("INVALID_DIRECTION", `invalid direction: ${String(direction)}`));
    }
    const result = this.dispatch(this.#action(DIRECTION_ACTIONS[direction], "", null));
    if (result.ok) return DONE;
    return err(new AutomationError("NAVIGATION_FAILED", `navigation failed: no component ${direction}`));
  }

  /**
   * Write one state key, recorded as a single history entry. A Stateful
   * component receives the value through applyState; its captured state
   * then wins over the written one.
   */
  setValue(id: string, key: string, value: unknown): AutomationResult {
    const tracker = this.#runtime.tracker;
    if (getComponent(tracker.current(), id) === undefined) return err(componentNotFound(id));
    const before = tracker.beforeAction();
    const live = this.#runtime.component(id);
    const stateful = live === undefined ? null : capabilitiesOf(live).stateful;
    stateful?.applyState?.(key, value);
    tracker.setComponentState(id, { state: { [key]: value } });
    this.#runtime.invalidate(id);
    this.#runtime.snapshotComponents();
    tracker.afterAction(before);
    return DONE;
  }

  /* ---------- Waiting ---------- */

  /**
   * Resolve once `condition` holds for the live snapshot. Re-checked on every
   * committed change and at least every poll interval until `timeoutMs`.
   */
  async waitUntil(
    condition: SnapshotCondition,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<AutomationResult> {
    const deadline = this.#now() + timeoutMs;
    for (;;) {
      if (condition(this.inspect())) return DONE;
      if (signal?.aborted) return err(new AutomationError("CANCELED", "wait canceled"));
      const remaining = deadline - this.#now();
      if (remaining <= 0) return err(waitTimeout(timeoutMs));
      await this.#nextCheck(Math.min(this.#pollMs, remaining), signal);
    }
  }

  waitForVisible(id: string, timeoutMs: number, signal?: AbortSignal): Promise<AutomationResult> {
    return this.waitUntil((s) => getComponent(s, id)?.visible === true, timeoutMs, signal);
  }

  waitForValue(
    id: string,
    key: string,
    expected: unknown,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<AutomationResult> {
    return this.waitUntil(
      (s) => {
        const state = getComponent(s, id)?.state;
        return state !== undefined && Object.prototype.hasOwnProperty.call(state, key) && state[key] === expected;
      },
      timeoutMs,
      signal,
    );
  }

  /* ---------- Composition ---------- */

  /** Run operations in order, stopping at the first failure. */
  async execute(...ops: readonly Operation[]): Promise<AutomationResult> {
    return this.executeWith(undefined, ...ops);
  }

  async executeWith(signal: AbortSignal | undefined, ...ops: readonly Operation[]): Promise<AutomationResult> {
    for (const op of ops) {
      if (signal?.aborted) return err(new AutomationError("CANCELED", `canceled before ${op.name}`));
      const result = await op.run(this, signal);
      if (!result.ok) return result;
    }
    return DONE;
  }

  /* ---------- Internals ---------- */

  #action(type: ActionType, target: string, payload: unknown): Action {
    return createAction(type, { payload, target, source: AUTOMATION_SOURCE });
  }

  #info(component: ComponentState): ComponentInfo {
    const node = this.#runtime.findNode(component.id);
    return Object.freeze({
      id: component.id,
      type: component.type,
      props: component.props,
      state: component.state,
      rect: component.rect,
      visible: component.visible,
      disabled: component.disabled,
      parentId: node?.parent?.id ?? null,
      children: Object.freeze(node === null ? [] : node.children.map((child) => child.id)),
    });
  }

  /** Sleep until the next poll, waking early on a committed change or abort. */
  async #nextCheck(ms: number, signal: AbortSignal | undefined): Promise<void> {
    const { controller, dispose } = linkSignal(signal);
    const unsubscribe = this.#runtime.tracker.subscribe(() => controller.abort());
    try {
      await sleep(ms, controller.signal);
    } finally {
      unsubscribe();
      dispose();
    }
  }
}

/** One step of an automation script. */
export interface Operation {
  readonly name: string;
  run(ctrl: AutomationController, signal?: AbortSignal): Promise<AutomationResult>;
}
