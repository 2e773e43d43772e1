/**
 * packages/core/src/runtime/runtime.ts — The update/render loop.
 *
 * Why: One Runtime instance owns every subsystem (layout, focus, dispatcher,
 * key map, state tracker) and hands them to each other at construction, so
 * nothing lives in module-level registries. The loop is:
 *
 *   start()
 *   repeat { update(); render(); wait for input or the frame interval }
 *   stop()
 *
 * A background task reads platform bytes into a bounded InputQueue; update()
 * drains it, decodes, maps to Actions and dispatches each one bracketed by
 * tracker.beforeAction()/afterAction(). Faults in the loop or the reader go
 * through Recovery before they surface.
 */

import { isRecord } from "../actions/payload.js";
import { ActionDispatcher } from "../actions/dispatcher.js";
import { type Action, actionCategory, withTarget } from "../actions/types.js";
import { type RuntimeConfig, type RuntimeConfigOverrides, resolveRuntimeConfig } from "../config.js";
import type { EnvSource } from "../diagnostics/env.js";
import { type Logger, createLogger } from "../diagnostics/logger.js";
import { TermlineError, describeError } from "../errors.js";
import { FocusManager } from "../focus/manager.js";
import { isFocusableByProps } from "../focus/traversal.js";
import type { SpatialDirection } from "../focus/types.js";
import { InputDecoder } from "../input/decoder.js";
import { KeyMap } from "../input/keymap.js";
import type { RawInput } from "../input/types.js";
import { upTo } from "../layout/constraints.js";
import { hitTest } from "../layout/hitTest.js";
import { LayoutEngine } from "../layout/layoutEngine.js";
import { findNodeById, markDirty, nodeRect, walkNodes } from "../layout/node.js";
import type { LayoutBox, LayoutNode, MeasureFn } from "../layout/types.js";
import { pathCurrent, pathEquals } from "../state/focusPath.js";
import { type Snapshot, componentIds, createComponentState, getComponent } from "../state/snapshot.js";
import { StateTracker } from "../state/tracker.js";
import { CURSOR_HOME, moveTo } from "./ansi.js";
import { CellBuffer } from "./cellBuffer.js";
import {
  type AnyComponent,
  type Capabilities,
  type Measurable,
  capabilitiesOf,
  isActionHandler,
} from "./component.js";
import { InputQueue } from "./inputQueue.js";
import { DEFAULT_TERMINAL_SIZE, type Platform, type TerminalSize } from "./platform.js";
import { type CrashHandler, Recovery, installRecovery } from "./recovery.js";
import { TaskScope } from "./taskScope.js";

/** Raw platform bytes, or an already-decoded input (resize, automation). */
export type QueuedInput = Uint8Array | RawInput;

export type RuntimeOptions = Readonly<{
  platform: Platform;
  config?: RuntimeConfigOverrides;
  env?: EnvSource;
  logger?: Logger;
  keyMap?: KeyMap;
  clock?: () => number;
  recovery?: Recovery;
  crashHandlers?: readonly CrashHandler[];
}>;

export type RuntimeStats = Readonly<{
  ticks: number;
  frames: number;
  skippedFrames: number;
  inputs: number;
  actions: number;
}>;

type BoundMeasure = Readonly<{ source: Measurable; fn: MeasureFn }>;

const DIRECTIONS: Readonly<Partial<Record<Action["type"], SpatialDirection>>> = Object.freeze({
  navigate_up: "up",
  navigate_down: "down",
  navigate_left: "left",
  navigate_right: "right",
});

function pointOf(payload: unknown): { x: number; y: number } | null {
  if (!isRecord(payload)) return null;
  const { x, y } = payload;
  if (typeof x !== "number" || typeof y !== "number") return null;
  return { x, y };
}

export class Runtime {
  readonly config: RuntimeConfig;
  readonly #platform: Platform;
  readonly #log: Logger;
  readonly #clock: () => number;
  readonly #layout: LayoutEngine;
  readonly #focus: FocusManager;
  readonly #dispatcher: ActionDispatcher;
  readonly #keyMap: KeyMap;
  readonly #tracker: StateTracker;
  readonly #decoder = new InputDecoder();
  readonly #recovery: Recovery;
  readonly #components = new Map<string, AnyComponent>();
  readonly #bound = new WeakMap<LayoutNode, BoundMeasure>();

  #queue: InputQueue<QueuedInput>;
  #tasks: TaskScope | null = null;
  #root: LayoutNode | null = null;
  #boxes: readonly LayoutBox[] = [];
  #size: TerminalSize = DEFAULT_TERMINAL_SIZE;
  #buffer: CellBuffer;
  #caps = new Map<string, Capabilities | null>();
  #running = false;
  #stopRequested = false;
  /** First background-task fault of the current run. */
  #taskFault: Readonly<{ error: unknown; handled: Promise<void> }> | null = null;
  #unsubResize: (() => void) | null = null;

  #ticks = 0;
  #frames = 0;
  #skippedFrames = 0;
  #inputs = 0;
  #actions = 0;

  constructor(opts: RuntimeOptions) {
    this.config = resolveRuntimeConfig(opts.config, opts.env);
    this.#platform = opts.platform;
    this.#clock = opts.clock ?? Date.now;
    this.#log = opts.logger ?? createLogger("runtime", { env: opts.env });

    this.#layout = new LayoutEngine({ cacheCapacity: this.config.layoutCacheCapacity });
    this.#focus = new FocusManager({
      isFocusable: (node) => this.#isNodeFocusable(node),
      logger: this.#log.child("focus"),
    });
    this.#dispatcher = new ActionDispatcher({
      logCapacity: this.config.dispatchLogCapacity,
      logger: this.#log.child("dispatch"),
      now: this.#clock,
    });
    this.#keyMap =
      opts.keyMap ??
      new KeyMap({
        clock: this.#clock,
        doubleClickMs: this.config.doubleClickMs,
        doubleClickDistance: this.config.doubleClickDistance,
      });
    this.#tracker = new StateTracker({
      maxHistory: this.config.maxHistory,
      clock: this.#clock,
      logger: this.#log.child("state"),
    });
    this.#recovery =
      opts.recovery ??
      installRecovery(this.#platform, {
        policy: this.config.recoveryPolicy,
        logger: this.#log.child("recovery"),
        handlers: opts.crashHandlers ?? [],
        clock: this.#clock,
      });
    this.#queue = new InputQueue<QueuedInput>(this.config.inputQueueCapacity);
    this.#buffer = new CellBuffer(this.#size.cols, this.#size.rows);

    this.#dispatcher.setDefaultHandler((action) => this.#defaultAction(action));
    this.#focus.onChange(() => {
      const path = this.#focus.focusPath();
      if (!pathEquals(path, this.#tracker.focusPath())) this.#tracker.setFocusPath(path);
    });
  }

  /* ---------- Accessors ---------- */

  get layoutEngine(): LayoutEngine {
    return this.#layout;
  }

  get focusManager(): FocusManager {
    return this.#focus;
  }

  get dispatcher(): ActionDispatcher {
    return this.#dispatcher;
  }

  get keyMap(): KeyMap {
    return this.#keyMap;
  }

  get tracker(): StateTracker {
    return this.#tracker;
  }

  get decoder(): InputDecoder {
    return this.#decoder;
  }

  get recovery(): Recovery {
    return this.#recovery;
  }

  get inputQueue(): InputQueue<QueuedInput> {
    return this.#queue;
  }

  get buffer(): CellBuffer {
    return this.#buffer;
  }

  get logger(): Logger {
    return this.#log;
  }

  get running(): boolean {
    return this.#running;
  }

  get stopRequested(): boolean {
    return this.#stopRequested;
  }

  get root(): LayoutNode | null {
    return this.#root;
  }

  get size(): TerminalSize {
    return this.#size;
  }

  /** Boxes from the last layout pass, pre-order. */
  boxes(): readonly LayoutBox[] {
    return this.#boxes;
  }

  findNode(id: string): LayoutNode | null {
    return this.#root === null ? null : findNodeById([this.#root], id);
  }

  component(id: string): AnyComponent | undefined {
    return this.#components.get(id);
  }

  componentIds(): readonly string[] {
    return Object.freeze([...this.#components.keys()]);
  }

  getStats(): RuntimeStats {
    return Object.freeze({
      ticks: this.#ticks,
      frames: this.#frames,
      skippedFrames: this.#skippedFrames,
      inputs: this.#inputs,
      actions: this.#actions,
    });
  }

  /* ---------- Tree and components ---------- */

  setRoot(root: LayoutNode | null): void {
    this.#root = root;
    this.#layout.invalidate();
    this.#relayout();
    this.syncFocusables();
    this.snapshotComponents();
  }

  /** Attach a component to the node with the same id. Returns an unmount function. */
  mount(component: AnyComponent): () => void {
    if (this.#components.has(component.id)) this.unmount(component.id);
    this.#components.set(component.id, component);
    if (isActionHandler(component)) this.#dispatcher.register(component);
    this.#touch(component.id);
    let active = true;
    return () => {
      if (!active) return;
      active = false;
      if (this.#components.get(component.id) === component) this.unmount(component.id);
    };
  }

  unmount(id: string): boolean {
    const component = this.#components.get(id);
    if (component === undefined) return false;
    this.#components.delete(id);
    if (this.#dispatcher.getTarget(id) === component) this.#dispatcher.unregister(id);
    this.#touch(id);
    return true;
  }

  /** Re-collect focusables from the current tree. */
  syncFocusables(): void {
    this.#beginPass();
    this.#focus.refresh(this.#root === null ? [] : [this.#root]);
  }

  /**
   * Write every node's current state into the tracker's live snapshot.
   * Geometry comes from the last layout pass; `props`, `state`, `visible`
   * and `disabled` from the component when it is Stateful. Nodes without a
   * Stateful component keep whatever state was last written to the tracker.
   */
  snapshotComponents(): void {
    this.#beginPass();
    const seen = new Set<string>();
    if (this.#root !== null) {
      walkNodes([this.#root], (node) => {
        seen.add(node.id);
        const captured = this.#capsFor(node.id)?.stateful?.captureState() ?? {};
        const existing = getComponent(this.#tracker.current(), node.id);
        this.#tracker.putComponent(
          createComponentState(node.id, {
            type: node.type,
            props: captured.props ?? node.props,
            state: captured.state ?? existing?.state ?? {},
            rect: { x: node.x, y: node.y, width: node.w, height: node.h },
            visible: captured.visible ?? (node.w > 0 && node.h > 0),
            disabled: captured.disabled ?? node.props["disabled"] === true,
          }),
        );
      });
    }
    for (const id of componentIds(this.#tracker.current())) {
      if (!seen.has(id)) this.#tracker.removeComponent(id);
    }
    const path = this.#focus.focusPath();
    if (!pathEquals(path, this.#tracker.focusPath())) this.#tracker.setFocusPath(path);
  }

  /** Re-measure one component after an out-of-band change and re-layout. */
  invalidate(id: string): void {
    this.#touch(id);
    this.#relayout();
  }

  /* ---------- Input ---------- */

  /** Queue raw bytes as if the platform had read them. */
  feed(bytes: Uint8Array): boolean {
    return this.#queue.tryOffer(bytes);
  }

  /** Queue an already-decoded input. */
  enqueue(input: RawInput): boolean {
    return this.#queue.tryOffer(input);
  }

  handleRaw(raw: RawInput): boolean {
    this.#inputs++;
    if (raw.kind === "resize") this.#resize({ cols: raw.cols, rows: raw.rows });
    const action = this.#keyMap.map(raw);
    if (action === null) return false;
    return this.dispatch(action);
  }

  /**
   * Route and dispatch one action inside a tracker bracket. Unaddressed key
   * actions go to the focused component; unaddressed mouse actions go to the
   * component under the pointer, which also takes focus on press/click.
   * Undo/redo fall back to the tracker history when nothing handles them.
   */
  dispatch(action: Action): boolean {
    this.#actions++;
    if (action.type === "undo" || action.type === "redo") return this.#history(action);

    const before = this.#tracker.beforeAction();
    const routed = this.#route(action);
    const handled = this.#dispatcher.dispatch(routed);
    if (handled && routed.target.length > 0) this.#touch(routed.target);
    this.#relayout();
    this.snapshotComponents();
    this.#tracker.afterAction(before);
    return handled;
  }

  /** Step tracker history back and push the restored state into live components. */
  undoState(): boolean {
    if (!this.#tracker.undo()) return false;
    this.#applySnapshot(this.#tracker.current());
    return true;
  }

  redoState(): boolean {
    if (!this.#tracker.redo()) return false;
    this.#applySnapshot(this.#tracker.current());
    return true;
  }

  requestStop(): void {
    this.#stopRequested = true;
  }

  /* ---------- Lifecycle ---------- */

  async start(): Promise<void> {
    if (this.#running) return;
    try {
      await this.#platform.init();
    } catch (error: unknown) {
      throw new TermlineError("PLATFORM_ERROR", `platform init failed: ${describeError(error)}`, {
        cause: error,
      });
    }
    this.#running = true;
    this.#stopRequested = false;
    this.#taskFault = null;
    if (this.#queue.closed) this.#queue = new InputQueue<QueuedInput>(this.config.inputQueueCapacity);
    this.#decoder.reset();
    this.#resize(this.#platform.size());

    this.#unsubResize =
      this.#platform.onResize?.((size) => {
        void this.#queue
          .offer({ kind: "resize", cols: size.cols, rows: size.rows }, this.config.inputEnqueueTimeoutMs)
          .then((accepted) => {
            if (!accepted) this.#log.warn("resize dropped: input queue full", { ...size });
          });
      }) ?? null;

    const tasks = new TaskScope({
      logger: this.#log.child("tasks"),
      onError: (error, task) => {
        void this.#fault(error, task);
      },
    });
    this.#tasks = tasks;
    tasks.go("input-reader", (signal) => this.#readLoop(signal));

    this.#relayout();
    this.syncFocusables();
    this.snapshotComponents();
    this.#log.info("runtime started", { cols: this.#size.cols, rows: this.#size.rows });
  }

  /**
   * Cancels the reader, waits for it (bounded by shutdownTimeoutMs) and
   * closes the platform. A shutdown timeout is rethrown after the platform
   * is closed.
   */
  async stop(): Promise<void> {
    if (!this.#running) return;
    this.#running = false;
    this.#unsubResize?.();
    this.#unsubResize = null;
    this.#queue.close();
    const tasks = this.#tasks;
    this.#tasks = null;
    try {
      if (tasks !== null) await tasks.shutdown(this.config.shutdownTimeoutMs);
    } finally {
      await this.#platform.close();
      this.#log.info("runtime stopped", this.getStats());
    }
  }

  /** Drain queued input, dispatch it, re-layout. Returns the number of handled actions. */
  update(): number {
    this.#ticks++;
    const items = this.#queue.drain();
    const inputs: RawInput[] = [];
    for (const item of items) {
      if (item instanceof Uint8Array) inputs.push(...this.#decoder.push(item));
      else inputs.push(item);
    }
    // A tick with no new bytes resolves a held lone ESC.
    if (items.length === 0 && this.#decoder.hasPending) inputs.push(...this.#decoder.flush());

    let handled = 0;
    for (const raw of inputs) {
      if (this.handleRaw(raw)) handled++;
    }
    this.#relayout();
    return handled;
  }

  /** Paint every Paintable into the buffer and write one full frame. False when the frame was skipped. */
  render(): boolean {
    if (this.#queue.consumeSkipFrame()) {
      this.#skippedFrames++;
      this.#log.debug("frame skipped: input backlog");
      return false;
    }
    this.#buffer.clear();
    if (this.#root !== null) this.#paint(this.#root);
    const rows = this.#buffer.toAnsiLines();
    let frame = CURSOR_HOME;
    for (let y = 0; y < rows.length; y++) frame += moveTo(0, y) + (rows[y] ?? "");
    this.#platform.writeString(frame);
    this.#frames++;
    return true;
  }

  /**
   * start, loop until stopped or aborted, stop. Under the "rethrow" policy a
   * background-task fault rejects the returned promise once the terminal is
   * restored.
   */
  async run(signal?: AbortSignal): Promise<void> {
    await this.#recovery.runSafely("main", async () => {
      await this.start();
      try {
        while (this.#running && !this.#stopRequested && signal?.aborted !== true) {
          this.update();
          this.render();
          if (this.#stopRequested) break;
          await this.#queue.waitForItems(this.config.frameIntervalMs, signal);
        }
      } finally {
        await this.stop();
      }
    });
    const fault = this.#taskFault;
    if (fault === null) return;
    await fault.handled;
    if (this.#recovery.policy === "rethrow") throw fault.error;
  }

  /* ---------- Internals ---------- */

  async #readLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const chunk = await this.#platform.readInput(signal);
      if (chunk === null) {
        this.#log.info("input closed");
        this.requestStop();
        return;
      }
      if (chunk.length === 0) continue;
      while (!(await this.#queue.offer(chunk, this.config.inputEnqueueTimeoutMs))) {
        if (signal.aborted || this.#queue.closed) return;
        this.#log.debug("input queue full", { size: this.#queue.size });
      }
    }
  }

  #fault(error: unknown, task: string): Promise<void> {
    this.requestStop();
    const handled = this.#recovery.handle(error, task).then(() => undefined);
    if (this.#taskFault === null) this.#taskFault = { error, handled };
    return handled;
  }

  #beginPass(): void {
    this.#caps.clear();
  }

  #capsFor(id: string): Capabilities | null {
    const cached = this.#caps.get(id);
    if (cached !== undefined) return cached;
    const component = this.#components.get(id);
    const caps = component === undefined ? null : capabilitiesOf(component);
    this.#caps.set(id, caps);
    return caps;
  }

  #isNodeFocusable(node: LayoutNode): boolean {
    const focusable = this.#capsFor(node.id)?.focusable;
    return focusable ? focusable.isFocusable() : isFocusableByProps(node);
  }

  #touch(id: string): void {
    this.#caps.delete(id);
    const node = this.findNode(id);
    if (node !== null) markDirty(node);
  }

  #resize(size: TerminalSize): void {
    const cols = Math.max(0, Math.floor(size.cols));
    const rows = Math.max(0, Math.floor(size.rows));
    if (cols === this.#size.cols && rows === this.#size.rows) return;
    this.#size = Object.freeze({ cols, rows });
    this.#buffer.resize(cols, rows);
    this.#layout.invalidate();
    if (this.#root !== null) markDirty(this.#root);
    this.#log.debug("resized", { cols, rows });
  }

  #relayout(): void {
    if (this.#root === null) {
      this.#boxes = [];
      return;
    }
    this.#beginPass();
    walkNodes([this.#root], (node) => {
      const measurable = this.#capsFor(node.id)?.measurable ?? null;
      const bound = this.#bound.get(node);
      if (bound !== undefined && bound.source !== measurable) {
        if (node.measure === bound.fn) node.measure = null;
        this.#bound.delete(node);
        markDirty(node);
      }
      if (measurable !== null && node.measure === null) {
        const fn: MeasureFn = (c) => measurable.measure(c);
        node.measure = fn;
        this.#bound.set(node, { source: measurable, fn });
        markDirty(node);
      }
    });
    const result = this.#layout.layout([this.#root], upTo(this.#size.cols, this.#size.rows));
    this.#boxes = result.boxes;
  }

  #paint(root: LayoutNode): void {
    this.#beginPass();
    const focused = this.#focus.getFocused();
    const focusPath = this.#focus.focusPath();
    const order: LayoutNode[] = [];
    walkNodes([root], (node) => {
      order.push(node);
    });
    // Stable: equal zIndex keeps tree order.
    order.sort((a, b) => a.style.zIndex - b.style.zIndex);
    for (const node of order) {
      if (node.w <= 0 || node.h <= 0) continue;
      const paintable = this.#capsFor(node.id)?.paintable;
      if (!paintable) continue;
      try {
        paintable.paint({ buffer: this.#buffer, rect: nodeRect(node), focused: node.id === focused, focusPath });
      } catch (error: unknown) {
        this.#log.error("paint failed", { id: node.id, error: describeError(error) });
      }
    }
  }

  #route(action: Action): Action {
    if (actionCategory(action.type) === "mouse") return this.#routeMouse(action);
    if (action.target.length > 0) return action;
    const focused = this.#focus.getFocused();
    return focused === null ? action : withTarget(action, focused);
  }

  #routeMouse(action: Action): Action {
    let target = action.target;
    if (target.length === 0) {
      const point = pointOf(action.payload);
      if (point === null) return action;
      const hit = hitTest(
        this.#boxes,
        point.x,
        point.y,
        (box) => this.#dispatcher.getTarget(box.id) !== undefined || this.#focus.isFocusable(box.id),
      );
      if (hit === null) return action;
      target = hit.id;
    }
    if ((action.type === "mouse_press" || action.type === "mouse_click") && this.#focus.isFocusable(target)) {
      this.#focus.focusSpecific(target);
    }
    return target === action.target ? action : withTarget(action, target);
  }

  #history(action: Action): boolean {
    const routed = this.#route(action);
    if (this.#dispatcher.dispatch(routed)) return true;
    return action.type === "undo" ? this.undoState() : this.redoState();
  }

  /** Push a restored snapshot back into live components and focus. */
  #applySnapshot(snapshot: Snapshot): void {
    this.#beginPass();
    for (const [id, state] of Object.entries(snapshot.components)) {
      const stateful = this.#capsFor(id)?.stateful;
      if (!stateful?.applyState) continue;
      for (const [key, value] of Object.entries(state.state)) stateful.applyState(key, value);
      this.#touch(id);
    }
    const target = pathCurrent(snapshot.focusPath);
    if (target !== null && target !== this.#focus.getFocused()) this.#focus.focusSpecific(target);
    this.#relayout();
  }

  #defaultAction(action: Action): boolean {
    switch (action.type) {
      case "navigate_next":
        return this.#focus.focusNext() !== null;
      case "navigate_prev":
        return this.#focus.focusPrev() !== null;
      case "navigate_first":
        return this.#focus.focusFirst() !== null;
      case "navigate_last":
        return this.#focus.focusLast() !== null;
      case "navigate_up":
      case "navigate_down":
      case "navigate_left":
      case "navigate_right": {
        const dir = DIRECTIONS[action.type];
        return dir !== undefined && this.#focus.focusDirection(dir) !== null;
      }
      case "focus_change": {
        const id = typeof action.payload === "string" ? action.payload : action.target;
        return id.length > 0 && this.#focus.focusSpecific(id);
      }
      case "resize": {
        if (!isRecord(action.payload)) return false;
        const { cols, rows } = action.payload;
        if (typeof cols !== "number" || typeof rows !== "number") return false;
        this.#resize({ cols, rows });
        return true;
      }
      case "quit":
        this.requestStop();
        return true;
      default:
        return false;
    }
  }
}
