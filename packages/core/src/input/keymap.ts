/**
 * packages/core/src/input/keymap.ts — RawInput -> Action.
 *
 * Precedence for keys, first match wins:
 *   1. custom bindings (`bind`)
 *   2. the innermost pushed context (`pushContext`)
 *   3. the default table
 *   4. printable characters without ctrl/alt/meta -> input_char
 *
 * Anything else maps to null, which is a no-op rather than an error.
 */

import { type Action, type ActionType, createAction } from "../actions/types.js";
import { type KeyParseError, comboOf, comboToString, parseKeyCombo } from "./keyParser.js";
import type { KeyMapConfig } from "./keymapConfig.js";
import { MouseTracker, type MouseTrackerOptions } from "./mouseTracker.js";
import type { KeyInput, RawInput } from "./types.js";

export type InvalidBinding = Readonly<{ keys: string; error: KeyParseError }>;

export type BindingInfo = Readonly<{
  /** Canonical spelling, e.g. "ctrl+shift+up". */
  keys: string;
  type: ActionType;
  /** "custom", "default" or "context:<name>". */
  scope: string;
}>;

export type KeyMapOptions = MouseTrackerOptions &
  Readonly<{
    /** Start from the default table (true unless set). */
    defaults?: boolean;
    clock?: () => number;
    /** `source` stamped on produced actions. */
    source?: string;
  }>;

type Entry = Readonly<{ type: ActionType; payload: unknown; hasPayload: boolean }>;

export const DEFAULT_BINDINGS: Readonly<Record<string, ActionType>> = Object.freeze({
  up: "navigate_up",
  down: "navigate_down",
  left: "navigate_left",
  right: "navigate_right",
  home: "cursor_home",
  end: "cursor_end",
  pageup: "navigate_page_up",
  pagedown: "navigate_page_down",
  tab: "navigate_next",
  "shift+tab": "navigate_prev",
  backspace: "backspace",
  delete: "delete_char",
  enter: "submit",
  escape: "cancel",
  f1: "help",
  f5: "refresh",
  "ctrl+c": "quit",
  "ctrl+z": "undo",
  "ctrl+y": "redo",
});

/**
 * Vim-style movement. Plain letters would shadow typed text, so these live in
 * the "vim" context: `pushContext(VIM_CONTEXT)` while a list or menu has focus.
 */
export const VIM_CONTEXT = "vim";

export const VIM_BINDINGS: Readonly<Record<string, ActionType>> = Object.freeze({
  k: "navigate_up",
  j: "navigate_down",
  h: "navigate_left",
  l: "navigate_right",
});

const QUIT_SIGNALS: ReadonlySet<string> = new Set(["interrupt", "terminate", "SIGINT", "SIGTERM"]);

function toList(keys: string | readonly string[]): readonly string[] {
  return typeof keys === "string" ? [keys] : keys;
}

function compile(
  target: Map<string, Entry>,
  keys: string | readonly string[],
  entry: Entry,
): InvalidBinding[] {
  const invalid: InvalidBinding[] = [];
  for (const k of toList(keys)) {
    const parsed = parseKeyCombo(k);
    if (!parsed.ok) {
      invalid.push(Object.freeze({ keys: k, error: parsed.error }));
      continue;
    }
    target.set(comboToString(parsed.value), entry);
  }
  return invalid;
}

function isPrintable(input: KeyInput): input is KeyInput & { char: string } {
  if (input.key !== "char" && input.key !== "space") return false;
  if (input.char === null || input.char.length === 0) return false;
  return !input.mods.ctrl && !input.mods.alt && !input.mods.meta;
}

export class KeyMap {
  readonly #custom = new Map<string, Entry>();
  readonly #defaults = new Map<string, Entry>();
  readonly #contexts = new Map<string, Map<string, Entry>>();
  #stack: string[] = [];
  readonly #mouse: MouseTracker;
  readonly #clock: () => number;
  readonly #source: string;

  constructor(opts: KeyMapOptions = {}) {
    this.#mouse = new MouseTracker(opts);
    this.#clock = opts.clock ?? Date.now;
    this.#source = opts.source ?? "input";
    if (opts.defaults !== false) {
      for (const [keys, type] of Object.entries(DEFAULT_BINDINGS)) {
        compile(this.#defaults, keys, { type, payload: null, hasPayload: false });
      }
      this.bindContext(VIM_CONTEXT, VIM_BINDINGS);
    }
  }

  /** Build a key map from a validated document (see parseKeyMapConfig). */
  static fromConfig(cfg: KeyMapConfig, opts: Omit<KeyMapOptions, "defaults"> = {}): KeyMap {
    const km = new KeyMap({ ...opts, defaults: cfg.defaults });
    for (const b of cfg.bindings) km.bind(b.keys, b.type);
    for (const [name, list] of Object.entries(cfg.contexts)) {
      const table: Record<string, ActionType> = {};
      for (const b of list) {
        for (const k of b.keys) table[k] = b.type;
      }
      km.bindContext(name, table);
    }
    return km;
  }

  /**
   * Bind one or more key strings. Without a payload the produced action
   * carries the decoded RawInput.
   */
  bind(keys: string | readonly string[], type: ActionType, payload?: unknown): readonly InvalidBinding[] {
    const entry: Entry = { type, payload: payload ?? null, hasPayload: payload !== undefined };
    return Object.freeze(compile(this.#custom, keys, entry));
  }

  unbind(keys: string | readonly string[]): void {
    for (const k of toList(keys)) {
      const parsed = parseKeyCombo(k);
      if (parsed.ok) this.#custom.delete(comboToString(parsed.value));
    }
  }

  /** Add bindings to a named context; later calls for the same name merge. */
  bindContext(name: string, bindings: Readonly<Record<string, ActionType>>): readonly InvalidBinding[] {
    let ctx = this.#contexts.get(name);
    if (ctx === undefined) {
      ctx = new Map();
      this.#contexts.set(name, ctx);
    }
    const invalid: InvalidBinding[] = [];
    for (const [keys, type] of Object.entries(bindings)) {
      invalid.push(...compile(ctx, keys, { type, payload: null, hasPayload: false }));
    }
    return Object.freeze(invalid);
  }

  /** Contexts without bindings are allowed; they simply fall through. */
  pushContext(name: string): void {
    this.#stack.push(name);
  }

  popContext(): string | null {
    return this.#stack.pop() ?? null;
  }

  clearContexts(): void {
    this.#stack = [];
  }

  activeContext(): string | null {
    return this.#stack[this.#stack.length - 1] ?? null;
  }

  contextDepth(): number {
    return this.#stack.length;
  }

  /** Effective bindings: custom, then the active context, then defaults not shadowed by either. */
  describeBindings(): readonly BindingInfo[] {
    const out: BindingInfo[] = [];
    const seen = new Set<string>();
    const collect = (entries: ReadonlyMap<string, Entry>, scope: string): void => {
      for (const [keys, entry] of entries) {
        if (seen.has(keys)) continue;
        seen.add(keys);
        out.push(Object.freeze({ keys, type: entry.type, scope }));
      }
    };
    collect(this.#custom, "custom");
    const active = this.activeContext();
    const ctx = active === null ? undefined : this.#contexts.get(active);
    if (active !== null && ctx !== undefined) collect(ctx, `context:${active}`);
    collect(this.#defaults, "default");
    return Object.freeze(out);
  }

  map(raw: RawInput): Action | null {
    switch (raw.kind) {
      case "key":
        return this.#mapKey(raw);
      case "mouse": {
        const g = this.#mouse.track(raw, this.#clock());
        const { type, ...payload } = g;
        return this.#action(type, Object.freeze(payload));
      }
      case "paste":
        return this.#action("input_text", raw.text);
      case "resize":
        return this.#action("resize", Object.freeze({ cols: raw.cols, rows: raw.rows }));
      case "signal":
        return QUIT_SIGNALS.has(raw.name) ? this.#action("quit", raw.name) : null;
    }
  }

  #mapKey(input: KeyInput): Action | null {
    const combo = comboToString(comboOf(input));
    const entry = this.#lookup(combo);
    if (entry !== undefined) {
      return this.#action(entry.type, entry.hasPayload ? entry.payload : input);
    }
    if (isPrintable(input)) return this.#action("input_char", input.char);
    return null;
  }

  #lookup(combo: string): Entry | undefined {
    const custom = this.#custom.get(combo);
    if (custom !== undefined) return custom;
    const active = this.activeContext();
    if (active !== null) {
      const hit = this.#contexts.get(active)?.get(combo);
      if (hit !== undefined) return hit;
    }
    return this.#defaults.get(combo);
  }

  #action(type: ActionType, payload: unknown): Action {
    return createAction(type, { payload, source: this.#source, timestamp: this.#clock() });
  }
}
