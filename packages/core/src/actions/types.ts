/**
 * packages/core/src/actions/types.ts — Action catalog and the Action record.
 *
 * Why: Actions are already-interpreted intents. Every input source (keyboard,
 * mouse, automation) is reduced to this one shape before routing, so a human
 * and an agent drive the interface through the same path.
 */

export const NAVIGATION_ACTIONS = Object.freeze([
  "navigate_first",
  "navigate_last",
  "navigate_next",
  "navigate_prev",
  "navigate_up",
  "navigate_down",
  "navigate_left",
  "navigate_right",
  "navigate_page_up",
  "navigate_page_down",
] as const);

export const EDITING_ACTIONS = Object.freeze([
  "input_char",
  "input_text",
  "delete_char",
  "delete_word",
  "delete_line",
  "backspace",
  "cursor_home",
  "cursor_end",
  "cursor_left",
  "cursor_right",
  "cursor_word_left",
  "cursor_word_right",
  "select_all",
  "select_word",
  "select_line",
] as const);

export const FORM_ACTIONS = Object.freeze([
  "submit",
  "cancel",
  "validate",
  "reset",
  "clear",
] as const);

export const SELECTION_ACTIONS = Object.freeze([
  "select_item",
  "deselect_item",
  "toggle_select",
  "select_range",
] as const);

export const MOUSE_ACTIONS = Object.freeze([
  "mouse_click",
  "mouse_double_click",
  "mouse_triple_click",
  "mouse_press",
  "mouse_release",
  "mouse_motion",
  "mouse_drag",
  "mouse_wheel",
] as const);

export const VIEW_ACTIONS = Object.freeze([
  "scroll",
  "scroll_up",
  "scroll_down",
  "scroll_left",
  "scroll_right",
  "zoom_in",
  "zoom_out",
  "zoom_reset",
] as const);

export const WINDOW_ACTIONS = Object.freeze([
  "quit",
  "close",
  "maximize",
  "minimize",
  "fullscreen",
] as const);

export const SYSTEM_ACTIONS = Object.freeze([
  "copy",
  "cut",
  "paste",
  "undo",
  "redo",
  "search",
  "help",
  "refresh",
  "focus_change",
  "resize",
] as const);

export const AUTOMATION_ACTIONS = Object.freeze([
  "ai_inspect",
  "ai_find",
  "ai_query",
  "ai_dispatch",
  "ai_wait",
  "ai_watch",
] as const);

export type ActionType =
  | (typeof NAVIGATION_ACTIONS)[number]
  | (typeof EDITING_ACTIONS)[number]
  | (typeof FORM_ACTIONS)[number]
  | (typeof SELECTION_ACTIONS)[number]
  | (typeof MOUSE_ACTIONS)[number]
  | (typeof VIEW_ACTIONS)[number]
  | (typeof WINDOW_ACTIONS)[number]
  | (typeof SYSTEM_ACTIONS)[number]
  | (typeof AUTOMATION_ACTIONS)[number];

export type ActionCategory =
  | "navigation"
  | "editing"
  | "form"
  | "selection"
  | "mouse"
  | "view"
  | "window"
  | "system"
  | "automation";

export const ACTION_CATEGORIES: Readonly<Record<ActionCategory, readonly ActionType[]>> =
  Object.freeze({
    navigation: NAVIGATION_ACTIONS,
    editing: EDITING_ACTIONS,
    form: FORM_ACTIONS,
    selection: SELECTION_ACTIONS,
    mouse: MOUSE_ACTIONS,
    view: VIEW_ACTIONS,
    window: WINDOW_ACTIONS,
    system: SYSTEM_ACTIONS,
    automation: AUTOMATION_ACTIONS,
  });

const CATEGORY_NAMES: readonly ActionCategory[] = Object.freeze([
  "navigation",
  "editing",
  "form",
  "selection",
  "mouse",
  "view",
  "window",
  "system",
  "automation",
]);

const CATEGORY_BY_TYPE: ReadonlyMap<string, ActionCategory> = (() => {
  const m = new Map<string, ActionCategory>();
  for (const category of CATEGORY_NAMES) {
    for (const t of ACTION_CATEGORIES[category]) m.set(t, category);
  }
  return m;
})();

export function isActionType(value: unknown): value is ActionType {
  return typeof value === "string" && CATEGORY_BY_TYPE.has(value);
}

export function actionCategory(type: ActionType): ActionCategory {
  const category = CATEGORY_BY_TYPE.get(type);
  if (category === undefined) throw new Error(`actionCategory: unknown action type "${type}"`);
  return category;
}

/**
 * A semantic intent.
 *   - payload: type-specific data (a char for input_char, {x,y,button} for mouse, ...)
 *   - source: id of whatever produced it ("keyboard", "mouse", "automation", a component id)
 *   - target: component id it is addressed to; empty string means unaddressed
 *   - timestamp: ms since epoch at creation
 */
export type Action = Readonly<{
  type: ActionType;
  payload: unknown;
  source: string;
  target: string;
  timestamp: number;
}>;

export type ActionInit = Readonly<{
  payload?: unknown;
  source?: string;
  target?: string;
  timestamp?: number;
}>;

export function createAction(type: ActionType, init: ActionInit = {}): Action {
  return Object.freeze({
    type,
    payload: init.payload ?? null,
    source: init.source ?? "",
    target: init.target ?? "",
    timestamp: init.timestamp ?? Date.now(),
  });
}

export function withPayload(a: Action, payload: unknown): Action {
  return Object.freeze({ ...a, payload });
}

export function withSource(a: Action, source: string): Action {
  return Object.freeze({ ...a, source });
}

export function withTarget(a: Action, target: string): Action {
  return Object.freeze({ ...a, target });
}

function clonePayload(payload: unknown): unknown {
  if (payload === null || typeof payload !== "object") return payload;
  try {
    return structuredClone(payload);
  } catch {
    // Functions and other uncloneable values are shared by reference.
    return payload;
  }
}

export function cloneAction(a: Action): Action {
  return Object.freeze({ ...a, payload: clonePayload(a.payload) });
}

/** "submit" or "submit{form1}". */
export function formatAction(a: Action): string {
  return a.target.length > 0 ? `${a.type}{${a.target}}` : a.type;
}
