/**
 * packages/core/src/input/keymapConfig.ts — Validate key-map documents.
 *
 * A document is plain JSON:
 *
 *   {
 *     "defaults": true,
 *     "navigation": { "up": ["k", "up"], "next": "tab" },
 *     "system": { "quit": ["ctrl+q"] },
 *     "contexts": { "search": { "submit": "enter", "cancel": ["escape", "ctrl+g"] } }
 *   }
 *
 * Section keys are short aliases ("up", "quit") or full action names
 * ("navigate_up"). Every error names the offending path.
 */

import { type ActionType, isActionType } from "../actions/types.js";
import { type Result, TermlineError, err, ok } from "../errors.js";
import { isRecord } from "../actions/payload.js";
import { canonicalCombo, parseKeyCombo } from "./keyParser.js";

export type KeyMapSection = "navigation" | "editing" | "form" | "system" | "scroll";

export type ConfiguredBinding = Readonly<{ keys: readonly string[]; type: ActionType }>;

export type KeyMapConfig = Readonly<{
  defaults: boolean;
  bindings: readonly ConfiguredBinding[];
  contexts: Readonly<Record<string, readonly ConfiguredBinding[]>>;
}>;

const SECTION_ALIASES: Readonly<Record<KeyMapSection, Readonly<Record<string, ActionType>>>> =
  Object.freeze({
    navigation: {
      next: "navigate_next",
      prev: "navigate_prev",
      up: "navigate_up",
      down: "navigate_down",
      left: "navigate_left",
      right: "navigate_right",
      first: "navigate_first",
      last: "navigate_last",
      page_up: "navigate_page_up",
      page_down: "navigate_page_down",
    },
    editing: {
      delete_char: "delete_char",
      delete_word: "delete_word",
      delete_line: "delete_line",
      backspace: "backspace",
      select_all: "select_all",
      select_word: "select_word",
      select_line: "select_line",
      cursor_home: "cursor_home",
      cursor_end: "cursor_end",
      cursor_left: "cursor_left",
      cursor_right: "cursor_right",
      clear: "clear",
    },
    form: {
      submit: "submit",
      cancel: "cancel",
      validate: "validate",
      reset: "reset",
    },
    system: {
      quit: "quit",
      help: "help",
      search: "search",
      refresh: "refresh",
      copy: "copy",
      paste: "paste",
      undo: "undo",
      redo: "redo",
    },
    scroll: {
      up: "scroll_up",
      down: "scroll_down",
      left: "scroll_left",
      right: "scroll_right",
      zoom_in: "zoom_in",
      zoom_out: "zoom_out",
    },
  });

const SECTIONS: readonly KeyMapSection[] = ["navigation", "editing", "form", "system", "scroll"];

function invalid(path: string, detail: string): TermlineError {
  return new TermlineError("INVALID_ARGUMENT", `${path}: ${detail}`);
}

function resolveName(name: string, section: KeyMapSection | null): ActionType | null {
  if (section !== null) {
    const hit = SECTION_ALIASES[section][name];
    if (hit !== undefined) return hit;
  }
  if (isActionType(name)) return name;
  if (section !== null) return null;
  for (const s of SECTIONS) {
    const hit = SECTION_ALIASES[s][name];
    if (hit !== undefined) return hit;
  }
  return null;
}

function parseKeys(value: unknown, path: string): Result<readonly string[], TermlineError> {
  const list: readonly unknown[] | null =
    typeof value === "string" ? [value] : Array.isArray(value) ? value : null;
  if (list === null) return err(invalid(path, "expected a key string or an array of key strings"));

  const out: string[] = [];
  for (let i = 0; i < list.length; i++) {
    const item = list[i];
    const itemPath = typeof value === "string" ? path : `${path}[${i}]`;
    if (typeof item !== "string") return err(invalid(itemPath, "expected a string"));
    const parsed = parseKeyCombo(item);
    if (!parsed.ok) return err(invalid(itemPath, parsed.error.detail));
    const canonical = canonicalCombo(item);
    if (canonical !== null) out.push(canonical);
  }
  return ok(Object.freeze(out));
}

function parseBindingTable(
  table: unknown,
  path: string,
  section: KeyMapSection | null,
): Result<readonly ConfiguredBinding[], TermlineError> {
  if (!isRecord(table)) return err(invalid(path, "expected an object"));
  const out: ConfiguredBinding[] = [];
  for (const [name, value] of Object.entries(table)) {
    const type = resolveName(name, section);
    if (type === null) return err(invalid(`${path}.${name}`, `unknown action "${name}"`));
    const keys = parseKeys(value, `${path}.${name}`);
    if (!keys.ok) return keys;
    out.push(Object.freeze({ keys: keys.value, type }));
  }
  return ok(Object.freeze(out));
}

function isSection(name: string): name is KeyMapSection {
  return (SECTIONS as readonly string[]).includes(name);
}

export function parseKeyMapConfig(doc: unknown): Result<KeyMapConfig, TermlineError> {
  if (!isRecord(doc)) return err(invalid("$", "expected an object"));

  let defaults = true;
  const bindings: ConfiguredBinding[] = [];
  const contexts: Record<string, readonly ConfiguredBinding[]> = {};

  for (const [key, value] of Object.entries(doc)) {
    if (key === "defaults") {
      if (typeof value !== "boolean") return err(invalid(key, "expected a boolean"));
      defaults = value;
      continue;
    }
    if (key === "contexts") {
      if (!isRecord(value)) return err(invalid(key, "expected an object"));
      for (const [ctxName, table] of Object.entries(value)) {
        const parsed = parseBindingTable(table, `contexts.${ctxName}`, null);
        if (!parsed.ok) return parsed;
        contexts[ctxName] = parsed.value;
      }
      continue;
    }
    if (!isSection(key)) return err(invalid(key, "unknown section"));
    const parsed = parseBindingTable(value, key, key);
    if (!parsed.ok) return parsed;
    bindings.push(...parsed.value);
  }

  return ok(
    Object.freeze({
      defaults,
      bindings: Object.freeze(bindings),
      contexts: Object.freeze(contexts),
    }),
  );
}
