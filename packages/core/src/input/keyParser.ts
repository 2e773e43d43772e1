/**
 * packages/core/src/input/keyParser.ts — Parse binding strings like "ctrl+s".
 *
 * Format:
 *   - Single key: "a", "escape", "f1"
 *   - With modifiers: "ctrl+s", "alt+shift+up"
 *
 * Modifier names (case-insensitive): shift; ctrl, control; alt, option;
 * meta, cmd, command, super. Key names are the NamedKey set plus aliases
 * (esc, return, pgup, pgdn, del, ins, plus) and any single character.
 *
 * Every binding has one canonical spelling ("ctrl+alt+shift+meta+key"), which
 * is also what `comboOf` produces for a decoded key, so matching is a string
 * lookup.
 */

import { err, ok, type Result } from "../errors.js";
import { isNamedKey, type KeyInput, type KeyMods } from "./types.js";

export type KeyParseError = Readonly<{
  code: "INVALID_KEY" | "EMPTY_SEQUENCE" | "INVALID_MODIFIER";
  detail: string;
}>;

export type KeyCombo = Readonly<{
  /** Named key or a single lower-case character. */
  key: string;
  mods: KeyMods;
}>;

type ModName = keyof KeyMods;

const MODIFIER_ALIASES: ReadonlyMap<string, ModName> = new Map<string, ModName>([
  ["shift", "shift"],
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["alt", "alt"],
  ["option", "alt"],
  ["meta", "meta"],
  ["cmd", "meta"],
  ["command", "meta"],
  ["super", "meta"],
]);

const KEY_ALIASES: ReadonlyMap<string, string> = new Map([
  ["esc", "escape"],
  ["return", "enter"],
  ["pgup", "pageup"],
  ["pgdn", "pagedown"],
  ["page_up", "pageup"],
  ["page_down", "pagedown"],
  ["del", "delete"],
  ["ins", "insert"],
  ["plus", "+"],
]);

function normalizeKeyName(name: string): string | null {
  const aliased = KEY_ALIASES.get(name) ?? name;
  if (isNamedKey(aliased)) return aliased;
  if ([...aliased].length === 1) return aliased;
  return null;
}

export function parseKeyCombo(input: string): Result<KeyCombo, KeyParseError> {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return err({ code: "EMPTY_SEQUENCE", detail: "keybinding string is empty" });
  }

  const pieces = trimmed.toLowerCase().split("+");
  const mods = { shift: false, ctrl: false, alt: false, meta: false };
  let keyName: string | null = null;

  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i];
    if (piece === undefined || piece.length === 0) {
      return err({ code: "INVALID_KEY", detail: `empty component in "${input}"` });
    }
    const isLast = i === pieces.length - 1;
    const modifier = MODIFIER_ALIASES.get(piece);

    if (modifier !== undefined && !isLast) {
      if (mods[modifier]) {
        return err({ code: "INVALID_MODIFIER", detail: `duplicate modifier "${piece}" in "${input}"` });
      }
      mods[modifier] = true;
      continue;
    }
    if (!isLast) {
      return err({
        code: "INVALID_MODIFIER",
        detail: `"${piece}" is not a valid modifier in "${input}"`,
      });
    }
    if (modifier !== undefined) {
      return err({
        code: "INVALID_KEY",
        detail: `modifier "${piece}" cannot be the final key in "${input}"`,
      });
    }
    keyName = normalizeKeyName(piece);
    if (keyName === null) {
      return err({ code: "INVALID_KEY", detail: `unknown key "${piece}" in "${input}"` });
    }
  }

  if (keyName === null) {
    return err({ code: "INVALID_KEY", detail: `no key found in "${input}"` });
  }
  return ok(Object.freeze({ key: keyName, mods: Object.freeze(mods) }));
}

export function comboToString(combo: KeyCombo): string {
  const parts: string[] = [];
  if (combo.mods.ctrl) parts.push("ctrl");
  if (combo.mods.alt) parts.push("alt");
  if (combo.mods.shift) parts.push("shift");
  if (combo.mods.meta) parts.push("meta");
  parts.push(combo.key);
  return parts.join("+");
}

/** Canonical spelling of a binding string, or null when it does not parse. */
export function canonicalCombo(input: string): string | null {
  const parsed = parseKeyCombo(input);
  return parsed.ok ? comboToString(parsed.value) : null;
}

/**
 * Combo for a decoded key. Upper-case letters become shift+letter so that
 * "shift+a" matches a typed "A".
 */
export function comboOf(input: KeyInput): KeyCombo {
  if (input.key !== "char") return { key: input.key, mods: input.mods };
  const ch = input.char ?? "";
  const lower = ch.toLowerCase();
  if (lower !== ch && ch.length === 1) {
    return { key: lower, mods: { ...input.mods, shift: true } };
  }
  return { key: ch, mods: input.mods };
}
