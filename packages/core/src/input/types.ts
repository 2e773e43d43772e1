/**
 * packages/core/src/input/types.ts — Platform-neutral decoded input.
 *
 * RawInput carries no semantics: it says which key or button was used, not
 * what the user meant. KeyMap turns it into Actions.
 */

export type KeyMods = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

export const EMPTY_MODS: KeyMods = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export const NAMED_KEYS = Object.freeze([
  "up",
  "down",
  "left",
  "right",
  "home",
  "end",
  "pageup",
  "pagedown",
  "insert",
  "delete",
  "enter",
  "tab",
  "backspace",
  "escape",
  "space",
  "f1",
  "f2",
  "f3",
  "f4",
  "f5",
  "f6",
  "f7",
  "f8",
  "f9",
  "f10",
  "f11",
  "f12",
] as const);

export type NamedKey = (typeof NAMED_KEYS)[number];

/** "char" keys carry their text in `char`. */
export type KeyName = NamedKey | "char";

export type MouseAction = "press" | "release" | "motion" | "wheel";

export type MouseButton = "left" | "middle" | "right" | "none" | "wheel_up" | "wheel_down";

export type KeyInput = Readonly<{ kind: "key"; key: KeyName; char: string | null; mods: KeyMods }>;

export type MouseInput = Readonly<{
  kind: "mouse";
  action: MouseAction;
  button: MouseButton;
  /** 0-based cell column. */
  x: number;
  /** 0-based cell row. */
  y: number;
  mods: KeyMods;
}>;

export type ResizeInput = Readonly<{ kind: "resize"; cols: number; rows: number }>;

export type PasteInput = Readonly<{ kind: "paste"; text: string }>;

export type SignalInput = Readonly<{ kind: "signal"; name: string }>;

export type RawInput = KeyInput | MouseInput | ResizeInput | PasteInput | SignalInput;

export function keyInput(key: KeyName, char: string | null = null, mods: KeyMods = EMPTY_MODS): KeyInput {
  return Object.freeze({ kind: "key", key, char, mods });
}

export function charInput(char: string, mods: KeyMods = EMPTY_MODS): KeyInput {
  return keyInput(char === " " ? "space" : "char", char, mods);
}

export function isNamedKey(value: string): value is NamedKey {
  return (NAMED_KEYS as readonly string[]).includes(value);
}
