/**
 * packages/core/src/runtime/ansi.ts — Escape sequences the runtime writes itself.
 */

export const ALT_SCREEN_ENTER = "\u001b[?1049h";
export const ALT_SCREEN_LEAVE = "\u001b[?1049l";
export const CURSOR_HIDE = "\u001b[?25l";
export const CURSOR_SHOW = "\u001b[?25h";
export const CURSOR_HOME = "\u001b[H";
export const CLEAR_SCREEN = "\u001b[2J";
export const MOUSE_ENABLE = "\u001b[?1000h\u001b[?1002h\u001b[?1006h";
export const MOUSE_DISABLE = "\u001b[?1006l\u001b[?1002l\u001b[?1000l";
export const PASTE_ENABLE = "\u001b[?2004h";
export const PASTE_DISABLE = "\u001b[?2004l";

/** Leaves the alternate screen and shows the cursor; safe to write more than once. */
export const RESTORE_TERMINAL = `${MOUSE_DISABLE}${PASTE_DISABLE}${ALT_SCREEN_LEAVE}${CURSOR_SHOW}`;

/** 0-based cell coordinates. */
export function moveTo(x: number, y: number): string {
  return `\u001b[${String(y + 1)};${String(x + 1)}H`;
}
