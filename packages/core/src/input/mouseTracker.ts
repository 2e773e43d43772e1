/**
 * packages/core/src/input/mouseTracker.ts — Click counting and drag detection.
 *
 * Why: the decoder reports bare press/release/motion events. Multi-click and
 * drag are properties of a sequence of events, so they need a little state
 * that the stateless decoder must not carry.
 */

import type { KeyMods, MouseButton, MouseInput } from "./types.js";

export type MouseGestureType =
  | "mouse_click"
  | "mouse_double_click"
  | "mouse_triple_click"
  | "mouse_press"
  | "mouse_release"
  | "mouse_motion"
  | "mouse_drag"
  | "mouse_wheel";

export type MouseGesture = Readonly<{
  type: MouseGestureType;
  x: number;
  y: number;
  button: MouseButton;
  mods: KeyMods;
  /** 1..3 for left clicks, 0 otherwise. */
  clicks: number;
  /** Present on mouse_drag: where the button went down. */
  start?: Readonly<{ x: number; y: number }>;
  dx?: number;
  dy?: number;
}>;

export type MouseTrackerOptions = Readonly<{
  doubleClickMs?: number;
  doubleClickDistance?: number;
}>;

type LastClick = { x: number; y: number; at: number; count: number };
type Pressed = { button: MouseButton; x: number; y: number };

const CLICK_TYPES: readonly MouseGestureType[] = [
  "mouse_click",
  "mouse_double_click",
  "mouse_triple_click",
];

export class MouseTracker {
  readonly #windowMs: number;
  readonly #distance: number;
  #last: LastClick | null = null;
  #pressed: Pressed | null = null;

  constructor(opts: MouseTrackerOptions = {}) {
    this.#windowMs = opts.doubleClickMs ?? 500;
    this.#distance = opts.doubleClickDistance ?? 5;
  }

  get isDragging(): boolean {
    return this.#pressed !== null;
  }

  track(input: MouseInput, at: number): MouseGesture {
    const base = { x: input.x, y: input.y, button: input.button, mods: input.mods };

    switch (input.action) {
      case "wheel":
        return Object.freeze({ ...base, type: "mouse_wheel", clicks: 0 });

      case "release":
        this.#pressed = null;
        return Object.freeze({ ...base, type: "mouse_release", clicks: 0 });

      case "motion": {
        const p = this.#pressed;
        if (p === null) return Object.freeze({ ...base, type: "mouse_motion", clicks: 0 });
        return Object.freeze({
          ...base,
          button: p.button,
          type: "mouse_drag",
          clicks: 0,
          start: Object.freeze({ x: p.x, y: p.y }),
          dx: input.x - p.x,
          dy: input.y - p.y,
        });
      }

      case "press": {
        this.#pressed = { button: input.button, x: input.x, y: input.y };
        if (input.button !== "left") {
          this.#last = null;
          return Object.freeze({ ...base, type: "mouse_press", clicks: 0 });
        }
        const count = this.#nextCount(input.x, input.y, at);
        this.#last = { x: input.x, y: input.y, at, count };
        return Object.freeze({ ...base, type: CLICK_TYPES[count - 1] ?? "mouse_click", clicks: count });
      }
    }
  }

  reset(): void {
    this.#last = null;
    this.#pressed = null;
  }

  #nextCount(x: number, y: number, at: number): number {
    const last = this.#last;
    if (last === null || last.count >= 3) return 1;
    if (at - last.at > this.#windowMs) return 1;
    if (Math.abs(x - last.x) > this.#distance || Math.abs(y - last.y) > this.#distance) return 1;
    return last.count + 1;
  }
}
