/**
 * packages/core/src/focus/traps.ts — Focus trap stack.
 *
 * Pushing a trap shadows the previous one without discarding it; popping
 * (or removing the top) exposes the prior trap again. Activity is never
 * cached: a trap is active exactly when it is the stack top.
 */

import type { FocusTrap } from "./types.js";

export class FocusTrapStack {
  readonly #stack: FocusTrap[] = [];

  /** Pushes `trap`; an existing trap with the same id is moved to the top. */
  push(trap: FocusTrap): void {
    this.remove(trap.id);
    this.#stack.push(trap);
  }

  pop(): FocusTrap | null {
    return this.#stack.pop() ?? null;
  }

  remove(id: string): boolean {
    const idx = this.#stack.findIndex((t) => t.id === id);
    if (idx < 0) return false;
    this.#stack.splice(idx, 1);
    return true;
  }

  clear(): void {
    this.#stack.length = 0;
  }

  active(): FocusTrap | null {
    return this.#stack[this.#stack.length - 1] ?? null;
  }

  isActive(id: string): boolean {
    return this.active()?.id === id;
  }

  has(id: string): boolean {
    return this.#stack.some((t) => t.id === id);
  }

  get depth(): number {
    return this.#stack.length;
  }

  /** Bottom to top. */
  ids(): readonly string[] {
    return this.#stack.map((t) => t.id);
  }
}
