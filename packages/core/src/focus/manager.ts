/**
 * packages/core/src/focus/manager.ts — Focus state for the runtime.
 *
 * Why: Focus is scoped (a stack of navigation domains) and can be further
 * confined by traps (modals, menus). Both layers resolve to one "available"
 * focusable list that every move operates on:
 *   - top trap present: focusables inside the trap's subtree
 *   - otherwise: the active scope's focusables
 *
 * Moves never throw; a null/false result means nothing changed.
 * Change listeners run synchronously after the focus path is updated.
 */

import { SILENT_LOGGER, type Logger } from "../diagnostics/logger.js";
import { findNodeById } from "../layout/node.js";
import type { LayoutNode } from "../layout/types.js";
import { EMPTY_FOCUS_PATH, type FocusPath } from "../state/focusPath.js";
import { type FocusBounds, computeGeometricMove } from "./geometry.js";
import { FocusScope } from "./scope.js";
import { FocusTrapStack } from "./traps.js";
import {
  ancestryPath,
  collectFocusableIds,
  computeMovedFocusId,
  isFocusableByProps,
} from "./traversal.js";
import type {
  FocusChangeListener,
  FocusMove,
  FocusTrap,
  FocusablePredicate,
  SpatialDirection,
} from "./types.js";

export type FocusManagerOptions = Readonly<{
  isFocusable?: FocusablePredicate;
  logger?: Logger;
}>;

export const ROOT_SCOPE_ID = "root";

export class FocusManager {
  readonly #base: FocusScope;
  readonly #scopes: FocusScope[];
  readonly #traps = new FocusTrapStack();
  readonly #returnFocus = new Map<string, string | null>();
  readonly #listeners: FocusChangeListener[] = [];
  readonly #isFocusable: FocusablePredicate;
  readonly #log: Logger;
  #roots: readonly LayoutNode[] = [];

  constructor(opts: FocusManagerOptions = {}) {
    this.#isFocusable = opts.isFocusable ?? isFocusableByProps;
    this.#log = opts.logger ?? SILENT_LOGGER;
    this.#base = new FocusScope(ROOT_SCOPE_ID);
    this.#base.setActive(true);
    this.#scopes = [this.#base];
  }

  /* ---------- Tree ---------- */

  roots(): readonly LayoutNode[] {
    return this.#roots;
  }

  /**
   * Re-collect every scope's focusables from `roots`. A scope whose focused
   * id disappeared falls back to its first focusable.
   */
  refresh(roots: readonly LayoutNode[] = this.#roots): void {
    this.#roots = roots;
    const before = this.getFocused();
    for (const scope of this.#scopes) {
      scope.setFocusables(this.#collectFor(scope));
      const cur = scope.focused();
      if (cur !== null && !scope.isFocusable(cur)) {
        const first = scope.focusables()[0];
        if (first === undefined) scope.clearFocus();
        else scope.setPath(this.#pathTo(first));
      }
    }
    const available = this.#available();
    const cur = this.getFocused();
    if (cur !== null && !available.includes(cur)) {
      this.activeScope().setPath(this.#pathTo(available[0] ?? null));
    }
    this.#notifyIfChanged(before);
  }

  #collectFor(scope: FocusScope): string[] {
    if (scope.rootId === null) return collectFocusableIds(this.#roots, this.#isFocusable);
    const root = findNodeById(this.#roots, scope.rootId);
    return root === null ? [] : collectFocusableIds([root], this.#isFocusable);
  }

  /* ---------- Scopes ---------- */

  activeScope(): FocusScope {
    return this.#scopes[this.#scopes.length - 1] ?? this.#base;
  }

  get scopeDepth(): number {
    return this.#scopes.length;
  }

  pushScope(scope: FocusScope): void {
    const before = this.getFocused();
    this.activeScope().setActive(false);
    if (scope.focusables().length === 0 && this.#roots.length > 0) {
      scope.setFocusables(this.#collectFor(scope));
    }
    scope.setActive(true);
    this.#scopes.push(scope);
    this.#notifyIfChanged(before);
  }

  /** Pops the active scope. The base scope is never popped; returns null then. */
  popScope(): FocusScope | null {
    if (this.#scopes.length <= 1) return null;
    const before = this.getFocused();
    const scope = this.#scopes.pop() ?? null;
    scope?.setActive(false);
    this.activeScope().setActive(true);
    this.#notifyIfChanged(before);
    return scope;
  }

  /* ---------- Queries ---------- */

  getFocused(): string | null {
    return this.activeScope().focused();
  }

  focusPath(): FocusPath {
    return this.activeScope().path();
  }

  /** The list navigation currently operates on (trap-restricted when a trap is up). */
  getFocusableIds(): readonly string[] {
    return this.#available();
  }

  isFocusable(id: string): boolean {
    return this.#available().includes(id);
  }

  #available(): readonly string[] {
    const trap = this.#traps.active();
    if (trap !== null) return collectFocusableIds([trap.root], this.#isFocusable);
    return this.activeScope().focusables();
  }

  /* ---------- Moves ---------- */

  focusNext(): string | null {
    return this.#moveSequential("next");
  }

  focusPrev(): string | null {
    return this.#moveSequential("prev");
  }

  focusFirst(): string | null {
    const id = this.#available()[0] ?? null;
    if (id !== null) this.#setFocus(id);
    return id;
  }

  focusLast(): string | null {
    const available = this.#available();
    const id = available[available.length - 1] ?? null;
    if (id !== null) this.#setFocus(id);
    return id;
  }

  /** Returns false (and leaves focus alone) when `id` is not currently focusable. */
  focusSpecific(id: string): boolean {
    if (!this.#available().includes(id)) return false;
    this.#setFocus(id);
    return true;
  }

  focusDirection(dir: SpatialDirection): string | null {
    const bounds: FocusBounds[] = [];
    for (const id of this.#available()) {
      const node = findNodeById(this.#roots, id);
      if (node !== null) bounds.push({ id, x: node.x, y: node.y, w: node.w, h: node.h });
    }
    const next = computeGeometricMove(this.getFocused(), dir, bounds);
    if (next !== null) this.#setFocus(next);
    return next;
  }

  blur(): void {
    this.#setFocus(null);
  }

  #moveSequential(move: FocusMove): string | null {
    const next = computeMovedFocusId(this.#available(), this.getFocused(), move);
    if (next !== null) this.#setFocus(next);
    return next;
  }

  /* ---------- Traps ---------- */

  /** Activates `trap`, moving focus inside it when the current focus lies outside. */
  pushTrap(trap: FocusTrap): void {
    this.#returnFocus.set(trap.id, this.getFocused());
    this.#traps.push(trap);
    const available = this.#available();
    const cur = this.getFocused();
    if (cur === null || !available.includes(cur)) {
      const first = available[0];
      if (first !== undefined) this.#setFocus(first);
    }
  }

  popTrap(): FocusTrap | null {
    const trap = this.#traps.pop();
    if (trap !== null) this.#restoreAfterTrap(trap.id);
    return trap;
  }

  removeTrap(id: string): boolean {
    const wasTop = this.#traps.isActive(id);
    if (!this.#traps.remove(id)) return false;
    if (wasTop) this.#restoreAfterTrap(id);
    else this.#returnFocus.delete(id);
    return true;
  }

  clearTraps(): void {
    while (this.#traps.depth > 0) this.popTrap();
  }

  activeTrap(): FocusTrap | null {
    return this.#traps.active();
  }

  isTrapActive(id: string): boolean {
    return this.#traps.isActive(id);
  }

  get trapDepth(): number {
    return this.#traps.depth;
  }

  #restoreAfterTrap(id: string): void {
    const back = this.#returnFocus.get(id) ?? null;
    this.#returnFocus.delete(id);
    const available = this.#available();
    if (back !== null && available.includes(back)) {
      this.#setFocus(back);
      return;
    }
    const cur = this.getFocused();
    if (cur !== null && !available.includes(cur)) this.#setFocus(available[0] ?? null);
  }

  /* ---------- Notifications ---------- */

  onChange(listener: FocusChangeListener): () => void {
    this.#listeners.push(listener);
    let active = true;
    return () => {
      if (!active) return;
      active = false;
      const idx = this.#listeners.indexOf(listener);
      if (idx >= 0) this.#listeners.splice(idx, 1);
    };
  }

  #pathTo(id: string | null): FocusPath {
    if (id === null) return EMPTY_FOCUS_PATH;
    return ancestryPath(this.#roots, id) ?? [id];
  }

  #setFocus(id: string | null): void {
    const before = this.getFocused();
    this.activeScope().setPath(this.#pathTo(id));
    this.#notifyIfChanged(before);
  }

  #notifyIfChanged(before: string | null): void {
    const after = this.getFocused();
    if (before === after) return;
    this.#log.debug("focus changed", { from: before, to: after });
    for (const listener of this.#listeners.slice()) {
      try {
        listener(before, after);
      } catch (error: unknown) {
        this.#log.error("focus listener threw", { error });
      }
    }
  }
}
