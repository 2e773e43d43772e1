/**
 * packages/core/src/focus/scope.ts — A bounded navigation domain.
 *
 * A scope owns an ordered focusable id list and the focus path within it.
 * Scopes are stacked by FocusManager; only the top scope is active.
 */

import { EMPTY_FOCUS_PATH, type FocusPath, pathCurrent } from "../state/focusPath.js";
import { computeMovedFocusId } from "./traversal.js";

export type FocusScopeOptions = Readonly<{
  /** Id of the subtree root whose focusables this scope collects; null means every root. */
  rootId?: string | null;
  modal?: boolean;
  focusables?: readonly string[];
}>;

export class FocusScope {
  readonly id: string;
  readonly rootId: string | null;
  readonly modal: boolean;
  #focusables: readonly string[];
  #path: FocusPath = EMPTY_FOCUS_PATH;
  #active = false;

  constructor(id: string, opts: FocusScopeOptions = {}) {
    this.id = id;
    this.rootId = opts.rootId ?? null;
    this.modal = opts.modal ?? false;
    this.#focusables = Object.freeze([...(opts.focusables ?? [])]);
  }

  get active(): boolean {
    return this.#active;
  }

  /** @internal Toggled by FocusManager on push/pop. */
  setActive(active: boolean): void {
    this.#active = active;
  }

  focusables(): readonly string[] {
    return this.#focusables;
  }

  setFocusables(ids: readonly string[]): void {
    this.#focusables = Object.freeze([...ids]);
  }

  isFocusable(id: string): boolean {
    return this.#focusables.includes(id);
  }

  path(): FocusPath {
    return this.#path;
  }

  setPath(path: FocusPath): void {
    this.#path = Object.freeze([...path]);
  }

  focused(): string | null {
    return pathCurrent(this.#path);
  }

  focus(id: string): boolean {
    if (!this.isFocusable(id)) return false;
    this.setPath([id]);
    return true;
  }

  next(): string | null {
    return this.#move(computeMovedFocusId(this.#focusables, this.focused(), "next"));
  }

  prev(): string | null {
    return this.#move(computeMovedFocusId(this.#focusables, this.focused(), "prev"));
  }

  first(): string | null {
    return this.#move(this.#focusables[0] ?? null);
  }

  last(): string | null {
    return this.#move(this.#focusables[this.#focusables.length - 1] ?? null);
  }

  clearFocus(): void {
    this.#path = EMPTY_FOCUS_PATH;
  }

  #move(id: string | null): string | null {
    if (id !== null) this.setPath([id]);
    return id;
  }
}
