/**
 * packages/core/src/state/focusPath.ts — Focus path values.
 *
 * A focus path lists component ids from the outermost focused ancestor down
 * to the focused component. The last element is the current focus.
 */

export type FocusPath = readonly string[];

export const EMPTY_FOCUS_PATH: FocusPath = Object.freeze([]);

export function pathEquals(a: FocusPath, b: FocusPath): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function pathCurrent(path: FocusPath): string | null {
  return path.length > 0 ? (path[path.length - 1] ?? null) : null;
}

export function pathParent(path: FocusPath): FocusPath {
  return path.length <= 1 ? EMPTY_FOCUS_PATH : Object.freeze(path.slice(0, -1));
}

export function pathAppend(path: FocusPath, id: string): FocusPath {
  return Object.freeze([...path, id]);
}

export function pathToString(path: FocusPath): string {
  return path.join(".");
}
