/**
 * packages/core/src/focus/traversal.ts — Sequential focus traversal.
 *
 * Rules:
 *   - next/prev wrap at both ends of the list
 *   - no current focus (or a current id missing from the list): next lands
 *     on the first id, prev on the last
 *   - an empty list yields null
 */

import { walkNodes } from "../layout/node.js";
import type { LayoutNode } from "../layout/types.js";
import type { FocusablePredicate, FocusMove } from "./types.js";

export function computeMovedFocusId(
  focusList: readonly string[],
  focusedId: string | null,
  move: FocusMove,
): string | null {
  const n = focusList.length;
  if (n === 0) return null;

  const first = focusList[0];
  const last = focusList[n - 1];
  if (first === undefined || last === undefined) return null;

  if (focusedId === null) return move === "next" ? first : last;

  const idx = focusList.indexOf(focusedId);
  if (idx < 0) return move === "next" ? first : last;

  const nextIdx = move === "next" ? (idx + 1) % n : (idx - 1 + n) % n;
  return focusList[nextIdx] ?? null;
}

/** Default focusability: an explicit `focusable: true` prop. */
export function isFocusableByProps(node: LayoutNode): boolean {
  return node.props["focusable"] === true && node.props["disabled"] !== true;
}

/** Depth-first preorder, children left-to-right. */
export function collectFocusableIds(
  roots: readonly LayoutNode[],
  isFocusable: FocusablePredicate = isFocusableByProps,
): string[] {
  const ids: string[] = [];
  walkNodes(roots, (node) => {
    if (isFocusable(node)) ids.push(node.id);
  });
  return ids;
}

/** Ids from the outermost root down to `id`, or null when `id` is absent. */
export function ancestryPath(roots: readonly LayoutNode[], id: string): string[] | null {
  const stack: string[] = [];
  const visit = (node: LayoutNode): boolean => {
    stack.push(node.id);
    if (node.id === id) return true;
    for (const child of node.children) {
      if (visit(child)) return true;
    }
    stack.pop();
    return false;
  };
  for (const root of roots) {
    if (visit(root)) return stack;
  }
  return null;
}
