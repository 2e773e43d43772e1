/**
 * packages/core/src/layout/absolute.ts — Out-of-flow positioning.
 *
 * An absolute child is placed against its parent's border box:
 *   x = parent.x + left             (left defaults to 0)
 *   x = parent.x + parent.w - right - child.w   when right is set
 * and likewise for top/bottom. When both sides of an axis are given,
 * right/bottom take precedence.
 */

import { isAbsolute } from "./node.js";
import type { LayoutNode } from "./types.js";

export function absolutePosition(
  parent: LayoutNode,
  child: LayoutNode,
  w: number,
  h: number,
): Readonly<{ x: number; y: number }> {
  const s = child.style;
  let x = parent.x + (s.left ?? 0);
  let y = parent.y + (s.top ?? 0);
  if (s.right !== undefined) x = parent.x + parent.w - s.right - w;
  if (s.bottom !== undefined) y = parent.y + parent.h - s.bottom - h;
  return { x, y };
}

function translate(node: LayoutNode, dx: number, dy: number): void {
  node.x += dx;
  node.y += dy;
  for (const child of node.children) translate(child, dx, dy);
}

/**
 * Re-derive absolute children's positions from their parents' current
 * geometry. Recurses through normally-flowed children; an absolute subtree
 * moves with its root. Idempotent on an already laid-out tree.
 */
export function applyAbsoluteLayout(parent: LayoutNode): void {
  for (const child of parent.children) {
    if (isAbsolute(child)) {
      const pos = absolutePosition(parent, child, child.w, child.h);
      const dx = pos.x - child.x;
      const dy = pos.y - child.y;
      if (dx !== 0 || dy !== 0) translate(child, dx, dy);
    } else {
      applyAbsoluteLayout(child);
    }
  }
}
