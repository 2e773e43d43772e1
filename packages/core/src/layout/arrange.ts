/**
 * packages/core/src/layout/arrange.ts — Top-down position assignment.
 *
 * Given a node's final border box, distribute its content box among in-flow
 * children:
 *   1. basis = explicit basis, else measured main size
 *   2. free = content main - sum(basis) - gaps
 *   3. free >= 0: grow by weight; free < 0: shrink by weight, floored at 0
 *   4. leftover free space is placed by `justify`; reverse directions
 *      mirror the result so the first child sits at the main-axis end
 *   5. cross size/offset from `alignSelf ?? align` (stretch fills the
 *      content cross size unless the child has an explicit cross size)
 * Absolute children are measured against the parent box and positioned
 * by their offsets.
 */

import { absolutePosition } from "./absolute.js";
import { upTo } from "./constraints.js";
import {
  computeJustifyExtraGap,
  computeJustifyStartOffset,
  growSizes,
  shrinkSizes,
} from "./flex.js";
import {
  flexBasis,
  flowChildren,
  isReverseDirection,
  isRowDirection,
  measureNode,
} from "./measure.js";
import { innerBounds, isAbsolute } from "./node.js";
import type { LayoutNode, Size } from "./types.js";

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function arrangeNode(node: LayoutNode, x: number, y: number, w: number, h: number): void {
  node.x = x;
  node.y = y;
  node.w = Math.max(0, w);
  node.h = Math.max(0, h);

  const flow = flowChildren(node);
  if (flow.length > 0) arrangeFlow(node, flow);

  for (const child of node.children) {
    if (!isAbsolute(child)) continue;
    const size = measureNode(child, upTo(node.w, node.h));
    const pos = absolutePosition(node, child, size.w, size.h);
    arrangeNode(child, pos.x, pos.y, size.w, size.h);
  }
}

function arrangeFlow(node: LayoutNode, flow: readonly LayoutNode[]): void {
  const s = node.style;
  const row = isRowDirection(s.direction);
  const inner = innerBounds(node);
  const innerMain = row ? inner.w : inner.h;
  const innerCross = row ? inner.h : inner.w;
  const n = flow.length;
  const gap = Math.max(0, s.gap);
  const gaps = gap * (n - 1);

  const childC = upTo(inner.w, inner.h);
  const measured: Size[] = flow.map((c) => measureNode(c, childC));
  const bases = flow.map((c, i) => flexBasis(c, measured[i] ?? { w: 0, h: 0 }, row));
  const free = innerMain - sum(bases) - gaps;

  const mains =
    free >= 0
      ? growSizes(
          bases,
          flow.map((c) => c.style.grow),
          free,
        )
      : shrinkSizes(
          bases,
          flow.map((c) => c.style.shrink),
          innerMain - gaps,
        );

  const extra = Math.max(0, innerMain - sum(mains) - gaps);
  let cursor = computeJustifyStartOffset(s.justify, extra, n);

  const reverse = isReverseDirection(s.direction);
  for (let i = 0; i < n; i++) {
    const child = flow[i];
    if (!child) continue;
    const main = mains[i] ?? 0;
    const m = measured[i] ?? { w: 0, h: 0 };

    const align = child.style.alignSelf ?? s.align;
    const explicitCross = row ? child.style.height : child.style.width;
    const measuredCross = Math.min(row ? m.h : m.w, innerCross);
    const cross = align === "stretch" && explicitCross === "auto" ? innerCross : measuredCross;
    let crossOffset = 0;
    if (align === "center") crossOffset = Math.floor((innerCross - cross) / 2);
    else if (align === "end") crossOffset = innerCross - cross;

    // Reverse directions mirror the forward placement across the main axis.
    const mainOffset = reverse ? innerMain - cursor - main : cursor;
    if (row) {
      arrangeNode(child, inner.x + mainOffset, inner.y + crossOffset, main, cross);
    } else {
      arrangeNode(child, inner.x + crossOffset, inner.y + mainOffset, cross, main);
    }

    cursor += main;
    if (i < n - 1) cursor += gap + computeJustifyExtraGap(s.justify, extra, n, i);
  }
}
