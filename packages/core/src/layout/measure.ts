/**
 * packages/core/src/layout/measure.ts — Bottom-up desired-size pass.
 *
 * Leaves report their content size through `measure`; containers sum their
 * in-flow children's flex bases along the main axis (plus gaps) and take the
 * largest child on the cross axis. Explicit sizes win over content, padding
 * is added, and the result is clamped to the incoming constraints. Absolute
 * children are out of flow and do not contribute.
 */

import { constrain, deflate, upTo } from "./constraints.js";
import { isAbsolute } from "./node.js";
import type { Constraints, FlexDirection, LayoutNode, Size } from "./types.js";

export function isRowDirection(d: FlexDirection): boolean {
  return d === "row" || d === "row-reverse";
}

export function isReverseDirection(d: FlexDirection): boolean {
  return d === "row-reverse" || d === "column-reverse";
}

function explicit(v: number | "auto"): number | null {
  return typeof v === "number" && Number.isFinite(v) ? Math.max(0, Math.trunc(v)) : null;
}

/** Main-axis starting size: explicit basis, else the (already explicit-aware) measured size. */
export function flexBasis(child: LayoutNode, measured: Size, row: boolean): number {
  const b = explicit(child.style.basis);
  if (b !== null) return b;
  return row ? measured.w : measured.h;
}

export function flowChildren(node: LayoutNode): LayoutNode[] {
  return node.children.filter((c) => !isAbsolute(c));
}

export function measureNode(node: LayoutNode, c: Constraints): Size {
  const s = node.style;
  const padW = s.padding.left + s.padding.right;
  const padH = s.padding.top + s.padding.bottom;
  const explicitW = explicit(s.width);
  const explicitH = explicit(s.height);

  const inner = deflate(c, s.padding);
  const contentC = upTo(
    explicitW !== null ? explicitW - padW : inner.maxWidth,
    explicitH !== null ? explicitH - padH : inner.maxHeight,
  );

  let contentW = 0;
  let contentH = 0;
  const flow = flowChildren(node);
  if (flow.length > 0) {
    const row = isRowDirection(s.direction);
    let main = 0;
    let cross = 0;
    for (const child of flow) {
      const cs = measureNode(child, contentC);
      main += flexBasis(child, cs, row);
      const childCross = row ? cs.h : cs.w;
      if (childCross > cross) cross = childCross;
    }
    main += Math.max(0, s.gap) * (flow.length - 1);
    contentW = row ? main : cross;
    contentH = row ? cross : main;
  } else if (node.measure !== null) {
    const m = node.measure(contentC);
    contentW = Number.isFinite(m.w) ? Math.max(0, m.w) : 0;
    contentH = Number.isFinite(m.h) ? Math.max(0, m.h) : 0;
  }

  const size = constrain(c, {
    w: explicitW ?? contentW + padW,
    h: explicitH ?? contentH + padH,
  });
  node.measuredW = size.w;
  node.measuredH = size.h;
  return size;
}
