/**
 * packages/core/src/layout/node.ts — Layout tree construction and queries.
 */

import type {
  Insets,
  LayoutNode,
  LayoutStyle,
  MeasureFn,
  Rect,
  StyleInit,
} from "./types.js";

const ZERO_INSETS: Insets = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export const DEFAULT_STYLE: LayoutStyle = Object.freeze({
  width: "auto",
  height: "auto",
  direction: "column",
  grow: 0,
  shrink: 1,
  basis: "auto",
  gap: 0,
  justify: "start",
  align: "start",
  alignSelf: undefined,
  padding: ZERO_INSETS,
  position: "relative",
  top: undefined,
  right: undefined,
  bottom: undefined,
  left: undefined,
  zIndex: 0,
  overflow: "visible",
});

function resolvePadding(p: StyleInit["padding"]): Insets {
  if (p === undefined) return ZERO_INSETS;
  if (typeof p === "number") return Object.freeze({ top: p, right: p, bottom: p, left: p });
  return Object.freeze({
    top: p.top ?? 0,
    right: p.right ?? 0,
    bottom: p.bottom ?? 0,
    left: p.left ?? 0,
  });
}

export function createStyle(init: StyleInit = {}, base: LayoutStyle = DEFAULT_STYLE): LayoutStyle {
  const { padding, ...rest } = init;
  return Object.freeze({
    ...base,
    ...rest,
    padding: padding === undefined ? base.padding : resolvePadding(padding),
  });
}

export type LayoutNodeInit = Readonly<{
  style?: StyleInit;
  props?: Record<string, unknown>;
  measure?: MeasureFn;
  children?: readonly LayoutNode[];
}>;

export function createLayoutNode(id: string, type: string, init: LayoutNodeInit = {}): LayoutNode {
  const node: LayoutNode = {
    id,
    type,
    style: createStyle(init.style),
    props: { ...(init.props ?? {}) },
    parent: null,
    children: [],
    measure: init.measure ?? null,
    x: 0,
    y: 0,
    w: 0,
    h: 0,
    measuredW: 0,
    measuredH: 0,
    dirty: true,
  };
  for (const child of init.children ?? []) appendChild(node, child);
  return node;
}

/** Reparents `child` under `parent`, detaching it from any previous parent. */
export function appendChild(parent: LayoutNode, child: LayoutNode): void {
  if (child.parent) removeChild(child.parent, child);
  child.parent = parent;
  parent.children.push(child);
  markDirty(parent);
}

export function removeChild(parent: LayoutNode, child: LayoutNode): boolean {
  const idx = parent.children.indexOf(child);
  if (idx < 0) return false;
  parent.children.splice(idx, 1);
  child.parent = null;
  markDirty(parent);
  return true;
}

/** Replace the style and flag the node (and its ancestors) for re-layout. */
export function setStyle(node: LayoutNode, init: StyleInit): void {
  node.style = createStyle(init, node.style);
  markDirty(node);
}

/** Flags the node and every ancestor; the engine bypasses its cache for dirty roots. */
export function markDirty(node: LayoutNode): void {
  let cur: LayoutNode | null = node;
  while (cur !== null) {
    cur.dirty = true;
    cur = cur.parent;
  }
}

export function clearDirty(node: LayoutNode): void {
  node.dirty = false;
  for (const child of node.children) clearDirty(child);
}

export function isAbsolute(node: LayoutNode): boolean {
  return node.style.position === "absolute";
}

export function nodeRect(node: LayoutNode): Rect {
  return Object.freeze({ x: node.x, y: node.y, w: node.w, h: node.h });
}

/** Inner (content) bounds: the border box minus padding, never negative. */
export function innerBounds(node: LayoutNode): Rect {
  const p = node.style.padding;
  return Object.freeze({
    x: node.x + p.left,
    y: node.y + p.top,
    w: Math.max(0, node.w - p.left - p.right),
    h: Math.max(0, node.h - p.top - p.bottom),
  });
}

/** Point-in-rect, exclusive of right/bottom edges. */
export function containsPoint(node: LayoutNode, x: number, y: number): boolean {
  return x >= node.x && x < node.x + node.w && y >= node.y && y < node.y + node.h;
}

/** Pre-order walk. Returning false from `visit` skips that node's subtree. */
export function walkNodes(
  roots: readonly LayoutNode[],
  visit: (node: LayoutNode, depth: number) => boolean | void,
): void {
  const stack: Array<{ node: LayoutNode; depth: number }> = [];
  for (let i = roots.length - 1; i >= 0; i--) {
    const r = roots[i];
    if (r) stack.push({ node: r, depth: 0 });
  }
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    if (visit(top.node, top.depth) === false) continue;
    const kids = top.node.children;
    for (let i = kids.length - 1; i >= 0; i--) {
      const k = kids[i];
      if (k) stack.push({ node: k, depth: top.depth + 1 });
    }
  }
}

export function findNodeById(roots: readonly LayoutNode[], id: string): LayoutNode | null {
  let found: LayoutNode | null = null;
  walkNodes(roots, (node) => {
    if (found) return false;
    if (node.id === id) {
      found = node;
      return false;
    }
    return true;
  });
  return found;
}
