/**
 * packages/core/src/layout/layoutEngine.ts — Two-pass flex layout with caching.
 *
 * Why: The runtime lays out the whole widget forest every frame. Most
 * frames change nothing structurally, so results are cached per
 * (constraints, tree shape) and replayed onto the nodes on a hit. A dirty
 * root always recomputes.
 *
 * Multiple roots stack vertically; each root is measured under the
 * incoming constraints and arranged at its natural size.
 */

import { DEFAULT_RUNTIME_CONFIG } from "../config.js";
import { applyAbsoluteLayout } from "./absolute.js";
import { arrangeNode } from "./arrange.js";
import { LayoutCache } from "./cache.js";
import { constraintsKey, normalizeConstraints } from "./constraints.js";
import { measureNode } from "./measure.js";
import { clearDirty, findNodeById, isAbsolute, walkNodes } from "./node.js";
import type { Constraints, LayoutBox, LayoutNode, LayoutResult, LayoutStats, Size } from "./types.js";

export type LayoutEngineOptions = Readonly<{
  cacheCapacity?: number;
}>;

type Signature = Readonly<{ key: string; ids: ReadonlySet<string> }>;

function signatureOf(roots: readonly LayoutNode[]): Signature {
  const parts: string[] = [];
  const ids = new Set<string>();
  walkNodes(roots, (node, depth) => {
    ids.add(node.id);
    parts.push(`${String(depth)}:${node.id}:${node.type}:${String(node.children.length)}`);
  });
  return { key: parts.join(";"), ids };
}

function collectBoxes(roots: readonly LayoutNode[]): LayoutBox[] {
  const boxes: LayoutBox[] = [];
  walkNodes(roots, (node, depth) => {
    boxes.push(
      Object.freeze({
        id: node.id,
        type: node.type,
        x: node.x,
        y: node.y,
        w: node.w,
        h: node.h,
        depth,
        zIndex: node.style.zIndex,
        absolute: isAbsolute(node),
      }),
    );
  });
  return boxes;
}

function restoreGeometry(roots: readonly LayoutNode[], boxes: readonly LayoutBox[]): void {
  let i = 0;
  walkNodes(roots, (node) => {
    const box = boxes[i++];
    if (!box) return false;
    node.x = box.x;
    node.y = box.y;
    node.w = box.w;
    node.h = box.h;
    return true;
  });
}

/** Stateless layout of a forest; mutates node geometry in place. */
export function computeLayout(roots: readonly LayoutNode[], c: Constraints): LayoutResult {
  const norm = normalizeConstraints(c);
  let y = 0;
  let maxW = 0;
  for (const root of roots) {
    const size = measureNode(root, norm);
    arrangeNode(root, 0, y, size.w, size.h);
    applyAbsoluteLayout(root);
    y += size.h;
    if (size.w > maxW) maxW = size.w;
  }
  const contentSize: Size = Object.freeze({ w: maxW, h: y });
  return Object.freeze({ boxes: Object.freeze(collectBoxes(roots)), contentSize });
}

export class LayoutEngine {
  readonly #cache: LayoutCache;
  #total = 0;
  #hits = 0;
  #misses = 0;

  constructor(opts: LayoutEngineOptions = {}) {
    this.#cache = new LayoutCache(opts.cacheCapacity ?? DEFAULT_RUNTIME_CONFIG.layoutCacheCapacity);
  }

  layout(roots: readonly LayoutNode[], c: Constraints): LayoutResult {
    this.#total++;
    const norm = normalizeConstraints(c);
    const sig = signatureOf(roots);
    const key = `${constraintsKey(norm)}|${sig.key}`;

    if (!roots.some((r) => r.dirty)) {
      const hit = this.#cache.get(key);
      if (hit !== undefined) {
        this.#hits++;
        restoreGeometry(roots, hit.boxes);
        return hit;
      }
    }

    this.#misses++;
    const result = computeLayout(roots, norm);
    for (const root of roots) clearDirty(root);
    this.#cache.set(key, result, sig.ids);
    return result;
  }

  /** Desired size of a single subtree, without arranging it. */
  measure(node: LayoutNode, c: Constraints): Size {
    return measureNode(node, normalizeConstraints(c));
  }

  find(roots: readonly LayoutNode[], id: string): LayoutNode | null {
    return findNodeById(roots, id);
  }

  getStats(): LayoutStats {
    return Object.freeze({ total: this.#total, hits: this.#hits, misses: this.#misses });
  }

  resetStats(): void {
    this.#total = 0;
    this.#hits = 0;
    this.#misses = 0;
  }

  get cacheSize(): number {
    return this.#cache.size;
  }

  invalidate(): void {
    this.#cache.clear();
  }

  invalidateNode(id: string): void {
    this.#cache.invalidateId(id);
  }
}
