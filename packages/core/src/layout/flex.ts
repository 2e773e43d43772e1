/**
 * packages/core/src/layout/flex.ts — Integer flex distribution and justify math.
 *
 * All outputs are whole cells. Fractional shares are resolved by largest
 * remainder, ties broken by lower slot index, so the same input always
 * yields the same split.
 */

import type { Justify } from "./types.js";

/**
 * Distribute an integer total across weighted slots deterministically.
 *
 * - Uses floor division for base shares.
 * - Distributes leftover cells by descending fractional part.
 * - Breaks ties by lower slot index.
 * - Non-positive or non-finite weights receive nothing.
 */
export function distributeInteger(total: number, weights: readonly number[]): number[] {
  const out = new Array<number>(weights.length).fill(0);
  const target = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  if (target <= 0 || weights.length === 0) return out;

  let totalWeight = 0;
  for (const raw of weights) {
    if (Number.isFinite(raw) && raw > 0) totalWeight += raw;
  }
  if (totalWeight <= 0) return out;

  const fracs = new Array<number>(weights.length).fill(-1);
  let baseSum = 0;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i] ?? 0;
    if (!Number.isFinite(w) || w <= 0) continue;
    const raw = (target * w) / totalWeight;
    const base = Math.floor(raw);
    out[i] = base;
    fracs[i] = raw - base;
    baseSum += base;
  }

  let remainder = target - baseSum;
  if (remainder <= 0) return out;

  const order: number[] = [];
  for (let i = 0; i < weights.length; i++) {
    if ((fracs[i] ?? -1) >= 0) order.push(i);
  }
  order.sort((a, b) => {
    const af = fracs[a] ?? 0;
    const bf = fracs[b] ?? 0;
    if (bf !== af) return bf - af;
    return a - b;
  });

  for (let i = 0; i < order.length && remainder > 0; i++) {
    const slot = order[i];
    if (slot === undefined) continue;
    out[slot] = (out[slot] ?? 0) + 1;
    remainder--;
  }
  return out;
}

/** Add `free` cells to `bases` in proportion to `grow` weights. */
export function growSizes(
  bases: readonly number[],
  grow: readonly number[],
  free: number,
): number[] {
  const extra = distributeInteger(free, grow);
  return bases.map((b, i) => b + (extra[i] ?? 0));
}

/**
 * Shrink `bases` until they fit `available`, removing overflow in proportion
 * to `shrink` weights. Sizes floor at zero; overflow a floored slot could not
 * absorb is redistributed across the remaining shrinkable slots.
 */
export function shrinkSizes(
  bases: readonly number[],
  shrink: readonly number[],
  available: number,
): number[] {
  const out = bases.map((b) => Math.max(0, b));
  let overflow = out.reduce((sum, b) => sum + b, 0) - Math.max(0, available);
  if (overflow <= 0) return out;

  while (overflow > 0) {
    const weights = out.map((size, i) => {
      const s = shrink[i] ?? 0;
      return size > 0 && Number.isFinite(s) && s > 0 ? s : 0;
    });
    if (!weights.some((w) => w > 0)) break;

    const cuts = distributeInteger(overflow, weights);
    let removed = 0;
    for (let i = 0; i < out.length; i++) {
      const cur = out[i] ?? 0;
      const cut = Math.min(cur, cuts[i] ?? 0);
      out[i] = cur - cut;
      removed += cut;
    }
    if (removed <= 0) break;
    overflow -= removed;
  }
  return out;
}

function unitSizeForExtra(extra: number, totalUnits: number, unitIndex: number): number {
  if (totalUnits <= 0) return 0;
  const base = Math.floor(extra / totalUnits);
  const rem = extra - base * totalUnits;
  return base + (unitIndex < rem ? 1 : 0);
}

/**
 * Offset of the first item.
 *   - between: no edge gap
 *   - around: half a unit at each end (extra split into 2n half-units)
 *   - evenly: n+1 equal gaps
 */
export function computeJustifyStartOffset(
  justify: Justify,
  extra: number,
  itemCount: number,
): number {
  if (extra <= 0 || itemCount <= 0) return 0;
  if (justify === "end") return extra;
  if (justify === "center") return Math.floor(extra / 2);
  if (justify === "evenly") return unitSizeForExtra(extra, itemCount + 1, 0);
  if (justify === "around") return unitSizeForExtra(extra, itemCount * 2, 0);
  return 0;
}

/** Extra space inserted after item `boundary` (0-based, between boundary and boundary+1). */
export function computeJustifyExtraGap(
  justify: Justify,
  extra: number,
  itemCount: number,
  boundary: number,
): number {
  if (extra <= 0) return 0;
  if (itemCount <= 1) return 0;
  if (boundary < 0 || boundary >= itemCount - 1) return 0;

  if (justify === "between") {
    return unitSizeForExtra(extra, itemCount - 1, boundary);
  }
  if (justify === "evenly") {
    return unitSizeForExtra(extra, itemCount + 1, boundary + 1);
  }
  if (justify === "around") {
    const u1 = unitSizeForExtra(extra, itemCount * 2, boundary * 2 + 1);
    const u2 = unitSizeForExtra(extra, itemCount * 2, boundary * 2 + 2);
    return u1 + u2;
  }

  return 0;
}
