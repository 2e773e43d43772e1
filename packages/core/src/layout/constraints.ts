/**
 * packages/core/src/layout/constraints.ts — Box constraint helpers.
 *
 * Constraints are immutable values created per layout call. Every helper
 * clamps to non-negative integers; a min above max collapses to max.
 */

import { type Constraints, type Insets, MAX_SIZE, type Size } from "./types.js";

function clampInt(v: number): number {
  if (!Number.isFinite(v)) return v > 0 ? MAX_SIZE : 0;
  const n = Math.trunc(v);
  if (n <= 0) return 0;
  return n > MAX_SIZE ? MAX_SIZE : n;
}

export function constraints(
  minWidth: number,
  maxWidth: number,
  minHeight: number,
  maxHeight: number,
): Constraints {
  const maxW = clampInt(maxWidth);
  const maxH = clampInt(maxHeight);
  return Object.freeze({
    minWidth: Math.min(clampInt(minWidth), maxW),
    maxWidth: maxW,
    minHeight: Math.min(clampInt(minHeight), maxH),
    maxHeight: maxH,
  });
}

/** Exactly `width` x `height`. */
export function tight(width: number, height: number): Constraints {
  return constraints(width, width, height, height);
}

/** At least the given minimums, otherwise unbounded. */
export function loose(minWidth = 0, minHeight = 0): Constraints {
  return constraints(minWidth, MAX_SIZE, minHeight, MAX_SIZE);
}

/** Anything from zero up to the given maximums. */
export function upTo(maxWidth: number, maxHeight: number): Constraints {
  return constraints(0, maxWidth, 0, maxHeight);
}

export const UNBOUNDED: Constraints = Object.freeze({
  minWidth: 0,
  maxWidth: MAX_SIZE,
  minHeight: 0,
  maxHeight: MAX_SIZE,
});

export function normalizeConstraints(c: Constraints): Constraints {
  return constraints(c.minWidth, c.maxWidth, c.minHeight, c.maxHeight);
}

export function constrainWidth(c: Constraints, w: number): number {
  const n = clampInt(w);
  if (n < c.minWidth) return c.minWidth;
  return n > c.maxWidth ? c.maxWidth : n;
}

export function constrainHeight(c: Constraints, h: number): number {
  const n = clampInt(h);
  if (n < c.minHeight) return c.minHeight;
  return n > c.maxHeight ? c.maxHeight : n;
}

export function constrain(c: Constraints, size: Size): Size {
  return Object.freeze({ w: constrainWidth(c, size.w), h: constrainHeight(c, size.h) });
}

export function isTight(c: Constraints): boolean {
  return c.minWidth === c.maxWidth && c.minHeight === c.maxHeight;
}

export function isBounded(c: Constraints): boolean {
  return c.maxWidth < MAX_SIZE || c.maxHeight < MAX_SIZE;
}

/** Remove insets from the maximums (content box); minimums drop to zero. */
export function deflate(c: Constraints, insets: Insets): Constraints {
  return constraints(
    0,
    c.maxWidth >= MAX_SIZE ? MAX_SIZE : c.maxWidth - insets.left - insets.right,
    0,
    c.maxHeight >= MAX_SIZE ? MAX_SIZE : c.maxHeight - insets.top - insets.bottom,
  );
}

/** Stable cache-key fragment. */
export function constraintsKey(c: Constraints): string {
  return `${String(c.minWidth)},${String(c.maxWidth)},${String(c.minHeight)},${String(c.maxHeight)}`;
}
