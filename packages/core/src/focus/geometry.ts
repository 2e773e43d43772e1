/**
 * packages/core/src/focus/geometry.ts — Spatial (arrow-key) focus navigation.
 *
 * Candidate filter (moving down; other directions are symmetric):
 *   cand.y >= cur.y + cur.h  ||  cand.centerY > cur.centerY
 *
 * Score:
 *   (1000 - |delta center along the move axis|) / 1000
 *   + 0.5 * crossAxisOverlap / max(cur.crossSize, cand.crossSize)
 *
 * Highest score wins; the earlier candidate keeps a tie. Zero-size boxes
 * never participate. With no current focus the top-left-most box is chosen.
 */

import type { SpatialDirection } from "./types.js";

export type FocusBounds = Readonly<{ id: string; x: number; y: number; w: number; h: number }>;

const MAX_DISTANCE = 1000;
const OVERLAP_WEIGHT = 0.5;

function centerX(b: FocusBounds): number {
  return b.x + Math.floor(b.w / 2);
}

function centerY(b: FocusBounds): number {
  return b.y + Math.floor(b.h / 2);
}

function overlap(aStart: number, aLen: number, bStart: number, bLen: number): number {
  const lo = Math.max(aStart, bStart);
  const hi = Math.min(aStart + aLen, bStart + bLen);
  return hi > lo ? hi - lo : 0;
}

function isPast(cur: FocusBounds, cand: FocusBounds, dir: SpatialDirection): boolean {
  switch (dir) {
    case "up":
      return cand.y + cand.h <= cur.y || centerY(cand) < centerY(cur);
    case "down":
      return cand.y >= cur.y + cur.h || centerY(cand) > centerY(cur);
    case "left":
      return cand.x + cand.w <= cur.x || centerX(cand) < centerX(cur);
    case "right":
      return cand.x >= cur.x + cur.w || centerX(cand) > centerX(cur);
  }
}

export function scoreCandidate(cur: FocusBounds, cand: FocusBounds, dir: SpatialDirection): number {
  const vertical = dir === "up" || dir === "down";
  const distance = vertical
    ? Math.abs(centerY(cand) - centerY(cur))
    : Math.abs(centerX(cand) - centerX(cur));
  let score = (MAX_DISTANCE - distance) / MAX_DISTANCE;

  const shared = vertical ? overlap(cur.x, cur.w, cand.x, cand.w) : overlap(cur.y, cur.h, cand.y, cand.h);
  if (shared > 0) {
    const span = vertical ? Math.max(cur.w, cand.w) : Math.max(cur.h, cand.h);
    score += (shared / span) * OVERLAP_WEIGHT;
  }
  return score;
}

function topLeftMost(candidates: readonly FocusBounds[]): string | null {
  let best: FocusBounds | null = null;
  for (const b of candidates) {
    if (best === null || b.y < best.y || (b.y === best.y && b.x < best.x)) best = b;
  }
  return best?.id ?? null;
}

export function computeGeometricMove(
  currentId: string | null,
  dir: SpatialDirection,
  bounds: readonly FocusBounds[],
): string | null {
  const candidates = bounds.filter((b) => b.w > 0 && b.h > 0);
  if (candidates.length === 0) return null;

  const cur = currentId === null ? undefined : candidates.find((b) => b.id === currentId);
  if (cur === undefined) return topLeftMost(candidates);

  let bestId: string | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const cand of candidates) {
    if (cand.id === cur.id || !isPast(cur, cand, dir)) continue;
    const score = scoreCandidate(cur, cand, dir);
    if (score > bestScore) {
      bestScore = score;
      bestId = cand.id;
    }
  }
  return bestId;
}
