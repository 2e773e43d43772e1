/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric vocabulary shared by measure, arrange, the
 * cache and focus navigation. All coordinates are in terminal cell units.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in terminal cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** Upper bound standing in for "unbounded" so arithmetic stays integral. */
export const MAX_SIZE = 1 << 30;

/** Box constraints: an inclusive size range per axis. */
export type Constraints = Readonly<{
  minWidth: number;
  maxWidth: number;
  minHeight: number;
  maxHeight: number;
}>;

export type FlexDirection = "row" | "column" | "row-reverse" | "column-reverse";

/** Main-axis distribution of free space. */
export type Justify = "start" | "end" | "center" | "between" | "around" | "evenly";

/** Cross-axis placement. */
export type Align = "start" | "center" | "end" | "stretch";

export type PositionMode = "relative" | "absolute";

export type Overflow = "visible" | "hidden" | "scroll";

/** Explicit cell size, or "auto" to use the measured content size. */
export type Dimension = number | "auto";

export type Insets = Readonly<{ top: number; right: number; bottom: number; left: number }>;

export type LayoutStyle = Readonly<{
  width: Dimension;
  height: Dimension;
  direction: FlexDirection;
  /** Share of positive free space. 0 = do not grow. */
  grow: number;
  /** Share of overflow to absorb. 0 = never shrink. */
  shrink: number;
  /** Proposed main-axis size before grow/shrink; "auto" = explicit or measured size. */
  basis: Dimension;
  gap: number;
  justify: Justify;
  align: Align;
  /** Per-child cross-axis override of the parent's `align`. */
  alignSelf: Align | undefined;
  padding: Insets;
  position: PositionMode;
  top: number | undefined;
  right: number | undefined;
  bottom: number | undefined;
  left: number | undefined;
  zIndex: number;
  overflow: Overflow;
}>;

/** Style input: every field optional; padding may be a single number for all sides. */
export type StyleInit = Partial<Omit<LayoutStyle, "padding">> &
  Readonly<{ padding?: number | Partial<Insets> }>;

/** Leaf content measurement. Receives the content-box constraints (padding removed). */
export type MeasureFn = (constraints: Constraints) => Size;

/**
 * A node in the layout tree.
 *
 * Parents exclusively own their ordered children; `parent` is a non-owning
 * back-reference for lookups only. Geometry fields are outputs, overwritten
 * on every layout pass.
 */
export interface LayoutNode {
  readonly id: string;
  readonly type: string;
  style: LayoutStyle;
  props: Record<string, unknown>;
  parent: LayoutNode | null;
  readonly children: LayoutNode[];
  measure: MeasureFn | null;

  /** Absolute screen position of the border box. */
  x: number;
  y: number;
  w: number;
  h: number;
  /** Natural size from the last measure pass. */
  measuredW: number;
  measuredH: number;
  dirty: boolean;
}

/** Flattened layout output for one node, in absolute coordinates. */
export type LayoutBox = Readonly<{
  id: string;
  type: string;
  x: number;
  y: number;
  w: number;
  h: number;
  depth: number;
  zIndex: number;
  absolute: boolean;
}>;

export type LayoutResult = Readonly<{
  /** Pre-order, roots in input order. */
  boxes: readonly LayoutBox[];
  contentSize: Size;
}>;

export type LayoutStats = Readonly<{
  total: number;
  hits: number;
  misses: number;
}>;
