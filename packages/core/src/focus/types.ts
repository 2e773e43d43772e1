import type { LayoutNode } from "../layout/types.js";

/** Sequential traversal direction. */
export type FocusMove = "next" | "prev";

/** Geometric traversal direction. */
export type SpatialDirection = "up" | "down" | "left" | "right";

export type TrapType = "modal" | "menu" | "popover" | "custom";

export type FocusTrap = Readonly<{
  id: string;
  type: TrapType;
  /** Subtree the trap confines navigation to. */
  root: LayoutNode;
}>;

export type FocusChangeListener = (prevId: string | null, nextId: string | null) => void;

export type FocusablePredicate = (node: LayoutNode) => boolean;
