export type {
  Align,
  Constraints,
  Dimension,
  FlexDirection,
  Insets,
  Justify,
  LayoutBox,
  LayoutNode,
  LayoutResult,
  LayoutStats,
  LayoutStyle,
  MeasureFn,
  Overflow,
  PositionMode,
  Rect,
  Size,
  StyleInit,
} from "./types.js";
export { MAX_SIZE } from "./types.js";
export {
  constrain,
  constrainHeight,
  constrainWidth,
  constraints,
  constraintsKey,
  deflate,
  isBounded,
  isTight,
  loose,
  normalizeConstraints,
  tight,
  UNBOUNDED,
  upTo,
} from "./constraints.js";
export {
  appendChild,
  clearDirty,
  containsPoint,
  createLayoutNode,
  createStyle,
  DEFAULT_STYLE,
  findNodeById,
  innerBounds,
  isAbsolute,
  markDirty,
  nodeRect,
  removeChild,
  setStyle,
  walkNodes,
  type LayoutNodeInit,
} from "./node.js";
export { distributeInteger, growSizes, shrinkSizes } from "./flex.js";
export { measureNode } from "./measure.js";
export { arrangeNode } from "./arrange.js";
export { absolutePosition, applyAbsoluteLayout } from "./absolute.js";
export { LayoutCache } from "./cache.js";
export { computeLayout, LayoutEngine, type LayoutEngineOptions } from "./layoutEngine.js";
export { contains, hitTest } from "./hitTest.js";
