export type {
  FocusablePredicate,
  FocusChangeListener,
  FocusMove,
  FocusTrap,
  SpatialDirection,
  TrapType,
} from "./types.js";
export {
  ancestryPath,
  collectFocusableIds,
  computeMovedFocusId,
  isFocusableByProps,
} from "./traversal.js";
export { computeGeometricMove, type FocusBounds, scoreCandidate } from "./geometry.js";
export { FocusScope, type FocusScopeOptions } from "./scope.js";
export { FocusTrapStack } from "./traps.js";
export { FocusManager, type FocusManagerOptions, ROOT_SCOPE_ID } from "./manager.js";
