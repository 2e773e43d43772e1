export {
  AUTOMATION_SOURCE,
  AutomationController,
  type AutomationControllerOptions,
  type AutomationResult,
  type ComponentInfo,
  type Direction,
  type Operation,
  type SnapshotCondition,
  type StateQuery,
  isDirection,
} from "./controller.js";
export {
  AutomationError,
  type AutomationErrorCode,
  componentDisabled,
  componentNotFound,
  invalidSelector,
  operationFailed,
  rootCause,
  waitTimeout,
} from "./errors.js";
export {
  type RetryOpOptions,
  atomicBatchOp,
  batchOp,
  clickOp,
  dispatchOp,
  inputOp,
  navigateOp,
  repeatOp,
  retryOp,
  waitOp,
  waitValueOp,
} from "./operations.js";
export { type Selector, matchesSelector, parseSelector, selectComponents } from "./selector.js";
