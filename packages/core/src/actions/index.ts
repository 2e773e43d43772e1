export {
  ACTION_CATEGORIES,
  type Action,
  type ActionCategory,
  type ActionInit,
  type ActionType,
  actionCategory,
  cloneAction,
  createAction,
  formatAction,
  isActionType,
  withPayload,
  withSource,
  withTarget,
} from "./types.js";
export { type ActionTarget, NOOP_TARGET, targetChain, targetFn } from "./target.js";
export {
  ActionError,
  type ActionErrorInit,
  type ActionErrorKind,
  MultipleError,
  actionNotSupported,
  canceledError,
  isActionError,
  targetDisabled,
  targetNotFound,
  timeoutError,
  toError,
} from "./errors.js";
export {
  expectChar,
  expectInteger,
  expectPayload,
  expectRecord,
  expectString,
  isRecord,
} from "./payload.js";
export {
  ActionDispatcher,
  type ActionHandler,
  type DispatchLogEntry,
  type DispatchStage,
  type DispatcherOptions,
  type DispatcherStats,
} from "./dispatcher.js";
export {
  type ActionFn,
  type ActionResult,
  CompositeAction,
  type CompletionCallback,
  type CompositeMode,
  type Executable,
  OK_RESULT,
  type RetryOptions,
  Semaphore,
  actionFn,
  batch,
  dispatchUnit,
  errResult,
  fallback,
  fromTask,
  isRecoverable,
  lazy,
  linkSignal,
  okResult,
  parallelWithLimit,
  retry,
  sequence,
  sleep,
  withTimeout,
} from "./composite.js";
export { WorkerPool, type WorkerPoolOptions } from "./workerPool.js";
