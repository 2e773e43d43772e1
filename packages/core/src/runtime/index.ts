export * from "./ansi.js";
export { BLANK_CELL, type Cell, CellBuffer } from "./cellBuffer.js";
export {
  type AnyComponent,
  type Capabilities,
  type Capability,
  type CapturedState,
  type Component,
  type FocusableComponent,
  type HandlesActions,
  type Measurable,
  type PaintContext,
  type Paintable,
  type Stateful,
  capabilitiesOf,
  hasCapability,
  isActionHandler,
  isFocusableComponent,
  isMeasurable,
  isPaintable,
  isStateful,
} from "./component.js";
export { InputQueue } from "./inputQueue.js";
export { DEFAULT_TERMINAL_SIZE, type Platform, type TerminalSize } from "./platform.js";
export {
  type CrashEnvironment,
  type CrashHandler,
  type CrashReport,
  Recovery,
  type RecoveryOptions,
  buildCrashReport,
  crashEnvironment,
  formatCrashReport,
  installRecovery,
  terminalRestorer,
} from "./recovery.js";
export { type QueuedInput, Runtime, type RuntimeOptions, type RuntimeStats } from "./runtime.js";
export { type TaskErrorHandler, type TaskFn, TaskScope, type TaskScopeOptions } from "./taskScope.js";
