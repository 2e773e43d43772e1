/**
 * @termline/core
 *
 * Host-agnostic TypeScript core for termline: layout, focus, actions, input
 * translation, state tracking, the runtime loop and the automation surface.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports);
 * host bindings live in @termline/node.
 */

// =============================================================================
// Errors and configuration
// =============================================================================

export {
  type Result,
  TermlineError,
  type TermlineErrorCode,
  describeError,
  err,
  ok,
} from "./errors.js";
export {
  DEFAULT_RUNTIME_CONFIG,
  type RecoveryPolicy,
  type RuntimeConfig,
  type RuntimeConfigOverrides,
  resolveRuntimeConfig,
} from "./config.js";

// =============================================================================
// Diagnostics
// =============================================================================

export * from "./diagnostics/index.js";

// =============================================================================
// Subsystems
// =============================================================================

export * from "./actions/index.js";
export * from "./layout/index.js";
export * from "./focus/index.js";
export * from "./input/index.js";
export * from "./state/index.js";
export * from "./runtime/index.js";
export * from "./automation/index.js";

// Both layout and state define a Rect: layout's is { x, y, w, h } in cells,
// the snapshot's spells out width/height.
export type { Rect } from "./layout/index.js";
export type { Rect as SnapshotRect } from "./state/index.js";
