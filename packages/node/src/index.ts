/**
 * @termline/node
 *
 * Node.js host for @termline/core: the stdio Platform, process hooks,
 * snapshot files, file logging and key-map files.
 */

export {
  NodePlatform,
  type NodePlatformOptions,
  type TerminalInput,
  type TerminalOutput,
} from "./platform/nodePlatform.js";
export {
  DEFAULT_FORWARDED_SIGNALS,
  type HookedProcess,
  type ProcessHookOptions,
  createCrashReportWriter,
  installProcessHooks,
} from "./process/hooks.js";
export { loadSnapshot, saveSnapshot } from "./state/snapshotStore.js";
export { type FileLogSink, createFileLogSink } from "./diagnostics/fileLogSink.js";
export { loadKeyMapFile } from "./input/keymapFile.js";
export { type NodeRuntime, type NodeRuntimeOptions, createNodeRuntime } from "./createNodeRuntime.js";
