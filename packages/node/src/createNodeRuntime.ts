/**
 * packages/node/src/createNodeRuntime.ts — Runtime wired to the Node host.
 *
 * Environment (explicit options win):
 *   TERMLINE_LOG_FILE=/path/app.log   route log records to a file
 *   TERMLINE_CRASH_DIR=/path/crashes  write a report file per fault
 * plus every TERMLINE_* variable the core config and logger read.
 */

import {
  type EnvSource,
  type KeyMap,
  Runtime,
  type RuntimeConfigOverrides,
  RESTORE_TERMINAL,
  createLogger,
  readEnv,
} from "@termline/core";
import { type FileLogSink, createFileLogSink } from "./diagnostics/fileLogSink.js";
import { NodePlatform, type NodePlatformOptions } from "./platform/nodePlatform.js";
import { type HookedProcess, createCrashReportWriter, installProcessHooks } from "./process/hooks.js";

export type NodeRuntimeOptions = Readonly<{
  platform?: NodePlatformOptions;
  config?: RuntimeConfigOverrides;
  env?: EnvSource;
  keyMap?: KeyMap;
  logFile?: string;
  crashDir?: string;
  /** Route process faults and termination signals through the runtime. Default true. */
  processHooks?: boolean;
  proc?: HookedProcess;
}>;

export type NodeRuntime = Readonly<{
  runtime: Runtime;
  platform: NodePlatform;
  /** Uninstall process hooks and close the log file. Idempotent. */
  dispose: () => void;
}>;

export function createNodeRuntime(opts: NodeRuntimeOptions = {}): NodeRuntime {
  const env = opts.env ?? process.env;
  const logFile = opts.logFile ?? readEnv(env, "TERMLINE_LOG_FILE");
  const crashDir = opts.crashDir ?? readEnv(env, "TERMLINE_CRASH_DIR");

  const fileSink: FileLogSink | null = logFile === null ? null : createFileLogSink(logFile);
  const logger = createLogger("termline", fileSink === null ? { env } : { env, sink: fileSink.sink });
  const platform = new NodePlatform({ ...opts.platform, logger: logger.child("platform") });
  const runtime = new Runtime({
    platform,
    env,
    logger,
    ...(opts.config !== undefined ? { config: opts.config } : {}),
    ...(opts.keyMap !== undefined ? { keyMap: opts.keyMap } : {}),
    crashHandlers: crashDir === null ? [] : [createCrashReportWriter(crashDir)],
  });

  const uninstall =
    opts.processHooks === false
      ? null
      : installProcessHooks(runtime, {
          ...(opts.proc !== undefined ? { proc: opts.proc } : {}),
          restoreOnExit: () => platform.writeString(RESTORE_TERMINAL),
        });

  let disposed = false;
  return Object.freeze({
    runtime,
    platform,
    dispose: () => {
      if (disposed) return;
      disposed = true;
      uninstall?.();
      fileSink?.close();
    },
  });
}
