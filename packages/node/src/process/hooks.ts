/**
 * packages/node/src/process/hooks.ts — Process-level fault and signal wiring.
 *
 * Why: Faults thrown outside the runtime's own tasks (a stray timer, an
 * unawaited promise in app code) would otherwise kill the process with the
 * terminal still raw. They are routed through the runtime's Recovery.
 * Termination signals become `signal` inputs, which the key map turns into
 * `quit`, so shutdown runs through the normal loop.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { type CrashHandler, type Runtime, describeError, formatCrashReport } from "@termline/core";

export type HookedProcess = NodeJS.EventEmitter & { exitCode?: number | string | undefined };

export type ProcessHookOptions = Readonly<{
  proc?: HookedProcess;
  /** Signals forwarded to the runtime as `signal` inputs. */
  signals?: readonly NodeJS.Signals[];
  /** Synchronous terminal restore for the "exit" event while the runtime is still running. */
  restoreOnExit?: () => void;
}>;

export const DEFAULT_FORWARDED_SIGNALS: readonly NodeJS.Signals[] = Object.freeze([
  "SIGINT",
  "SIGTERM",
]);

/** Returns an idempotent uninstall function. */
export function installProcessHooks(runtime: Runtime, opts: ProcessHookOptions = {}): () => void {
  const proc: HookedProcess = opts.proc ?? process;
  const log = runtime.logger.child("process");

  const onFault = (task: string) => (error: unknown) => {
    void runtime.recovery.handle(error, task).then(
      () => {
        proc.exitCode = 1;
        runtime.requestStop();
      },
      (handleError: unknown) => {
        log.error("recovery failed", { error: describeError(handleError) });
      },
    );
  };
  const onUncaught = onFault("uncaught-exception");
  const onRejection = onFault("unhandled-rejection");

  const signalHandlers = (opts.signals ?? DEFAULT_FORWARDED_SIGNALS).map((name) => {
    const handler = (): void => {
      if (!runtime.enqueue({ kind: "signal", name })) {
        log.warn("signal dropped: input queue full; stopping", { signal: name });
        runtime.requestStop();
      }
    };
    return { name, handler };
  });

  const onExit = (): void => {
    if (runtime.running) opts.restoreOnExit?.();
  };

  proc.on("uncaughtException", onUncaught);
  proc.on("unhandledRejection", onRejection);
  for (const { name, handler } of signalHandlers) proc.on(name, handler);
  proc.on("exit", onExit);

  let active = true;
  return () => {
    if (!active) return;
    active = false;
    proc.off("uncaughtException", onUncaught);
    proc.off("unhandledRejection", onRejection);
    for (const { name, handler } of signalHandlers) proc.off(name, handler);
    proc.off("exit", onExit);
  };
}

/** Crash handler that writes each report to `<dir>/termline-crash-<at>-<pid>.log`. */
export function createCrashReportWriter(dir: string): CrashHandler {
  return (report) => {
    mkdirSync(dir, { recursive: true });
    const file = join(dir, `termline-crash-${String(report.at)}-${String(report.env.pid)}.log`);
    writeFileSync(file, `${formatCrashReport(report)}\n`, "utf8");
  };
}
