/**
 * packages/core/src/runtime/recovery.ts — Fault boundary for runtime tasks.
 *
 * On a fault, in this order:
 *   1. restore the terminal (leave the alternate screen, show the cursor,
 *      cooked mode through platform.close)
 *   2. build a CrashReport and log it at `error`
 *   3. run registered crash handlers
 *   4. apply the policy: "rethrow" hands the error back to the caller,
 *      "exit" terminates the process with code 1
 *
 * Restoring first guarantees a crash never leaves the terminal raw, even if
 * a handler itself fails.
 */

import type { RecoveryPolicy } from "../config.js";
import { SILENT_LOGGER, type Logger } from "../diagnostics/logger.js";
import { describeError } from "../errors.js";
import { RESTORE_TERMINAL } from "./ansi.js";
import type { Platform } from "./platform.js";

export type CrashEnvironment = Readonly<{
  node: string;
  platform: string;
  arch: string;
  pid: number;
}>;

export type CrashReport = Readonly<{
  error: string;
  stack: string | null;
  task: string;
  /** ms since epoch. */
  at: number;
  env: CrashEnvironment;
}>;

export type CrashHandler = (report: CrashReport) => void;

export type RecoveryOptions = Readonly<{
  policy?: RecoveryPolicy;
  restore?: () => void | Promise<void>;
  logger?: Logger;
  handlers?: readonly CrashHandler[];
  exit?: (code: number) => void;
  clock?: () => number;
}>;

type HostProcess = {
  version?: string;
  platform?: string;
  arch?: string;
  pid?: number;
  exit?: (code?: number) => void;
};

function hostProcess(): HostProcess | undefined {
  const g = globalThis as { process?: HostProcess };
  return g.process;
}

export function crashEnvironment(): CrashEnvironment {
  const p = hostProcess();
  return Object.freeze({
    node: p?.version ?? "unknown",
    platform: p?.platform ?? "unknown",
    arch: p?.arch ?? "unknown",
    pid: p?.pid ?? 0,
  });
}

function defaultExit(code: number): void {
  hostProcess()?.exit?.(code);
}

export function buildCrashReport(error: unknown, task: string, at: number): CrashReport {
  return Object.freeze({
    error: describeError(error),
    stack: error instanceof Error && typeof error.stack === "string" ? error.stack : null,
    task,
    at,
    env: crashEnvironment(),
  });
}

export function formatCrashReport(report: CrashReport): string {
  const lines = [
    `fault in ${report.task}: ${report.error}`,
    `at: ${new Date(report.at).toISOString()}`,
    `env: node ${report.env.node} ${report.env.platform}/${report.env.arch} pid ${String(report.env.pid)}`,
  ];
  if (report.stack !== null) lines.push("", report.stack);
  return lines.join("\n");
}

export class Recovery {
  readonly policy: RecoveryPolicy;
  readonly #restore: (() => void | Promise<void>) | undefined;
  readonly #log: Logger;
  readonly #handlers: CrashHandler[];
  readonly #exit: (code: number) => void;
  readonly #clock: () => number;
  readonly #reports: CrashReport[] = [];

  constructor(opts: RecoveryOptions = {}) {
    this.policy = opts.policy ?? "rethrow";
    this.#restore = opts.restore;
    this.#log = opts.logger ?? SILENT_LOGGER;
    this.#handlers = [...(opts.handlers ?? [])];
    this.#exit = opts.exit ?? defaultExit;
    this.#clock = opts.clock ?? Date.now;
  }

  addHandler(handler: CrashHandler): () => void {
    this.#handlers.push(handler);
    let active = true;
    return () => {
      if (!active) return;
      active = false;
      const idx = this.#handlers.indexOf(handler);
      if (idx >= 0) this.#handlers.splice(idx, 1);
    };
  }

  /** Reports handled so far, oldest first. */
  reports(): readonly CrashReport[] {
    return Object.freeze([...this.#reports]);
  }

  async handle(error: unknown, task = "main"): Promise<CrashReport> {
    await this.restoreTerminal();

    const report = buildCrashReport(error, task, this.#clock());
    this.#reports.push(report);
    this.#log.error("runtime fault", { task, error: report.error, stack: report.stack, env: report.env });

    for (const handler of this.#handlers.slice()) {
      try {
        handler(report);
      } catch (handlerError: unknown) {
        this.#log.error("crash handler threw", { error: describeError(handlerError) });
      }
    }

    if (this.policy === "exit") this.#exit(1);
    return report;
  }

  async restoreTerminal(): Promise<void> {
    if (!this.#restore) return;
    try {
      await this.#restore();
    } catch (restoreError: unknown) {
      this.#log.error("terminal restore failed", { error: describeError(restoreError) });
    }
  }

  /** Runs `fn` inside the fault boundary; the original error is rethrown after handling. */
  async runSafely<T>(name: string, fn: () => T | Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      await this.handle(error, name);
      throw error;
    }
  }
}

/** Writes the restore sequence, then lets the platform leave raw mode. */
export function terminalRestorer(platform: Platform): () => Promise<void> {
  return async () => {
    platform.writeString(RESTORE_TERMINAL);
    await platform.close();
  };
}

export function installRecovery(
  platform: Platform,
  opts: Omit<RecoveryOptions, "restore"> = {},
): Recovery {
  return new Recovery({ ...opts, restore: terminalRestorer(platform) });
}
