/**
 * packages/core/src/diagnostics/logger.ts — Leveled NDJSON logger.
 *
 * Enable with:
 *   TERMLINE_LOG=1
 *
 * Optional:
 *   TERMLINE_LOG_LEVEL=trace|debug|info|warn|error   (default: info)
 *
 * Records are single-line JSON objects: { ts, level, scope, msg, ...fields }.
 * The default sink writes to stderr; hosts that own the terminal should pass a
 * file sink (see @termline/node createFileLogSink) so log lines never land in
 * the rendered frame.
 */

import { type EnvSource, envFlag, hostEnv, readEnv } from "./env.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export type LogFields = Readonly<Record<string, unknown>>;

export type LogSink = (line: string) => void;

export interface Logger {
  readonly scope: string;
  readonly enabled: boolean;
  trace(msg: string, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** Derive a logger with a nested scope ("runtime" -> "runtime.input"). */
  child(scope: string): Logger;
  /** Number of records the sink rejected by throwing. */
  droppedCount(): number;
}

export type LoggerOptions = Readonly<{
  enabled?: boolean;
  level?: LogLevel;
  sink?: LogSink;
  now?: () => Date;
  env?: EnvSource;
}>;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
});

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function defaultSink(line: string): void {
  const g = globalThis as {
    process?: { stderr?: { write?: (text: string) => void } };
    console?: { error?: (msg?: unknown) => void };
  };
  if (typeof g.process?.stderr?.write === "function") {
    g.process.stderr.write(`${line}\n`);
    return;
  }
  g.console?.error?.(line);
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === "bigint") return value.toString();
  return value;
}

type SharedState = {
  dropped: number;
};

function build(
  scope: string,
  enabled: boolean,
  minRank: number,
  sink: LogSink,
  now: () => Date,
  shared: SharedState,
): Logger {
  const emit = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (!enabled || LEVEL_RANK[level] < minRank) return;
    try {
      const record: Record<string, unknown> = { ts: now().toISOString(), level, scope, msg };
      if (fields) {
        for (const [k, v] of Object.entries(fields)) record[k] = serializeField(v);
      }
      sink(JSON.stringify(record));
    } catch {
      // Never break the frame due to optional diagnostics.
      shared.dropped++;
    }
  };

  return Object.freeze({
    scope,
    enabled,
    trace: (msg: string, fields?: LogFields) => emit("trace", msg, fields),
    debug: (msg: string, fields?: LogFields) => emit("debug", msg, fields),
    info: (msg: string, fields?: LogFields) => emit("info", msg, fields),
    warn: (msg: string, fields?: LogFields) => emit("warn", msg, fields),
    error: (msg: string, fields?: LogFields) => emit("error", msg, fields),
    child: (sub: string) => build(`${scope}.${sub}`, enabled, minRank, sink, now, shared),
    droppedCount: () => shared.dropped,
  });
}

/**
 * Create a logger for `scope`. Explicit options win over TERMLINE_LOG* env vars.
 */
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const env = opts.env ?? hostEnv();
  const enabled = opts.enabled ?? envFlag(env, "TERMLINE_LOG");
  const envLevel = readEnv(env, "TERMLINE_LOG_LEVEL");
  const level: LogLevel =
    opts.level ?? (envLevel !== null && isLogLevel(envLevel) ? envLevel : "info");
  return build(
    scope,
    enabled,
    LEVEL_RANK[level],
    opts.sink ?? defaultSink,
    opts.now ?? (() => new Date()),
    { dropped: 0 },
  );
}

/** Logger that records nothing; used when a subsystem is built without one. */
export const SILENT_LOGGER: Logger = createLogger("silent", { enabled: false, env: {} });
