/**
 * packages/core/src/config.ts — Runtime configuration with defaults.
 *
 * Precedence: explicit overrides > TERMLINE_* environment > defaults.
 * Overrides are validated strictly (bad values throw INVALID_ARGUMENT);
 * malformed environment values fall back to the default.
 */

import { type EnvSource, envPositiveInt, hostEnv, readEnv } from "./diagnostics/env.js";
import { TermlineError } from "./errors.js";

export type RecoveryPolicy = "rethrow" | "exit";

export type RuntimeConfig = Readonly<{
  /** Bounded input queue between the reader task and the main loop. */
  inputQueueCapacity: number;
  /** How long the reader blocks on a full queue before giving up on a frame. */
  inputEnqueueTimeoutMs: number;
  shutdownTimeoutMs: number;
  maxHistory: number;
  layoutCacheCapacity: number;
  dispatchLogCapacity: number;
  waitPollIntervalMs: number;
  doubleClickMs: number;
  doubleClickDistance: number;
  frameIntervalMs: number;
  recoveryPolicy: RecoveryPolicy;
}>;

export type RuntimeConfigOverrides = Partial<RuntimeConfig>;

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = Object.freeze({
  inputQueueCapacity: 256,
  inputEnqueueTimeoutMs: 50,
  shutdownTimeoutMs: 2000,
  maxHistory: 100,
  layoutCacheCapacity: 1000,
  dispatchLogCapacity: 1000,
  waitPollIntervalMs: 50,
  doubleClickMs: 500,
  doubleClickDistance: 5,
  frameIntervalMs: 16,
  recoveryPolicy: "rethrow",
});

type IntKey = Exclude<keyof RuntimeConfig, "recoveryPolicy">;

const ENV_NAMES: Readonly<Record<IntKey, string>> = Object.freeze({
  inputQueueCapacity: "TERMLINE_INPUT_QUEUE_CAPACITY",
  inputEnqueueTimeoutMs: "TERMLINE_INPUT_ENQUEUE_TIMEOUT_MS",
  shutdownTimeoutMs: "TERMLINE_SHUTDOWN_TIMEOUT_MS",
  maxHistory: "TERMLINE_MAX_HISTORY",
  layoutCacheCapacity: "TERMLINE_LAYOUT_CACHE_CAPACITY",
  dispatchLogCapacity: "TERMLINE_DISPATCH_LOG_CAPACITY",
  waitPollIntervalMs: "TERMLINE_WAIT_POLL_INTERVAL_MS",
  doubleClickMs: "TERMLINE_DOUBLE_CLICK_MS",
  doubleClickDistance: "TERMLINE_DOUBLE_CLICK_DISTANCE",
  frameIntervalMs: "TERMLINE_FRAME_INTERVAL_MS",
});

const INT_KEYS = Object.keys(ENV_NAMES).filter((k): k is IntKey => k in ENV_NAMES);

function invalidArgument(detail: string): never {
  throw new TermlineError("INVALID_ARGUMENT", detail);
}

function requirePositiveInt(name: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) {
    invalidArgument(`${name} must be a positive integer`);
  }
  return v;
}

function isRecoveryPolicy(v: unknown): v is RecoveryPolicy {
  return v === "rethrow" || v === "exit";
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveRuntimeConfig(
  overrides?: RuntimeConfigOverrides,
  env: EnvSource = hostEnv(),
): RuntimeConfig {
  const out: { -readonly [K in keyof RuntimeConfig]: RuntimeConfig[K] } = {
    ...DEFAULT_RUNTIME_CONFIG,
  };

  for (const key of INT_KEYS) {
    out[key] = envPositiveInt(env, ENV_NAMES[key], DEFAULT_RUNTIME_CONFIG[key]);
  }
  const envPolicy = readEnv(env, "TERMLINE_RECOVERY_POLICY");
  if (isRecoveryPolicy(envPolicy)) out.recoveryPolicy = envPolicy;

  if (overrides) {
    for (const key of INT_KEYS) {
      const v = overrides[key];
      if (v !== undefined) out[key] = requirePositiveInt(key, v);
    }
    if (overrides.recoveryPolicy !== undefined) {
      if (!isRecoveryPolicy(overrides.recoveryPolicy)) {
        invalidArgument(`recoveryPolicy must be "rethrow" or "exit"`);
      }
      out.recoveryPolicy = overrides.recoveryPolicy;
    }
  }

  return Object.freeze(out);
}
