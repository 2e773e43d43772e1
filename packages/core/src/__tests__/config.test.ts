import { assert, describe, test } from "@termline/testkit";
import { DEFAULT_RUNTIME_CONFIG, resolveRuntimeConfig } from "../config.js";
import { TermlineError } from "../errors.js";

describe("resolveRuntimeConfig", () => {
  test("defaults when nothing is set", () => {
    const config = resolveRuntimeConfig(undefined, {});
    assert.deepEqual(config, DEFAULT_RUNTIME_CONFIG);
    assert.equal(Object.isFrozen(config), true);
  });

  test("reads TERMLINE_* variables and ignores malformed ones", () => {
    const config = resolveRuntimeConfig(undefined, {
      TERMLINE_MAX_HISTORY: "20",
      TERMLINE_FRAME_INTERVAL_MS: "abc",
      TERMLINE_INPUT_QUEUE_CAPACITY: "-3",
      TERMLINE_RECOVERY_POLICY: "exit",
    });
    assert.equal(config.maxHistory, 20);
    assert.equal(config.frameIntervalMs, 16);
    assert.equal(config.inputQueueCapacity, 256);
    assert.equal(config.recoveryPolicy, "exit");
  });

  test("an unknown recovery policy in the environment keeps the default", () => {
    assert.equal(resolveRuntimeConfig(undefined, { TERMLINE_RECOVERY_POLICY: "panic" }).recoveryPolicy, "rethrow");
  });

  test("explicit overrides win over the environment", () => {
    const config = resolveRuntimeConfig({ maxHistory: 5 }, { TERMLINE_MAX_HISTORY: "20" });
    assert.equal(config.maxHistory, 5);
  });

  test("invalid overrides throw INVALID_ARGUMENT", () => {
    assert.throws(
      () => resolveRuntimeConfig({ maxHistory: 0 }, {}),
      (error: unknown) =>
        error instanceof TermlineError &&
        error.code === "INVALID_ARGUMENT" &&
        error.message === "maxHistory must be a positive integer",
    );
    assert.throws(() => resolveRuntimeConfig({ waitPollIntervalMs: 1.5 }, {}), TermlineError);
  });
});
