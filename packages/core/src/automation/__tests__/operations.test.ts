import { assert, describe, test } from "@termline/testkit";
import { createAction } from "../../actions/types.js";
import { createLogger } from "../../diagnostics/logger.js";
import { err, ok } from "../../errors.js";
import { Runtime } from "../../runtime/runtime.js";
import { FakePlatform, TextField, formTree } from "../../runtime/__tests__/fixtures.js";
import { AutomationController, type AutomationResult, type Operation } from "../controller.js";
import { AutomationError, rootCause } from "../errors.js";
import {
  atomicBatchOp,
  batchOp,
  clickOp,
  dispatchOp,
  inputOp,
  navigateOp,
  repeatOp,
  retryOp,
  waitOp,
  waitValueOp,
} from "../operations.js";

function setup(): { ctrl: AutomationController; rt: Runtime; field1: TextField } {
  const rt = new Runtime({
    platform: new FakePlatform(),
    env: {},
    logger: createLogger("test", { enabled: false, env: {} }),
  });
  const field1 = new TextField("field1");
  rt.mount(field1);
  rt.mount(new TextField("field2"));
  rt.setRoot(formTree());
  return { ctrl: new AutomationController(rt, { pollIntervalMs: 5 }), rt, field1 };
}

/** Fails with TIMEOUT until its `succeedOn`-th call. */
function flaky(succeedOn: number): { op: Operation; calls: () => number } {
  let calls = 0;
  return {
    op: {
      name: "flaky",
      run: async (): Promise<AutomationResult> => {
        calls++;
        return calls >= succeedOn ? ok(undefined) : err(new AutomationError("TIMEOUT", "not yet"));
      },
    },
    calls: () => calls,
  };
}

describe("operations - execute", () => {
  test("click then input runs in order", async () => {
    const { ctrl, field1 } = setup();
    const result = await ctrl.execute(clickOp("field1"), inputOp("field1", "hi"));
    assert.equal(result.ok, true);
    assert.equal(field1.value, "hi");
    assert.deepEqual(ctrl.getFocused(), { ok: true, value: "field1" });
  });

  test("the first failure stops the script", async () => {
    const { ctrl, field1 } = setup();
    const result = await ctrl.execute(inputOp("field1", "a"), clickOp("nope"), inputOp("field1", "b"));
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error.code, "COMPONENT_NOT_FOUND");
    assert.equal(field1.value, "a");
  });

  test("navigate and dispatch steps", async () => {
    const { ctrl } = setup();
    const result = await ctrl.execute(
      dispatchOp(() => createAction("navigate_next")),
      navigateOp("down"),
    );
    assert.equal(result.ok, true);
    assert.deepEqual(ctrl.getFocused(), { ok: true, value: "field2" });
  });

  test("wait steps", async () => {
    const { ctrl } = setup();
    assert.equal((await ctrl.execute(waitValueOp("field1", "value", "", 10))).ok, true);
    const timedOut = await ctrl.execute(waitOp(() => false, 10));
    assert.equal(timedOut.ok, false);
    if (!timedOut.ok) assert.equal(timedOut.error.code, "TIMEOUT");
  });
});

describe("operations - batches", () => {
  test("batchOp wraps the failure and keeps applied steps", async () => {
    const { ctrl, field1 } = setup();
    const result = await ctrl.execute(batchOp(inputOp("field1", "a"), clickOp("nope")));
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.code, "OPERATION_FAILED");
      assert.equal(result.error.message, "batch operation failed: component not found: nope");
      assert.equal(rootCause(result.error).code, "COMPONENT_NOT_FOUND");
    }
    assert.equal(field1.value, "a");
  });

  test("atomicBatchOp undoes applied steps on failure", async () => {
    const { ctrl, rt, field1 } = setup();
    const result = await ctrl.execute(atomicBatchOp(inputOp("field1", "ab"), clickOp("nope")));
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, "atomic batch rolled back: component not found: nope");
    }
    assert.equal(field1.value, "");
    assert.equal(rt.tracker.history().past.length, 0);
    assert.deepEqual(ctrl.getState("field1", "value"), { ok: true, value: "" });
  });

  test("atomicBatchOp leaves earlier history alone", async () => {
    const { ctrl, rt, field1 } = setup();
    ctrl.input("field1", "x");
    await ctrl.execute(atomicBatchOp(inputOp("field1", "y"), clickOp("nope")));
    assert.equal(field1.value, "x");
    assert.equal(rt.tracker.history().past.length, 1);
  });

  test("a successful atomic batch keeps its changes", async () => {
    const { ctrl, field1 } = setup();
    const result = await ctrl.execute(atomicBatchOp(inputOp("field1", "ok")));
    assert.equal(result.ok, true);
    assert.equal(field1.value, "ok");
  });
});

describe("operations - repeat and retry", () => {
  test("repeatOp runs the step count times", async () => {
    const { ctrl, field1 } = setup();
    assert.equal((await ctrl.execute(repeatOp(inputOp("field1", "x"), 3, 1))).ok, true);
    assert.equal(field1.value, "xxx");
  });

  test("repeatOp names the failing iteration", async () => {
    const { ctrl } = setup();
    const result = await ctrl.execute(repeatOp(clickOp("nope"), 2));
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, "repeat failed at iteration 0: component not found: nope");
    }
  });

  test("retryOp succeeds once the step does", async () => {
    const { ctrl } = setup();
    const f = flaky(3);
    assert.equal((await ctrl.execute(retryOp(f.op, 3))).ok, true);
    assert.equal(f.calls(), 3);
  });

  test("retryOp gives up after the last attempt", async () => {
    const { ctrl } = setup();
    const f = flaky(3);
    const result = await ctrl.execute(retryOp(f.op, 2, { delayMs: 1 }));
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, "retry failed after 2 attempts: not yet");
      assert.equal(rootCause(result.error).code, "TIMEOUT");
    }
    assert.equal(f.calls(), 2);
  });

  test("shouldRetry can stop retrying early", async () => {
    const { ctrl } = setup();
    const f = flaky(3);
    const result = await ctrl.execute(retryOp(f.op, 5, { shouldRetry: (e) => e.code !== "TIMEOUT" }));
    assert.equal(result.ok, false);
    assert.equal(f.calls(), 1);
  });

  test("an aborted signal stops a script before the next step", async () => {
    const { ctrl, field1 } = setup();
    const controller = new AbortController();
    controller.abort();
    const result = await ctrl.executeWith(controller.signal, inputOp("field1", "a"));
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error.code, "CANCELED");
    assert.equal(field1.value, "");
  });
});
