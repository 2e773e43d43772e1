import { assert, describe, test } from "@termline/testkit";
import { TermlineError } from "../../errors.js";
import { InputQueue } from "../inputQueue.js";

describe("InputQueue", () => {
  test("rejects a non-positive capacity", () => {
    assert.throws(
      () => new InputQueue<number>(0),
      (e: unknown) => e instanceof TermlineError && e.code === "INVALID_ARGUMENT",
    );
  });

  test("drain returns items in FIFO order and empties the queue", async () => {
    const q = new InputQueue<number>(4);
    assert.equal(await q.offer(1, 10), true);
    assert.equal(q.tryOffer(2), true);
    assert.deepEqual(q.drain(), [1, 2]);
    assert.equal(q.size, 0);
  });

  test("a blocked producer is admitted when the consumer drains", async () => {
    const q = new InputQueue<string>(1);
    q.tryOffer("a");
    const pending = q.offer("b", 1000);
    assert.equal(q.blocked, 1);
    assert.deepEqual(q.drain(), ["a"]);
    assert.equal(await pending, true);
    assert.deepEqual(q.drain(), ["b"]);
    assert.equal(q.skipFrame, false);
  });

  test("a producer that times out sets skipFrame once", async () => {
    const q = new InputQueue<string>(1);
    q.tryOffer("a");
    assert.equal(await q.offer("b", 5), false);
    assert.equal(q.blocked, 0);
    assert.equal(q.consumeSkipFrame(), true);
    assert.equal(q.consumeSkipFrame(), false);
    assert.deepEqual(q.drain(), ["a"]);
  });

  test("tryOffer never jumps ahead of blocked producers", () => {
    const q = new InputQueue<string>(1);
    q.tryOffer("a");
    void q.offer("b", 1000);
    q.drain();
    assert.equal(q.tryOffer("c"), false);
    assert.deepEqual(q.drain(), ["b"]);
  });

  test("waitForItems wakes on the next offer", async () => {
    const q = new InputQueue<number>(2);
    const waiting = q.waitForItems(1000);
    q.tryOffer(7);
    assert.equal(await waiting, true);
  });

  test("waitForItems resolves false on timeout and on abort", async () => {
    const q = new InputQueue<number>(2);
    assert.equal(await q.waitForItems(5), false);
    const controller = new AbortController();
    const waiting = q.waitForItems(1000, controller.signal);
    controller.abort();
    assert.equal(await waiting, false);
  });

  test("close releases blocked producers and keeps queued items", async () => {
    const q = new InputQueue<number>(1);
    q.tryOffer(1);
    const pending = q.offer(2, 1000);
    q.close();
    assert.equal(await pending, false);
    assert.equal(q.tryOffer(3), false);
    assert.equal(await q.offer(3, 10), false);
    assert.deepEqual(q.drain(), [1]);
  });
});
