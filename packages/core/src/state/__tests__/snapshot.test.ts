import { assert, describe, test } from "@termline/testkit";
import {
  createComponentState,
  createSnapshot,
  dataOnly,
  dataValue,
  deepEqualUnknown,
  withMetadata,
} from "../snapshot.js";

describe("deepEqualUnknown", () => {
  test("dates compare by time", () => {
    assert.equal(deepEqualUnknown(new Date(0), new Date(0)), true);
    assert.equal(deepEqualUnknown(new Date(0), new Date(86_400_000)), false);
    assert.equal(deepEqualUnknown({ due: new Date(0) }, { due: new Date(1) }), false);
  });

  test("maps compare entries", () => {
    assert.equal(deepEqualUnknown(new Map([["a", { n: 1 }]]), new Map([["a", { n: 1 }]])), true);
    assert.equal(deepEqualUnknown(new Map([["a", 1]]), new Map([["a", 2]])), false);
    assert.equal(deepEqualUnknown(new Map([["a", 1]]), new Map([["b", 1]])), false);
    assert.equal(deepEqualUnknown(new Map(), new Map([["a", 1]])), false);
  });

  test("sets compare members", () => {
    assert.equal(deepEqualUnknown(new Set([1, 2]), new Set([2, 1])), true);
    assert.equal(deepEqualUnknown(new Set([1, 2]), new Set([1, 3])), false);
    assert.equal(deepEqualUnknown(new Set([{ x: 1 }]), new Set([{ x: 1 }])), true);
    assert.equal(deepEqualUnknown(new Set([{ x: 1 }]), new Set([{ x: 2 }])), false);
  });

  test("different kinds of object are never equal", () => {
    assert.equal(deepEqualUnknown(new Date(0), {}), false);
    assert.equal(deepEqualUnknown(new Map(), new Set()), false);
    assert.equal(deepEqualUnknown(new Map(), {}), false);
  });
});

describe("dataValue", () => {
  test("drops callbacks at every depth", () => {
    const value = {
      label: "x",
      onClick: () => undefined,
      tag: Symbol("t"),
      nested: { keep: [1, 2], fn: () => 0 },
      list: [1, () => 2, { run: () => 3, id: "r" }],
    };
    assert.deepEqual(dataValue(value), {
      label: "x",
      nested: { keep: [1, 2] },
      list: [1, undefined, { id: "r" }],
    });
  });

  test("keeps dates and walks maps and sets", () => {
    const due = new Date(0);
    const out = dataValue({ due, byId: new Map([["a", { f: () => 1, v: 1 }]]), tags: new Set(["x", () => 0]) });
    assert.deepEqual(out, { due, byId: new Map([["a", { v: 1 }]]), tags: new Set(["x"]) });
  });

  test("keeps shared and cyclic references", () => {
    type Node = { name: string; self?: Node };
    const node: Node = { name: "a" };
    node.self = node;
    const out = dataOnly({ node });
    const copied = out["node"];
    assert.ok(typeof copied === "object" && copied !== null && "self" in copied);
    assert.equal(copied.self, copied);
  });
});

describe("snapshot construction", () => {
  test("component props and state with nested callbacks are copied as data", () => {
    const c = createComponentState("table", {
      type: "table",
      props: { columns: [{ key: "name", format: (v: unknown) => String(v) }] },
      state: { sort: { key: "name", compare: () => 0 } },
    });
    assert.deepEqual(c.props, { columns: [{ key: "name" }] });
    assert.deepEqual(c.state, { sort: { key: "name" } });
    assert.ok(Object.isFrozen(c.props["columns"]));
  });

  test("metadata values with nested callbacks are copied as data", () => {
    const s = withMetadata(createSnapshot({ timestamp: 1 }), "menu", { items: [{ id: "open", run: () => 0 }] });
    assert.deepEqual(s.metadata["menu"], { items: [{ id: "open" }] });
  });
});
