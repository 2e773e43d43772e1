import { assert, describe, test } from "@termline/testkit";
import { computeGeometricMove, scoreCandidate } from "../geometry.js";
import { FocusScope } from "../scope.js";
import { FocusTrapStack } from "../traps.js";
import { createLayoutNode } from "../../layout/node.js";

describe("FocusScope", () => {
  test("cyclic moves over its own list", () => {
    const s = new FocusScope("s", { focusables: ["x", "y", "z"] });
    assert.equal(s.prev(), "z");
    assert.equal(s.next(), "x");
    assert.equal(s.last(), "z");
    assert.equal(s.first(), "x");
    assert.deepEqual(s.path(), ["x"]);
  });

  test("focus only accepts listed ids", () => {
    const s = new FocusScope("s", { focusables: ["x"] });
    assert.equal(s.focus("nope"), false);
    assert.equal(s.focused(), null);
    assert.equal(s.focus("x"), true);
    assert.equal(s.focused(), "x");
  });

  test("an empty scope returns null", () => {
    const s = new FocusScope("s");
    assert.equal(s.next(), null);
    assert.equal(s.first(), null);
  });
});

describe("FocusTrapStack", () => {
  const root = createLayoutNode("r", "box");

  test("activity is the stack top", () => {
    const traps = new FocusTrapStack();
    traps.push({ id: "a", type: "modal", root });
    traps.push({ id: "b", type: "menu", root });
    assert.equal(traps.isActive("a"), false);
    traps.remove("b");
    assert.equal(traps.isActive("a"), true);
  });

  test("re-pushing an id moves it to the top", () => {
    const traps = new FocusTrapStack();
    traps.push({ id: "a", type: "modal", root });
    traps.push({ id: "b", type: "custom", root });
    traps.push({ id: "a", type: "modal", root });
    assert.deepEqual(traps.ids(), ["b", "a"]);
    assert.equal(traps.depth, 2);
    traps.clear();
    assert.equal(traps.pop(), null);
  });
});

describe("geometric scoring", () => {
  const a = { id: "a", x: 0, y: 0, w: 10, h: 1 };
  const b = { id: "b", x: 0, y: 1, w: 10, h: 1 };
  const c = { id: "c", x: 0, y: 2, w: 10, h: 1 };

  test("nearer aligned candidates score higher", () => {
    assert.ok(Math.abs(scoreCandidate(a, b, "down") - 1.499) < 1e-9);
    assert.ok(Math.abs(scoreCandidate(a, c, "down") - 1.498) < 1e-9);
  });

  test("cross-axis overlap breaks distance ties", () => {
    const cur = { id: "cur", x: 10, y: 0, w: 4, h: 1 };
    const aligned = { id: "aligned", x: 10, y: 3, w: 4, h: 1 };
    const offset = { id: "offset", x: 30, y: 3, w: 4, h: 1 };
    assert.equal(computeGeometricMove("cur", "down", [cur, offset, aligned]), "aligned");
  });

  test("horizontal moves", () => {
    const left = { id: "left", x: 0, y: 0, w: 4, h: 1 };
    const right = { id: "right", x: 6, y: 0, w: 4, h: 1 };
    assert.equal(computeGeometricMove("left", "right", [left, right]), "right");
    assert.equal(computeGeometricMove("right", "left", [left, right]), "left");
    assert.equal(computeGeometricMove("left", "left", [left, right]), null);
  });

  test("zero-size candidates are ignored", () => {
    const ghost = { id: "ghost", x: 0, y: 1, w: 0, h: 0 };
    assert.equal(computeGeometricMove("a", "down", [a, ghost, c]), "c");
  });
});
