import { assert, describe, test } from "@termline/testkit";
import {
  appendChild,
  clearDirty,
  containsPoint,
  createLayoutNode,
  findNodeById,
  innerBounds,
  markDirty,
  removeChild,
  walkNodes,
} from "../node.js";

describe("layout nodes", () => {
  test("markDirty flags every ancestor", () => {
    const leaf = createLayoutNode("leaf", "box");
    const mid = createLayoutNode("mid", "box", { children: [leaf] });
    const root = createLayoutNode("root", "box", { children: [mid] });
    clearDirty(root);
    markDirty(leaf);
    assert.deepEqual([root.dirty, mid.dirty, leaf.dirty], [true, true, true]);
  });

  test("appendChild reparents", () => {
    const child = createLayoutNode("c", "box");
    const a = createLayoutNode("a", "box", { children: [child] });
    const b = createLayoutNode("b", "box");
    appendChild(b, child);
    assert.equal(a.children.length, 0);
    assert.equal(child.parent, b);
    assert.equal(removeChild(a, child), false);
  });

  test("walkNodes skips a subtree when visit returns false", () => {
    const root = createLayoutNode("root", "box", {
      children: [
        createLayoutNode("a", "box", { children: [createLayoutNode("a1", "box")] }),
        createLayoutNode("b", "box"),
      ],
    });
    const seen: string[] = [];
    walkNodes([root], (n) => {
      seen.push(n.id);
      return n.id !== "a";
    });
    assert.deepEqual(seen, ["root", "a", "b"]);
    assert.equal(findNodeById([root], "a1")?.id, "a1");
    assert.equal(findNodeById([root], "zz"), null);
  });

  test("innerBounds and containsPoint", () => {
    const n = createLayoutNode("n", "box", { style: { padding: { left: 2, top: 1 } } });
    n.x = 10;
    n.y = 5;
    n.w = 6;
    n.h = 3;
    assert.deepEqual(innerBounds(n), { x: 12, y: 6, w: 4, h: 2 });
    assert.equal(containsPoint(n, 15, 7), true);
    assert.equal(containsPoint(n, 16, 7), false);
  });
});
