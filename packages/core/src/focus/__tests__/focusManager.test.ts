import { assert, describe, test } from "@termline/testkit";
import { upTo } from "../../layout/constraints.js";
import { LayoutEngine } from "../../layout/layoutEngine.js";
import { createLayoutNode, removeChild } from "../../layout/node.js";
import type { LayoutNode, StyleInit } from "../../layout/types.js";
import { FocusManager } from "../manager.js";
import { FocusScope } from "../scope.js";

function node(id: string, children: LayoutNode[] = [], focusable = false, style: StyleInit = {}): LayoutNode {
  return createLayoutNode(id, "box", { props: { focusable }, style, children });
}

function stacked() {
  const row = (id: string) => node(id, [], true, { width: 10, height: 1 });
  const root = node("root", [row("a"), row("b"), row("c")]);
  new LayoutEngine().layout([root], upTo(80, 24));
  const fm = new FocusManager();
  fm.refresh([root]);
  return { root, fm };
}

describe("FocusManager sequential traversal", () => {
  test("collects focusables in preorder", () => {
    const { fm } = stacked();
    assert.deepEqual(fm.getFocusableIds(), ["a", "b", "c"]);
    assert.equal(fm.getFocused(), null);
  });

  test("next called N times returns to the start", () => {
    const { fm } = stacked();
    for (const start of ["a", "b", "c"]) {
      assert.equal(fm.focusSpecific(start), true);
      for (let i = 0; i < 3; i++) fm.focusNext();
      assert.equal(fm.getFocused(), start);
    }
  });

  test("prev wraps from the first to the last", () => {
    const { fm } = stacked();
    assert.equal(fm.focusFirst(), "a");
    assert.equal(fm.focusPrev(), "c");
    assert.equal(fm.focusLast(), "c");
    assert.equal(fm.focusNext(), "a");
  });

  test("with nothing focused, next picks the first and prev the last", () => {
    assert.equal(stacked().fm.focusNext(), "a");
    assert.equal(stacked().fm.focusPrev(), "c");
  });

  test("focusSpecific rejects non-focusable ids and keeps focus", () => {
    const { fm } = stacked();
    fm.focusSpecific("b");
    assert.equal(fm.focusSpecific("root"), false);
    assert.equal(fm.focusSpecific("missing"), false);
    assert.equal(fm.getFocused(), "b");
  });

  test("focus path runs from the root to the focused node", () => {
    const { fm } = stacked();
    fm.focusSpecific("b");
    assert.deepEqual(fm.focusPath(), ["root", "b"]);
  });

  test("empty focusable set yields null", () => {
    const fm = new FocusManager();
    fm.refresh([node("root")]);
    assert.equal(fm.focusNext(), null);
    assert.equal(fm.focusFirst(), null);
    assert.equal(fm.focusDirection("down"), null);
  });

  test("refresh moves focus to the first focusable when the focused node disappears", () => {
    const { root, fm } = stacked();
    fm.focusSpecific("b");
    const b = root.children[1];
    assert.ok(b);
    removeChild(root, b);
    fm.refresh();
    assert.equal(fm.getFocused(), "a");
  });
});

describe("FocusManager geometric navigation", () => {
  test("down, down, up over three stacked rows", () => {
    const { fm } = stacked();
    fm.focusSpecific("a");
    assert.equal(fm.focusDirection("down"), "b");
    assert.equal(fm.focusDirection("down"), "c");
    assert.equal(fm.focusDirection("up"), "b");
  });

  test("no candidate leaves focus unchanged", () => {
    const { fm } = stacked();
    fm.focusSpecific("c");
    assert.equal(fm.focusDirection("down"), null);
    assert.equal(fm.focusDirection("right"), null);
    assert.equal(fm.getFocused(), "c");
  });

  test("with nothing focused the top-left node is chosen", () => {
    const { fm } = stacked();
    assert.equal(fm.focusDirection("up"), "a");
  });
});

describe("FocusManager notifications", () => {
  test("listeners see (prev, next) for real changes only", () => {
    const { fm } = stacked();
    const seen: Array<[string | null, string | null]> = [];
    const off = fm.onChange((prev, next) => {
      seen.push([prev, next]);
    });
    fm.focusFirst();
    fm.focusNext();
    fm.focusSpecific("b");
    off();
    off();
    fm.focusNext();
    assert.deepEqual(seen, [
      [null, "a"],
      ["a", "b"],
    ]);
  });
});

function trapTree() {
  const m2 = node("m2", [], true);
  const inner = node("inner", [m2]);
  const modal = node("modal", [node("m1", [], true), inner]);
  const root = node("root", [node("a", [], true), node("b", [], true), modal]);
  const fm = new FocusManager();
  fm.refresh([root]);
  return { fm, modal, inner };
}

describe("FocusManager traps", () => {
  test("a trap confines traversal to its subtree", () => {
    const { fm, modal } = trapTree();
    fm.focusSpecific("a");
    fm.pushTrap({ id: "t1", type: "modal", root: modal });
    assert.equal(fm.getFocused(), "m1");
    assert.deepEqual(fm.getFocusableIds(), ["m1", "m2"]);
    assert.equal(fm.focusNext(), "m2");
    assert.equal(fm.focusNext(), "m1");
    assert.equal(fm.focusSpecific("a"), false);
  });

  test("nested traps shadow and restore in stack order", () => {
    const { fm, modal, inner } = trapTree();
    fm.focusSpecific("a");
    fm.pushTrap({ id: "t1", type: "modal", root: modal });
    fm.pushTrap({ id: "t2", type: "menu", root: inner });
    assert.equal(fm.getFocused(), "m2");
    assert.equal(fm.isTrapActive("t1"), false);
    assert.equal(fm.isTrapActive("t2"), true);

    assert.equal(fm.popTrap()?.id, "t2");
    assert.equal(fm.isTrapActive("t1"), true);
    assert.equal(fm.getFocused(), "m1");

    fm.popTrap();
    assert.equal(fm.trapDepth, 0);
    assert.equal(fm.getFocused(), "a");
  });

  test("removing a non-top trap keeps the top active", () => {
    const { fm, modal, inner } = trapTree();
    fm.pushTrap({ id: "t1", type: "modal", root: modal });
    fm.pushTrap({ id: "t2", type: "popover", root: inner });
    assert.equal(fm.removeTrap("t1"), true);
    assert.equal(fm.removeTrap("t1"), false);
    assert.equal(fm.trapDepth, 1);
    assert.equal(fm.isTrapActive("t2"), true);
    assert.equal(fm.getFocused(), "m2");
    fm.clearTraps();
    assert.equal(fm.activeTrap(), null);
    assert.equal(fm.getFocused(), "m1");
  });
});

describe("FocusManager scopes", () => {
  test("a pushed scope collects from its root and pops back", () => {
    const { fm } = trapTree();
    fm.focusSpecific("b");
    fm.pushScope(new FocusScope("dialog", { rootId: "modal", modal: true }));
    assert.equal(fm.scopeDepth, 2);
    assert.equal(fm.activeScope().id, "dialog");
    assert.deepEqual(fm.getFocusableIds(), ["m1", "m2"]);
    assert.equal(fm.getFocused(), null);
    assert.equal(fm.focusNext(), "m1");

    const popped = fm.popScope();
    assert.equal(popped?.id, "dialog");
    assert.equal(popped?.active, false);
    assert.equal(fm.getFocused(), "b");
    assert.equal(fm.popScope(), null);
  });
});
