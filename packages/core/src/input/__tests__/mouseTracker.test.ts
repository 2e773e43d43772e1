import { assert, describe, test } from "@termline/testkit";
import { MouseTracker } from "../mouseTracker.js";
import { EMPTY_MODS, type MouseAction, type MouseButton, type MouseInput } from "../types.js";

function mouse(action: MouseAction, button: MouseButton, x: number, y: number): MouseInput {
  return { kind: "mouse", action, button, x, y, mods: EMPTY_MODS };
}

describe("MouseTracker - click counting", () => {
  test("counts up to triple then starts over", () => {
    const t = new MouseTracker();
    const types = [0, 100, 200, 300].map((at) => t.track(mouse("press", "left", 1, 1), at).type);
    assert.deepEqual(types, ["mouse_click", "mouse_double_click", "mouse_triple_click", "mouse_click"]);
  });

  test("clicks outside the time window do not combine", () => {
    const t = new MouseTracker({ doubleClickMs: 500 });
    t.track(mouse("press", "left", 0, 0), 0);
    assert.equal(t.track(mouse("press", "left", 0, 0), 501).clicks, 1);
  });

  test("clicks too far apart do not combine", () => {
    const t = new MouseTracker();
    t.track(mouse("press", "left", 0, 0), 0);
    assert.equal(t.track(mouse("press", "left", 6, 0), 10).clicks, 1);
    assert.equal(t.track(mouse("press", "left", 8, 3), 20).clicks, 2);
  });

  test("right and middle presses are plain presses", () => {
    const t = new MouseTracker();
    const g = t.track(mouse("press", "right", 2, 3), 0);
    assert.equal(g.type, "mouse_press");
    assert.equal(g.clicks, 0);
  });

  test("another button breaks a click run", () => {
    const t = new MouseTracker();
    t.track(mouse("press", "left", 0, 0), 0);
    t.track(mouse("press", "middle", 0, 0), 10);
    assert.equal(t.track(mouse("press", "left", 0, 0), 20).type, "mouse_click");
  });
});

describe("MouseTracker - drag", () => {
  test("motion while pressed is a drag relative to the press point", () => {
    const t = new MouseTracker();
    t.track(mouse("press", "left", 5, 5), 0);
    assert.equal(t.isDragging, true);
    const g = t.track(mouse("motion", "left", 8, 6), 10);
    assert.equal(g.type, "mouse_drag");
    assert.deepEqual(g.start, { x: 5, y: 5 });
    assert.equal(g.dx, 3);
    assert.equal(g.dy, 1);
    assert.equal(g.button, "left");
  });

  test("release ends the drag", () => {
    const t = new MouseTracker();
    t.track(mouse("press", "left", 5, 5), 0);
    assert.equal(t.track(mouse("release", "left", 6, 5), 10).type, "mouse_release");
    assert.equal(t.isDragging, false);
    assert.equal(t.track(mouse("motion", "none", 7, 5), 20).type, "mouse_motion");
  });

  test("wheel passes through", () => {
    const t = new MouseTracker();
    const g = t.track(mouse("wheel", "wheel_up", 1, 2), 0);
    assert.equal(g.type, "mouse_wheel");
    assert.equal(g.button, "wheel_up");
  });
});
