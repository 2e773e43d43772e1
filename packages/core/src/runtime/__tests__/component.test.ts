import { assert, describe, test } from "@termline/testkit";
import { type AnyComponent, capabilitiesOf, hasCapability } from "../component.js";
import { TextField } from "./fixtures.js";

describe("component capabilities", () => {
  test("a plain component has none", () => {
    const label: AnyComponent = { id: "l", type: "label" };
    const caps = capabilitiesOf(label);
    assert.equal(caps.measurable, null);
    assert.equal(caps.focusable, null);
    assert.equal(caps.paintable, null);
    assert.equal(caps.target, null);
    assert.equal(caps.stateful, null);
    assert.equal(hasCapability(label, "paint"), false);
  });

  test("a full widget reports every capability", () => {
    const field = new TextField("f");
    const caps = capabilitiesOf(field);
    assert.equal(caps.measurable, field);
    assert.equal(caps.focusable, field);
    assert.equal(caps.paintable, field);
    assert.equal(caps.target, field);
    assert.equal(caps.stateful, field);
    assert.equal(hasCapability(field, "measure"), true);
    assert.equal(hasCapability(field, "action"), true);
  });

  test("a component with only handleAction is a target and nothing else", () => {
    const button: AnyComponent = { id: "b", type: "button", handleAction: () => true };
    const caps = capabilitiesOf(button);
    assert.equal(caps.target, button);
    assert.equal(caps.focusable, null);
    assert.equal(hasCapability(button, "focus"), false);
  });
});
