/**
 * packages/core/src/runtime/component.ts — Component capability traits.
 *
 * Why: Widgets opt into layout, focus, routing and paint by implementing a
 * subset of small interfaces. The runtime resolves a component's capability
 * set once per node per pass (`capabilitiesOf`) instead of probing methods
 * at every use site.
 */

import type { Action } from "../actions/types.js";
import type { Constraints, Size } from "../layout/types.js";
import type { FocusPath } from "../state/focusPath.js";
import type { ComponentInit } from "../state/snapshot.js";
import type { CellBuffer } from "./cellBuffer.js";

export type Component = Readonly<{ id: string; type: string }>;

export interface Measurable extends Component {
  measure(constraints: Constraints): Size;
}

export interface FocusableComponent extends Component {
  isFocusable(): boolean;
}

export type PaintContext = Readonly<{
  buffer: CellBuffer;
  /** Border box in buffer cells. */
  rect: Readonly<{ x: number; y: number; w: number; h: number }>;
  focused: boolean;
  focusPath: FocusPath;
}>;

export interface Paintable extends Component {
  paint(ctx: PaintContext): void;
}

export interface HandlesActions extends Component {
  handleAction(action: Action): boolean;
}

/** Fields a component reports into snapshots; `rect` always comes from layout. */
export type CapturedState = Omit<ComponentInit, "rect" | "type">;

export interface Stateful extends Component {
  captureState(): CapturedState;
  /** Apply an externally-set value (automation setValue). */
  applyState?(key: string, value: unknown): void;
}

export type Capability = "measure" | "focus" | "paint" | "action" | "state";

export type Capabilities = Readonly<{
  measurable: Measurable | null;
  focusable: FocusableComponent | null;
  paintable: Paintable | null;
  target: HandlesActions | null;
  stateful: Stateful | null;
}>;

export type AnyComponent = Component &
  Partial<
    Pick<Measurable, "measure"> &
      Pick<FocusableComponent, "isFocusable"> &
      Pick<Paintable, "paint"> &
      Pick<HandlesActions, "handleAction"> &
      Pick<Stateful, "captureState" | "applyState">
  >;

export function isMeasurable(c: AnyComponent): c is Measurable {
  return typeof c.measure === "function";
}

export function isFocusableComponent(c: AnyComponent): c is FocusableComponent {
  return typeof c.isFocusable === "function";
}

export function isPaintable(c: AnyComponent): c is Paintable {
  return typeof c.paint === "function";
}

export function isActionHandler(c: AnyComponent): c is HandlesActions {
  return typeof c.handleAction === "function";
}

export function isStateful(c: AnyComponent): c is Stateful {
  return typeof c.captureState === "function";
}

export function hasCapability(c: AnyComponent, cap: Capability): boolean {
  switch (cap) {
    case "measure":
      return isMeasurable(c);
    case "focus":
      return isFocusableComponent(c);
    case "paint":
      return isPaintable(c);
    case "action":
      return isActionHandler(c);
    case "state":
      return isStateful(c);
  }
}

export function capabilitiesOf(c: AnyComponent): Capabilities {
  return Object.freeze({
    measurable: isMeasurable(c) ? c : null,
    focusable: isFocusableComponent(c) ? c : null,
    paintable: isPaintable(c) ? c : null,
    target: isActionHandler(c) ? c : null,
    stateful: isStateful(c) ? c : null,
  });
}
