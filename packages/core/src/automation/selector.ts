/**
 * packages/core/src/automation/selector.ts — Component selectors.
 *
 * Grammar (one predicate per selector):
 *   #id           exact id
 *   .type         exact type tag
 *   [key=value]   a prop or state entry whose string form equals value;
 *                 value may be wrapped in double quotes
 *   *             every component
 */

import { type Result, err, ok } from "../errors.js";
import type { ComponentState, Snapshot } from "../state/snapshot.js";
import { type AutomationError, invalidSelector } from "./errors.js";

export type Selector =
  | Readonly<{ kind: "id"; id: string }>
  | Readonly<{ kind: "type"; type: string }>
  | Readonly<{ kind: "attribute"; key: string; value: string }>
  | Readonly<{ kind: "all" }>;

function stripQuotes(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) return value.slice(1, -1);
  return value;
}

export function parseSelector(input: string): Result<Selector, AutomationError> {
  const text = input.trim();
  if (text === "*") return ok(Object.freeze({ kind: "all" }));
  if (text.startsWith("#") && text.length > 1) return ok(Object.freeze({ kind: "id", id: text.slice(1) }));
  if (text.startsWith(".") && text.length > 1) {
    return ok(Object.freeze({ kind: "type", type: text.slice(1) }));
  }
  if (text.startsWith("[") && text.endsWith("]")) {
    const body = text.slice(1, -1);
    const eq = body.indexOf("=");
    if (eq <= 0) return err(invalidSelector(input));
    const key = body.slice(0, eq).trim();
    if (key.length === 0) return err(invalidSelector(input));
    return ok(Object.freeze({ kind: "attribute", key, value: stripQuotes(body.slice(eq + 1).trim()) }));
  }
  return err(invalidSelector(input));
}

function stringForm(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || typeof value !== "object") return String(value);
  return JSON.stringify(value);
}

function hasEntry(record: Readonly<Record<string, unknown>>, key: string, value: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key) && stringForm(record[key]) === value;
}

export function matchesSelector(component: ComponentState, selector: Selector): boolean {
  switch (selector.kind) {
    case "all":
      return true;
    case "id":
      return component.id === selector.id;
    case "type":
      return component.type === selector.type;
    case "attribute":
      return (
        hasEntry(component.props, selector.key, selector.value) ||
        hasEntry(component.state, selector.key, selector.value)
      );
  }
}

/** Matching components, ordered by id. */
export function selectComponents(snapshot: Snapshot, selector: Selector): readonly ComponentState[] {
  const out: ComponentState[] = [];
  for (const component of Object.values(snapshot.components)) {
    if (matchesSelector(component, selector)) out.push(component);
  }
  out.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return Object.freeze(out);
}
