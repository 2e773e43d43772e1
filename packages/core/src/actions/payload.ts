import { type Result, err, ok } from "../errors.js";
import { ActionError } from "./errors.js";
import type { Action } from "./types.js";

function missing(action: Action): ActionError {
  return new ActionError("missing_payload", `"${action.type}" requires a payload`, { action });
}

function mismatch(action: Action, expected: string): ActionError {
  const actual = action.payload === null ? "null" : typeof action.payload;
  return new ActionError(
    "payload_type_mismatch",
    `"${action.type}" expects a ${expected} payload, got ${actual}`,
    { action, details: { expected, actual } },
  );
}

function isMissing(v: unknown): boolean {
  return v === null || v === undefined;
}

export function expectString(action: Action): Result<string, ActionError> {
  if (isMissing(action.payload)) return err(missing(action));
  if (typeof action.payload !== "string") return err(mismatch(action, "string"));
  return ok(action.payload);
}

/** Exactly one code point. */
export function expectChar(action: Action): Result<string, ActionError> {
  const s = expectString(action);
  if (!s.ok) return s;
  if ([...s.value].length !== 1) {
    return err(
      new ActionError("invalid_payload", `"${action.type}" expects a single character`, {
        action,
        details: { length: s.value.length },
      }),
    );
  }
  return s;
}

export function expectInteger(action: Action): Result<number, ActionError> {
  if (isMissing(action.payload)) return err(missing(action));
  if (typeof action.payload !== "number") return err(mismatch(action, "number"));
  if (!Number.isInteger(action.payload)) {
    return err(new ActionError("invalid_payload", `"${action.type}" expects an integer`, { action }));
  }
  return ok(action.payload);
}

export function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function expectRecord(action: Action): Result<Readonly<Record<string, unknown>>, ActionError> {
  if (isMissing(action.payload)) return err(missing(action));
  if (!isRecord(action.payload)) return err(mismatch(action, "record"));
  return ok(action.payload);
}

/** Generic guard-based validator for payload shapes the helpers above don't cover. */
export function expectPayload<T>(
  action: Action,
  guard: (v: unknown) => v is T,
  expected: string,
): Result<T, ActionError> {
  if (isMissing(action.payload)) return err(missing(action));
  if (!guard(action.payload)) return err(mismatch(action, expected));
  return ok(action.payload);
}
