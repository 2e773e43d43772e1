/**
 * packages/core/src/actions/errors.ts — Structured action failures.
 *
 * Why: Dispatch and orchestration return errors the caller can branch on
 * (retry a timeout, surface a disabled target) instead of parsing messages.
 */

import type { Action } from "./types.js";

export type ActionErrorKind =
  | "target_not_found"
  | "target_disabled"
  | "target_not_interactable"
  | "invalid_payload"
  | "missing_payload"
  | "payload_type_mismatch"
  | "action_not_supported"
  | "action_not_allowed"
  | "action_failed"
  | "dispatch_failed"
  | "timeout"
  | "canceled";

export type ActionErrorInit = Readonly<{
  action?: Action | undefined;
  target?: string | undefined;
  componentType?: string | undefined;
  details?: Readonly<Record<string, unknown>> | undefined;
  cause?: unknown;
}>;

export class ActionError extends Error {
  override readonly name = "ActionError";
  readonly kind: ActionErrorKind;
  readonly action: Action | undefined;
  readonly target: string;
  readonly componentType: string;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(kind: ActionErrorKind, message: string, init: ActionErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.kind = kind;
    this.action = init.action;
    this.target = init.target ?? init.action?.target ?? "";
    this.componentType = init.componentType ?? "";
    this.details = Object.freeze({ ...(init.details ?? {}) });
  }

  is(kind: ActionErrorKind): boolean {
    return this.kind === kind;
  }

  override toString(): string {
    const parts: string[] = [];
    if (this.action) parts.push(`action=${this.action.type}`);
    if (this.target.length > 0) parts.push(`target=${this.target}`);
    if (this.componentType.length > 0) parts.push(`component=${this.componentType}`);
    const suffix = parts.length > 0 ? ` (${parts.join(", ")})` : "";
    return `${this.kind}: ${this.message}${suffix}`;
  }
}

export function isActionError(e: unknown, kind?: ActionErrorKind): e is ActionError {
  return e instanceof ActionError && (kind === undefined || e.kind === kind);
}

export function targetNotFound(target: string, action?: Action): ActionError {
  return new ActionError("target_not_found", `target "${target}" is not registered`, {
    action,
    target,
  });
}

export function targetDisabled(target: string, action?: Action): ActionError {
  return new ActionError("target_disabled", `target "${target}" is disabled`, { action, target });
}

export function actionNotSupported(action: Action, componentType = ""): ActionError {
  return new ActionError("action_not_supported", `"${action.type}" is not supported`, {
    action,
    componentType,
  });
}

export function timeoutError(ms: number): ActionError {
  return new ActionError("timeout", `action timeout after ${String(ms)}ms`, {
    details: { timeoutMs: ms },
  });
}

export function canceledError(): ActionError {
  return new ActionError("canceled", "action canceled");
}

/**
 * Aggregate of concurrent failures. The first error is the primary cause.
 */
export class MultipleError extends Error {
  override readonly name = "MultipleError";
  readonly errors: readonly Error[];

  constructor(errors: readonly Error[]) {
    const first = errors[0];
    const firstMsg = first ? first.message : "no errors";
    super(
      errors.length > 1 ? `${String(errors.length)} errors occurred, first: ${firstMsg}` : firstMsg,
      first ? { cause: first } : undefined,
    );
    this.errors = Object.freeze([...errors]);
  }

  /** The primary cause. */
  unwrap(): Error | undefined {
    return this.errors[0];
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
