/**
 * packages/core/src/automation/errors.ts — Automation failures.
 *
 * Why: Scripts driving the UI branch on what went wrong (a component is
 * missing, a wait ran out) without matching message text.
 */

export type AutomationErrorCode =
  | "COMPONENT_NOT_FOUND"
  | "COMPONENT_DISABLED"
  | "INVALID_SELECTOR"
  | "INVALID_DIRECTION"
  | "NOT_HANDLED"
  | "NAVIGATION_FAILED"
  | "NO_FOCUS"
  | "TIMEOUT"
  | "CANCELED"
  | "OPERATION_FAILED";

export class AutomationError extends Error {
  override readonly name = "AutomationError";
  readonly code: AutomationErrorCode;

  constructor(code: AutomationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

export function componentNotFound(id: string): AutomationError {
  return new AutomationError("COMPONENT_NOT_FOUND", `component not found: ${id}`);
}

export function componentDisabled(id: string): AutomationError {
  return new AutomationError("COMPONENT_DISABLED", `component is disabled: ${id}`);
}

export function invalidSelector(selector: string): AutomationError {
  return new AutomationError("INVALID_SELECTOR", `invalid selector: ${selector}`);
}

export function waitTimeout(ms: number): AutomationError {
  return new AutomationError("TIMEOUT", `timeout waiting for condition after ${ms}ms`);
}

/** Wrap a failure from a nested operation, keeping its code reachable through `cause`. */
export function operationFailed(message: string, cause: AutomationError): AutomationError {
  return new AutomationError("OPERATION_FAILED", `${message}: ${cause.message}`, { cause });
}

/** The innermost AutomationError along a `cause` chain. */
export function rootCause(error: AutomationError): AutomationError {
  let current = error;
  while (current.cause instanceof AutomationError) current = current.cause;
  return current;
}
