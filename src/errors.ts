/**
 * Structured error hierarchy for Tollgate.
 *
 * Every error extends {@link TollgateError} and carries a `code` tag, so callers
 * can match either by class or by code:
 *
 * ```ts
 * try {
 *   await breaker.run(work);
 * } catch (e) {
 *   if (e instanceof BudgetExceededError) { ... }
 *   if (isTollgateError(e, "TURN_LIMIT_EXCEEDED")) { ... }
 * }
 * ```
 *
 * @module errors
 */

export type TollgateErrorCode =
  | "BUDGET_EXCEEDED"
  | "TURN_LIMIT_EXCEEDED"
  | "TOKEN_COUNT_FAILED"
  | "UNKNOWN_MODEL"
  | "VALIDATION_ERROR"
  | "INTERCEPTION_ERROR";

/** Base error for all Tollgate errors. */
export class TollgateError extends Error {
  readonly code: TollgateErrorCode;
  constructor(code: TollgateErrorCode, message: string) {
    super(message);
    this.name = "TollgateError";
    this.code = code;
  }
}

/** Thrown when admitting a call would reach or pass the run's dollar ceiling. */
export class BudgetExceededError extends TollgateError {
  readonly runId: string;
  readonly budgetUsd: number;
  readonly spentUsd: number;
  readonly lastModel: string;
  constructor(runId: string, budgetUsd: number, spentUsd: number, lastModel: string) {
    super(
      "BUDGET_EXCEEDED",
      `Budget exceeded: $${spentUsd.toFixed(2)} / $${budgetUsd.toFixed(2)} on run ${runId}`,
    );
    this.name = "BudgetExceededError";
    this.runId = runId;
    this.budgetUsd = budgetUsd;
    this.spentUsd = spentUsd;
    this.lastModel = lastModel;
  }
}

/** Thrown when a run has already made its maximum number of calls. */
export class TurnLimitError extends TollgateError {
  readonly runId: string;
  readonly maxTurns: number;
  readonly currentTurn: number;
  constructor(runId: string, maxTurns: number, currentTurn: number) {
    super("TURN_LIMIT_EXCEEDED", `Turn limit exceeded: ${currentTurn} / ${maxTurns} on run ${runId}`);
    this.name = "TurnLimitError";
    this.runId = runId;
    this.maxTurns = maxTurns;
    this.currentTurn = currentTurn;
  }
}

/** Thrown by a token counting backend. Recovered inside the call path. */
export class TokenCountError extends TollgateError {
  readonly model?: string;
  constructor(message: string, model?: string, cause?: unknown) {
    super("TOKEN_COUNT_FAILED", message);
    this.name = "TokenCountError";
    this.model = model;
    if (cause !== undefined) this.cause = cause;
  }
}

/** Thrown when no pricing source knows the model. */
export class UnknownModelError extends TollgateError {
  readonly model: string;
  constructor(model: string, detail?: string) {
    super("UNKNOWN_MODEL", detail ? `Unknown model: ${model} (${detail})` : `Unknown model: ${model}`);
    this.name = "UnknownModelError";
    this.model = model;
  }
}

/** Thrown when an argument or configuration value is invalid. */
export class ValidationError extends TollgateError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Thrown when hook points cannot be claimed, installed or restored. */
export class InterceptionError extends TollgateError {
  constructor(message: string) {
    super("INTERCEPTION_ERROR", message);
    this.name = "InterceptionError";
  }
}

export function isTollgateError(error: unknown, code?: TollgateErrorCode): error is TollgateError {
  if (!(error instanceof TollgateError)) return false;
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
