/**
 * Error taxonomy for the safety controls.
 *
 * Every error carries a stable `code` so callers (and the control surface) can
 * branch on it without string matching, and an `isRetryable` flag that the
 * retry helpers consult.
 */

export enum SafetyErrorCode {
  TRANSIENT_GATEWAY = 'TRANSIENT_GATEWAY',
  PRECISION = 'PRECISION',
  GATEWAY_REJECTED = 'GATEWAY_REJECTED',
  INVALID_MARGIN_DATA = 'INVALID_MARGIN_DATA',
  PARTIAL_FAILURE = 'PARTIAL_FAILURE',
  RESET_PRECONDITION_FAILED = 'RESET_PRECONDITION_FAILED',
  RESET_NOT_PERMITTED = 'RESET_NOT_PERMITTED',
  STATE_STORE = 'STATE_STORE',
  TIMEOUT = 'TIMEOUT',
  ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',
}

export class SafetyError extends Error {
  public readonly code: SafetyErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly isRetryable: boolean;

  constructor(code: SafetyErrorCode, message: string, context?: Record<string, unknown>, isRetryable = false) {
    super(message);
    this.name = 'SafetyError';
    this.code = code;
    this.isRetryable = isRetryable;
    if (context) {
      this.context = context;
    }
  }
}

/**
 * Network failure, timeout or rate limit. Retried with bounded backoff.
 */
export class TransientGatewayError extends SafetyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SafetyErrorCode.TRANSIENT_GATEWAY, message, context, true);
    this.name = 'TransientGatewayError';
  }
}

/**
 * Quantity or price violates the instrument's step or minimum.
 */
export class PrecisionError extends SafetyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SafetyErrorCode.PRECISION, message, context);
    this.name = 'PrecisionError';
  }
}

/**
 * The exchange answered and refused the request.
 */
export class GatewayRejectedError extends SafetyError {
  public readonly exchangeCode: number | undefined;

  constructor(message: string, exchangeCode?: number, context?: Record<string, unknown>) {
    super(SafetyErrorCode.GATEWAY_REJECTED, message, context);
    this.name = 'GatewayRejectedError';
    this.exchangeCode = exchangeCode;
  }
}

export class InvalidMarginDataError extends SafetyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SafetyErrorCode.INVALID_MARGIN_DATA, message, context);
    this.name = 'InvalidMarginDataError';
  }
}

/**
 * One or more symbols were still open when the run ended. Recorded in the report, never thrown.
 */
export class PartialFailureError extends SafetyError {
  public readonly remainingSymbols: string[];

  constructor(message: string, remainingSymbols: string[]) {
    super(SafetyErrorCode.PARTIAL_FAILURE, message, { remainingSymbols });
    this.name = 'PartialFailureError';
    this.remainingSymbols = remainingSymbols;
  }
}

/**
 * Account not verified flat. Counts are null when the check itself failed.
 */
export class ResetPreconditionFailedError extends SafetyError {
  public readonly positionsRemaining: number | null;
  public readonly ordersRemaining: number | null;

  constructor(message: string, positionsRemaining: number | null, ordersRemaining: number | null) {
    super(SafetyErrorCode.RESET_PRECONDITION_FAILED, message, { positionsRemaining, ordersRemaining });
    this.name = 'ResetPreconditionFailedError';
    this.positionsRemaining = positionsRemaining;
    this.ordersRemaining = ordersRemaining;
  }
}

export class ResetNotPermittedError extends SafetyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SafetyErrorCode.RESET_NOT_PERMITTED, message, context);
    this.name = 'ResetNotPermittedError';
  }
}

export class StateStoreError extends SafetyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SafetyErrorCode.STATE_STORE, message, context, true);
    this.name = 'StateStoreError';
  }
}

export class TimeoutError extends SafetyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(SafetyErrorCode.TIMEOUT, message, context, true);
    this.name = 'TimeoutError';
  }
}

export class IllegalTransitionError extends SafetyError {
  constructor(from: string, to: string) {
    super(SafetyErrorCode.ILLEGAL_TRANSITION, `Illegal panic state transition ${from} -> ${to}`, { from, to });
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Retry predicate shared by the orchestrator and the monitor
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof SafetyError && error.isRetryable;
}
