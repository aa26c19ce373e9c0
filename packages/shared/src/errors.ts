/**
 * Pool error taxonomy
 *
 * Every failure aborts the whole operation with no partial state change.
 * Callers branch on `error.code` rather than on message text.
 */

export type PoolErrorCode =
  | 'CAPACITY_EXCEEDED'
  | 'INSUFFICIENT_BALANCE'
  | 'ARITHMETIC_OVERFLOW'
  | 'DIVIDE_BY_ZERO'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_PARAMETER'
  | 'INVALID_AMOUNT'
  | 'REENTRANCY_REJECTED'
  | 'UNAUTHORIZED'
  | 'PAUSED';

export type ErrorDetailValue = string | number | boolean | null;

export type ErrorDetails = Record<string, ErrorDetailValue>;

export type DetailInput = Record<string, ErrorDetailValue | bigint | undefined>;

function normalizeDetails(details?: DetailInput): ErrorDetails {
  const normalized: ErrorDetails = {};
  if (!details) return normalized;
  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) continue;
    normalized[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return normalized;
}

export interface PoolErrorOptions {
  details?: DetailInput;
  cause?: unknown;
}

export class PoolError extends Error {
  readonly code: PoolErrorCode;
  readonly details: ErrorDetails;

  constructor(code: PoolErrorCode, message: string, options: PoolErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PoolError';
    this.code = code;
    this.details = normalizeDetails(options.details);
  }
}

/** Deposit would push claimed shares past capacity plus buffer */
export class CapacityExceededError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('CAPACITY_EXCEEDED', message, options);
    this.name = 'CapacityExceededError';
  }
}

/** Not enough native capital (or shares) to cover the request and its obligations */
export class InsufficientBalanceError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('INSUFFICIENT_BALANCE', message, options);
    this.name = 'InsufficientBalanceError';
  }
}

/** Result or intermediate value left the uint256 range */
export class ArithmeticOverflowError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('ARITHMETIC_OVERFLOW', message, options);
    this.name = 'ArithmeticOverflowError';
  }
}

export class DivideByZeroError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('DIVIDE_BY_ZERO', message, options);
    this.name = 'DivideByZeroError';
  }
}

/** Accounting reached a state that correct share bookkeeping cannot produce */
export class InvariantViolationError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('INVARIANT_VIOLATION', message, options);
    this.name = 'InvariantViolationError';
  }
}

export class InvalidParameterError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('INVALID_PARAMETER', message, options);
    this.name = 'InvalidParameterError';
  }
}

export class InvalidAmountError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('INVALID_AMOUNT', message, options);
    this.name = 'InvalidAmountError';
  }
}

export class ReentrancyRejectedError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('REENTRANCY_REJECTED', message, options);
    this.name = 'ReentrancyRejectedError';
  }
}

export class UnauthorizedError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('UNAUTHORIZED', message, options);
    this.name = 'UnauthorizedError';
  }
}

export class PausedError extends PoolError {
  constructor(message: string, options?: PoolErrorOptions) {
    super('PAUSED', message, options);
    this.name = 'PausedError';
  }
}

/**
 * Type guard for pool errors, optionally narrowed to one code
 */
export function isPoolError(value: unknown, code?: PoolErrorCode): value is PoolError {
  return value instanceof PoolError && (code === undefined || value.code === code);
}
