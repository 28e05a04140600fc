/**
 * Error taxonomy
 *
 * Every failure is synchronous and non-retryable; the enclosing transaction
 * is rolled back before the error reaches the caller.
 */

export class AmmError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'AmmError';
    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed assets, unknown strategies, degenerate initial amounts */
export class ConfigurationError extends AmmError {
  constructor(message: string, code = 'INVALID_CONFIGURATION') {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}

export class QuoteUnavailableError extends AmmError {
  constructor(public readonly poolId: string) {
    super(`No quote available for pool ${poolId}`, 'QUOTE_UNAVAILABLE');
    this.name = 'QuoteUnavailableError';
  }
}

export class SlippageViolationError extends AmmError {
  constructor(
    public readonly amountOut: bigint,
    public readonly minAmountOut: bigint
  ) {
    super(`Output ${amountOut} below minimum ${minAmountOut}`, 'SLIPPAGE_VIOLATION');
    this.name = 'SlippageViolationError';
  }
}

/** No liquidity, zero-rounding withdrawals, reserve shortfalls */
export class LiquidityError extends AmmError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = 'LiquidityError';
  }
}

/** Nested session starts, unsettled deltas */
export class SessionError extends AmmError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = 'SessionError';
  }
}

/** Bad or expired commitments, nonce mismatches, execution outside a permitted window */
export class MevProtectionError extends AmmError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = 'MevProtectionError';
  }
}

export class ReentrancyError extends AmmError {
  constructor(public readonly resource: string) {
    super(`Reentrant call into ${resource}`, 'REENTRANT_CALL');
    this.name = 'ReentrancyError';
  }
}

export class InsufficientBalanceError extends AmmError {
  constructor(
    public readonly token: string,
    public readonly account: string,
    public readonly required: bigint,
    public readonly available: bigint
  ) {
    super(
      `Account ${account} holds ${available} of ${token}, needs ${required}`,
      'INSUFFICIENT_BALANCE'
    );
    this.name = 'InsufficientBalanceError';
  }
}

/** Extract a message from an unknown thrown value */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
