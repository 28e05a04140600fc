/**
 * Utility Functions
 * Integer math for reserves, shares and quotes
 *
 * IMPORTANT: All amounts are bigints. Never use Number() on token amounts.
 */

// Precision constants for fixed-point math - exported for use in other modules
export const PRECISION = 10n ** 18n; // 18 decimal precision for prices
export const BPS_PRECISION = 10000n; // Basis points precision
export const MAX_UINT128 = (1n << 128n) - 1n;

/** floor(a * b / denominator) */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('mulDiv by zero');
  }
  return (a * b) / denominator;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Integer square root (floor), Newton iteration
 */
export function sqrtBigInt(value: bigint): bigint {
  if (value < 0n) {
    throw new RangeError('Square root of negative value');
  }
  if (value < 2n) return value;

  let x = value;
  let y = (x + 1n) >> 1n;
  while (y < x) {
    x = y;
    y = (x + value / x) >> 1n;
  }
  return x;
}

/**
 * Check if data published at `dataTimestamp` is older than `maxAgeSec` at `now`
 */
export function isDataStale(
  dataTimestamp: number,
  maxAgeSec: number,
  now: number = Math.floor(Date.now() / 1000)
): boolean {
  return now - dataTimestamp > maxAgeSec;
}

/**
 * Calculate UniswapV2-style constant product output
 * amountOut = (amountIn * (10000 - fee) * reserveOut) / (reserveIn * 10000 + amountIn * (10000 - fee))
 */
export function getAmountOutConstantProduct(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: number = 30
): bigint {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) {
    return 0n;
  }

  const feeMultiplier = BPS_PRECISION - BigInt(feeBps);
  const amountInWithFee = amountIn * feeMultiplier;
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * BPS_PRECISION + amountInWithFee;

  return numerator / denominator;
}
