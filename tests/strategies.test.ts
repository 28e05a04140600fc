/**
 * Pricing Strategy Tests
 */

import { ConstantProductStrategy, OracleAnchoredStrategy } from '../src/strategies';
import { encodePricePayload } from '../src/bridges';
import { decodeMarking } from '../src/marking';
import { encodeTraderContext } from '../src/trader-context';
import { EMPTY_BYTES } from '../src/types';
import type { HexBytes, QuoteParams, RoutedPayload } from '../src/types';
import { CONSTANT_PRODUCT, E, USDC, WETH } from './fixtures';

function params(overrides: Partial<QuoteParams>): QuoteParams {
  return {
    asset0: WETH,
    asset1: USDC,
    strategy: CONSTANT_PRODUCT,
    amount: 0n,
    asset0Balance: 0n,
    asset1Balance: 0n,
    bucketId: 0,
    zeroForOne: true,
    ...overrides,
  };
}

function payload(
  defaults: [HexBytes, HexBytes, HexBytes, HexBytes] = [EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES],
  extra: HexBytes = EMPTY_BYTES,
  context: HexBytes = EMPTY_BYTES
): RoutedPayload {
  return { marking: decodeMarking(0), defaults, extra, context };
}

const contextAt = (timestamp: number): HexBytes =>
  encodeTraderContext({ timestamp, blockNumber: 1, gasPrice: 1n, sessionActive: false });

describe('ConstantProductStrategy', () => {
  it('should quote with the default 30 bps fee', async () => {
    const strategy = new ConstantProductStrategy();
    const amount = await strategy.quote(
      params({ amount: 1000n, asset0Balance: 10000n, asset1Balance: 10000n })
    );
    expect(amount).toBe(906n);
  });

  it('should apply per-bucket fee overrides', async () => {
    const strategy = new ConstantProductStrategy({ bucketFees: { 7: 0 } });
    const quoted = await strategy.quote(
      params({ amount: 1000n, asset0Balance: 10000n, asset1Balance: 10000n, bucketId: 7 })
    );
    expect(quoted).toBe(909n);
    expect(strategy.feeForBucket(7)).toBe(0);
    expect(strategy.feeForBucket(8)).toBe(30);
  });

  it('should use asset1 as input when swapping one for zero', async () => {
    const strategy = new ConstantProductStrategy({ feeBps: 0 });
    const amount = await strategy.quote(
      params({ amount: 1000n, asset0Balance: 10000n, asset1Balance: 20000n, zeroForOne: false })
    );
    expect(amount).toBe(476n);
  });

  it('should quote batches element-wise', async () => {
    const strategy = new ConstantProductStrategy({ feeBps: 0 });
    const amounts = await strategy.quoteBatch([
      params({ amount: 100n, asset0Balance: 1000n, asset1Balance: 1000n }),
      params({ amount: 1000n, asset0Balance: 10000n, asset1Balance: 10000n }),
    ]);
    expect(amounts).toEqual([90n, 909n]);
  });

  it('should reject fees outside [0, 10000)', () => {
    expect(() => new ConstantProductStrategy({ feeBps: 10000 })).toThrow(RangeError);
    expect(() => new ConstantProductStrategy({ bucketFees: { 1: -1 } })).toThrow(RangeError);
  });
});

describe('OracleAnchoredStrategy', () => {
  const price = encodePricePayload({ price1e18: 2000n * E, updatedAt: 9_000 });
  const deep = { asset0Balance: 1000n * E, asset1Balance: 10_000_000n * E };

  it('should convert asset0 to asset1 at the bridge price', async () => {
    const strategy = new OracleAnchoredStrategy();
    const amount = await strategy.quote(
      params({ amount: E, ...deep }),
      payload([price, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES])
    );
    expect(amount).toBe(2000n * E);
  });

  it('should convert asset1 to asset0 at the inverse price', async () => {
    const strategy = new OracleAnchoredStrategy();
    const amount = await strategy.quote(
      params({ amount: 2000n * E, zeroForOne: false, ...deep }),
      payload([price, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES])
    );
    expect(amount).toBe(E);
  });

  it('should subtract the bucket spread in basis points', async () => {
    const strategy = new OracleAnchoredStrategy();
    const amount = await strategy.quote(
      params({ amount: E, bucketId: 30, ...deep }),
      payload([price, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES])
    );
    expect(amount).toBe(1994n * E);
  });

  it('should skip unusable payloads and fall back to the extra slot', async () => {
    const strategy = new OracleAnchoredStrategy();
    const amount = await strategy.quote(
      params({ amount: E, ...deep }),
      payload(['0x1234', EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES], price)
    );
    expect(amount).toBe(2000n * E);
  });

  it('should return zero without any price', async () => {
    const strategy = new OracleAnchoredStrategy();
    expect(await strategy.quote(params({ amount: E, ...deep }), payload())).toBe(0n);
  });

  it('should return zero for stale data', async () => {
    const strategy = new OracleAnchoredStrategy({ maxStalenessSec: 3600 });
    const stale = encodePricePayload({ price1e18: 2000n * E, updatedAt: 1_000 });
    const amount = await strategy.quote(
      params({ amount: E, ...deep }),
      payload([stale, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES], EMPTY_BYTES, contextAt(10_000))
    );
    expect(amount).toBe(0n);
  });

  it('should accept data within the staleness limit', async () => {
    const strategy = new OracleAnchoredStrategy({ maxStalenessSec: 3600 });
    const amount = await strategy.quote(
      params({ amount: E, ...deep }),
      payload([price, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES], EMPTY_BYTES, contextAt(10_000))
    );
    expect(amount).toBe(2000n * E);
  });

  it('should refuse to drain the output reserve', async () => {
    const strategy = new OracleAnchoredStrategy();
    const amount = await strategy.quote(
      params({ amount: E, asset0Balance: E, asset1Balance: 1000n * E }),
      payload([price, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES])
    );
    expect(amount).toBe(0n);
  });

  it('should return zero for a spread of 100% or more', async () => {
    const strategy = new OracleAnchoredStrategy();
    const amount = await strategy.quote(
      params({ amount: E, bucketId: 10000, ...deep }),
      payload([price, EMPTY_BYTES, EMPTY_BYTES, EMPTY_BYTES])
    );
    expect(amount).toBe(0n);
  });
});
