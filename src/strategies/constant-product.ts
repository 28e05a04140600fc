/**
 * Constant Product Strategy
 * x * y = k pricing against the pool's own inventory; bridge payloads are ignored
 */

import { getAmountOutConstantProduct } from '../utils';
import type { PricingStrategy, QuoteParams } from '../types';

export interface ConstantProductStrategyConfig {
  /** Fee charged on the input amount */
  feeBps?: number;
  /** Fee overrides keyed by bucket id */
  bucketFees?: Record<number, number>;
}

export class ConstantProductStrategy implements PricingStrategy {
  readonly name = 'constant-product';
  private readonly feeBps: number;
  private readonly bucketFees: Map<number, number>;

  constructor(config: ConstantProductStrategyConfig = {}) {
    this.feeBps = config.feeBps ?? 30; // 0.3% default fee
    this.bucketFees = new Map(
      Object.entries(config.bucketFees ?? {}).map(([bucket, fee]) => [Number(bucket), fee])
    );
    for (const fee of [this.feeBps, ...this.bucketFees.values()]) {
      if (!Number.isInteger(fee) || fee < 0 || fee >= 10000) {
        throw new RangeError(`Fee must be an integer in [0, 10000) bps, got ${fee}`);
      }
    }
  }

  feeForBucket(bucketId: number): number {
    return this.bucketFees.get(bucketId) ?? this.feeBps;
  }

  async quote(params: QuoteParams): Promise<bigint> {
    const reserveIn = params.zeroForOne ? params.asset0Balance : params.asset1Balance;
    const reserveOut = params.zeroForOne ? params.asset1Balance : params.asset0Balance;
    return getAmountOutConstantProduct(
      params.amount,
      reserveIn,
      reserveOut,
      this.feeForBucket(params.bucketId)
    );
  }

  async quoteBatch(params: QuoteParams[]): Promise<bigint[]> {
    return Promise.all(params.map((entry) => this.quote(entry)));
  }
}
