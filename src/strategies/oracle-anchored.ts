/**
 * Oracle Anchored Strategy
 *
 * Prices against the first usable bridge payload (default bridges 0..3,
 * then the extra slot) and subtracts a spread taken from the bucket id,
 * in basis points. Returns 0 ("no price") when no bridge has data, the
 * data is stale relative to the trader-context timestamp, or the output
 * would drain the pool's reserve.
 */

import { decodePricePayload } from '../bridges/payload';
import { decodeTraderContext } from '../trader-context';
import { BPS_PRECISION, PRECISION, isDataStale } from '../utils';
import type { PricePayload } from '../bridges/payload';
import type { PricingStrategy, QuoteParams, RoutedPayload } from '../types';

export interface OracleAnchoredStrategyConfig {
  /** Maximum age of bridge data, in seconds */
  maxStalenessSec?: number;
}

export class OracleAnchoredStrategy implements PricingStrategy {
  readonly name = 'oracle-anchored';
  private readonly maxStalenessSec: number;

  constructor(config: OracleAnchoredStrategyConfig = {}) {
    this.maxStalenessSec = config.maxStalenessSec ?? 3600; // 1 hour max staleness
  }

  private selectPrice(payload: RoutedPayload): PricePayload | null {
    for (const data of [...payload.defaults, payload.extra]) {
      const price = decodePricePayload(data);
      if (price) return price;
    }
    return null;
  }

  async quote(params: QuoteParams, payload: RoutedPayload): Promise<bigint> {
    if (params.amount <= 0n) return 0n;

    const price = this.selectPrice(payload);
    if (!price) return 0n;

    // Without a trader context there is no block time to judge staleness against
    const context = decodeTraderContext(payload.context);
    if (context && isDataStale(price.updatedAt, this.maxStalenessSec, context.timestamp)) {
      return 0n;
    }

    const spreadBps = BigInt(params.bucketId);
    if (spreadBps >= BPS_PRECISION) return 0n;

    const gross = params.zeroForOne
      ? (params.amount * price.price1e18) / PRECISION
      : (params.amount * PRECISION) / price.price1e18;
    const amountOut = (gross * (BPS_PRECISION - spreadBps)) / BPS_PRECISION;

    const reserveOut = params.zeroForOne ? params.asset1Balance : params.asset0Balance;
    return amountOut >= reserveOut ? 0n : amountOut;
  }

  async quoteBatch(params: QuoteParams[], payloads: RoutedPayload[]): Promise<bigint[]> {
    return Promise.all(params.map((entry, index) => this.quote(entry, payloads[index])));
  }
}
