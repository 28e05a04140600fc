/**
 * Protocol Fee
 *
 * At each liquidity event the pool's value in asset-0 terms (2 * reserve0,
 * priced at the inventory ratio) is compared with the baseline stored at the
 * previous event. A share of the growth is taken from the reserves pro rata
 * and accrued per token for the treasury.
 */

import { BPS_PRECISION } from './utils';
import type { Address, Checkpointable, Rollback } from './types';

export interface ProtocolFeeCharge {
  fee0: bigint;
  fee1: bigint;
  profit: bigint;
}

export const NO_CHARGE: ProtocolFeeCharge = { fee0: 0n, fee1: 0n, profit: 0n };

/** Pool value in asset-0 terms */
export function poolValue(reserve0: bigint): bigint {
  return 2n * reserve0;
}

export function computeProtocolFee(
  reserve0: bigint,
  reserve1: bigint,
  baseline: bigint,
  feeBps: number
): ProtocolFeeCharge {
  const value = poolValue(reserve0);
  if (feeBps === 0 || baseline === 0n || value <= baseline) return NO_CHARGE;

  const profit = value - baseline;
  const feeValue = (profit * BigInt(feeBps)) / BPS_PRECISION;
  return {
    fee0: (reserve0 * feeValue) / value,
    fee1: (reserve1 * feeValue) / value,
    profit,
  };
}

export class ProtocolFeeLedger implements Checkpointable {
  private accrued = new Map<string, { token: Address; amount: bigint }>();

  accrue(token: Address, amount: bigint): void {
    if (amount === 0n) return;
    const key = token.toLowerCase();
    this.accrued.set(key, { token, amount: this.accruedFor(token) + amount });
  }

  accruedFor(token: Address): bigint {
    return this.accrued.get(token.toLowerCase())?.amount ?? 0n;
  }

  /** Zero and return the accrual for `token` */
  take(token: Address): bigint {
    const amount = this.accruedFor(token);
    this.accrued.delete(token.toLowerCase());
    return amount;
  }

  checkpoint(): Rollback {
    const accrued = new Map(this.accrued);
    return () => {
      this.accrued = accrued;
    };
  }
}
