/**
 * Inventory Ledger
 *
 * Per-pool reserves and liquidity-share accounting. Both reserves live in
 * one packed 256-bit slot (reserve0 in the low 128 bits, reserve1 in the
 * high 128 bits) and are always read and written together.
 *
 * The ledger records; it never clamps. Callers validate sufficiency first.
 */

import { ZeroAddress } from 'ethers';
import { LiquidityError } from './errors';
import { MAX_UINT128 } from './utils';
import type { Address, Checkpointable, PoolId, PoolState, Rollback } from './types';

/** Holder of the permanently locked shares */
export const LOCKED_SHARES_HOLDER: Address = ZeroAddress;

interface PoolSlot {
  /** reserve0 | reserve1 << 128 */
  packedReserves: bigint;
  totalLiquidityShares: bigint;
  protocolFeeBaseline: bigint;
}

const EMPTY_SLOT: PoolSlot = {
  packedReserves: 0n,
  totalLiquidityShares: 0n,
  protocolFeeBaseline: 0n,
};

export function packReserves(reserve0: bigint, reserve1: bigint): bigint {
  return (reserve1 << 128n) | reserve0;
}

export function unpackReserves(packed: bigint): [bigint, bigint] {
  return [packed & MAX_UINT128, packed >> 128n];
}

function checkReserve(poolId: PoolId, value: bigint, side: 0 | 1): void {
  if (value < 0n || value > MAX_UINT128) {
    throw new LiquidityError(
      `Reserve${side} of pool ${poolId} out of range: ${value}`,
      'RESERVE_OUT_OF_RANGE'
    );
  }
}

export class InventoryLedger implements Checkpointable {
  private pools = new Map<PoolId, PoolSlot>();
  private shares = new Map<PoolId, Map<string, bigint>>();

  has(poolId: PoolId): boolean {
    return this.pools.has(poolId);
  }

  /** Register an empty pool; existing pools are left untouched */
  initialize(poolId: PoolId): void {
    if (!this.pools.has(poolId)) {
      this.pools.set(poolId, { ...EMPTY_SLOT });
    }
  }

  getInventory(poolId: PoolId): [bigint, bigint] {
    return unpackReserves(this.slot(poolId).packedReserves);
  }

  getPoolState(poolId: PoolId): PoolState {
    const slot = this.slot(poolId);
    const [reserve0, reserve1] = unpackReserves(slot.packedReserves);
    return {
      reserve0,
      reserve1,
      totalLiquidityShares: slot.totalLiquidityShares,
      protocolFeeBaseline: slot.protocolFeeBaseline,
    };
  }

  /**
   * Apply signed deltas to both reserves in one write.
   */
  applyDelta(poolId: PoolId, delta0: bigint, delta1: bigint): void {
    const slot = this.slot(poolId);
    const [reserve0, reserve1] = unpackReserves(slot.packedReserves);
    const next0 = reserve0 + delta0;
    const next1 = reserve1 + delta1;
    checkReserve(poolId, next0, 0);
    checkReserve(poolId, next1, 1);
    this.pools.set(poolId, { ...slot, packedReserves: packReserves(next0, next1) });
  }

  setProtocolFeeBaseline(poolId: PoolId, baseline: bigint): void {
    const slot = this.slot(poolId);
    this.pools.set(poolId, { ...slot, protocolFeeBaseline: baseline });
  }

  totalShares(poolId: PoolId): bigint {
    return this.slot(poolId).totalLiquidityShares;
  }

  sharesOf(poolId: PoolId, holder: Address): bigint {
    return this.shares.get(poolId)?.get(holder.toLowerCase()) ?? 0n;
  }

  mintShares(poolId: PoolId, holder: Address, amount: bigint): void {
    const slot = this.slot(poolId);
    const balances = this.shares.get(poolId) ?? new Map<string, bigint>();
    const key = holder.toLowerCase();
    balances.set(key, (balances.get(key) ?? 0n) + amount);
    this.shares.set(poolId, balances);
    this.pools.set(poolId, {
      ...slot,
      totalLiquidityShares: slot.totalLiquidityShares + amount,
    });
  }

  burnShares(poolId: PoolId, holder: Address, amount: bigint): void {
    const slot = this.slot(poolId);
    const held = this.sharesOf(poolId, holder);
    if (amount > held) {
      throw new LiquidityError(
        `Holder ${holder} owns ${held} shares of pool ${poolId}, cannot burn ${amount}`,
        'INSUFFICIENT_SHARES'
      );
    }
    const balances = this.shares.get(poolId) ?? new Map<string, bigint>();
    balances.set(holder.toLowerCase(), held - amount);
    this.shares.set(poolId, balances);
    this.pools.set(poolId, {
      ...slot,
      totalLiquidityShares: slot.totalLiquidityShares - amount,
    });
  }

  checkpoint(): Rollback {
    const pools = new Map(this.pools);
    const shares = new Map(
      [...this.shares].map(([poolId, balances]) => [poolId, new Map(balances)] as const)
    );
    return () => {
      this.pools = pools;
      this.shares = shares;
    };
  }

  private slot(poolId: PoolId): PoolSlot {
    return this.pools.get(poolId) ?? EMPTY_SLOT;
  }
}
