/**
 * Pool Directory
 * Keys and statistics of every created pool, by pool id
 */

import type { Checkpointable, PoolId, PoolKey, PoolStatistics, Rollback } from './types';

interface PoolRecord {
  key: PoolKey;
  stats: PoolStatistics;
}

export class PoolDirectory implements Checkpointable {
  private pools = new Map<PoolId, PoolRecord>();

  has(poolId: PoolId): boolean {
    return this.pools.has(poolId);
  }

  register(poolId: PoolId, key: PoolKey, blockNumber: number): void {
    this.pools.set(poolId, {
      key,
      stats: { swapCount: 0, volume0: 0n, volume1: 0n, createdAtBlock: blockNumber },
    });
  }

  getKey(poolId: PoolId): PoolKey | undefined {
    return this.pools.get(poolId)?.key;
  }

  getStatistics(poolId: PoolId): PoolStatistics | undefined {
    const record = this.pools.get(poolId);
    return record ? { ...record.stats } : undefined;
  }

  poolIds(): PoolId[] {
    return [...this.pools.keys()];
  }

  recordSwap(poolId: PoolId, volume0: bigint, volume1: bigint): void {
    const record = this.pools.get(poolId);
    if (!record) return;
    this.pools.set(poolId, {
      key: record.key,
      stats: {
        ...record.stats,
        swapCount: record.stats.swapCount + 1,
        volume0: record.stats.volume0 + volume0,
        volume1: record.stats.volume1 + volume1,
      },
    });
  }

  checkpoint(): Rollback {
    const pools = new Map(this.pools);
    return () => {
      this.pools = pools;
    };
  }
}
