/**
 * Access control, circuit breaker and volume control
 *
 * Pools opt into each feature; traders select a mode per call through the
 * protection word. When both are set the pluggable ProtectionPolicy
 * decides. The registry holds the storage a policy needs: per-pool
 * allow/deny lists and per-block volume counters. The default policy
 * admits every trade.
 */

import { MevProtectionError } from '../errors';
import type { Address, Checkpointable, PoolId, Rollback, TraderProtection } from '../types';

export type ProtectionFeature = 'accessControl' | 'circuitBreaker' | 'volumeControl';

export interface PoolProtectionConfig {
  accessControl: boolean;
  circuitBreaker: boolean;
  volumeControl: boolean;
}

export const NO_POOL_PROTECTION: PoolProtectionConfig = {
  accessControl: false,
  circuitBreaker: false,
  volumeControl: false,
};

export interface ProtectionRequest {
  poolId: PoolId;
  trader: Address;
  /** Trader-selected mode for the feature under evaluation */
  mode: number;
  amountIn: bigint;
  zeroForOne: boolean;
  blockNumber: number;
}

export interface ProtectionPolicy {
  /** false rejects the trade */
  evaluate(feature: ProtectionFeature, request: ProtectionRequest, registry: ProtectionRegistry): boolean;
}

export const PERMISSIVE_POLICY: ProtectionPolicy = {
  evaluate: () => true,
};

const REJECTION_CODES: Record<ProtectionFeature, string> = {
  accessControl: 'ACCESS_DENIED',
  circuitBreaker: 'CIRCUIT_BREAKER_TRIPPED',
  volumeControl: 'VOLUME_LIMIT_EXCEEDED',
};

const FEATURE_MODE: Record<ProtectionFeature, (protection: TraderProtection) => number> = {
  accessControl: (protection) => protection.accessControlMode,
  circuitBreaker: (protection) => protection.circuitBreakerMode,
  volumeControl: (protection) => protection.volumeControlMode,
};

const traderKey = (poolId: PoolId, trader: Address): string => `${poolId}:${trader.toLowerCase()}`;

export class ProtectionRegistry implements Checkpointable {
  private pools = new Map<PoolId, PoolProtectionConfig>();
  private allowed = new Set<string>();
  private denied = new Set<string>();
  private volumes = new Map<string, { blockNumber: number; amount: bigint }>();

  configurePool(poolId: PoolId, config: Partial<PoolProtectionConfig>): PoolProtectionConfig {
    const next = { ...this.poolConfig(poolId), ...config };
    this.pools.set(poolId, next);
    return next;
  }

  poolConfig(poolId: PoolId): PoolProtectionConfig {
    return this.pools.get(poolId) ?? NO_POOL_PROTECTION;
  }

  allow(poolId: PoolId, trader: Address): void {
    this.denied.delete(traderKey(poolId, trader));
    this.allowed.add(traderKey(poolId, trader));
  }

  deny(poolId: PoolId, trader: Address): void {
    this.allowed.delete(traderKey(poolId, trader));
    this.denied.add(traderKey(poolId, trader));
  }

  isAllowed(poolId: PoolId, trader: Address): boolean {
    return this.allowed.has(traderKey(poolId, trader));
  }

  isDenied(poolId: PoolId, trader: Address): boolean {
    return this.denied.has(traderKey(poolId, trader));
  }

  /** Input volume the trader moved through the pool in `blockNumber` */
  volumeAt(poolId: PoolId, trader: Address, blockNumber: number): bigint {
    const entry = this.volumes.get(traderKey(poolId, trader));
    return entry && entry.blockNumber === blockNumber ? entry.amount : 0n;
  }

  recordVolume(poolId: PoolId, trader: Address, blockNumber: number, amount: bigint): void {
    const key = traderKey(poolId, trader);
    this.volumes.set(key, {
      blockNumber,
      amount: this.volumeAt(poolId, trader, blockNumber) + amount,
    });
  }

  checkpoint(): Rollback {
    const pools = new Map(this.pools);
    const allowed = new Set(this.allowed);
    const denied = new Set(this.denied);
    const volumes = new Map(this.volumes);
    return () => {
      this.pools = pools;
      this.allowed = allowed;
      this.denied = denied;
      this.volumes = volumes;
    };
  }
}

/**
 * Applies the policy to every feature the pool opted into and the trader
 * selected a non-zero mode for.
 */
export class ProtectionGuard {
  constructor(
    private readonly registry: ProtectionRegistry,
    private policy: ProtectionPolicy = PERMISSIVE_POLICY
  ) {}

  setPolicy(policy: ProtectionPolicy): void {
    this.policy = policy;
  }

  enforce(protection: TraderProtection, request: Omit<ProtectionRequest, 'mode'>): void {
    const config = this.registry.poolConfig(request.poolId);
    const features: ProtectionFeature[] = ['accessControl', 'circuitBreaker', 'volumeControl'];

    for (const feature of features) {
      const mode = FEATURE_MODE[feature](protection);
      if (!config[feature] || mode === 0) continue;
      if (!this.policy.evaluate(feature, { ...request, mode }, this.registry)) {
        throw new MevProtectionError(
          `${feature} policy rejected trade by ${request.trader} in pool ${request.poolId}`,
          REJECTION_CODES[feature]
        );
      }
    }

    if (config.volumeControl) {
      this.registry.recordVolume(request.poolId, request.trader, request.blockNumber, request.amountIn);
    }
  }
}
