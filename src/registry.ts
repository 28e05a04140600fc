/**
 * Component registries
 * Handle → implementation lookup for data bridges and pricing strategies
 */

import { ConfigurationError } from './errors';
import { CONSOLIDATED_SLOT, NO_EXTRA_SLOT } from './marking';
import { addressSchema, parseParam } from './validation';
import type { Address, DataBridge, PricingStrategy } from './types';

export const DEFAULT_BRIDGE_COUNT = 4;
export const FIRST_EXTRA_SLOT = 1;
export const LAST_EXTRA_SLOT = 14;

export class BridgeRegistry {
  private readonly defaults: Array<DataBridge | undefined> = new Array(DEFAULT_BRIDGE_COUNT).fill(undefined);
  private readonly extras = new Map<number, DataBridge>();
  private consolidated?: DataBridge;

  constructor(defaults: Array<DataBridge | undefined> = []) {
    if (defaults.length > DEFAULT_BRIDGE_COUNT) {
      throw new ConfigurationError(
        `At most ${DEFAULT_BRIDGE_COUNT} default bridges, got ${defaults.length}`,
        'INVALID_BRIDGE_SLOT'
      );
    }
    defaults.forEach((bridge, index) => {
      this.defaults[index] = bridge;
    });
  }

  setDefaultBridge(index: number, bridge: DataBridge | undefined): void {
    if (!Number.isInteger(index) || index < 0 || index >= DEFAULT_BRIDGE_COUNT) {
      throw new ConfigurationError(`Default bridge index ${index} out of range`, 'INVALID_BRIDGE_SLOT');
    }
    this.defaults[index] = bridge;
  }

  setExtraBridge(slot: number, bridge: DataBridge | undefined): void {
    if (!Number.isInteger(slot) || slot < FIRST_EXTRA_SLOT || slot > LAST_EXTRA_SLOT) {
      throw new ConfigurationError(
        `Extra bridge slot ${slot} outside ${FIRST_EXTRA_SLOT}..${LAST_EXTRA_SLOT}`,
        'INVALID_BRIDGE_SLOT'
      );
    }
    if (bridge) {
      this.extras.set(slot, bridge);
    } else {
      this.extras.delete(slot);
    }
  }

  setConsolidatedBridge(bridge: DataBridge | undefined): void {
    this.consolidated = bridge;
  }

  defaultBridge(index: number): DataBridge | undefined {
    return this.defaults[index];
  }

  /** Bridge behind a marking's extra slot; slot 0 and unset slots have none */
  bridgeForSlot(slot: number): DataBridge | undefined {
    if (slot === NO_EXTRA_SLOT) return undefined;
    if (slot === CONSOLIDATED_SLOT) return this.consolidated;
    return this.extras.get(slot);
  }
}

export class StrategyRegistry {
  private readonly strategies = new Map<string, PricingStrategy>();

  register(handle: Address, strategy: PricingStrategy): Address {
    const checksummed = parseParam(addressSchema, handle, 'strategy handle');
    this.strategies.set(checksummed.toLowerCase(), strategy);
    return checksummed;
  }

  unregister(handle: Address): boolean {
    return this.strategies.delete(handle.toLowerCase());
  }

  has(handle: Address): boolean {
    return this.strategies.has(handle.toLowerCase());
  }

  get(handle: Address): PricingStrategy | undefined {
    return this.strategies.get(handle.toLowerCase());
  }

  /** Lookup that fails for unknown handles */
  require(handle: Address): PricingStrategy {
    const strategy = this.get(handle);
    if (!strategy) {
      throw new ConfigurationError(`No strategy registered for ${handle}`, 'UNKNOWN_STRATEGY');
    }
    return strategy;
  }
}
