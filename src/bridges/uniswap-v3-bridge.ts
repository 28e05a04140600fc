/**
 * UniswapV3 Spot Bridge
 * Publishes the current sqrtPriceX96 spot price of a concentrated liquidity pool
 */

import { Contract } from 'ethers';
import type { ContractRunner } from 'ethers';
import { PRECISION } from '../utils';
import { encodePricePayload } from './payload';
import type { Address, BlockContext, DataBridge, HexBytes, QuoteParams } from '../types';

const UNISWAP_V3_POOL_ABI = [
  'function slot0() external view returns (uint160 sqrtPriceX96, int24 tick, uint16 observationIndex, uint16 observationCardinality, uint16 observationCardinalityNext, uint8 feeProtocol, bool unlocked)',
  'function token0() external view returns (address)',
  'function token1() external view returns (address)',
];

// price = sqrtPriceX96^2 / 2^192
const Q192_SHIFT = 192n;

export interface UniswapV3SpotBridgeConfig {
  pool: Address;
  runner: ContractRunner;
  id?: string;
  /** Source of the published timestamp; wall clock when omitted */
  clock?: BlockContext;
}

export class UniswapV3SpotBridge implements DataBridge {
  readonly id: string;
  private readonly pool: Contract;
  private readonly clock?: BlockContext;
  private tokens?: [string, string];

  constructor(config: UniswapV3SpotBridgeConfig) {
    this.id = config.id ?? `uniswap-v3:${config.pool.toLowerCase()}`;
    this.pool = new Contract(config.pool, UNISWAP_V3_POOL_ABI, config.runner);
    this.clock = config.clock;
  }

  private async getPoolTokens(): Promise<[string, string]> {
    if (this.tokens) return this.tokens;
    const [token0, token1] = await Promise.all([this.pool.token0(), this.pool.token1()]);
    this.tokens = [String(token0).toLowerCase(), String(token1).toLowerCase()];
    return this.tokens;
  }

  async getData(params: QuoteParams): Promise<HexBytes> {
    const [[poolToken0, poolToken1], slot0] = await Promise.all([
      this.getPoolTokens(),
      this.pool.slot0(),
    ]);

    const sqrtPriceX96 = BigInt(slot0[0]);
    const price1Per0 = (sqrtPriceX96 * sqrtPriceX96 * PRECISION) >> Q192_SHIFT;
    if (price1Per0 === 0n) {
      throw new Error(`Pool ${this.id} price rounds to zero`);
    }
    const updatedAt = this.clock?.getTimestamp() ?? Math.floor(Date.now() / 1000);

    const asset0 = params.asset0.toLowerCase();
    const asset1 = params.asset1.toLowerCase();
    if (poolToken0 === asset0 && poolToken1 === asset1) {
      return encodePricePayload({ price1e18: price1Per0, updatedAt });
    }
    if (poolToken0 === asset1 && poolToken1 === asset0) {
      return encodePricePayload({ price1e18: (PRECISION * PRECISION) / price1Per0, updatedAt });
    }
    throw new Error(`Pool ${this.id} does not trade ${params.asset0}/${params.asset1}`);
  }
}
