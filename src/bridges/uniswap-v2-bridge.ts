/**
 * UniswapV2 Reserve Bridge
 * Publishes the spot price of a UniswapV2-style pair from its reserves
 */

import { Contract } from 'ethers';
import type { ContractRunner } from 'ethers';
import { PRECISION } from '../utils';
import { encodePricePayload } from './payload';
import type { Address, DataBridge, HexBytes, QuoteParams } from '../types';

const UNISWAP_V2_PAIR_ABI = [
  'function getReserves() external view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
  'function token0() external view returns (address)',
  'function token1() external view returns (address)',
];

export interface UniswapV2ReserveBridgeConfig {
  pair: Address;
  runner: ContractRunner;
  id?: string;
}

/**
 * Works with Uniswap V2, Sushiswap, and other constant product pairs.
 * The pair's own token order may be the reverse of the pool's.
 */
export class UniswapV2ReserveBridge implements DataBridge {
  readonly id: string;
  private readonly pair: Contract;
  private tokens?: [string, string];

  constructor(config: UniswapV2ReserveBridgeConfig) {
    this.id = config.id ?? `uniswap-v2:${config.pair.toLowerCase()}`;
    this.pair = new Contract(config.pair, UNISWAP_V2_PAIR_ABI, config.runner);
  }

  private async getPairTokens(): Promise<[string, string]> {
    if (this.tokens) return this.tokens;
    const [token0, token1] = await Promise.all([this.pair.token0(), this.pair.token1()]);
    this.tokens = [String(token0).toLowerCase(), String(token1).toLowerCase()];
    return this.tokens;
  }

  async getData(params: QuoteParams): Promise<HexBytes> {
    const [[pairToken0, pairToken1], reserves] = await Promise.all([
      this.getPairTokens(),
      this.pair.getReserves(),
    ]);

    const reserve0 = BigInt(reserves[0]);
    const reserve1 = BigInt(reserves[1]);
    const updatedAt = Number(reserves[2]);
    if (reserve0 === 0n || reserve1 === 0n) {
      throw new Error(`Pair ${this.id} has no reserves`);
    }

    const asset0 = params.asset0.toLowerCase();
    const asset1 = params.asset1.toLowerCase();
    if (pairToken0 === asset0 && pairToken1 === asset1) {
      return encodePricePayload({ price1e18: (reserve1 * PRECISION) / reserve0, updatedAt });
    }
    if (pairToken0 === asset1 && pairToken1 === asset0) {
      return encodePricePayload({ price1e18: (reserve0 * PRECISION) / reserve1, updatedAt });
    }
    throw new Error(`Pair ${this.id} does not trade ${params.asset0}/${params.asset1}`);
  }
}
