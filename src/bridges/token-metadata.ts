import { Contract } from 'ethers';
import type { ContractRunner } from 'ethers';
import { NATIVE_TOKEN } from '../flash-accounting';
import type { Address } from '../types';

const ERC20_ABI = ['function decimals() external view returns (uint8)'];

const NATIVE_DECIMALS = 18;

/**
 * ERC-20 decimals lookup with caching
 */
export class TokenMetadataCache {
  private readonly decimalsCache = new Map<string, number>();

  constructor(private readonly runner: ContractRunner) {}

  async getDecimals(token: Address): Promise<number> {
    const key = token.toLowerCase();
    if (key === NATIVE_TOKEN.toLowerCase()) return NATIVE_DECIMALS;

    const cached = this.decimalsCache.get(key);
    if (cached !== undefined) return cached;

    const contract = new Contract(token, ERC20_ABI, this.runner);
    const decimals = Number(await contract.decimals());
    this.decimalsCache.set(key, decimals);
    return decimals;
  }
}
