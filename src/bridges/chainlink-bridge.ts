/**
 * Chainlink Feed Bridge
 * Converts an AggregatorV3 answer into a raw-unit price for the pool's pair
 */

import { Contract } from 'ethers';
import type { ContractRunner } from 'ethers';
import { PRECISION } from '../utils';
import { encodePricePayload } from './payload';
import { TokenMetadataCache } from './token-metadata';
import type { Address, DataBridge, HexBytes, QuoteParams } from '../types';

const AGGREGATOR_V3_ABI = [
  'function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)',
  'function decimals() external view returns (uint8)',
];

export interface ChainlinkFeedBridgeConfig {
  feed: Address;
  runner: ContractRunner;
  id?: string;
  /** The feed quotes asset1 in asset0 terms instead of asset0 in asset1 terms */
  invert?: boolean;
  tokens?: TokenMetadataCache;
}

export class ChainlinkFeedBridge implements DataBridge {
  readonly id: string;
  private readonly feed: Contract;
  private readonly invert: boolean;
  private readonly tokens: TokenMetadataCache;
  private feedDecimals?: number;

  constructor(config: ChainlinkFeedBridgeConfig) {
    this.id = config.id ?? `chainlink:${config.feed.toLowerCase()}`;
    this.feed = new Contract(config.feed, AGGREGATOR_V3_ABI, config.runner);
    this.invert = config.invert ?? false;
    this.tokens = config.tokens ?? new TokenMetadataCache(config.runner);
  }

  private async getFeedDecimals(): Promise<number> {
    if (this.feedDecimals === undefined) {
      this.feedDecimals = Number(await this.feed.decimals());
    }
    return this.feedDecimals;
  }

  async getData(params: QuoteParams): Promise<HexBytes> {
    const [feedDecimals, round, decimals0, decimals1] = await Promise.all([
      this.getFeedDecimals(),
      this.feed.latestRoundData(),
      this.tokens.getDecimals(params.asset0),
      this.tokens.getDecimals(params.asset1),
    ]);

    const answer = BigInt(round[1]);
    const updatedAt = Number(round[3]);
    if (answer <= 0n) {
      throw new Error(`Feed ${this.id} reported non-positive answer ${answer}`);
    }

    const feedScale = 10n ** BigInt(feedDecimals);
    const scale0 = 10n ** BigInt(decimals0);
    const scale1 = 10n ** BigInt(decimals1);
    const price1e18 = this.invert
      ? (feedScale * PRECISION * scale1) / (answer * scale0)
      : (answer * PRECISION * scale1) / (feedScale * scale0);

    return encodePricePayload({ price1e18, updatedAt });
  }
}
