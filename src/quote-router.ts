/**
 * Quote Router
 *
 * Gathers bridge payloads for a pool's marking and hands them, with the
 * quote parameters, to the pool's pricing strategy.
 *
 * Bridges and strategies are untrusted: a bridge that throws or returns
 * nothing contributes EMPTY_BYTES, a strategy that throws or returns a
 * non-positive amount yields 0n ("no price").
 */

import { ConfigurationError, getErrorMessage } from './errors';
import { Logger } from './logger';
import { decodeMarking } from './marking';
import { BridgeRegistry, StrategyRegistry } from './registry';
import { encodeTraderContext } from './trader-context';
import { EMPTY_BYTES } from './types';
import type { FlashAccountingSession } from './flash-accounting';
import type {
  Address,
  BlockContext,
  DataBridge,
  HexBytes,
  MarkingFields,
  OperationContext,
  PoolId,
  PoolKey,
  PricingStrategy,
  QuoteParams,
  QuoteResult,
  RoutedPayload,
} from './types';

/**
 * Bridge responses for one logical call, memoized by bridge id and asset
 * pair. Bridges read pair-specific state, so hops over different pairs
 * never share an entry.
 */
export class BridgeCache {
  private readonly entries = new Map<string, Promise<HexBytes>>();
  private fetchCount = 0;

  /** Number of bridge calls actually made */
  get fetches(): number {
    return this.fetchCount;
  }

  static keyOf(bridgeId: string, asset0: Address, asset1: Address): string {
    return `${bridgeId}:${asset0.toLowerCase()}:${asset1.toLowerCase()}`;
  }

  has(bridgeId: string, asset0: Address, asset1: Address): boolean {
    return this.entries.has(BridgeCache.keyOf(bridgeId, asset0, asset1));
  }

  fetch(
    bridge: DataBridge,
    params: QuoteParams,
    onFailure: (bridge: DataBridge, reason: string) => void
  ): Promise<HexBytes> {
    const key = BridgeCache.keyOf(bridge.id, params.asset0, params.asset1);
    const cached = this.entries.get(key);
    if (cached) return cached;

    this.fetchCount++;
    const pending = (async (): Promise<HexBytes> => {
      try {
        const data = await bridge.getData(params);
        if (typeof data !== 'string' || data === '' || data === EMPTY_BYTES) {
          onFailure(bridge, 'empty response');
          return EMPTY_BYTES;
        }
        return data;
      } catch (error) {
        onFailure(bridge, getErrorMessage(error));
        return EMPTY_BYTES;
      }
    })();
    this.entries.set(key, pending);
    return pending;
  }
}

export interface QuoteRequest {
  key: PoolKey;
  poolId: PoolId;
  amount: bigint;
  zeroForOne: boolean;
  /** User the trader-context payload describes */
  beneficiary: Address;
}

function sanitizeAmount(value: unknown): bigint {
  return typeof value === 'bigint' && value > 0n ? value : 0n;
}

export class QuoteRouter {
  constructor(
    private readonly bridges: BridgeRegistry,
    private readonly strategies: StrategyRegistry,
    private readonly block: BlockContext,
    private readonly sessions: FlashAccountingSession,
    private readonly logger: Logger
  ) {}

  /**
   * Quote one pool at the given reserves.
   */
  async getQuote(
    request: QuoteRequest,
    reserve0: bigint,
    reserve1: bigint,
    cache: BridgeCache = new BridgeCache(),
    ctx: OperationContext = this.logger.startOperation('quo')
  ): Promise<QuoteResult> {
    const strategy = this.strategies.require(request.key.strategy);
    const marking = decodeMarking(request.key.marking);
    const params = this.toQuoteParams(request, marking, reserve0, reserve1);
    const payload = await this.buildPayload(params, marking, request.beneficiary, cache, ctx);

    const amountOut = await this.callStrategy(strategy, ctx, request.poolId, () =>
      strategy.quote(params, payload)
    );

    this.logger.debug(ctx, 'QUOTE', 'Strategy quoted', {
      pool_id: request.poolId,
      strategy: strategy.name,
      amount_in: params.amount,
      amount_out: amountOut,
      bridge_fetches: cache.fetches,
    });
    return { amountOut, poolId: request.poolId };
  }

  /**
   * Quote several markings of one asset pair and strategy with a shared cache.
   */
  async getQuoteBatch(
    requests: QuoteRequest[],
    reserves: Array<[bigint, bigint]>,
    cache: BridgeCache = new BridgeCache(),
    ctx: OperationContext = this.logger.startOperation('quo')
  ): Promise<QuoteResult[]> {
    if (requests.length === 0) return [];
    if (requests.length !== reserves.length) {
      throw new ConfigurationError('One reserve pair required per quote request', 'INVALID_PARAMETER');
    }

    const [first] = requests;
    const samePair = requests.every(
      (request) =>
        request.key.asset0 === first.key.asset0 &&
        request.key.asset1 === first.key.asset1 &&
        request.key.strategy.toLowerCase() === first.key.strategy.toLowerCase()
    );
    if (!samePair) {
      throw new ConfigurationError('Batch quotes must share asset pair and strategy', 'INVALID_PARAMETER');
    }

    const strategy = this.strategies.require(first.key.strategy);
    const params: QuoteParams[] = [];
    const payloads: RoutedPayload[] = [];
    for (const [index, request] of requests.entries()) {
      const marking = decodeMarking(request.key.marking);
      const [reserve0, reserve1] = reserves[index];
      const quoteParams = this.toQuoteParams(request, marking, reserve0, reserve1);
      params.push(quoteParams);
      payloads.push(await this.buildPayload(quoteParams, marking, request.beneficiary, cache, ctx));
    }

    let amounts: bigint[];
    const batchQuote = strategy.quoteBatch?.bind(strategy);
    if (batchQuote) {
      try {
        const raw = await batchQuote(params, payloads);
        amounts = requests.map((_, index) => sanitizeAmount(raw[index]));
      } catch (error) {
        this.logger.warn(ctx, 'STRATEGY_FAILURE', 'Batch quote failed; treating as no price', {
          strategy: strategy.name,
          error: getErrorMessage(error),
        });
        amounts = requests.map(() => 0n);
      }
    } else {
      amounts = [];
      for (const [index, request] of requests.entries()) {
        amounts.push(
          await this.callStrategy(strategy, ctx, request.poolId, () =>
            strategy.quote(params[index], payloads[index])
          )
        );
      }
    }

    return requests.map((request, index) => ({ amountOut: amounts[index], poolId: request.poolId }));
  }

  /**
   * Decode-driven payload assembly: up to four default bridges, the extra
   * slot, then the trader context when the enhanced-context bit is set.
   */
  async buildPayload(
    params: QuoteParams,
    marking: MarkingFields,
    beneficiary: Address,
    cache: BridgeCache,
    ctx: OperationContext
  ): Promise<RoutedPayload> {
    const onFailure = (bridge: DataBridge, reason: string): void => {
      this.logger.warn(ctx, 'BRIDGE_NO_DATA', 'Bridge returned no data', {
        bridge: bridge.id,
        reason,
      });
    };
    const read = (bridge: DataBridge | undefined): Promise<HexBytes> =>
      bridge ? cache.fetch(bridge, params, onFailure) : Promise.resolve(EMPTY_BYTES);

    const [d0, d1, d2, d3, extra] = await Promise.all([
      marking.bridgeFlags[0] ? read(this.bridges.defaultBridge(0)) : Promise.resolve(EMPTY_BYTES),
      marking.bridgeFlags[1] ? read(this.bridges.defaultBridge(1)) : Promise.resolve(EMPTY_BYTES),
      marking.bridgeFlags[2] ? read(this.bridges.defaultBridge(2)) : Promise.resolve(EMPTY_BYTES),
      marking.bridgeFlags[3] ? read(this.bridges.defaultBridge(3)) : Promise.resolve(EMPTY_BYTES),
      read(this.bridges.bridgeForSlot(marking.extraSlot)),
    ]);

    const context = marking.enhancedContext
      ? encodeTraderContext({
          timestamp: this.block.getTimestamp(),
          blockNumber: this.block.getBlockNumber(),
          gasPrice: this.block.getGasPrice(),
          sessionActive: this.sessions.isSessionActive(beneficiary),
        })
      : EMPTY_BYTES;

    return { marking, defaults: [d0, d1, d2, d3], extra, context };
  }

  private toQuoteParams(
    request: QuoteRequest,
    marking: MarkingFields,
    reserve0: bigint,
    reserve1: bigint
  ): QuoteParams {
    return {
      asset0: request.key.asset0,
      asset1: request.key.asset1,
      strategy: request.key.strategy,
      amount: request.amount,
      asset0Balance: reserve0,
      asset1Balance: reserve1,
      bucketId: marking.bucketId,
      zeroForOne: request.zeroForOne,
    };
  }

  private async callStrategy(
    strategy: PricingStrategy,
    ctx: OperationContext,
    poolId: PoolId,
    call: () => Promise<bigint>
  ): Promise<bigint> {
    try {
      return sanitizeAmount(await call());
    } catch (error) {
      this.logger.warn(ctx, 'STRATEGY_FAILURE', 'Strategy failed; treating as no price', {
        pool_id: poolId,
        strategy: strategy.name,
        error: getErrorMessage(error),
      });
      return 0n;
    }
  }
}
