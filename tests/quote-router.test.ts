/**
 * Quote Router Tests
 */

import { ZeroAddress } from 'ethers';
import { QuoteRouter, BridgeCache } from '../src/quote-router';
import type { QuoteRequest } from '../src/quote-router';
import { BridgeRegistry, StrategyRegistry } from '../src/registry';
import { ManualBlockContext } from '../src/block-context';
import { FlashAccountingSession } from '../src/flash-accounting';
import { StaticDataBridge } from '../src/bridges';
import { decodeTraderContext } from '../src/trader-context';
import { derivePoolId, toPoolKey } from '../src/pool-identity';
import { EMPTY_BYTES } from '../src/types';
import type { DataBridge, PricingStrategy, QuoteParams, RoutedPayload } from '../src/types';
import { ALICE, CONSTANT_PRODUCT, DAI, USDC, WETH, captureLogs } from './fixtures';
import type { LogCapture } from './fixtures';

class RecordingStrategy implements PricingStrategy {
  readonly name = 'recording';
  readonly payloads: RoutedPayload[] = [];
  readonly params: QuoteParams[] = [];

  constructor(private readonly result: () => Promise<bigint> = async () => 42n) {}

  async quote(params: QuoteParams, payload: RoutedPayload): Promise<bigint> {
    this.params.push(params);
    this.payloads.push(payload);
    return this.result();
  }
}

class FailingBridge implements DataBridge {
  readonly id = 'failing';

  async getData(): Promise<string> {
    throw new Error('feed offline');
  }
}

function request(marking: number, assetB = USDC): QuoteRequest {
  const key = toPoolKey(WETH, assetB, CONSTANT_PRODUCT, marking);
  return { key, poolId: derivePoolId(key), amount: 1000n, zeroForOne: true, beneficiary: ALICE };
}

describe('QuoteRouter', () => {
  let bridges: BridgeRegistry;
  let strategies: StrategyRegistry;
  let sessions: FlashAccountingSession;
  let strategy: RecordingStrategy;
  let logs: LogCapture;
  let router: QuoteRouter;

  beforeEach(() => {
    bridges = new BridgeRegistry();
    strategies = new StrategyRegistry();
    sessions = new FlashAccountingSession();
    strategy = new RecordingStrategy();
    strategies.register(CONSTANT_PRODUCT, strategy);
    const block = new ManualBlockContext({ blockNumber: 100, timestamp: 1_700_000_000, gasPrice: 7n });
    const captured = captureLogs();
    logs = captured.capture;
    router = new QuoteRouter(bridges, strategies, block, sessions, captured.logger.child('quote-router'));
  });

  describe('payload assembly', () => {
    it('should fill only the flagged default bridges', async () => {
      const one = new StaticDataBridge('one', '0x01');
      const two = new StaticDataBridge('two', '0x02');
      const three = new StaticDataBridge('three', '0x03');
      bridges.setDefaultBridge(1, one);
      bridges.setDefaultBridge(2, two);
      bridges.setDefaultBridge(3, three);

      await router.getQuote(request(0b0110), 10n, 20n);

      expect(strategy.payloads[0].defaults).toEqual([EMPTY_BYTES, '0x01', '0x02', EMPTY_BYTES]);
      expect(strategy.payloads[0].extra).toBe(EMPTY_BYTES);
      expect(strategy.payloads[0].context).toBe(EMPTY_BYTES);
      expect(three.callCount).toBe(0);
    });

    it('should pass reserves, bucket and direction to the strategy', async () => {
      await router.getQuote(request(7 << 4), 10n, 20n);

      expect(strategy.params[0]).toEqual({
        asset0: WETH,
        asset1: USDC,
        strategy: CONSTANT_PRODUCT,
        amount: 1000n,
        asset0Balance: 10n,
        asset1Balance: 20n,
        bucketId: 7,
        zeroForOne: true,
      });
    });

    it('should read the extra slot and the consolidated slot', async () => {
      bridges.setExtraBridge(3, new StaticDataBridge('extra', '0xee'));
      bridges.setConsolidatedBridge(new StaticDataBridge('consolidated', '0xcc'));

      await router.getQuote(request(3 << 20), 10n, 20n);
      await router.getQuote(request(15 << 20), 10n, 20n);
      await router.getQuote(request(4 << 20), 10n, 20n);

      expect(strategy.payloads.map((payload) => payload.extra)).toEqual(['0xee', '0xcc', EMPTY_BYTES]);
    });

    it('should append the trader context when bit 0 is set', async () => {
      bridges.setDefaultBridge(0, new StaticDataBridge('zero', '0x00aa'));

      await router.getQuote(request(0x1), 10n, 20n);
      sessions.startSession(ALICE);
      await router.getQuote(request(0x1), 10n, 20n);

      expect(strategy.payloads[0].defaults[0]).toBe('0x00aa');
      expect(decodeTraderContext(strategy.payloads[0].context)).toEqual({
        timestamp: 1_700_000_000,
        blockNumber: 100,
        gasPrice: 7n,
        sessionActive: false,
      });
      expect(decodeTraderContext(strategy.payloads[1].context)?.sessionActive).toBe(true);
    });
  });

  describe('bridge failures', () => {
    it('should turn a throwing bridge into empty bytes and log it', async () => {
      bridges.setDefaultBridge(1, new FailingBridge());

      const result = await router.getQuote(request(0b0010), 10n, 20n);

      expect(result.amountOut).toBe(42n);
      expect(strategy.payloads[0].defaults[1]).toBe(EMPTY_BYTES);
      const warning = logs.entries().find((entry) => entry.event_type === 'BRIDGE_NO_DATA');
      expect(warning?.level).toBe('WARN');
      expect(warning?.component).toBe('quote-router');
      expect(warning?.context).toEqual({ bridge: 'failing', reason: 'feed offline' });
    });

    it('should treat an empty response as no data', async () => {
      bridges.setDefaultBridge(2, new StaticDataBridge('silent'));

      await router.getQuote(request(0b0100), 10n, 20n);

      expect(strategy.payloads[0].defaults[2]).toBe(EMPTY_BYTES);
      expect(logs.events()).toContain('BRIDGE_NO_DATA');
    });
  });

  describe('bridge cache', () => {
    it('should fetch a bridge configured in several slots once', async () => {
      const shared = new StaticDataBridge('shared', '0x01');
      bridges.setDefaultBridge(1, shared);
      bridges.setDefaultBridge(2, shared);
      bridges.setExtraBridge(1, shared);
      const cache = new BridgeCache();

      await router.getQuote(request(0b0110 | (1 << 20)), 10n, 20n, cache);

      expect(shared.callCount).toBe(1);
      expect(cache.fetches).toBe(1);
      expect(cache.has('shared', WETH, USDC)).toBe(true);
      expect(cache.has('shared', WETH, DAI)).toBe(false);
      expect(strategy.payloads[0].extra).toBe('0x01');
    });

    it('should share fetches across a batch', async () => {
      const shared = new StaticDataBridge('shared', '0x01');
      bridges.setDefaultBridge(1, shared);

      await router.getQuoteBatch(
        [request(0b0010), request(0b0010 | (5 << 4))],
        [
          [10n, 20n],
          [30n, 40n],
        ]
      );

      expect(shared.callCount).toBe(1);
      expect(strategy.params.map((params) => params.asset0Balance)).toEqual([10n, 30n]);
    });

    it('should fetch again for a new logical call', async () => {
      const shared = new StaticDataBridge('shared', '0x01');
      bridges.setDefaultBridge(1, shared);

      await router.getQuote(request(0b0010), 10n, 20n);
      await router.getQuote(request(0b0010), 10n, 20n);

      expect(shared.callCount).toBe(2);
    });

    it('should not share an entry between asset pairs', async () => {
      const shared = new StaticDataBridge('shared', '0x01');
      bridges.setDefaultBridge(1, shared);
      const cache = new BridgeCache();

      await router.getQuote(request(0b0010), 10n, 20n, cache);
      await router.getQuote(request(0b0010, DAI), 10n, 20n, cache);
      await router.getQuote(request(0b0010 | (5 << 4), DAI), 10n, 20n, cache);

      expect(shared.callCount).toBe(2);
      expect(strategy.params.map((params) => params.asset1)).toEqual([USDC, DAI, DAI]);
    });
  });

  describe('strategy failures', () => {
    it('should map a throwing strategy to zero', async () => {
      strategies.register(
        CONSTANT_PRODUCT,
        new RecordingStrategy(async () => {
          throw new Error('division by zero');
        })
      );

      const result = await router.getQuote(request(0), 10n, 20n);

      expect(result).toEqual({ amountOut: 0n, poolId: request(0).poolId });
      expect(logs.events()).toContain('STRATEGY_FAILURE');
    });

    it('should map a negative result to zero', async () => {
      strategies.register(CONSTANT_PRODUCT, new RecordingStrategy(async () => -5n));
      expect((await router.getQuote(request(0), 10n, 20n)).amountOut).toBe(0n);
    });

    it('should fail for an unregistered strategy', async () => {
      strategies.unregister(CONSTANT_PRODUCT);
      await expect(router.getQuote(request(0), 10n, 20n)).rejects.toMatchObject({
        code: 'UNKNOWN_STRATEGY',
      });
    });
  });

  describe('getQuoteBatch', () => {
    it('should return one result per request in order', async () => {
      const results = await router.getQuoteBatch(
        [request(0), request(0x10)],
        [
          [10n, 20n],
          [10n, 20n],
        ]
      );
      expect(results).toEqual([
        { amountOut: 42n, poolId: request(0).poolId },
        { amountOut: 42n, poolId: request(0x10).poolId },
      ]);
    });

    it('should use the strategy batch entry point when present', async () => {
      const batching: PricingStrategy = {
        name: 'batching',
        quote: async () => 1n,
        quoteBatch: async (params) => params.map((entry) => entry.amount * 2n),
      };
      strategies.register(CONSTANT_PRODUCT, batching);

      const results = await router.getQuoteBatch([request(0)], [[10n, 20n]]);
      expect(results[0].amountOut).toBe(2000n);
    });

    it('should reject requests across different pairs', async () => {
      await expect(
        router.getQuoteBatch(
          [request(0), request(0, DAI)],
          [
            [10n, 20n],
            [10n, 20n],
          ]
        )
      ).rejects.toMatchObject({ code: 'INVALID_PARAMETER' });
    });

    it('should return nothing for no requests', async () => {
      expect(await router.getQuoteBatch([], [])).toEqual([]);
    });
  });
});

describe('decodeTraderContext', () => {
  it('should return null for empty or malformed payloads', () => {
    expect(decodeTraderContext(EMPTY_BYTES)).toBeNull();
    expect(decodeTraderContext('0x1234')).toBeNull();
  });
});

describe('BridgeRegistry', () => {
  it('should reject out-of-range slots', () => {
    const registry = new BridgeRegistry();
    expect(() => registry.setDefaultBridge(4, undefined)).toThrow(
      expect.objectContaining({ code: 'INVALID_BRIDGE_SLOT' })
    );
    expect(() => registry.setExtraBridge(15, undefined)).toThrow(
      expect.objectContaining({ code: 'INVALID_BRIDGE_SLOT' })
    );
    expect(() => registry.setExtraBridge(0, undefined)).toThrow(
      expect.objectContaining({ code: 'INVALID_BRIDGE_SLOT' })
    );
  });

  it('should have no bridge behind slot 0', () => {
    const registry = new BridgeRegistry([new StaticDataBridge('a')]);
    expect(registry.bridgeForSlot(0)).toBeUndefined();
    expect(registry.defaultBridge(0)?.id).toBe('a');
  });
});

describe('StrategyRegistry', () => {
  it('should look handles up case-insensitively', () => {
    const registry = new StrategyRegistry();
    const strategy = new RecordingStrategy();
    const lower = `0x${'ab'.repeat(20)}`;
    registry.register(lower, strategy);

    expect(registry.get(`0x${'AB'.repeat(20)}`)).toBe(strategy);
    expect(registry.unregister(lower)).toBe(true);
    expect(registry.has(lower)).toBe(false);
  });

  it('should reject handles that are not addresses', () => {
    expect(() => new StrategyRegistry().register(ZeroAddress.slice(0, 10), new RecordingStrategy())).toThrow(
      expect.objectContaining({ code: 'INVALID_PARAMETER' })
    );
  });
});
