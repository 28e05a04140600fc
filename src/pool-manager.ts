/**
 * Pool Manager
 *
 * Public entry point of the engine. Every operation runs as one
 * transaction: stores are checkpointed on entry and restored if anything
 * throws, so an operation either completes or leaves no trace.
 *
 * Settlement: operations record signed deltas for the beneficiary (the
 * active flash-session user, else the sender). Outside a session the
 * deltas are settled against the token vault before the operation
 * returns; inside one they wait for the session to settle.
 */

import { ZeroAddress } from 'ethers';
import { Config } from './config';
import { ConfigurationError, LiquidityError, QuoteUnavailableError, SlippageViolationError } from './errors';
import { Logger } from './logger';
import { ManualBlockContext } from './block-context';
import { TransactionScope, ReentrancyGuard, poolResource, sessionResource } from './concurrency';
import { FlashAccountingSession, NATIVE_TOKEN } from './flash-accounting';
import type { SettlementSink } from './flash-accounting';
import { InventoryLedger, LOCKED_SHARES_HOLDER } from './inventory-ledger';
import { decodeTraderProtection } from './marking';
import { AtomicExecutionGate } from './mev/atomic-execution';
import { CommitRevealRegistry, computeCommitment } from './mev/commit-reveal';
import type { CommitRecord } from './mev/commit-reveal';
import { ProtectionGuard, ProtectionRegistry } from './mev/protection-policy';
import type { PoolProtectionConfig, ProtectionPolicy } from './mev/protection-policy';
import { PoolDirectory } from './pool-directory';
import { derivePoolId, isAsset0, toPoolKey } from './pool-identity';
import { ProtocolFeeLedger, computeProtocolFee, poolValue } from './protocol-fee';
import { BridgeCache, QuoteRouter } from './quote-router';
import { BridgeRegistry, StrategyRegistry } from './registry';
import { InMemoryTokenVault } from './token-vault';
import { EMPTY_BYTES } from './types';
import { minBigInt, mulDiv, sqrtBigInt } from './utils';
import {
  addressSchema,
  bytes32Schema,
  hexBytesSchema,
  markingSchema,
  nonNegativeAmountSchema,
  parseParam,
  positiveAmountSchema,
  protectionWordSchema,
  uint64Schema,
} from './validation';
import type {
  AddLiquidityParams,
  Address,
  BatchSwapParams,
  BatchSwapResult,
  BlockContext,
  CommitParams,
  CorrelationPrefix,
  CreatePoolParams,
  DataBridge,
  FlashSessionParams,
  FlashSessionResult,
  LiquidityResult,
  OperationContext,
  PoolId,
  PoolInfo,
  PoolKey,
  PoolState,
  PricingStrategy,
  QuoteBatchParams,
  QuoteResult,
  QuoteSwapParams,
  RemoveLiquidityParams,
  RevealParams,
  SwapHop,
  SwapParams,
  SwapResult,
  TokenVault,
} from './types';

/** Vault account holding reserves when no address is configured */
export const DEFAULT_MANAGER_ADDRESS: Address = '0x0000000000000000000000000000000000001000';

export interface PoolManagerOptions {
  config?: Config;
  logger?: Logger;
  vault?: TokenVault;
  block?: BlockContext;
  /** Vault account that custodies pool reserves */
  address?: Address;
  protectionPolicy?: ProtectionPolicy;
}

interface ResolvedPool {
  key: PoolKey;
  poolId: PoolId;
}

interface SwapLeg {
  assetIn: Address;
  assetOut: Address;
  strategy: Address;
  marking: number;
}

/**
 * Split a hop's input across its markings. On the first hop the listed
 * amounts must add up to the input exactly; on later hops they are weights
 * scaled to the previous hop's output, the rounding remainder going to the
 * last marking.
 */
export function splitHopAmount(hop: SwapHop, total: bigint, exact: boolean): bigint[] {
  if (hop.markings.length === 0) {
    throw new ConfigurationError('Hop lists no markings', 'INVALID_ROUTE');
  }
  if (!hop.amounts) {
    if (hop.markings.length === 1) return [total];
    throw new ConfigurationError('A hop across several markings needs per-marking amounts', 'INVALID_SPLIT');
  }
  if (hop.amounts.length !== hop.markings.length || hop.amounts.some((amount) => amount < 0n)) {
    throw new ConfigurationError('One non-negative amount required per marking', 'INVALID_SPLIT');
  }

  const sum = hop.amounts.reduce((acc, amount) => acc + amount, 0n);
  if (exact) {
    if (sum !== total) {
      throw new ConfigurationError(`Hop amounts sum to ${sum}, expected ${total}`, 'INVALID_SPLIT');
    }
    return [...hop.amounts];
  }
  if (sum === 0n) {
    throw new ConfigurationError('Hop weights sum to zero', 'INVALID_SPLIT');
  }

  const scaled = hop.amounts.map((weight) => (total * weight) / sum);
  const assigned = scaled.slice(0, -1).reduce((acc, amount) => acc + amount, 0n);
  scaled[scaled.length - 1] = total - assigned;
  return scaled;
}

/** Largest deposit at the current reserve ratio that fits both amounts */
function proportionalAmounts(
  amount0: bigint,
  amount1: bigint,
  reserve0: bigint,
  reserve1: bigint
): [bigint, bigint] {
  const optimal1 = mulDiv(amount0, reserve1, reserve0);
  if (optimal1 <= amount1) return [amount0, optimal1];
  return [mulDiv(amount1, reserve0, reserve1), amount1];
}

export class PoolManager {
  readonly address: Address;
  readonly config: Config;
  readonly bridges = new BridgeRegistry();
  readonly strategies = new StrategyRegistry();
  readonly protection = new ProtectionRegistry();

  private readonly logger: Logger;
  private readonly vault: TokenVault;
  private readonly block: BlockContext;
  private readonly ledger = new InventoryLedger();
  private readonly sessions = new FlashAccountingSession();
  private readonly directory = new PoolDirectory();
  private readonly fees = new ProtocolFeeLedger();
  private readonly reentrancy = new ReentrancyGuard();
  private readonly commits: CommitRevealRegistry;
  private readonly atomic: AtomicExecutionGate;
  private readonly protectionGuard: ProtectionGuard;
  private readonly router: QuoteRouter;
  private readonly scope: TransactionScope;
  private readonly sink: SettlementSink;

  constructor(options: PoolManagerOptions = {}) {
    this.config = options.config ?? new Config();
    this.logger =
      options.logger ?? new Logger('amm-engine', 'pool-manager', { minLevel: this.config.logLevel });
    this.vault = options.vault ?? new InMemoryTokenVault();
    this.block = options.block ?? new ManualBlockContext();
    this.address = parseParam(addressSchema, options.address ?? DEFAULT_MANAGER_ADDRESS, 'manager address');

    this.commits = new CommitRevealRegistry(() => this.config.commitRevealWindow);
    this.atomic = new AtomicExecutionGate(this.config);
    this.protectionGuard = new ProtectionGuard(this.protection, options.protectionPolicy);
    this.router = new QuoteRouter(
      this.bridges,
      this.strategies,
      this.block,
      this.sessions,
      this.logger.child('quote-router')
    );
    this.scope = new TransactionScope([
      this.ledger,
      this.sessions,
      this.directory,
      this.fees,
      this.commits,
      this.protection,
      this.vault,
    ]);
    this.sink = {
      pay: (user, token, amount) => this.vault.transfer(token, this.address, user, amount),
      collect: (user, token, amount) => this.vault.transfer(token, user, this.address, amount),
    };
  }

  // ============================================================
  // Administration
  // ============================================================

  registerStrategy(handle: Address, strategy: PricingStrategy): Address {
    return this.strategies.register(handle, strategy);
  }

  setDefaultBridge(index: number, bridge: DataBridge | undefined): void {
    this.bridges.setDefaultBridge(index, bridge);
  }

  setExtraBridge(slot: number, bridge: DataBridge | undefined): void {
    this.bridges.setExtraBridge(slot, bridge);
  }

  setConsolidatedBridge(bridge: DataBridge | undefined): void {
    this.bridges.setConsolidatedBridge(bridge);
  }

  setEmergencyBatchMode(mode: number | null): void {
    this.atomic.setEmergencyBatchMode(mode);
  }

  getEmergencyBatchMode(): number | null {
    return this.atomic.getEmergencyBatchMode();
  }

  configurePoolProtection(poolId: PoolId, config: Partial<PoolProtectionConfig>): PoolProtectionConfig {
    return this.protection.configurePool(poolId, config);
  }

  setProtectionPolicy(policy: ProtectionPolicy): void {
    this.protectionGuard.setPolicy(policy);
  }

  // ============================================================
  // Pools and liquidity
  // ============================================================

  getPoolId(assetA: Address, assetB: Address, strategy: Address, marking: number): PoolId {
    return this.resolvePool(assetA, assetB, strategy, marking).poolId;
  }

  async createPool(params: CreatePoolParams): Promise<PoolId> {
    return this.run('pool', 'POOL_CREATE_FAILED', { strategy: params.strategy, marking: params.marking }, async (ctx) => {
      parseParam(addressSchema, params.sender, 'sender');
      const { key, poolId } = this.registerPool(params);
      this.logger.complete(ctx, 'POOL_CREATED', 'Pool created', {
        pool_id: poolId,
        asset0: key.asset0,
        asset1: key.asset1,
        strategy: key.strategy,
        marking: key.marking,
      });
      return poolId;
    });
  }

  /**
   * Deposit both assets. Creates the pool on first use. The first deposit
   * mints sqrt(amount0 * amount1) shares less the permanently locked
   * minimum; later deposits are trimmed to the reserve ratio.
   */
  async addLiquidity(params: AddLiquidityParams): Promise<LiquidityResult> {
    return this.run('liq', 'LIQUIDITY_ADD_FAILED', { sender: params.sender }, async (ctx) => {
      const sender = parseParam(addressSchema, params.sender, 'sender');
      const amountA = parseParam(positiveAmountSchema, params.amountA, 'amountA');
      const amountB = parseParam(positiveAmountSchema, params.amountB, 'amountB');

      let pool = this.resolvePool(params.assetA, params.assetB, params.strategy, params.marking);
      if (!this.directory.has(pool.poolId)) {
        pool = this.registerPool(params);
        this.logger.info(ctx, 'POOL_CREATED', 'Pool created on first deposit', { pool_id: pool.poolId });
      }

      const user = this.beneficiary(sender);
      const [amount0, amount1] = isAsset0(params.assetA, params.assetB)
        ? [amountA, amountB]
        : [amountB, amountA];

      const result = this.withPoolLock(pool.poolId, () =>
        this.mintLiquidity(ctx, pool, user, amount0, amount1)
      );
      this.settleOutsideSession(user);

      this.logger.complete(ctx, 'LIQUIDITY_ADDED', 'Liquidity added', {
        pool_id: pool.poolId,
        provider: user,
        amount0: result.amount0,
        amount1: result.amount1,
        shares: result.shares,
      });
      return result;
    });
  }

  /**
   * Burn shares for shares * reserve / totalShares of each asset.
   */
  async removeLiquidity(params: RemoveLiquidityParams): Promise<LiquidityResult> {
    return this.run('liq', 'LIQUIDITY_REMOVE_FAILED', { sender: params.sender }, async (ctx) => {
      const sender = parseParam(addressSchema, params.sender, 'sender');
      const shares = parseParam(positiveAmountSchema, params.shares, 'shares');
      const pool = this.requirePool(params.assetA, params.assetB, params.strategy, params.marking);
      const user = this.beneficiary(sender);

      const result = this.withPoolLock(pool.poolId, () => this.burnLiquidity(ctx, pool, user, shares));
      this.settleOutsideSession(user);

      this.logger.complete(ctx, 'LIQUIDITY_REMOVED', 'Liquidity removed', {
        pool_id: pool.poolId,
        provider: user,
        amount0: result.amount0,
        amount1: result.amount1,
        shares,
      });
      return result;
    });
  }

  // ============================================================
  // Swaps
  // ============================================================

  async swap(params: SwapParams): Promise<SwapResult> {
    return this.swapWithProtection(params, 0);
  }

  /**
   * Swap with the trader's 32-bit protection word applied.
   */
  async swapWithProtection(params: SwapParams, protectionWord: number): Promise<SwapResult> {
    return this.run('swp', 'SWAP_FAILED', { sender: params.sender, amount_in: params.amountIn }, async (ctx) => {
      const result = await this.executeProtectedSwap(ctx, params, protectionWord);
      this.logger.complete(ctx, 'SWAP_EXECUTED', 'Swap executed', {
        pool_id: result.poolId,
        amount_in: result.amountIn,
        amount_out: result.amountOut,
        zero_for_one: result.zeroForOne,
      });
      return result;
    });
  }

  /**
   * Chain swaps hop by hop; each hop may fan out across markings of one pair.
   */
  async batchSwap(params: BatchSwapParams, protectionWord = 0): Promise<BatchSwapResult> {
    return this.run('bat', 'BATCH_SWAP_FAILED', { sender: params.sender, hops: params.hops.length }, async (ctx) => {
      const sender = parseParam(addressSchema, params.sender, 'sender');
      const amountIn = parseParam(positiveAmountSchema, params.amountIn, 'amountIn');
      const minAmountOut = parseParam(nonNegativeAmountSchema, params.minAmountOut, 'minAmountOut');
      if (params.hops.length === 0) {
        throw new ConfigurationError('Batch swap needs at least one hop', 'INVALID_ROUTE');
      }

      const user = this.beneficiary(sender);
      const cache = new BridgeCache();
      const hops: SwapResult[][] = [];
      let hopInput = amountIn;
      let previousOut: Address | undefined;

      for (const [index, hop] of params.hops.entries()) {
        if (previousOut !== undefined && previousOut.toLowerCase() !== hop.assetIn.toLowerCase()) {
          throw new ConfigurationError(
            `Hop ${index} starts from ${hop.assetIn}, previous hop produced ${previousOut}`,
            'INVALID_ROUTE'
          );
        }

        const amounts = splitHopAmount(hop, hopInput, index === 0);
        const results: SwapResult[] = [];
        let hopOutput = 0n;
        for (const [bucket, marking] of hop.markings.entries()) {
          const amount = amounts[bucket];
          if (amount === 0n) continue;
          const leg: SwapLeg = { ...hop, marking };
          const { poolId } = this.requirePool(leg.assetIn, leg.assetOut, leg.strategy, leg.marking);
          this.enforceProtection(user, poolId, protectionWord, amount, isAsset0(leg.assetIn, leg.assetOut));
          const result = await this.executeSwap(ctx, user, leg, amount, cache);
          results.push(result);
          hopOutput += result.amountOut;
        }

        hops.push(results);
        hopInput = hopOutput;
        previousOut = hop.assetOut;
      }

      if (hopInput < minAmountOut) {
        throw new SlippageViolationError(hopInput, minAmountOut);
      }
      this.settleOutsideSession(user);

      this.logger.complete(ctx, 'BATCH_SWAP_EXECUTED', 'Batch swap executed', {
        amount_in: amountIn,
        amount_out: hopInput,
        hops: hops.length,
        legs: hops.reduce((count, legs) => count + legs.length, 0),
        bridge_fetches: cache.fetches,
      });
      return { amountOut: hopInput, hops };
    });
  }

  // ============================================================
  // Flash sessions
  // ============================================================

  /**
   * Open a session for the sender, run the callback (which may call back
   * into swaps and liquidity operations), then settle `tokens` and close.
   */
  async flashSession(params: FlashSessionParams): Promise<FlashSessionResult> {
    return this.run('ses', 'FLASH_SESSION_FAILED', { sender: params.sender }, async (ctx) => {
      const owner = parseParam(addressSchema, params.sender, 'sender');
      const value = parseParam(nonNegativeAmountSchema, params.value ?? 0n, 'value');
      const data = parseParam(hexBytesSchema, params.data ?? EMPTY_BYTES, 'data');
      const tokens = params.tokens.map((token) => parseParam(addressSchema, token, 'token'));

      const previousUser = this.sessions.getActiveUser();
      let release: (() => void) | undefined;

      try {
        this.sessions.startSession(owner);
        release = this.reentrancy.enter(sessionResource(owner));
        this.sessions.setActiveUser(owner);

        if (value > 0n) {
          this.vault.transfer(NATIVE_TOKEN, owner, this.address, value);
        }
        this.logger.debug(ctx, 'FLASH_SESSION_STARTED', 'Invoking flash callback', { owner });

        await params.callback.onFlashSession(owner, data);

        const settled = this.sessions.settle(owner, tokens, value, this.sink);
        this.sessions.endSession(owner);

        this.logger.complete(ctx, 'FLASH_SESSION_SETTLED', 'Flash session settled', {
          owner,
          tokens: settled.length,
        });
        return { owner, settled };
      } finally {
        release?.();
        if (previousUser) {
          this.sessions.setActiveUser(previousUser);
        } else {
          this.sessions.clearActiveUser();
        }
      }
    });
  }

  // ============================================================
  // Commit-reveal
  // ============================================================

  async commit(params: CommitParams): Promise<CommitRecord> {
    return this.run('mev', 'COMMIT_FAILED', { sender: params.sender }, async (ctx) => {
      const trader = parseParam(addressSchema, params.sender, 'sender');
      const commitment = parseParam(bytes32Schema, params.commitment, 'commitment');
      const record = this.commits.commit(trader, commitment, this.block.getBlockNumber());
      this.logger.complete(ctx, 'COMMIT_RECORDED', 'Swap commitment recorded', {
        trader,
        block: record.blockCommitted,
        nonce: record.traderNonce,
      });
      return record;
    });
  }

  /**
   * Reveal a committed swap and execute it.
   */
  async revealCommitted(params: RevealParams, protectionWord = 0): Promise<SwapResult> {
    return this.run('mev', 'REVEAL_FAILED', { sender: params.sender, nonce: params.nonce }, async (ctx) => {
      const trader = parseParam(addressSchema, params.sender, 'sender');
      const salt = parseParam(bytes32Schema, params.salt, 'salt');
      const nonce = parseParam(uint64Schema, params.nonce, 'nonce');
      const amountIn = parseParam(positiveAmountSchema, params.amountIn, 'amountIn');
      const minAmountOut = parseParam(nonNegativeAmountSchema, params.minAmountOut, 'minAmountOut');
      const { key } = this.requirePool(params.assetIn, params.assetOut, params.strategy, params.marking);
      const zeroForOne = isAsset0(params.assetIn, params.assetOut);

      const commitment = computeCommitment({
        assetIn: zeroForOne ? key.asset0 : key.asset1,
        assetOut: zeroForOne ? key.asset1 : key.asset0,
        strategy: key.strategy,
        marking: key.marking,
        amountIn,
        zeroForOne,
        minAmountOut,
        nonce,
        trader,
        salt,
      });
      this.commits.reveal(trader, commitment, nonce, this.block.getBlockNumber());

      const result = await this.executeProtectedSwap(ctx, { ...params, amountIn, minAmountOut }, protectionWord);
      this.logger.complete(ctx, 'COMMIT_REVEALED', 'Committed swap executed', {
        trader,
        pool_id: result.poolId,
        amount_in: result.amountIn,
        amount_out: result.amountOut,
      });
      return result;
    });
  }

  getCommitNonce(trader: Address): bigint {
    return this.commits.getNonce(trader);
  }

  getCommitment(trader: Address): CommitRecord | undefined {
    return this.commits.getCommitment(trader);
  }

  // ============================================================
  // Quotes and views
  // ============================================================

  /** Preview a swap's output without executing it; 0n means no price */
  async quote(params: QuoteSwapParams): Promise<QuoteResult> {
    return this.run('quo', 'QUOTE_FAILED', { amount_in: params.amountIn }, async (ctx) => {
      const amountIn = parseParam(positiveAmountSchema, params.amountIn, 'amountIn');
      const { key, poolId } = this.resolvePool(params.assetIn, params.assetOut, params.strategy, params.marking);
      const [reserve0, reserve1] = this.ledger.getInventory(poolId);
      return this.router.getQuote(
        {
          key,
          poolId,
          amount: amountIn,
          zeroForOne: isAsset0(params.assetIn, params.assetOut),
          beneficiary: this.quoteBeneficiary(params.sender),
        },
        reserve0,
        reserve1,
        new BridgeCache(),
        ctx
      );
    });
  }

  /** Preview one amount per marking of a pair, sharing bridge fetches */
  async quoteBatch(params: QuoteBatchParams): Promise<QuoteResult[]> {
    return this.run('quo', 'QUOTE_BATCH_FAILED', { markings: params.markings.length }, async (ctx) => {
      if (params.amounts.length !== params.markings.length) {
        throw new ConfigurationError('One amount required per marking', 'INVALID_PARAMETER');
      }
      const zeroForOne = isAsset0(params.assetIn, params.assetOut);
      const beneficiary = this.quoteBeneficiary(params.sender);

      const requests = params.markings.map((marking, index) => {
        const { key, poolId } = this.resolvePool(params.assetIn, params.assetOut, params.strategy, marking);
        return {
          key,
          poolId,
          amount: parseParam(nonNegativeAmountSchema, params.amounts[index], 'amount'),
          zeroForOne,
          beneficiary,
        };
      });
      const reserves = requests.map((request) => this.ledger.getInventory(request.poolId));
      return this.router.getQuoteBatch(requests, reserves, new BridgeCache(), ctx);
    });
  }

  getPoolState(poolId: PoolId): PoolState {
    return this.ledger.getPoolState(poolId);
  }

  getPoolInfo(poolId: PoolId): PoolInfo | undefined {
    const key = this.directory.getKey(poolId);
    const stats = this.directory.getStatistics(poolId);
    if (!key || !stats) return undefined;
    return { poolId, key, state: this.ledger.getPoolState(poolId), stats };
  }

  getLiquidityBalance(poolId: PoolId, holder: Address): bigint {
    return this.ledger.sharesOf(poolId, holder);
  }

  isSessionActive(owner: Address): boolean {
    return this.sessions.isSessionActive(owner);
  }

  // ============================================================
  // Protocol fees
  // ============================================================

  getProtocolFeesAccrued(token: Address): bigint {
    return this.fees.accruedFor(token);
  }

  /** Pay the accrued protocol fees in `token` to the treasury */
  async collectProtocolFees(token: Address): Promise<bigint> {
    return this.run('pool', 'PROTOCOL_FEE_COLLECT_FAILED', { token }, async (ctx) => {
      const asset = parseParam(addressSchema, token, 'token');
      const treasury = this.config.protocolTreasury;
      if (!treasury) {
        throw new ConfigurationError('No protocol treasury configured', 'NO_TREASURY');
      }
      const amount = this.fees.take(asset);
      this.vault.transfer(asset, this.address, treasury, amount);
      this.logger.complete(ctx, 'PROTOCOL_FEES_COLLECTED', 'Protocol fees paid to treasury', {
        token: asset,
        amount,
        treasury,
      });
      return amount;
    });
  }

  // ============================================================
  // Internals
  // ============================================================

  private async run<T>(
    prefix: CorrelationPrefix,
    failureEvent: string,
    logContext: Record<string, unknown>,
    operation: (ctx: OperationContext) => Promise<T>
  ): Promise<T> {
    const ctx = this.logger.startOperation(prefix);
    try {
      return await this.scope.run(() => operation(ctx));
    } catch (error) {
      this.logger.failure(ctx, failureEvent, error, logContext);
      throw error;
    }
  }

  private beneficiary(sender: Address): Address {
    return this.sessions.getActiveUser() ?? sender;
  }

  private quoteBeneficiary(sender: Address | undefined): Address {
    return sender === undefined ? ZeroAddress : parseParam(addressSchema, sender, 'sender');
  }

  private resolvePool(assetA: Address, assetB: Address, strategy: Address, marking: number): ResolvedPool {
    const key = toPoolKey(assetA, assetB, strategy, parseParam(markingSchema, marking, 'marking'));
    return { key, poolId: derivePoolId(key) };
  }

  private requirePool(assetA: Address, assetB: Address, strategy: Address, marking: number): ResolvedPool {
    const pool = this.resolvePool(assetA, assetB, strategy, marking);
    if (!this.directory.has(pool.poolId)) {
      throw new ConfigurationError(`Pool ${pool.poolId} does not exist`, 'POOL_NOT_FOUND');
    }
    return pool;
  }

  private registerPool(params: CreatePoolParams): ResolvedPool {
    const pool = this.resolvePool(params.assetA, params.assetB, params.strategy, params.marking);
    if (!this.strategies.has(pool.key.strategy)) {
      throw new ConfigurationError(`No strategy registered for ${pool.key.strategy}`, 'UNKNOWN_STRATEGY');
    }
    if (this.directory.has(pool.poolId)) {
      throw new ConfigurationError(`Pool ${pool.poolId} already exists`, 'POOL_ALREADY_EXISTS');
    }
    this.ledger.initialize(pool.poolId);
    this.directory.register(pool.poolId, pool.key, this.block.getBlockNumber());
    return pool;
  }

  private withPoolLock<T>(poolId: PoolId, fn: () => T): T {
    const release = this.reentrancy.enter(poolResource(poolId));
    try {
      return fn();
    } finally {
      release();
    }
  }

  private settleOutsideSession(user: Address): void {
    if (this.sessions.isSessionActive(user)) return;
    this.sessions.settle(user, this.sessions.touchedTokens(user), 0n, this.sink);
  }

  private enforceProtection(
    user: Address,
    poolId: PoolId,
    protectionWord: number,
    amountIn: bigint,
    zeroForOne: boolean
  ): void {
    const protection = decodeTraderProtection(
      parseParam(protectionWordSchema, protectionWord, 'protection word')
    );
    const blockNumber = this.block.getBlockNumber();
    this.atomic.check(protection, this.sessions.isSessionActive(user), blockNumber);
    this.protectionGuard.enforce(protection, { poolId, trader: user, amountIn, zeroForOne, blockNumber });
  }

  private async executeProtectedSwap(
    ctx: OperationContext,
    params: SwapParams,
    protectionWord: number
  ): Promise<SwapResult> {
    const sender = parseParam(addressSchema, params.sender, 'sender');
    const amountIn = parseParam(positiveAmountSchema, params.amountIn, 'amountIn');
    const minAmountOut = parseParam(nonNegativeAmountSchema, params.minAmountOut, 'minAmountOut');
    const { poolId } = this.requirePool(params.assetIn, params.assetOut, params.strategy, params.marking);
    const user = this.beneficiary(sender);

    this.enforceProtection(user, poolId, protectionWord, amountIn, isAsset0(params.assetIn, params.assetOut));
    const result = await this.executeSwap(ctx, user, params, amountIn, new BridgeCache());
    if (result.amountOut < minAmountOut) {
      throw new SlippageViolationError(result.amountOut, minAmountOut);
    }
    this.settleOutsideSession(user);
    return result;
  }

  /**
   * Quote, validate and book one swap leg. The pool stays locked across the
   * strategy call so a re-entering bridge or strategy cannot mutate it.
   */
  private async executeSwap(
    ctx: OperationContext,
    user: Address,
    leg: SwapLeg,
    amountIn: bigint,
    cache: BridgeCache
  ): Promise<SwapResult> {
    const { key, poolId } = this.requirePool(leg.assetIn, leg.assetOut, leg.strategy, leg.marking);
    const zeroForOne = isAsset0(leg.assetIn, leg.assetOut);

    return this.reentrancy.guard(poolResource(poolId), async () => {
      const [reserve0, reserve1] = this.ledger.getInventory(poolId);
      if (reserve0 === 0n || reserve1 === 0n) {
        throw new LiquidityError(`Pool ${poolId} has no liquidity`, 'NO_LIQUIDITY');
      }

      const { amountOut } = await this.router.getQuote(
        { key, poolId, amount: amountIn, zeroForOne, beneficiary: user },
        reserve0,
        reserve1,
        cache,
        ctx
      );
      if (amountOut === 0n) {
        throw new QuoteUnavailableError(poolId);
      }
      const reserveOut = zeroForOne ? reserve1 : reserve0;
      if (amountOut >= reserveOut) {
        throw new LiquidityError(
          `Output ${amountOut} exceeds available reserve ${reserveOut} of pool ${poolId}`,
          'INSUFFICIENT_RESERVES'
        );
      }

      const [tokenIn, tokenOut] = zeroForOne ? [key.asset0, key.asset1] : [key.asset1, key.asset0];
      this.ledger.applyDelta(
        poolId,
        zeroForOne ? amountIn : -amountOut,
        zeroForOne ? -amountOut : amountIn
      );
      this.directory.recordSwap(
        poolId,
        zeroForOne ? amountIn : amountOut,
        zeroForOne ? amountOut : amountIn
      );
      this.sessions.addDelta(user, tokenIn, -amountIn);
      this.sessions.addDelta(user, tokenOut, amountOut);

      this.logger.debug(ctx, 'SWAP_LEG', 'Swap leg booked', {
        pool_id: poolId,
        amount_in: amountIn,
        amount_out: amountOut,
        zero_for_one: zeroForOne,
      });
      return { poolId, amountIn, amountOut, zeroForOne };
    });
  }

  private mintLiquidity(
    ctx: OperationContext,
    pool: ResolvedPool,
    user: Address,
    amount0: bigint,
    amount1: bigint
  ): LiquidityResult {
    const { key, poolId } = pool;
    this.chargeProtocolFee(ctx, pool);
    const state = this.ledger.getPoolState(poolId);

    let shares: bigint;
    let used0 = amount0;
    let used1 = amount1;
    if (state.totalLiquidityShares === 0n) {
      const raw = sqrtBigInt(amount0 * amount1);
      const lock = this.config.minimumLiquidity;
      if (raw <= lock) {
        throw new ConfigurationError(
          `Initial liquidity ${raw} does not exceed the locked minimum ${lock}`,
          'INSUFFICIENT_INITIAL_LIQUIDITY'
        );
      }
      this.ledger.mintShares(poolId, LOCKED_SHARES_HOLDER, lock);
      shares = raw - lock;
    } else {
      [used0, used1] = proportionalAmounts(amount0, amount1, state.reserve0, state.reserve1);
      shares = minBigInt(
        mulDiv(used0, state.totalLiquidityShares, state.reserve0),
        mulDiv(used1, state.totalLiquidityShares, state.reserve1)
      );
      if (shares === 0n) {
        throw new LiquidityError('Deposit too small to mint any shares', 'INSUFFICIENT_LIQUIDITY_MINTED');
      }
    }

    this.ledger.applyDelta(poolId, used0, used1);
    this.ledger.mintShares(poolId, user, shares);
    this.ledger.setProtocolFeeBaseline(poolId, poolValue(state.reserve0 + used0));
    this.sessions.addDelta(user, key.asset0, -used0);
    this.sessions.addDelta(user, key.asset1, -used1);

    return { poolId, amount0: used0, amount1: used1, shares };
  }

  private burnLiquidity(
    ctx: OperationContext,
    pool: ResolvedPool,
    user: Address,
    shares: bigint
  ): LiquidityResult {
    const { key, poolId } = pool;
    this.chargeProtocolFee(ctx, pool);
    const state = this.ledger.getPoolState(poolId);
    if (state.totalLiquidityShares === 0n) {
      throw new LiquidityError(`Pool ${poolId} has no liquidity`, 'NO_LIQUIDITY');
    }

    const amount0 = mulDiv(shares, state.reserve0, state.totalLiquidityShares);
    const amount1 = mulDiv(shares, state.reserve1, state.totalLiquidityShares);
    if (amount0 === 0n && amount1 === 0n) {
      throw new LiquidityError(`Burning ${shares} shares returns nothing`, 'INSUFFICIENT_WITHDRAWAL');
    }

    this.ledger.burnShares(poolId, user, shares);
    this.ledger.applyDelta(poolId, -amount0, -amount1);
    this.ledger.setProtocolFeeBaseline(poolId, poolValue(state.reserve0 - amount0));
    this.sessions.addDelta(user, key.asset0, amount0);
    this.sessions.addDelta(user, key.asset1, amount1);

    return { poolId, amount0, amount1, shares };
  }

  private chargeProtocolFee(ctx: OperationContext, pool: ResolvedPool): void {
    const feeBps = this.config.protocolFeeBps;
    if (feeBps === 0 || !this.config.protocolTreasury) return;

    const state = this.ledger.getPoolState(pool.poolId);
    const charge = computeProtocolFee(state.reserve0, state.reserve1, state.protocolFeeBaseline, feeBps);
    if (charge.fee0 === 0n && charge.fee1 === 0n) return;

    this.ledger.applyDelta(pool.poolId, -charge.fee0, -charge.fee1);
    this.fees.accrue(pool.key.asset0, charge.fee0);
    this.fees.accrue(pool.key.asset1, charge.fee1);
    this.logger.info(ctx, 'PROTOCOL_FEE_CHARGED', 'Protocol fee taken from pool growth', {
      pool_id: pool.poolId,
      profit: charge.profit,
      fee0: charge.fee0,
      fee1: charge.fee1,
    });
  }
}
