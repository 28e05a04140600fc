/**
 * Pooled AMM Engine
 *
 * Accounting engine for pooled liquidity with pluggable pricing strategies,
 * flash-accounting sessions and opt-in MEV protection.
 *
 * @example
 * ```typescript
 * import { PoolManager, ConstantProductStrategy, InMemoryTokenVault } from 'pooled-amm-engine';
 *
 * const vault = new InMemoryTokenVault();
 * const manager = new PoolManager({ vault });
 * const strategy = manager.registerStrategy('0x00000000000000000000000000000000000000c9', new ConstantProductStrategy());
 *
 * vault.mint(WETH, alice, parseEther('1000'));
 * vault.mint(USDC, alice, parseEther('130000'));
 * await manager.addLiquidity({
 *   sender: alice, assetA: WETH, assetB: USDC, strategy, marking: 0,
 *   amountA: parseEther('1000'), amountB: parseEther('130000'),
 * });
 *
 * const { amountOut } = await manager.swap({
 *   sender: bob, assetIn: WETH, assetOut: USDC, strategy, marking: 0,
 *   amountIn: parseEther('1'), minAmountOut: 0n,
 * });
 * ```
 */

// Engine
export { PoolManager, DEFAULT_MANAGER_ADDRESS, splitHopAmount } from './pool-manager';
export type { PoolManagerOptions } from './pool-manager';

// Configuration
export { Config, DEFAULT_CONFIG, DEFAULT_BATCH_WINDOWS, loadConfigFromEnv } from './config';

// Types
export { EMPTY_BYTES } from './types';
export type {
  Address,
  HexBytes,
  PoolId,
  LogLevel,
  CorrelationPrefix,
  OperationContext,
  LogEntry,
  LoggerOptions,
  PoolKey,
  MarkingFields,
  TraderProtection,
  PoolState,
  PoolStatistics,
  PoolInfo,
  QuoteParams,
  RoutedPayload,
  DataBridge,
  PricingStrategy,
  QuoteResult,
  TraderContext,
  BlockContext,
  Rollback,
  Checkpointable,
  TokenVault,
  FlashCallback,
  CreatePoolParams,
  AddLiquidityParams,
  RemoveLiquidityParams,
  SwapParams,
  SwapHop,
  BatchSwapParams,
  FlashSessionParams,
  CommitParams,
  RevealParams,
  QuoteSwapParams,
  QuoteBatchParams,
  SwapResult,
  LiquidityResult,
  BatchSwapResult,
  SettledDelta,
  FlashSessionResult,
  BatchWindowConfig,
  EngineConfig,
} from './types';

// Errors
export {
  AmmError,
  ConfigurationError,
  QuoteUnavailableError,
  SlippageViolationError,
  LiquidityError,
  SessionError,
  MevProtectionError,
  ReentrancyError,
  InsufficientBalanceError,
  getErrorMessage,
} from './errors';

// Logger
export { Logger } from './logger';

// Pool identity and marking codec
export { canonicalize, assemble, disassemble, derivePoolId, poolIdFromPacked, toPoolKey } from './pool-identity';
export {
  decodeMarking,
  encodeMarking,
  decodeTraderProtection,
  encodeTraderProtection,
  NO_PROTECTION,
  ENHANCED_CONTEXT_FLAG,
  ATOMIC_EXECUTION_FLAG,
  CONSOLIDATED_SLOT,
} from './marking';

// Stores and collaborators
export { InventoryLedger, LOCKED_SHARES_HOLDER } from './inventory-ledger';
export { FlashAccountingSession, NATIVE_TOKEN } from './flash-accounting';
export type { SettlementSink } from './flash-accounting';
export { ManualBlockContext } from './block-context';
export type { ManualBlockContextOptions } from './block-context';
export { InMemoryTokenVault } from './token-vault';
export { TransactionScope, ReentrancyGuard, AsyncMutex } from './concurrency';

// Quoting
export { QuoteRouter, BridgeCache } from './quote-router';
export type { QuoteRequest } from './quote-router';
export { encodeTraderContext, decodeTraderContext } from './trader-context';
export { BridgeRegistry, StrategyRegistry } from './registry';
export * from './bridges';
export * from './strategies';

// MEV protection
export * from './mev';

// Protocol fee
export { computeProtocolFee, poolValue } from './protocol-fee';

// Utilities
export {
  PRECISION,
  BPS_PRECISION,
  sqrtBigInt,
  mulDiv,
  getAmountOutConstantProduct,
} from './utils';
