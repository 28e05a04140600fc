/**
 * AMM Engine Types
 * Core type definitions for pools, quoting, flash accounting and MEV protection
 */

/** Checksummed 20-byte address (hex string) */
export type Address = string;

/** 0x-prefixed hex string of arbitrary length */
export type HexBytes = string;

/** keccak256 of the packed pool identifier */
export type PoolId = string;

/** Empty bridge payload, the canonical "no data" value */
export const EMPTY_BYTES: HexBytes = '0x';

/** Log severities, lowest to highest */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/** Correlation id prefixes, one per kind of top-level operation */
export type CorrelationPrefix = 'pool' | 'liq' | 'swp' | 'bat' | 'ses' | 'quo' | 'mev';

export interface OperationContext {
  correlation_id: string;
  started_at: Date;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  correlation_id: string;
  service: string;
  component?: string;
  event_type: string;
  message: string;
  context: Record<string, unknown>;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  output?: (line: string) => void;
}

// ============================================================
// Pool identity
// ============================================================

/** Canonical pool key: asset0 < asset1 by address value */
export interface PoolKey {
  asset0: Address;
  asset1: Address;
  /** Handle of the pricing strategy registered with the engine */
  strategy: Address;
  /** 24-bit configuration word */
  marking: number;
}

/** Structured view of the 24-bit marking word */
export interface MarkingFields {
  /** Default bridges 0..3 (bits 0..3) */
  bridgeFlags: readonly [boolean, boolean, boolean, boolean];
  /** Pricing-parameter variant (bits 4..19) */
  bucketId: number;
  /** Extra bridge slot (bits 20..23): 0 none, 1..14 configurable, 15 consolidated */
  extraSlot: number;
  /** Append the trader-context payload (bit 0) */
  enhancedContext: boolean;
}

/** Structured view of the per-call 32-bit trader protection word */
export interface TraderProtection {
  accessControlMode: number;
  volumeControlMode: number;
  atomicExecution: boolean;
  /** 0 = session-only, 1..7 = batch window index */
  batchMode: number;
  circuitBreakerMode: number;
}

// ============================================================
// Pool state
// ============================================================

export interface PoolState {
  reserve0: bigint;
  reserve1: bigint;
  totalLiquidityShares: bigint;
  /** Pool value in asset-0 terms at the last liquidity event */
  protocolFeeBaseline: bigint;
}

export interface PoolStatistics {
  swapCount: number;
  volume0: bigint;
  volume1: bigint;
  createdAtBlock: number;
}

export interface PoolInfo {
  poolId: PoolId;
  key: PoolKey;
  state: PoolState;
  stats: PoolStatistics;
}

// ============================================================
// Quoting
// ============================================================

/** Parameters handed to bridges and strategies */
export interface QuoteParams {
  asset0: Address;
  asset1: Address;
  strategy: Address;
  amount: bigint;
  asset0Balance: bigint;
  asset1Balance: bigint;
  bucketId: number;
  zeroForOne: boolean;
}

/** Bridge payloads assembled for one quote */
export interface RoutedPayload {
  marking: MarkingFields;
  /** One entry per default bridge; EMPTY_BYTES when disabled or unavailable */
  defaults: readonly [HexBytes, HexBytes, HexBytes, HexBytes];
  extra: HexBytes;
  /** abi.encode(uint256 timestamp, uint256 blockNumber, uint256 gasPrice, bool sessionActive) */
  context: HexBytes;
}

/** Pluggable market-data provider */
export interface DataBridge {
  /** Cache handle; a bridge id is fetched once per asset pair per logical call */
  readonly id: string;
  getData(params: QuoteParams): Promise<HexBytes>;
}

/** Pluggable pricing logic; amountOut === 0n means "no price" */
export interface PricingStrategy {
  readonly name: string;
  quote(params: QuoteParams, payload: RoutedPayload): Promise<bigint>;
  quoteBatch?(params: QuoteParams[], payloads: RoutedPayload[]): Promise<bigint[]>;
}

export interface QuoteResult {
  amountOut: bigint;
  poolId: PoolId;
}

/** Decoded trader-context payload */
export interface TraderContext {
  timestamp: number;
  blockNumber: number;
  gasPrice: bigint;
  sessionActive: boolean;
}

// ============================================================
// Chain & settlement collaborators
// ============================================================

export interface BlockContext {
  getBlockNumber(): number;
  getTimestamp(): number;
  getGasPrice(): bigint;
}

/** Restores the state captured when the checkpoint was taken */
export type Rollback = () => void;

export interface Checkpointable {
  checkpoint(): Rollback;
}

/** Fungible balance keeper the engine settles against */
export interface TokenVault extends Checkpointable {
  balanceOf(token: Address, account: Address): bigint;
  transfer(token: Address, from: Address, to: Address, amount: bigint): void;
}

/** External entry point invoked while a flash session is active */
export interface FlashCallback {
  onFlashSession(owner: Address, data: HexBytes): Promise<void>;
}

// ============================================================
// Public operation parameters
// ============================================================

export interface CreatePoolParams {
  sender: Address;
  assetA: Address;
  assetB: Address;
  strategy: Address;
  marking: number;
}

export interface AddLiquidityParams extends CreatePoolParams {
  amountA: bigint;
  amountB: bigint;
}

export interface RemoveLiquidityParams extends CreatePoolParams {
  shares: bigint;
}

export interface SwapParams {
  sender: Address;
  assetIn: Address;
  assetOut: Address;
  strategy: Address;
  marking: number;
  amountIn: bigint;
  minAmountOut: bigint;
}

export interface SwapHop {
  assetIn: Address;
  assetOut: Address;
  strategy: Address;
  markings: number[];
  /** Per-marking split; may be omitted for a single marking */
  amounts?: bigint[];
}

export interface BatchSwapParams {
  sender: Address;
  hops: SwapHop[];
  amountIn: bigint;
  minAmountOut: bigint;
}

export interface FlashSessionParams {
  sender: Address;
  callback: FlashCallback;
  data?: HexBytes;
  /** Tokens settled when the callback returns */
  tokens: Address[];
  /** Native value supplied with the call */
  value?: bigint;
}

export interface CommitParams {
  sender: Address;
  commitment: HexBytes;
}

export interface RevealParams extends SwapParams {
  nonce: bigint;
  salt: HexBytes;
}

export interface QuoteSwapParams {
  /** User the trader-context payload describes; zero address when omitted */
  sender?: Address;
  assetIn: Address;
  assetOut: Address;
  strategy: Address;
  marking: number;
  amountIn: bigint;
}

export interface QuoteBatchParams {
  sender?: Address;
  assetIn: Address;
  assetOut: Address;
  strategy: Address;
  markings: number[];
  /** Input amount per marking */
  amounts: bigint[];
}

export interface SwapResult {
  poolId: PoolId;
  amountIn: bigint;
  amountOut: bigint;
  zeroForOne: boolean;
}

export interface LiquidityResult {
  poolId: PoolId;
  amount0: bigint;
  amount1: bigint;
  shares: bigint;
}

export interface BatchSwapResult {
  amountOut: bigint;
  hops: SwapResult[][];
}

export interface SettledDelta {
  token: Address;
  /** Positive: paid to the owner; negative: collected from the owner */
  delta: bigint;
}

export interface FlashSessionResult {
  owner: Address;
  settled: SettledDelta[];
}

// ============================================================
// Configuration
// ============================================================

export interface BatchWindowConfig {
  cycleLength: number;
  settlementBlocks: number;
  enabled: boolean;
}

export interface EngineConfig {
  /** Shares burned forever on the first deposit */
  minimumLiquidity: bigint;
  /** Blocks after the commit block during which a reveal is legal */
  commitRevealWindow: number;
  protocolFeeBps: number;
  protocolTreasury?: Address;
  /** Batch windows selected by trader batch modes 1..7 */
  batchWindows: BatchWindowConfig[];
  logLevel: LogLevel;
}
