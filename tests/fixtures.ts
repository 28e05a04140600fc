/**
 * Shared test fixtures
 */

import { Config } from '../src/config';
import { InMemoryTokenVault } from '../src/token-vault';
import { ManualBlockContext } from '../src/block-context';
import { Logger } from '../src/logger';
import { PoolManager } from '../src/pool-manager';
import { ConstantProductStrategy } from '../src/strategies';
import type { EngineConfig, LogEntry } from '../src/types';

export const E = 10n ** 18n;

// Canonical order: WETH < USDC < DAI
export const WETH = '0x1111111111111111111111111111111111111111';
export const USDC = '0x2222222222222222222222222222222222222222';
export const DAI = '0x3333333333333333333333333333333333333333';

export const ALICE = '0x1000000000000000000000000000000000000001';
export const BOB = '0x1000000000000000000000000000000000000002';
export const TREASURY = '0x1000000000000000000000000000000000000003';

export const CONSTANT_PRODUCT = '0x9000000000000000000000000000000000000001';
export const ORACLE = '0x9000000000000000000000000000000000000002';

export const SALT = `0x${'00'.repeat(31)}01`;

export interface LogCapture {
  lines: string[];
  entries(): LogEntry[];
  events(): string[];
}

export function captureLogs(): { logger: Logger; capture: LogCapture } {
  const lines: string[] = [];
  const logger = new Logger('amm-engine', 'pool-manager', {
    output: (line) => lines.push(line),
  });
  const entries = (): LogEntry[] => lines.map((line): LogEntry => JSON.parse(line));
  return {
    logger,
    capture: {
      lines,
      entries,
      events: () => entries().map((entry) => entry.event_type),
    },
  };
}

export interface Engine {
  manager: PoolManager;
  vault: InMemoryTokenVault;
  block: ManualBlockContext;
  logs: LogCapture;
}

export function createEngine(overrides?: Partial<EngineConfig>): Engine {
  const vault = new InMemoryTokenVault();
  const block = new ManualBlockContext({ blockNumber: 100, timestamp: 1_700_000_000 });
  const { logger, capture } = captureLogs();
  const manager = new PoolManager({ vault, block, logger, config: new Config(overrides) });
  manager.registerStrategy(CONSTANT_PRODUCT, new ConstantProductStrategy());
  return { manager, vault, block, logs: capture };
}
