/**
 * Engine Configuration
 * Validated parameters for liquidity locking, commit-reveal and batch windows
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from './errors';
import { addressSchema, batchWindowSchema } from './validation';
import type { BatchWindowConfig, EngineConfig } from './types';

/** Batch windows selected by trader batch modes 1..7 */
export const DEFAULT_BATCH_WINDOWS: readonly BatchWindowConfig[] = [
  { cycleLength: 2, settlementBlocks: 1, enabled: true },
  { cycleLength: 5, settlementBlocks: 2, enabled: true },
  { cycleLength: 10, settlementBlocks: 3, enabled: true },
  { cycleLength: 20, settlementBlocks: 5, enabled: true },
  { cycleLength: 50, settlementBlocks: 10, enabled: true },
  { cycleLength: 100, settlementBlocks: 20, enabled: true },
  { cycleLength: 300, settlementBlocks: 60, enabled: true },
];

export const DEFAULT_CONFIG: EngineConfig = {
  minimumLiquidity: 1000n,
  commitRevealWindow: 256,
  protocolFeeBps: 0,
  batchWindows: DEFAULT_BATCH_WINDOWS.map((window) => ({ ...window })),
  logLevel: 'INFO',
};

const engineConfigSchema = z.object({
  minimumLiquidity: z.bigint().positive(),
  commitRevealWindow: z.number().int().positive(),
  protocolFeeBps: z.number().int().min(0).max(5000),
  protocolTreasury: addressSchema.optional(),
  batchWindows: z.array(batchWindowSchema).length(7),
  logLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']),
});

/**
 * Configuration manager for the engine
 */
export class Config {
  private config: EngineConfig;

  constructor(overrides?: Partial<EngineConfig>) {
    this.config = Config.validate({ ...DEFAULT_CONFIG, ...overrides });
  }

  private static validate(candidate: EngineConfig): EngineConfig {
    const result = engineConfigSchema.safeParse(candidate);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid engine configuration: ${detail}`);
    }
    return result.data;
  }

  get minimumLiquidity(): bigint {
    return this.config.minimumLiquidity;
  }

  get commitRevealWindow(): number {
    return this.config.commitRevealWindow;
  }

  get protocolFeeBps(): number {
    return this.config.protocolFeeBps;
  }

  get protocolTreasury(): string | undefined {
    return this.config.protocolTreasury;
  }

  get logLevel(): EngineConfig['logLevel'] {
    return this.config.logLevel;
  }

  /** Window for batch mode 1..7 */
  batchWindow(mode: number): BatchWindowConfig | undefined {
    return this.config.batchWindows[mode - 1];
  }

  getConfig(): Readonly<EngineConfig> {
    return Object.freeze({
      ...this.config,
      batchWindows: this.config.batchWindows.map((window) => ({ ...window })),
    });
  }

  update(overrides: Partial<EngineConfig>): void {
    this.config = Config.validate({ ...this.config, ...overrides });
  }
}

const envSchema = z.object({
  AMM_MINIMUM_LIQUIDITY: z.coerce.bigint().optional(),
  AMM_COMMIT_REVEAL_WINDOW: z.coerce.number().int().optional(),
  AMM_PROTOCOL_FEE_BPS: z.coerce.number().int().optional(),
  AMM_PROTOCOL_TREASURY: z.string().optional(),
  AMM_LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).optional(),
});

/**
 * Build a Config from environment variables.
 * When reading process.env, a .env file in the working directory is loaded first.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): Config {
  if (env === process.env) {
    dotenv.config();
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${detail}`);
  }

  const vars = parsed.data;
  const overrides: Partial<EngineConfig> = {};
  if (vars.AMM_MINIMUM_LIQUIDITY !== undefined) overrides.minimumLiquidity = vars.AMM_MINIMUM_LIQUIDITY;
  if (vars.AMM_COMMIT_REVEAL_WINDOW !== undefined) overrides.commitRevealWindow = vars.AMM_COMMIT_REVEAL_WINDOW;
  if (vars.AMM_PROTOCOL_FEE_BPS !== undefined) overrides.protocolFeeBps = vars.AMM_PROTOCOL_FEE_BPS;
  if (vars.AMM_PROTOCOL_TREASURY) overrides.protocolTreasury = vars.AMM_PROTOCOL_TREASURY;
  if (vars.AMM_LOG_LEVEL !== undefined) overrides.logLevel = vars.AMM_LOG_LEVEL;

  return new Config(overrides);
}
