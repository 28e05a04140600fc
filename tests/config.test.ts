/**
 * Configuration Tests
 */

import { Config, DEFAULT_BATCH_WINDOWS, loadConfigFromEnv } from '../src/config';
import { ConfigurationError } from '../src/errors';
import { TREASURY } from './fixtures';

describe('Config', () => {
  it('should start from the defaults', () => {
    const config = new Config();
    expect(config.minimumLiquidity).toBe(1000n);
    expect(config.commitRevealWindow).toBe(256);
    expect(config.protocolFeeBps).toBe(0);
    expect(config.protocolTreasury).toBeUndefined();
    expect(config.logLevel).toBe('INFO');
    expect(config.batchWindow(2)).toEqual({ cycleLength: 5, settlementBlocks: 2, enabled: true });
    expect(config.batchWindow(7)).toEqual({ cycleLength: 300, settlementBlocks: 60, enabled: true });
    expect(config.batchWindow(8)).toBeUndefined();
  });

  it('should reject a protocol fee above 50%', () => {
    expect(() => new Config({ protocolFeeBps: 6000 })).toThrow(ConfigurationError);
  });

  it('should reject a window whose settlement exceeds its cycle', () => {
    const windows = DEFAULT_BATCH_WINDOWS.map((window) => ({ ...window }));
    windows[0] = { cycleLength: 2, settlementBlocks: 3, enabled: true };
    expect(() => new Config({ batchWindows: windows })).toThrow(
      expect.objectContaining({ code: 'INVALID_CONFIGURATION' })
    );
  });

  it('should validate updates and keep the previous values on failure', () => {
    const config = new Config();
    config.update({ commitRevealWindow: 10 });
    expect(config.commitRevealWindow).toBe(10);

    expect(() => config.update({ commitRevealWindow: 0 })).toThrow(ConfigurationError);
    expect(config.commitRevealWindow).toBe(10);
  });

  it('should hand out a frozen copy', () => {
    const snapshot = new Config().getConfig();
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});

describe('loadConfigFromEnv', () => {
  it('should read overrides from the environment', () => {
    const config = loadConfigFromEnv({
      AMM_MINIMUM_LIQUIDITY: '500',
      AMM_COMMIT_REVEAL_WINDOW: '20',
      AMM_PROTOCOL_FEE_BPS: '700',
      AMM_PROTOCOL_TREASURY: TREASURY,
      AMM_LOG_LEVEL: 'WARN',
    });

    expect(config.minimumLiquidity).toBe(500n);
    expect(config.commitRevealWindow).toBe(20);
    expect(config.protocolFeeBps).toBe(700);
    expect(config.protocolTreasury).toBe(TREASURY);
    expect(config.logLevel).toBe('WARN');
  });

  it('should fall back to the defaults for unset variables', () => {
    expect(loadConfigFromEnv({}).commitRevealWindow).toBe(256);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfigFromEnv({ AMM_LOG_LEVEL: 'LOUD' })).toThrow(ConfigurationError);
  });

  it('should reject a malformed treasury address', () => {
    expect(() => loadConfigFromEnv({ AMM_PROTOCOL_TREASURY: 'treasury' })).toThrow(ConfigurationError);
  });
});
