/**
 * Atomic Execution Gate Tests
 */

import { AtomicExecutionGate, isBatchWindowActive } from '../src/mev';
import { Config, DEFAULT_BATCH_WINDOWS } from '../src/config';
import { NO_PROTECTION } from '../src/marking';
import type { TraderProtection } from '../src/types';

const atomic = (batchMode: number): TraderProtection => ({
  ...NO_PROTECTION,
  atomicExecution: true,
  batchMode,
});

describe('isBatchWindowActive', () => {
  it('should open the first settlement blocks of every cycle', () => {
    const window = { cycleLength: 5, settlementBlocks: 2, enabled: true };
    const open = Array.from({ length: 21 }, (_, block) => block).filter((block) =>
      isBatchWindowActive(window, block)
    );
    expect(open).toEqual([0, 1, 5, 6, 10, 11, 15, 16, 20]);
  });

  it('should stay closed when the window is disabled', () => {
    expect(isBatchWindowActive({ cycleLength: 5, settlementBlocks: 2, enabled: false }, 0)).toBe(false);
  });
});

describe('AtomicExecutionGate', () => {
  let config: Config;
  let gate: AtomicExecutionGate;

  beforeEach(() => {
    config = new Config();
    gate = new AtomicExecutionGate(config);
  });

  it('should let unprotected trades through', () => {
    expect(() => gate.check(NO_PROTECTION, false, 12)).not.toThrow();
  });

  it('should require a session in session-only mode', () => {
    expect(() => gate.check(atomic(0), false, 12)).toThrow(
      expect.objectContaining({ code: 'ATOMIC_EXECUTION_REQUIRED' })
    );
    expect(() => gate.check(atomic(0), true, 12)).not.toThrow();
  });

  it('should enforce the selected batch window', () => {
    // mode 2: cycle 5, settlement 2
    expect(() => gate.check(atomic(2), true, 10)).not.toThrow();
    expect(() => gate.check(atomic(2), true, 11)).not.toThrow();
    expect(() => gate.check(atomic(2), true, 12)).toThrow(
      expect.objectContaining({ code: 'OUTSIDE_BATCH_WINDOW' })
    );
  });

  it('should reject a disabled batch mode', () => {
    config.update({
      batchWindows: DEFAULT_BATCH_WINDOWS.map((window, index) =>
        index === 2 ? { ...window, enabled: false } : { ...window }
      ),
    });
    expect(() => gate.check(atomic(3), true, 0)).toThrow(
      expect.objectContaining({ code: 'BATCH_WINDOW_DISABLED' })
    );
  });

  it('should force protection on every trade in emergency mode', () => {
    gate.setEmergencyBatchMode(1);
    expect(gate.getEmergencyBatchMode()).toBe(1);

    // mode 1: cycle 2, settlement 1
    expect(() => gate.check(NO_PROTECTION, false, 4)).toThrow(
      expect.objectContaining({ code: 'ATOMIC_EXECUTION_REQUIRED' })
    );
    expect(() => gate.check(NO_PROTECTION, true, 3)).toThrow(
      expect.objectContaining({ code: 'OUTSIDE_BATCH_WINDOW' })
    );
    expect(() => gate.check(NO_PROTECTION, true, 4)).not.toThrow();

    gate.setEmergencyBatchMode(null);
    expect(() => gate.check(NO_PROTECTION, false, 3)).not.toThrow();
  });

  it('should override the trader batch mode in emergency mode', () => {
    gate.setEmergencyBatchMode(0);
    expect(gate.effective(atomic(5))).toEqual(atomic(0));
  });

  it('should reject emergency modes outside 0..7', () => {
    expect(() => gate.setEmergencyBatchMode(8)).toThrow(
      expect.objectContaining({ code: 'INVALID_PARAMETER' })
    );
  });
});
