/**
 * Atomic Execution
 *
 * Trader opt-in gate: with the atomic flag set, a swap must run inside the
 * beneficiary's flash session and, for batch modes 1..7, inside the
 * settlement blocks of the selected batch window. An emergency mode forces
 * the gate on for every swap.
 */

import { ConfigurationError, MevProtectionError } from '../errors';
import { BATCH_MODE_MASK } from '../marking';
import type { Config } from '../config';
import type { BatchWindowConfig, TraderProtection } from '../types';

export const SESSION_ONLY_MODE = 0;

export function isBatchWindowActive(window: BatchWindowConfig, blockNumber: number): boolean {
  return window.enabled && blockNumber % window.cycleLength < window.settlementBlocks;
}

export class AtomicExecutionGate {
  private emergencyMode: number | null = null;

  constructor(private readonly config: Config) {}

  /** Force atomic execution with `mode` for everyone; null lifts it */
  setEmergencyBatchMode(mode: number | null): void {
    if (mode !== null && (!Number.isInteger(mode) || mode < 0 || mode > BATCH_MODE_MASK)) {
      throw new ConfigurationError(`Batch mode ${mode} outside 0..${BATCH_MODE_MASK}`, 'INVALID_PARAMETER');
    }
    this.emergencyMode = mode;
  }

  getEmergencyBatchMode(): number | null {
    return this.emergencyMode;
  }

  /** Protection actually applied once the emergency switch is considered */
  effective(protection: TraderProtection): TraderProtection {
    if (this.emergencyMode === null) return protection;
    return { ...protection, atomicExecution: true, batchMode: this.emergencyMode };
  }

  check(protection: TraderProtection, sessionActive: boolean, blockNumber: number): void {
    const applied = this.effective(protection);
    if (!applied.atomicExecution) return;

    if (!sessionActive) {
      throw new MevProtectionError(
        'Atomic execution requires an active flash session',
        'ATOMIC_EXECUTION_REQUIRED'
      );
    }
    if (applied.batchMode === SESSION_ONLY_MODE) return;

    const window = this.config.batchWindow(applied.batchMode);
    if (!window || !window.enabled) {
      throw new MevProtectionError(`Batch mode ${applied.batchMode} is disabled`, 'BATCH_WINDOW_DISABLED');
    }
    if (!isBatchWindowActive(window, blockNumber)) {
      throw new MevProtectionError(
        `Block ${blockNumber} is outside batch window ${applied.batchMode} (cycle ${window.cycleLength}, settle ${window.settlementBlocks})`,
        'OUTSIDE_BATCH_WINDOW'
      );
    }
  }
}
