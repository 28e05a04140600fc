/**
 * Marking Codec
 *
 * 24-bit pool marking layout (wire-stable):
 *   bit  0      enhanced-context flag, also the flag of default bridge 0
 *   bits 0..3   default bridges 0..3
 *   bits 4..19  bucket id
 *   bits 20..23 extra bridge slot (0 none, 1..14 configurable, 15 consolidated)
 *
 * 32-bit trader protection word (per call, never part of the pool id):
 *   bits 0..3   access-control mode
 *   bits 4..7   volume-control mode
 *   bit  8      atomic execution enabled
 *   bits 9..11  batch mode (0 session-only, 1..7 batch window)
 *   bits 12..15 circuit-breaker mode
 *   bits 16..31 reserved
 *
 * All functions are total: out-of-range inputs are masked, never rejected.
 */

import type { MarkingFields, TraderProtection } from './types';

export const MARKING_MASK = 0xffffff;
export const ENHANCED_CONTEXT_FLAG = 0x1;
export const BRIDGE_FLAGS_MASK = 0xf;
export const BUCKET_SHIFT = 4;
export const BUCKET_MASK = 0xffff;
export const EXTRA_SLOT_SHIFT = 20;
export const EXTRA_SLOT_MASK = 0xf;
export const NO_EXTRA_SLOT = 0;
export const CONSOLIDATED_SLOT = 15;

export const ACCESS_CONTROL_MASK = 0xf;
export const VOLUME_CONTROL_SHIFT = 4;
export const ATOMIC_EXECUTION_FLAG = 0x100;
export const BATCH_MODE_SHIFT = 9;
export const BATCH_MODE_MASK = 0x7;
export const CIRCUIT_BREAKER_SHIFT = 12;
export const MODE_MASK = 0xf;

export function decodeMarking(marking: number): MarkingFields {
  const word = (marking >>> 0) & MARKING_MASK;
  const bridgeFlags = [
    (word & 0x1) !== 0,
    (word & 0x2) !== 0,
    (word & 0x4) !== 0,
    (word & 0x8) !== 0,
  ] as const;

  return {
    bridgeFlags,
    bucketId: (word >>> BUCKET_SHIFT) & BUCKET_MASK,
    extraSlot: (word >>> EXTRA_SLOT_SHIFT) & EXTRA_SLOT_MASK,
    enhancedContext: (word & ENHANCED_CONTEXT_FLAG) !== 0,
  };
}

export function encodeMarking(fields: MarkingFields): number {
  let word = 0;
  fields.bridgeFlags.forEach((enabled, index) => {
    if (enabled) word |= 1 << index;
  });
  if (fields.enhancedContext) word |= ENHANCED_CONTEXT_FLAG;
  word |= (fields.bucketId & BUCKET_MASK) << BUCKET_SHIFT;
  word |= (fields.extraSlot & EXTRA_SLOT_MASK) << EXTRA_SLOT_SHIFT;
  return word >>> 0;
}

/** Marking as the 3-byte hex string used in pool id derivation */
export function markingToBytes3(marking: number): string {
  const word = (marking >>> 0) & MARKING_MASK;
  return `0x${word.toString(16).padStart(6, '0')}`;
}

export function markingFromBytes3(hex: string): number {
  return Number.parseInt(hex.slice(2), 16) & MARKING_MASK;
}

export function decodeTraderProtection(word: number): TraderProtection {
  const value = word >>> 0;
  return {
    accessControlMode: value & ACCESS_CONTROL_MASK,
    volumeControlMode: (value >>> VOLUME_CONTROL_SHIFT) & MODE_MASK,
    atomicExecution: (value & ATOMIC_EXECUTION_FLAG) !== 0,
    batchMode: (value >>> BATCH_MODE_SHIFT) & BATCH_MODE_MASK,
    circuitBreakerMode: (value >>> CIRCUIT_BREAKER_SHIFT) & MODE_MASK,
  };
}

export function encodeTraderProtection(protection: TraderProtection): number {
  let word = protection.accessControlMode & ACCESS_CONTROL_MASK;
  word |= (protection.volumeControlMode & MODE_MASK) << VOLUME_CONTROL_SHIFT;
  if (protection.atomicExecution) word |= ATOMIC_EXECUTION_FLAG;
  word |= (protection.batchMode & BATCH_MODE_MASK) << BATCH_MODE_SHIFT;
  word |= (protection.circuitBreakerMode & MODE_MASK) << CIRCUIT_BREAKER_SHIFT;
  return word >>> 0;
}

export const NO_PROTECTION: TraderProtection = decodeTraderProtection(0);
