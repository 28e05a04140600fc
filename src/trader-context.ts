/**
 * Trader context payload appended to routed payloads when a pool's marking
 * sets the enhanced-context bit:
 * abi.encode(uint256 timestamp, uint256 blockNumber, uint256 gasPrice, bool sessionActive)
 */

import { AbiCoder } from 'ethers';
import { EMPTY_BYTES } from './types';
import type { HexBytes, TraderContext } from './types';

const TRADER_CONTEXT_TYPES = ['uint256', 'uint256', 'uint256', 'bool'] as const;

export function encodeTraderContext(context: TraderContext): HexBytes {
  return AbiCoder.defaultAbiCoder().encode(TRADER_CONTEXT_TYPES, [
    context.timestamp,
    context.blockNumber,
    context.gasPrice,
    context.sessionActive,
  ]);
}

export function decodeTraderContext(payload: HexBytes): TraderContext | null {
  if (payload === EMPTY_BYTES) return null;
  try {
    const [timestamp, blockNumber, gasPrice, sessionActive] = AbiCoder.defaultAbiCoder().decode(
      TRADER_CONTEXT_TYPES,
      payload
    );
    return {
      timestamp: Number(timestamp),
      blockNumber: Number(blockNumber),
      gasPrice: BigInt(gasPrice),
      sessionActive: Boolean(sessionActive),
    };
  } catch {
    return null;
  }
}
