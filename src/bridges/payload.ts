/**
 * Price payload shared by the bundled bridges and the oracle-anchored
 * strategy: abi.encode(uint256 price1e18, uint256 updatedAt).
 *
 * price1e18 is the amount of asset1 (raw units) per raw unit of asset0,
 * scaled by 1e18.
 */

import { AbiCoder } from 'ethers';
import { EMPTY_BYTES } from '../types';
import type { HexBytes } from '../types';

const PRICE_PAYLOAD_TYPES = ['uint256', 'uint256'] as const;

export interface PricePayload {
  price1e18: bigint;
  updatedAt: number;
}

export function encodePricePayload(payload: PricePayload): HexBytes {
  return AbiCoder.defaultAbiCoder().encode(PRICE_PAYLOAD_TYPES, [
    payload.price1e18,
    payload.updatedAt,
  ]);
}

/** null for empty, malformed or zero-price payloads */
export function decodePricePayload(data: HexBytes): PricePayload | null {
  if (data === EMPTY_BYTES) return null;
  try {
    const [price, updatedAt] = AbiCoder.defaultAbiCoder().decode(PRICE_PAYLOAD_TYPES, data);
    const price1e18 = BigInt(price);
    if (price1e18 === 0n) return null;
    return { price1e18, updatedAt: Number(updatedAt) };
  } catch {
    return null;
  }
}
