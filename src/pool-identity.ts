/**
 * Pool Identity
 *
 * A pool is identified by its canonical asset pair, strategy handle and
 * marking. The packed identifier is solidityPacked(address, address,
 * address, bytes3) (63 bytes) and round-trips losslessly; the pool id is
 * its keccak256, matching on-chain derivations of the same key.
 */

import { dataLength, dataSlice, getAddress, isHexString, keccak256, solidityPacked } from 'ethers';
import { ConfigurationError } from './errors';
import { markingFromBytes3, markingToBytes3, MARKING_MASK } from './marking';
import { addressSchema, parseParam } from './validation';
import type { Address, HexBytes, PoolId, PoolKey } from './types';

const PACKED_KEY_LENGTH = 20 + 20 + 20 + 3;

/**
 * Order two assets by address value (case-insensitive).
 */
export function canonicalize(assetA: Address, assetB: Address): [Address, Address] {
  const a = parseParam(addressSchema, assetA, 'asset');
  const b = parseParam(addressSchema, assetB, 'asset');
  if (a.toLowerCase() === b.toLowerCase()) {
    throw new ConfigurationError(`Pool assets must differ: ${a}`, 'IDENTICAL_ASSETS');
  }
  return a.toLowerCase() < b.toLowerCase() ? [a, b] : [b, a];
}

/** Whether `asset` is the canonical asset0 of the pair */
export function isAsset0(asset: Address, other: Address): boolean {
  return asset.toLowerCase() < other.toLowerCase();
}

/** Canonical pool key for caller-ordered inputs */
export function toPoolKey(
  assetA: Address,
  assetB: Address,
  strategy: Address,
  marking: number
): PoolKey {
  const [asset0, asset1] = canonicalize(assetA, assetB);
  return {
    asset0,
    asset1,
    strategy: parseParam(addressSchema, strategy, 'strategy'),
    marking: (marking >>> 0) & MARKING_MASK,
  };
}

/**
 * Pack a pool key. Asset order of the inputs does not matter.
 */
export function assemble(
  assetA: Address,
  assetB: Address,
  strategy: Address,
  marking: number
): HexBytes {
  const key = toPoolKey(assetA, assetB, strategy, marking);
  return solidityPacked(
    ['address', 'address', 'address', 'bytes3'],
    [key.asset0, key.asset1, key.strategy, markingToBytes3(key.marking)]
  );
}

/**
 * Inverse of assemble.
 */
export function disassemble(packed: HexBytes): PoolKey {
  if (!isHexString(packed) || dataLength(packed) !== PACKED_KEY_LENGTH) {
    throw new ConfigurationError(
      `Packed pool identifier must be ${PACKED_KEY_LENGTH} bytes`,
      'INVALID_POOL_IDENTIFIER'
    );
  }

  const asset0 = getAddress(dataSlice(packed, 0, 20));
  const asset1 = getAddress(dataSlice(packed, 20, 40));
  if (!isAsset0(asset0, asset1)) {
    throw new ConfigurationError('Packed pool identifier is not canonical', 'INVALID_POOL_IDENTIFIER');
  }

  return {
    asset0,
    asset1,
    strategy: getAddress(dataSlice(packed, 40, 60)),
    marking: markingFromBytes3(dataSlice(packed, 60, 63)),
  };
}

export function poolIdFromPacked(packed: HexBytes): PoolId {
  return keccak256(packed);
}

export function derivePoolId(key: PoolKey): PoolId {
  return poolIdFromPacked(assemble(key.asset0, key.asset1, key.strategy, key.marking));
}
