/**
 * Commit-Reveal
 *
 * A trader commits to a hash of their swap parameters, then reveals them
 * in a later block. The reveal is legal only for blocks in
 * (blockCommitted, blockCommitted + window]; each commitment is consumed
 * once and advances the trader's nonce.
 *
 * Commitment formula (matches an on-chain keccak256(abi.encode(...))):
 *   keccak256(abi.encode(address assetIn, address assetOut, address strategy,
 *     bytes3 marking, uint256 amountIn, bool zeroForOne, uint256 minAmountOut,
 *     uint64 nonce, address trader, bytes32 salt))
 */

import { AbiCoder, keccak256 } from 'ethers';
import { MevProtectionError } from '../errors';
import { markingToBytes3 } from '../marking';
import type { Address, Checkpointable, HexBytes, Rollback } from '../types';

const COMMITMENT_TYPES = [
  'address',
  'address',
  'address',
  'bytes3',
  'uint256',
  'bool',
  'uint256',
  'uint64',
  'address',
  'bytes32',
] as const;

export interface CommitmentInput {
  assetIn: Address;
  assetOut: Address;
  strategy: Address;
  marking: number;
  amountIn: bigint;
  zeroForOne: boolean;
  minAmountOut: bigint;
  nonce: bigint;
  trader: Address;
  salt: HexBytes;
}

export function computeCommitment(input: CommitmentInput): HexBytes {
  return keccak256(
    AbiCoder.defaultAbiCoder().encode(COMMITMENT_TYPES, [
      input.assetIn,
      input.assetOut,
      input.strategy,
      markingToBytes3(input.marking),
      input.amountIn,
      input.zeroForOne,
      input.minAmountOut,
      input.nonce,
      input.trader,
      input.salt,
    ])
  );
}

export interface CommitRecord {
  commitmentHash: HexBytes;
  blockCommitted: number;
  traderNonce: bigint;
}

const traderKey = (trader: Address): string => trader.toLowerCase();

export class CommitRevealRegistry implements Checkpointable {
  private commitments = new Map<string, CommitRecord>();
  private nonces = new Map<string, bigint>();

  /**
   * @param window - Reveal window length in blocks, read on every check
   */
  constructor(private readonly window: () => number) {}

  getNonce(trader: Address): bigint {
    return this.nonces.get(traderKey(trader)) ?? 0n;
  }

  getCommitment(trader: Address): CommitRecord | undefined {
    return this.commitments.get(traderKey(trader));
  }

  /**
   * Record a commitment. A trader holds at most one pending commitment;
   * an expired one may be replaced.
   */
  commit(trader: Address, commitmentHash: HexBytes, blockNumber: number): CommitRecord {
    const pending = this.getCommitment(trader);
    if (pending && blockNumber <= pending.blockCommitted + this.window()) {
      throw new MevProtectionError(
        `Trader ${trader} already has a pending commitment from block ${pending.blockCommitted}`,
        'COMMITMENT_PENDING'
      );
    }

    const record: CommitRecord = {
      commitmentHash: commitmentHash.toLowerCase(),
      blockCommitted: blockNumber,
      traderNonce: this.getNonce(trader),
    };
    this.commitments.set(traderKey(trader), record);
    return record;
  }

  /**
   * Check a reveal and consume the commitment. Checks run in order:
   * existence, nonce, hash, too new, expired.
   */
  reveal(trader: Address, commitmentHash: HexBytes, nonce: bigint, blockNumber: number): CommitRecord {
    const record = this.getCommitment(trader);
    if (!record) {
      throw new MevProtectionError(`No commitment for ${trader}`, 'INVALID_COMMITMENT');
    }
    const liveNonce = this.getNonce(trader);
    if (nonce !== liveNonce) {
      throw new MevProtectionError(`Nonce ${nonce} does not match ${liveNonce}`, 'INVALID_NONCE');
    }
    if (record.commitmentHash !== commitmentHash.toLowerCase()) {
      throw new MevProtectionError('Revealed parameters do not match commitment', 'INVALID_COMMITMENT');
    }
    if (blockNumber <= record.blockCommitted) {
      throw new MevProtectionError(
        `Reveal in block ${blockNumber} must follow commit block ${record.blockCommitted}`,
        'COMMITMENT_TOO_NEW'
      );
    }
    if (blockNumber > record.blockCommitted + this.window()) {
      throw new MevProtectionError(
        `Commitment from block ${record.blockCommitted} expired at block ${record.blockCommitted + this.window()}`,
        'COMMITMENT_EXPIRED'
      );
    }

    this.commitments.delete(traderKey(trader));
    this.nonces.set(traderKey(trader), liveNonce + 1n);
    return record;
  }

  checkpoint(): Rollback {
    const commitments = new Map(this.commitments);
    const nonces = new Map(this.nonces);
    return () => {
      this.commitments = commitments;
      this.nonces = nonces;
    };
  }
}
