/**
 * Block Context
 * Block number, timestamp and gas price seen by the engine
 */

import type { BlockContext } from './types';

export interface ManualBlockContextOptions {
  blockNumber?: number;
  timestamp?: number;
  /** Seconds added to the timestamp per mined block */
  blockTime?: number;
  gasPrice?: bigint;
}

/**
 * Block context advanced explicitly; used for simulation and tests.
 */
export class ManualBlockContext implements BlockContext {
  private blockNumber: number;
  private timestamp: number;
  private readonly blockTime: number;
  private gasPrice: bigint;

  constructor(options: ManualBlockContextOptions = {}) {
    this.blockNumber = options.blockNumber ?? 1;
    this.timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);
    this.blockTime = options.blockTime ?? 12;
    this.gasPrice = options.gasPrice ?? 1_000_000_000n;
  }

  getBlockNumber(): number {
    return this.blockNumber;
  }

  getTimestamp(): number {
    return this.timestamp;
  }

  getGasPrice(): bigint {
    return this.gasPrice;
  }

  /** Advance by `blocks` blocks */
  mine(blocks = 1): void {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new RangeError(`Cannot mine ${blocks} blocks`);
    }
    this.blockNumber += blocks;
    this.timestamp += blocks * this.blockTime;
  }

  /** Jump to an absolute block number (forward only) */
  mineTo(blockNumber: number): void {
    this.mine(blockNumber - this.blockNumber);
  }

  setGasPrice(gasPrice: bigint): void {
    this.gasPrice = gasPrice;
  }
}
