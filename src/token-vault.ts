/**
 * In-memory token vault
 *
 * Balance bookkeeping for the engine's settlement transfers. Transfers are
 * all-or-nothing per call; checkpoints let the engine undo a whole
 * transaction's transfers.
 */

import { InsufficientBalanceError } from './errors';
import type { Address, Rollback, TokenVault } from './types';

const entryKey = (token: Address, account: Address): string =>
  `${token.toLowerCase()}:${account.toLowerCase()}`;

export class InMemoryTokenVault implements TokenVault {
  private balances = new Map<string, bigint>();

  balanceOf(token: Address, account: Address): bigint {
    return this.balances.get(entryKey(token, account)) ?? 0n;
  }

  /** Credit new units to an account (test and simulation funding) */
  mint(token: Address, account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('Cannot mint a negative amount');
    }
    this.balances.set(entryKey(token, account), this.balanceOf(token, account) + amount);
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('Cannot transfer a negative amount');
    }
    if (amount === 0n) return;

    const available = this.balanceOf(token, from);
    if (available < amount) {
      throw new InsufficientBalanceError(token, from, amount, available);
    }
    this.balances.set(entryKey(token, from), available - amount);
    this.balances.set(entryKey(token, to), this.balanceOf(token, to) + amount);
  }

  checkpoint(): Rollback {
    const saved = new Map(this.balances);
    return () => {
      this.balances = saved;
    };
  }
}
