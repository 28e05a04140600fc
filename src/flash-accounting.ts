/**
 * Flash Accounting Session
 *
 * Per-owner transient ledger of signed (user, token) deltas. While a
 * session is active for a user, operations accumulate here instead of
 * transferring; settlement pays or pulls the net amount per token once.
 *
 * Sign convention: a positive delta is owed TO the user, a negative delta
 * is owed BY the user.
 */

import { ZeroAddress } from 'ethers';
import { SessionError } from './errors';
import type { Address, Checkpointable, Rollback, SettledDelta } from './types';

/** The native asset is tracked under the zero address */
export const NATIVE_TOKEN: Address = ZeroAddress;

/** Moves settled amounts; implemented by the engine against its vault */
export interface SettlementSink {
  /** Pay `amount` of `token` to `user` */
  pay(user: Address, token: Address, amount: bigint): void;
  /** Collect `amount` of `token` from `user` */
  collect(user: Address, token: Address, amount: bigint): void;
}

const keyOf = (address: Address): string => address.toLowerCase();

export class FlashAccountingSession implements Checkpointable {
  private sessions = new Set<string>();
  private deltas = new Map<string, Map<string, { token: Address; amount: bigint }>>();
  private activeUser: Address | null = null;

  startSession(owner: Address): void {
    const key = keyOf(owner);
    if (this.sessions.has(key)) {
      throw new SessionError(`Session already active for ${owner}`, 'SESSION_ALREADY_ACTIVE');
    }
    this.sessions.add(key);
  }

  /**
   * Close the owner's session. Every delta must have been settled.
   */
  endSession(owner: Address): void {
    const key = keyOf(owner);
    if (!this.sessions.has(key)) {
      throw new SessionError(`No active session for ${owner}`, 'NO_ACTIVE_SESSION');
    }
    const residual = this.pendingDeltas(owner);
    if (residual.length > 0) {
      throw new SessionError(
        `Session for ${owner} has unsettled deltas in ${residual.map((line) => line.token).join(', ')}`,
        'UNSETTLED_DELTAS'
      );
    }
    this.sessions.delete(key);
    this.deltas.delete(key);
    if (this.activeUser && keyOf(this.activeUser) === key) {
      this.activeUser = null;
    }
  }

  /** Dispatch gate: true defers settlement, false settles immediately */
  isSessionActive(user: Address): boolean {
    return this.sessions.has(keyOf(user));
  }

  setActiveUser(user: Address): void {
    this.activeUser = user;
  }

  getActiveUser(): Address | null {
    return this.activeUser;
  }

  clearActiveUser(): void {
    this.activeUser = null;
  }

  /** Accumulate a signed delta; never overwrites */
  addDelta(user: Address, token: Address, amount: bigint): void {
    if (amount === 0n) return;
    const userKey = keyOf(user);
    const ledger = this.deltas.get(userKey) ?? new Map<string, { token: Address; amount: bigint }>();
    const tokenKey = keyOf(token);
    const current = ledger.get(tokenKey);
    ledger.set(tokenKey, { token, amount: (current?.amount ?? 0n) + amount });
    this.deltas.set(userKey, ledger);
  }

  getDelta(user: Address, token: Address): bigint {
    return this.deltas.get(keyOf(user))?.get(keyOf(token))?.amount ?? 0n;
  }

  /** Non-zero deltas still owed by or to the user */
  pendingDeltas(user: Address): SettledDelta[] {
    const ledger = this.deltas.get(keyOf(user));
    if (!ledger) return [];
    return [...ledger.values()]
      .filter((entry) => entry.amount !== 0n)
      .map((entry) => ({ token: entry.token, delta: entry.amount }));
  }

  /** Tokens with a non-zero delta */
  touchedTokens(user: Address): Address[] {
    return this.pendingDeltas(user).map((line) => line.token);
  }

  /**
   * Settle the listed tokens for `user`: pulls first, then payouts, each
   * delta zeroed once moved. Native value already supplied offsets what the
   * user owes in the native token; any excess is refunded.
   *
   * Settling an already-settled token is a no-op.
   */
  settle(
    user: Address,
    tokens: Address[],
    nativeValueSupplied: bigint,
    sink: SettlementSink
  ): SettledDelta[] {
    if (nativeValueSupplied < 0n) {
      throw new SessionError('Native value cannot be negative', 'INVALID_NATIVE_VALUE');
    }
    if (nativeValueSupplied > 0n) {
      this.addDelta(user, NATIVE_TOKEN, nativeValueSupplied);
    }

    const unique = new Map<string, Address>();
    for (const token of tokens) unique.set(keyOf(token), token);
    if (nativeValueSupplied > 0n) unique.set(keyOf(NATIVE_TOKEN), NATIVE_TOKEN);

    const lines: SettledDelta[] = [...unique.values()]
      .map((token) => ({ token, delta: this.getDelta(user, token) }))
      .filter((line) => line.delta !== 0n);

    for (const line of lines.filter((entry) => entry.delta < 0n)) {
      sink.collect(user, line.token, -line.delta);
      this.zero(user, line.token);
    }
    for (const line of lines.filter((entry) => entry.delta > 0n)) {
      sink.pay(user, line.token, line.delta);
      this.zero(user, line.token);
    }
    return lines;
  }

  checkpoint(): Rollback {
    const sessions = new Set(this.sessions);
    const deltas = new Map(
      [...this.deltas].map(([user, ledger]) => [user, new Map(ledger)] as const)
    );
    const activeUser = this.activeUser;
    return () => {
      this.sessions = sessions;
      this.deltas = deltas;
      this.activeUser = activeUser;
    };
  }

  private zero(user: Address, token: Address): void {
    this.deltas.get(keyOf(user))?.delete(keyOf(token));
  }
}
