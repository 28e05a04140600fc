/**
 * Execution isolation
 *
 * - AsyncMutex serializes top-level entry points so no caller observes
 *   another call's partial state across an await.
 * - TransactionScope checkpoints every registered store on entry and rolls
 *   them all back when the call throws. Calls made from inside a running
 *   transaction (flash callbacks) join it with their own savepoint instead
 *   of waiting on the mutex.
 * - ReentrancyGuard blocks re-entry into a resource (a pool, a session
 *   owner) that is already mid-operation.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ReentrancyError } from './errors';
import type { Checkpointable, Rollback } from './types';

/**
 * Async mutex for mutual exclusion in async operations.
 */
export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquire the mutex, waiting if it is held.
   *
   * @returns A release function that MUST be called when done
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    }
    this.locked = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Hand the lock straight to the next waiter so no new caller can slip in
      const next = this.waitQueue.shift();
      if (next) {
        setImmediate(next);
      } else {
        this.locked = false;
      }
    };
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }
}

interface TransactionFrame {
  depth: number;
}

export class TransactionScope {
  private readonly mutex = new AsyncMutex();
  private readonly storage = new AsyncLocalStorage<TransactionFrame>();
  private readonly participants: Checkpointable[] = [];

  constructor(participants: Checkpointable[] = []) {
    this.participants.push(...participants);
  }

  enlist(participant: Checkpointable): void {
    this.participants.push(participant);
  }

  /** Whether the current async context is inside a transaction */
  isActive(): boolean {
    return this.storage.getStore() !== undefined;
  }

  depth(): number {
    return this.storage.getStore()?.depth ?? 0;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const frame = this.storage.getStore();
    if (frame) {
      return this.storage.run({ depth: frame.depth + 1 }, () => this.withSavepoint(fn));
    }

    return this.mutex.runExclusive(() =>
      this.storage.run({ depth: 1 }, () => this.withSavepoint(fn))
    );
  }

  private async withSavepoint<T>(fn: () => Promise<T>): Promise<T> {
    const rollbacks: Rollback[] = this.participants.map((participant) => participant.checkpoint());
    try {
      return await fn();
    } catch (error) {
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
      throw error;
    }
  }
}

export class ReentrancyGuard {
  private readonly held = new Set<string>();

  isHeld(resource: string): boolean {
    return this.held.has(resource);
  }

  enter(resource: string): () => void {
    if (this.held.has(resource)) {
      throw new ReentrancyError(resource);
    }
    this.held.add(resource);
    return () => {
      this.held.delete(resource);
    };
  }

  async guard<T>(resource: string, fn: () => Promise<T>): Promise<T> {
    const release = this.enter(resource);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export const poolResource = (poolId: string): string => `pool:${poolId}`;
export const sessionResource = (owner: string): string => `session:${owner.toLowerCase()}`;
