/**
 * Execution Isolation Tests
 */

import { AsyncMutex, ReentrancyGuard, TransactionScope } from '../src/concurrency';
import { ReentrancyError } from '../src/errors';
import type { Checkpointable, Rollback } from '../src/types';

class Counter implements Checkpointable {
  value = 0;

  checkpoint(): Rollback {
    const saved = this.value;
    return () => {
      this.value = saved;
    };
  }
}

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('AsyncMutex', () => {
  it('should run exclusive sections one at a time in call order', async () => {
    const mutex = new AsyncMutex();
    const order: string[] = [];

    await Promise.all(
      ['a', 'b', 'c'].map((name) =>
        mutex.runExclusive(async () => {
          order.push(`${name}:start`);
          await tick();
          order.push(`${name}:end`);
        })
      )
    );

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('should release the lock when the section throws', async () => {
    const mutex = new AsyncMutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(mutex.isLocked()).toBe(false);
  });
});

describe('TransactionScope', () => {
  it('should roll every participant back when the call throws', async () => {
    const counter = new Counter();
    const scope = new TransactionScope([counter]);

    await expect(
      scope.run(async () => {
        counter.value = 5;
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(counter.value).toBe(0);
  });

  it('should keep changes of a successful call', async () => {
    const counter = new Counter();
    const scope = new TransactionScope();
    scope.enlist(counter);

    await scope.run(async () => {
      counter.value = 3;
    });
    expect(counter.value).toBe(3);
    expect(scope.isActive()).toBe(false);
  });

  it('should give nested calls a savepoint of their own', async () => {
    const counter = new Counter();
    const scope = new TransactionScope([counter]);
    const depths: number[] = [];

    await scope.run(async () => {
      counter.value = 1;
      depths.push(scope.depth());
      await scope
        .run(async () => {
          depths.push(scope.depth());
          counter.value = 2;
          throw new Error('inner');
        })
        .catch((error: unknown) => {
          expect(error).toBeInstanceOf(Error);
        });
      counter.value += 10;
    });

    expect(depths).toEqual([1, 2]);
    expect(counter.value).toBe(11);
  });
});

describe('ReentrancyGuard', () => {
  it('should reject entering a held resource', async () => {
    const guard = new ReentrancyGuard();

    await guard.guard('pool:1', async () => {
      expect(guard.isHeld('pool:1')).toBe(true);
      expect(() => guard.enter('pool:1')).toThrow(ReentrancyError);
      const release = guard.enter('pool:2');
      release();
    });

    expect(guard.isHeld('pool:1')).toBe(false);
  });
});
