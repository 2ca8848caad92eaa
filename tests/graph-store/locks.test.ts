/**
 * Unit tests for the keyed lock manager
 */
import { NodeLockManager, candidateLockKey, caseLockKey } from '../../src/graph-store/locks';

describe('NodeLockManager', () => {
  it('runs holders of the same key one after another', async () => {
    const locks = new NodeLockManager();
    const order: string[] = [];

    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = locks.withLocks(['tn-1'], async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = locks.withLocks(['tn-1'], async () => {
      order.push('second');
    });

    await new Promise(resolve => setImmediate(resolve));
    expect(order).toEqual(['first:start']);
    expect(locks.isLocked('tn-1')).toBe(true);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.size).toBe(0);
  });

  it('does not block writers on different keys', async () => {
    const locks = new NodeLockManager();
    const release = await locks.acquire(['tn-1']);

    await expect(locks.withLocks(['tn-2'], async () => 'done')).resolves.toBe('done');

    release();
    expect(locks.isLocked('tn-1')).toBe(false);
  });

  it('takes overlapping key sets without deadlocking', async () => {
    const locks = new NodeLockManager();

    const results = await Promise.all([
      locks.withLocks(['tn-2', 'tn-1'], async () => 'a'),
      locks.withLocks(['tn-1', 'tn-2'], async () => 'b'),
      locks.withLocks(['tn-2', 'tn-2'], async () => 'c'),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(locks.size).toBe(0);
  });

  it('releases after a failure', async () => {
    const locks = new NodeLockManager();

    await expect(
      locks.withLocks(['tn-1'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(locks.isLocked('tn-1')).toBe(false);
  });

  it('ignores a second release', async () => {
    const locks = new NodeLockManager();
    const release = await locks.acquire(['tn-1']);
    release();
    release();
    expect(locks.size).toBe(0);
  });

  it('prefixes candidate and case keys', () => {
    expect(candidateLockKey('c1')).toBe('candidate:c1');
    expect(caseLockKey('k1')).toBe('case:k1');
  });
});
