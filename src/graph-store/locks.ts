/**
 * Keyed async locks for graph writes.
 *
 * Keys are node ids, `candidate:<id>`, `case:<id>` and the graph-wide
 * `spawn` key held while a new node is created. A writer that needs
 * several keys takes them in sorted order, so two writers touching the same
 * pair of nodes can never wait on each other in a cycle.
 */
import { logger } from '../utils/logger';

export type Release = () => void;

export class NodeLockManager {
  // key -> tail of the waiters queued on it
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Acquire every key, in sorted order
   * @returns a function releasing all of them
   */
  async acquire(keys: Iterable<string>): Promise<Release> {
    const ordered = [...new Set(keys)].sort();
    const releases: Release[] = [];

    for (const key of ordered) {
      releases.push(await this.acquireOne(key));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const release of releases.reverse()) release();
    };
  }

  async withLocks<T>(keys: Iterable<string>, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(keys);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }

  private async acquireOne(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: Release = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    logger.debug({ key }, 'Lock acquired');

    return () => {
      release();
      // Drop the entry once nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}

export function candidateLockKey(candidateId: string): string {
  return `candidate:${candidateId}`;
}

export function caseLockKey(caseId: string): string {
  return `case:${caseId}`;
}

export const SPAWN_LOCK_KEY = 'spawn';
