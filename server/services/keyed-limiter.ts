import pLimit, { type LimitFunction } from 'p-limit';

/**
 * One single-writer queue per key: tasks sharing a key run one after another,
 * tasks with different keys run freely.
 */
export class KeyedLimiter {
  private limits = new Map<string, LimitFunction>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let limit = this.limits.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.limits.set(key, limit);
    }

    const current = limit;
    return current(task).finally(() => {
      if (current.activeCount === 0 && current.pendingCount === 0 && this.limits.get(key) === current) {
        this.limits.delete(key);
      }
    });
  }

  get size(): number {
    return this.limits.size;
  }
}
