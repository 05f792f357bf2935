// src/common/utils/keyed-mutex.util.ts

/**
 * 按键加锁的互斥量
 *
 * 同一个 key 上的任务按提交顺序依次执行（FIFO），不同 key 之间互不阻塞。
 * 任务失败不会影响后续排队的任务。
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(() => task());
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      // 队尾仍是自己时清理，避免 key 无限增长
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
