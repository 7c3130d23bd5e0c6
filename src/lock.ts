/**
 * Promise-chain mutex. Each run() waits for the previous holder to settle,
 * whether it resolved or rejected.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const prior = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await prior;
    try {
      return await operation();
    } finally {
      release();
    }
  }
}

/**
 * One Mutex per key, created on demand and dropped once nobody is waiting on it.
 */
export class KeyedMutex {
  private locks = new Map<string, { mutex: Mutex; holders: number }>();

  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = { mutex: new Mutex(), holders: 0 };
      this.locks.set(key, lock);
    }
    lock.holders++;

    try {
      return await lock.mutex.run(operation);
    } finally {
      lock.holders--;
      // Only delete if this is still the current lock for this key
      if (lock.holders === 0 && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys with a holder or waiter. */
  get size(): number {
    return this.locks.size;
  }
}
