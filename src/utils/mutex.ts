/**
 * FIFO lock for async critical sections. Callers queue behind the
 * previous holder; a section that throws still releases the lock.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => {};
    const held = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => held);
    this.pending++;

    let released = false;
    return previous.then(() => () => {
      if (released) return;
      released = true;
      this.pending--;
      release();
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
