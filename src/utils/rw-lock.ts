/**
 * Async read/write lock
 *
 * Any number of readers may hold the lock together; a writer holds it
 * alone. Waiters are served in arrival order and a queued writer blocks
 * readers that arrive after it, so a stream of reads cannot starve a
 * mutation.
 */

type Waiter = {
  mode: 'read' | 'write';
  grant: () => void;
};

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private queue: Waiter[] = [];

  /**
   * Run `operation` while holding a shared read lock
   */
  async withRead<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.acquire('read');
    try {
      return await operation();
    } finally {
      this.release('read');
    }
  }

  /**
   * Run `operation` while holding the exclusive write lock
   */
  async withWrite<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.acquire('write');
    try {
      return await operation();
    } finally {
      this.release('write');
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get writing(): boolean {
    return this.writerActive;
  }

  get pending(): number {
    return this.queue.length;
  }

  private acquire(mode: 'read' | 'write'): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      this.queue.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        }
      });
    });
  }

  private release(mode: 'read' | 'write'): void {
    if (mode === 'write') {
      this.writerActive = false;
    } else {
      this.activeReaders--;
    }
    this.drain();
  }

  private canGrant(mode: 'read' | 'write'): boolean {
    if (this.writerActive) return false;
    return mode === 'read' || this.activeReaders === 0;
  }

  private take(mode: 'read' | 'write'): void {
    if (mode === 'write') {
      this.writerActive = true;
    } else {
      this.activeReaders++;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!next || !this.canGrant(next.mode)) return;
      this.queue.shift();
      next.grant();
      if (next.mode === 'write') return;
    }
  }
}
