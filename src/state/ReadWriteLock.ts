export type Release = () => void;

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export interface ReadWriteLockStats {
  activeReaders: number;
  writerActive: boolean;
  pendingReaders: number;
  pendingWriters: number;
}

/**
 * Async shared/exclusive lock.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are granted in arrival order, and a queued writer blocks readers
 * that arrive after it so a steady stream of reads cannot starve writes.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private queue: Waiter[] = [];

  acquireRead(): Promise<Release> {
    if (!this.writerActive && this.queue.length === 0) {
      this.activeReaders++;
      return Promise.resolve(this.createRelease('read'));
    }
    return this.enqueue('read');
  }

  acquireWrite(): Promise<Release> {
    if (!this.writerActive && this.activeReaders === 0 && this.queue.length === 0) {
      this.writerActive = true;
      return Promise.resolve(this.createRelease('write'));
    }
    return this.enqueue('write');
  }

  /**
   * Run fn while holding shared access
   */
  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run fn while holding exclusive access
   */
  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  getStats(): ReadWriteLockStats {
    return {
      activeReaders: this.activeReaders,
      writerActive: this.writerActive,
      pendingReaders: this.queue.filter(waiter => waiter.mode === 'read').length,
      pendingWriters: this.queue.filter(waiter => waiter.mode === 'write').length
    };
  }

  private enqueue(mode: LockMode): Promise<Release> {
    return new Promise<Release>(resolve => {
      this.queue.push({
        mode,
        grant: () => resolve(this.createRelease(mode))
      });
    });
  }

  private createRelease(mode: LockMode): Release {
    let released = false;
    return () => {
      if (released) {
        throw new Error(`ReadWriteLock ${mode} access released twice`);
      }
      released = true;

      if (mode === 'write') {
        this.writerActive = false;
      } else {
        this.activeReaders--;
      }
      this.dispatch();
    };
  }

  /**
   * Grant the head of the queue: one writer, or every consecutive reader
   */
  private dispatch(): void {
    if (this.writerActive) {
      return;
    }

    const head = this.queue[0];
    if (!head) {
      return;
    }

    if (head.mode === 'write') {
      if (this.activeReaders > 0) {
        return;
      }
      this.queue.shift();
      this.writerActive = true;
      head.grant();
      return;
    }

    while (this.queue.length > 0 && this.queue[0].mode === 'read') {
      const reader = this.queue.shift();
      if (reader) {
        this.activeReaders++;
        reader.grant();
      }
    }
  }
}
