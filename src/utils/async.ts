/**
 * Async Coordination Primitives
 *
 * Serializes access to shared in-process state touched by concurrent requests.
 *
 * @module
 */

// =============================================================================
// Mutex
// =============================================================================

/**
 * A simple async mutex for serializing access to a shared resource.
 * Uses a FIFO queue so waiters are served in order.
 */
export class Mutex {
  private _locked = false;
  private _waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this._locked;
  }

  /** Acquires the mutex, waiting if it's currently held. */
  async acquire(): Promise<void> {
    if (!this._locked) {
      this._locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /** Releases the mutex, waking the next waiter if any. */
  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._locked = false;
    }
  }

  /** Runs a function while holding the mutex, releasing on completion. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// =============================================================================
// Readers/Writer Lock
// =============================================================================

type Waiter = { kind: "read" | "write"; wake: () => void };

/**
 * Many concurrent readers or one writer.
 *
 * Waiters are queued FIFO; a queued writer blocks readers that arrive after it,
 * so a steady stream of reads cannot starve a write.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  async acquireRead(): Promise<void> {
    if (!this.writing && this.queue.length === 0) {
      this.readers++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push({
        kind: "read",
        wake: () => {
          this.readers++;
          resolve();
        },
      });
    });
  }

  async acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0 && this.queue.length === 0) {
      this.writing = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push({
        kind: "write",
        wake: () => {
          this.writing = true;
          resolve();
        },
      });
    });
  }

  releaseRead(): void {
    this.readers--;
    this.drain();
  }

  releaseWrite(): void {
    this.writing = false;
    this.drain();
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  private drain(): void {
    if (this.writing) return;

    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!head) return;

      if (head.kind === "write") {
        if (this.readers > 0) return;
        this.queue.shift();
        head.wake();
        return;
      }

      this.queue.shift();
      head.wake();
    }
  }
}
