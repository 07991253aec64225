type LockMode = 'read' | 'write';

type Waiter = {
  mode: LockMode;
  grant: () => void;
};

/**
 * Many readers or one writer. Waiters are served in arrival order, so a queued
 * writer holds back readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;

  private writing = false;

  private readonly waiters: Waiter[] = [];

  async read<T>(action: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await action();
    } finally {
      this.release('read');
    }
  }

  async write<T>(action: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await action();
    } finally {
      this.release('write');
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private canEnter(mode: LockMode): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0;
  }

  private enter(mode: LockMode): void {
    if (mode === 'read') {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.readers -= 1;
    } else {
      this.writing = false;
    }

    this.drain();
  }

  private drain(): void {
    let next = this.waiters[0];

    while (next && this.canEnter(next.mode)) {
      this.waiters.shift();
      this.enter(next.mode);
      next.grant();

      if (next.mode === 'write') {
        return;
      }

      next = this.waiters[0];
    }
  }
}
