type Release = () => void;

/**
 * FIFO async lock. Waiters are handed the lock in the order they asked for it.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  public get isLocked(): boolean {
    return this.locked;
  }

  public acquire(): Promise<Release> {
    return new Promise<Release>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
      } else {
        this.waiters.push(resolve);
      }
    });
  }

  public async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
