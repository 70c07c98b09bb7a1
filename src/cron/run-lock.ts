export type RunLease = {
  readonly holder: string;
  readonly acquiredAt: Date;
  /** Idempotent: only the first call frees the lock. */
  release(): void;
};

/**
 * Process-wide binary lock for processing runs.
 *
 * Acquisition never waits: a failed tryAcquire means a run is already active
 * and the caller applies its overlap policy instead of retrying.
 */
export class RunLock {
  private current: { holder: string; token: symbol } | null = null;

  get isHeld(): boolean {
    return this.current !== null;
  }

  get holder(): string | null {
    return this.current?.holder ?? null;
  }

  tryAcquire(holder: string): RunLease | null {
    if (this.current) return null;

    const token = Symbol(holder);
    this.current = { holder, token };
    let released = false;
    return {
      holder,
      acquiredAt: new Date(),
      release: () => {
        if (released) return;
        released = true;
        // A stale lease must never free a lock someone else now holds.
        if (this.current?.token === token) this.current = null;
      },
    };
  }
}

/** Run `fn` with the lease held and release it on every exit path. */
export async function withLease<T>(lease: RunLease, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } finally {
    lease.release();
  }
}
