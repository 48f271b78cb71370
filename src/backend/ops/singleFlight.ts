/**
 * Handle for the single in-flight operation. Releasing twice is a no-op.
 */
export interface SingleFlightLease {
  readonly operation: string;
  release(): void;
}

export type SingleFlightResult<T> =
  | { busy: true; active: string }
  | { busy: false; value: T };

/**
 * At most one operation in flight; a second caller is turned away, not
 * queued, and is expected to retry later.
 *
 * Acquisition is synchronous, so check-and-set cannot interleave with another
 * caller on the event loop.
 *
 * @example
 * ```typescript
 * const guard = new SingleFlightGuard();
 * const res = await guard.run("devices.refresh", () => listDevices(runner));
 * if (res.busy) {
 *   // another operation (res.active) holds the slot
 * }
 * ```
 */
export class SingleFlightGuard {
  private current: { operation: string; token: symbol } | null = null;

  /** Name of the operation holding the slot, or null when idle. */
  public active(): string | null {
    return this.current?.operation ?? null;
  }

  /**
   * Take the slot if it is free.
   *
   * @returns A lease to release when the operation finishes, or null if busy.
   */
  public tryAcquire(operation: string): SingleFlightLease | null {
    if (this.current) {
      return null;
    }
    const token = Symbol(operation);
    this.current = { operation, token };
    return {
      operation,
      release: () => {
        if (this.current?.token === token) {
          this.current = null;
        }
      },
    };
  }

  /**
   * Run `fn` while holding the slot. Errors from `fn` propagate after release.
   */
  public async run<T>(operation: string, fn: () => Promise<T>): Promise<SingleFlightResult<T>> {
    const lease = this.tryAcquire(operation);
    if (!lease) {
      return { busy: true, active: this.active() ?? "unknown" };
    }
    try {
      return { busy: false, value: await fn() };
    } finally {
      lease.release();
    }
  }
}
