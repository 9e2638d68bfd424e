export type RateGateOptions = {
  /** Calls allowed per rolling window. */
  windowCapacity?: number;
  windowDurationMs?: number;
  /** Minimum gap between the starts of two consecutive calls. */
  minSpacingMs?: number;
};

export type RateGateSnapshot = {
  callsInWindow: number;
  remaining: number;
  nextAvailableAt: number;
};

/**
 * Sliding-window admission gate for the remote API. The dispatcher is its
 * only writer: `tryAcquire` is a pure check and a `true` answer must be
 * followed immediately by `recordCall`.
 */
export class RateGate {
  readonly windowCapacity: number;
  readonly windowDurationMs: number;
  readonly minSpacingMs: number;
  private calls: number[] = [];
  private lastCallAt: number | undefined;

  constructor(opts: RateGateOptions = {}) {
    this.windowCapacity = Math.max(1, opts.windowCapacity ?? 30);
    this.windowDurationMs = Math.max(0, opts.windowDurationMs ?? 60_000);
    this.minSpacingMs = Math.max(0, opts.minSpacingMs ?? 2_000);
  }

  tryAcquire(now: number): boolean {
    return this.inWindow(now).length < this.windowCapacity && this.spacingClear(now);
  }

  recordCall(now: number): void {
    this.evictOld(now);
    this.calls.push(now);
    this.lastCallAt = now;
  }

  /** Earliest instant at which `tryAcquire` would return true. */
  nextAvailableAt(now: number): number {
    const live = this.inWindow(now);
    let at = now;
    if (live.length >= this.windowCapacity) {
      // the oldest call that has to age out before a slot frees up
      at = live[live.length - this.windowCapacity] + this.windowDurationMs;
    }
    if (this.lastCallAt !== undefined) {
      at = Math.max(at, this.lastCallAt + this.minSpacingMs);
    }
    return at;
  }

  snapshot(now: number): RateGateSnapshot {
    const callsInWindow = this.inWindow(now).length;
    return {
      callsInWindow,
      remaining: Math.max(0, this.windowCapacity - callsInWindow),
      nextAvailableAt: this.nextAvailableAt(now),
    };
  }

  private spacingClear(now: number): boolean {
    return this.lastCallAt === undefined || now - this.lastCallAt >= this.minSpacingMs;
  }

  // A call exactly windowDurationMs old has expired.
  private inWindow(now: number): number[] {
    return this.calls.filter((t) => now - t < this.windowDurationMs);
  }

  private evictOld(now: number) {
    this.calls = this.inWindow(now);
  }
}
