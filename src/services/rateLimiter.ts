export interface SlidingWindowOptions {
  enabled: boolean;
  /** Requests admitted per client within any trailing window. */
  limit: number;
  windowMs: number;
  /** Route admitted without being counted. */
  exemptPath: string;
}

export type RateLimitDecision =
  | { admitted: true; remaining: number; resetAt: number }
  | { admitted: false; retryAfterMs: number; resetAt: number };

/**
 * Per-client sliding-window counter held in process memory. Each instance
 * enforces its own quota; several processes do not share counts.
 *
 * `admit` is async so a shared backing store can sit behind the same
 * contract, but this implementation does its read-prune-check-append without
 * yielding, which makes it a critical section per client within the process.
 */
export class SlidingWindowLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(private readonly options: SlidingWindowOptions) {}

  get limit(): number {
    return this.options.limit;
  }

  get windowMs(): number {
    return this.options.windowMs;
  }

  isExempt(route: string): boolean {
    return !this.options.enabled || route === this.options.exemptPath;
  }

  async admit(clientId: string, route: string, now: number = Date.now()): Promise<RateLimitDecision> {
    if (this.isExempt(route)) {
      return { admitted: true, remaining: this.options.limit, resetAt: now };
    }
    return this.record(clientId, now);
  }

  /** Count one request for `clientId` unless its window is already full. */
  record(clientId: string, now: number = Date.now()): RateLimitDecision {
    const { limit, windowMs } = this.options;
    const recent = this.prune(clientId, now);

    if (recent.length >= limit) {
      const resetAt = recent[0] + windowMs;
      return { admitted: false, retryAfterMs: Math.max(resetAt - now, 0), resetAt };
    }

    recent.push(now);
    this.hits.set(clientId, recent);

    return { admitted: true, remaining: limit - recent.length, resetAt: recent[0] + windowMs };
  }

  /** Timestamps currently counted against `clientId`. */
  peek(clientId: string, now: number = Date.now()): number[] {
    return [...this.prune(clientId, now)];
  }

  /** Drop the most recent hit, e.g. when a request is not to be counted after all. */
  forget(clientId: string): void {
    const stamps = this.hits.get(clientId);
    if (!stamps) return;
    stamps.pop();
    if (stamps.length === 0) this.hits.delete(clientId);
  }

  reset(clientId?: string): void {
    if (clientId === undefined) this.hits.clear();
    else this.hits.delete(clientId);
  }

  /** Remove clients with nothing left inside the window. */
  sweep(now: number = Date.now()): void {
    for (const clientId of [...this.hits.keys()]) {
      if (this.prune(clientId, now).length === 0) this.hits.delete(clientId);
    }
  }

  get size(): number {
    return this.hits.size;
  }

  private prune(clientId: string, now: number): number[] {
    const stamps = this.hits.get(clientId);
    if (!stamps) return [];

    const recent = stamps.filter((t) => now - t < this.options.windowMs);
    if (recent.length !== stamps.length) this.hits.set(clientId, recent);
    return recent;
  }
}
