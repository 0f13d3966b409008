import rateLimit, { type ClientRateLimitInfo, type Store } from 'express-rate-limit';
import type { Request, RequestHandler } from 'express';
import { SlidingWindowLimiter } from '../services/rateLimiter';
import { RateLimitedError } from '../utils/errors';

const SWEEP_INTERVAL_MS = 60_000;

/**
 * express-rate-limit store over a {@link SlidingWindowLimiter}. A rejected
 * request is reported as `limit + 1` hits without being recorded, so only
 * admitted requests occupy the window.
 */
export class SlidingWindowStore implements Store {
  localKeys = true;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(private readonly limiter: SlidingWindowLimiter) {}

  init(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.limiter.sweep(), SWEEP_INTERVAL_MS);
    this.sweeper.unref();
  }

  async get(key: string): Promise<ClientRateLimitInfo | undefined> {
    const now = Date.now();
    const stamps = this.limiter.peek(key, now);
    if (stamps.length === 0) return undefined;
    return { totalHits: stamps.length, resetTime: new Date(stamps[0] + this.limiter.windowMs) };
  }

  async increment(key: string): Promise<ClientRateLimitInfo> {
    const decision = this.limiter.record(key);
    const totalHits = decision.admitted
      ? this.limiter.limit - decision.remaining
      : this.limiter.limit + 1;
    return { totalHits, resetTime: new Date(decision.resetAt) };
  }

  async decrement(key: string): Promise<void> {
    this.limiter.forget(key);
  }

  async resetKey(key: string): Promise<void> {
    this.limiter.reset(key);
  }

  async resetAll(): Promise<void> {
    this.limiter.reset();
  }

  async shutdown(): Promise<void> {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = null;
  }
}

export function clientKey(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Admission gate mounted before every route. Rejections are forwarded to the
 * error handler as {@link RateLimitedError}.
 */
export function createRateLimiter(limiter: SlidingWindowLimiter): RequestHandler {
  return rateLimit({
    windowMs: limiter.windowMs,
    limit: limiter.limit,
    store: new SlidingWindowStore(limiter),
    keyGenerator: clientKey,
    skip: (req) => limiter.isExempt(req.path),
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (req, _res, next) => {
      const stamps = limiter.peek(clientKey(req));
      const retryAfterMs = stamps.length > 0
        ? Math.max(stamps[0] + limiter.windowMs - Date.now(), 0)
        : limiter.windowMs;
      next(new RateLimitedError(retryAfterMs));
    },
  });
}
