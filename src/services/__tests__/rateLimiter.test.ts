import { describe, expect, it } from 'vitest';
import { SlidingWindowLimiter } from '../rateLimiter';

function limiter(limit = 3, enabled = true): SlidingWindowLimiter {
  return new SlidingWindowLimiter({ enabled, limit, windowMs: 60_000, exemptPath: '/health' });
}

describe('SlidingWindowLimiter', () => {
  it('admits up to the quota and rejects the next request in the window', async () => {
    const rl = limiter();

    await expect(rl.admit('10.0.0.1', '/api/v1/apps', 0)).resolves.toEqual({
      admitted: true,
      remaining: 2,
      resetAt: 60_000,
    });
    await expect(rl.admit('10.0.0.1', '/api/v1/apps', 1_000)).resolves.toMatchObject({ admitted: true, remaining: 1 });
    await expect(rl.admit('10.0.0.1', '/api/v1/apps', 2_000)).resolves.toMatchObject({ admitted: true, remaining: 0 });

    await expect(rl.admit('10.0.0.1', '/api/v1/apps', 3_000)).resolves.toEqual({
      admitted: false,
      retryAfterMs: 57_000,
      resetAt: 60_000,
    });
  });

  it('does not count rejected requests', async () => {
    const rl = limiter();
    for (const t of [0, 1_000, 2_000, 3_000, 4_000]) await rl.admit('10.0.0.1', '/x', t);

    expect(rl.peek('10.0.0.1', 4_000)).toEqual([0, 1_000, 2_000]);
  });

  it('frees a slot once the oldest request is a full window old', async () => {
    const rl = limiter();
    for (const t of [0, 1_000, 2_000]) await rl.admit('10.0.0.1', '/x', t);

    await expect(rl.admit('10.0.0.1', '/x', 59_999)).resolves.toMatchObject({ admitted: false, retryAfterMs: 1 });
    await expect(rl.admit('10.0.0.1', '/x', 60_000)).resolves.toMatchObject({ admitted: true });
    expect(rl.peek('10.0.0.1', 60_000)).toEqual([1_000, 2_000, 60_000]);
  });

  it('admits again after the window has passed', async () => {
    const rl = limiter();
    for (const t of [0, 1_000, 2_000, 3_000]) await rl.admit('10.0.0.1', '/x', t);

    await expect(rl.admit('10.0.0.1', '/x', 61_000)).resolves.toEqual({
      admitted: true,
      remaining: 1,
      resetAt: 62_000,
    });
  });

  it('keeps separate windows per client', async () => {
    const rl = limiter(1);

    await expect(rl.admit('10.0.0.1', '/x', 0)).resolves.toMatchObject({ admitted: true });
    await expect(rl.admit('10.0.0.2', '/x', 0)).resolves.toMatchObject({ admitted: true });
    await expect(rl.admit('10.0.0.1', '/x', 1)).resolves.toMatchObject({ admitted: false });
  });

  it('admits exactly one of several simultaneous requests at quota 1', async () => {
    const rl = limiter(1);

    const decisions = await Promise.all(
      Array.from({ length: 10 }, () => rl.admit('10.0.0.1', '/x', 5_000))
    );

    expect(decisions.filter((d) => d.admitted)).toHaveLength(1);
    expect(rl.peek('10.0.0.1', 5_000)).toEqual([5_000]);
  });

  it('never counts the exempt route', async () => {
    const rl = limiter(1);

    for (let i = 0; i < 5; i++) {
      await expect(rl.admit('10.0.0.1', '/health', i)).resolves.toMatchObject({ admitted: true, remaining: 1 });
    }
    await expect(rl.admit('10.0.0.1', '/x', 10)).resolves.toMatchObject({ admitted: true });
    expect(rl.isExempt('/health')).toBe(true);
    expect(rl.isExempt('/x')).toBe(false);
  });

  it('admits everything when disabled', async () => {
    const rl = limiter(1, false);

    for (let i = 0; i < 5; i++) {
      await expect(rl.admit('10.0.0.1', '/x', i)).resolves.toMatchObject({ admitted: true });
    }
    expect(rl.size).toBe(0);
  });

  it('sweeps clients whose window has emptied', async () => {
    const rl = limiter();
    await rl.admit('10.0.0.1', '/x', 0);
    await rl.admit('10.0.0.2', '/x', 30_000);

    rl.sweep(60_000);

    expect(rl.size).toBe(1);
    expect(rl.peek('10.0.0.2', 60_000)).toEqual([30_000]);
  });

  it('forgets the latest hit', async () => {
    const rl = limiter();
    await rl.admit('10.0.0.1', '/x', 0);
    await rl.admit('10.0.0.1', '/x', 1_000);

    rl.forget('10.0.0.1');

    expect(rl.peek('10.0.0.1', 1_000)).toEqual([0]);
  });
});
