import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InProcessDeploymentQueue } from '../queue';
import type { DeploymentJobData, DeploymentOutcome } from '../deploymentPipeline';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function job(id: string): DeploymentJobData {
  return { deploymentId: id, appId: `app-${id}` };
}

/** Runner whose runs stay open until the test settles them. */
function gatedRunner() {
  const gates = new Map<string, (outcome: DeploymentOutcome) => void>();
  const run = vi.fn(
    (data: DeploymentJobData) =>
      new Promise<DeploymentOutcome>((resolve) => {
        gates.set(data.deploymentId, resolve);
      })
  );
  const settle = (id: string, status: DeploymentOutcome['status'] = 'running') => {
    const resolve = gates.get(id);
    if (!resolve) throw new Error(`deployment ${id} is not running`);
    resolve({ deploymentId: id, status });
  };
  return { run, settle };
}

describe('InProcessDeploymentQueue', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns from schedule before the run starts', async () => {
    const run = vi.fn(async (data: DeploymentJobData): Promise<DeploymentOutcome> => ({
      deploymentId: data.deploymentId,
      status: 'running',
    }));
    const queue = new InProcessDeploymentQueue(run);

    queue.schedule(job('a'));
    expect(run).not.toHaveBeenCalled();

    await queue.onIdle();
    expect(run).toHaveBeenCalledWith(job('a'));
  });

  it('runs jobs in the order they were scheduled', async () => {
    const order: string[] = [];
    const queue = new InProcessDeploymentQueue(async (data) => {
      order.push(data.deploymentId);
      return { deploymentId: data.deploymentId, status: 'running' };
    });

    for (const id of ['a', 'b', 'c']) queue.schedule(job(id));
    await queue.onIdle();

    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('never runs more jobs at once than its concurrency', async () => {
    const { run, settle } = gatedRunner();
    const queue = new InProcessDeploymentQueue(run, 2);

    for (const id of ['a', 'b', 'c']) queue.schedule(job(id));
    await flush();

    expect(run).toHaveBeenCalledTimes(2);
    await expect(queue.stats()).resolves.toEqual({ queued: 1, active: 2, completed: 0, failed: 0 });

    settle('a');
    await flush();

    expect(run).toHaveBeenCalledTimes(3);
    expect(run).toHaveBeenLastCalledWith(job('c'));

    settle('b');
    settle('c', 'failed');
    await queue.onIdle();

    await expect(queue.stats()).resolves.toEqual({ queued: 0, active: 0, completed: 2, failed: 1 });
  });

  it('ignores a deployment that is already queued or running', async () => {
    const { run, settle } = gatedRunner();
    const queue = new InProcessDeploymentQueue(run);

    queue.schedule(job('a'));
    queue.schedule(job('a'));
    await flush();
    queue.schedule(job('a'));

    expect(run).toHaveBeenCalledTimes(1);

    settle('a');
    await queue.onIdle();
    queue.schedule(job('a'));
    await flush();

    expect(run).toHaveBeenCalledTimes(2);
  });

  it('keeps draining after a runner throws', async () => {
    const queue = new InProcessDeploymentQueue(async (data) => {
      if (data.deploymentId === 'a') throw new Error('boom');
      return { deploymentId: data.deploymentId, status: 'running' };
    });

    queue.schedule(job('a'));
    queue.schedule(job('b'));
    await queue.onIdle();

    await expect(queue.stats()).resolves.toEqual({ queued: 0, active: 0, completed: 1, failed: 1 });
  });

  it('waits for running work on close and then drops new jobs', async () => {
    const { run, settle } = gatedRunner();
    const queue = new InProcessDeploymentQueue(run);

    queue.schedule(job('a'));
    await flush();

    let closed = false;
    const closing = queue.close().then(() => {
      closed = true;
    });
    await flush();
    expect(closed).toBe(false);

    settle('a');
    await closing;

    queue.schedule(job('b'));
    await flush();
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('rejects a concurrency below one', () => {
    expect(() => new InProcessDeploymentQueue(vi.fn(), 0)).toThrow(RangeError);
  });
});
