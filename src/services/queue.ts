import { Queue } from 'bullmq';
import { config, type QueueDriver } from '../config';
import type { JobStore } from '../stores/types';
import { DeploymentJobData, DeploymentOutcome, runDeployment } from './deploymentPipeline';

export const DEPLOYMENT_QUEUE_NAME = 'deployments';

export interface QueueStats {
  queued: number;
  active: number;
  completed: number;
  failed: number;
}

/**
 * Fire-and-forget scheduling of deployment runs. `schedule` returns before the
 * run starts; callers never observe its outcome.
 */
export interface DeploymentQueue {
  schedule(job: DeploymentJobData): void;
  stats(): Promise<QueueStats>;
  /** Stop accepting jobs and wait for work this process owns to settle. */
  close(): Promise<void>;
}

export type DeploymentRunner = (job: DeploymentJobData) => Promise<DeploymentOutcome>;

/**
 * FIFO queue drained by a fixed number of in-process workers. A deployment id
 * that is already queued or running is not scheduled again.
 */
export class InProcessDeploymentQueue implements DeploymentQueue {
  private readonly pending: DeploymentJobData[] = [];
  private readonly tracked = new Set<string>();
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;
  private completed = 0;
  private failed = 0;
  private closed = false;

  constructor(
    private readonly run: DeploymentRunner,
    private readonly concurrency = 1
  ) {
    if (concurrency < 1) throw new RangeError('concurrency must be at least 1');
  }

  schedule(job: DeploymentJobData): void {
    if (this.closed) {
      console.warn(`[Queue] Queue closed, dropping deployment ${job.deploymentId}`);
      return;
    }
    if (this.tracked.has(job.deploymentId)) {
      console.warn(`[Queue] Deployment ${job.deploymentId} is already scheduled`);
      return;
    }

    this.tracked.add(job.deploymentId);
    this.pending.push(job);
    setImmediate(() => this.pump());
  }

  async stats(): Promise<QueueStats> {
    return {
      queued: this.pending.length,
      active: this.active,
      completed: this.completed,
      failed: this.failed,
    };
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const job = this.pending.shift();
      if (!job) break;

      this.active += 1;
      void this.execute(job);
    }

    if (this.isIdle()) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }

  private async execute(job: DeploymentJobData): Promise<void> {
    try {
      const outcome = await this.run(job);
      if (outcome.status === 'running') this.completed += 1;
      else if (outcome.status === 'failed') this.failed += 1;
    } catch (err) {
      this.failed += 1;
      console.error(`[Queue] Deployment ${job.deploymentId} crashed its worker:`, err instanceof Error ? err.message : err);
    } finally {
      this.active -= 1;
      this.tracked.delete(job.deploymentId);
      this.pump();
    }
  }
}

/**
 * Redis-backed queue; runs are consumed by the separate worker process
 * (`src/worker.ts`). Failed runs are not retried.
 */
export class BullDeploymentQueue implements DeploymentQueue {
  private readonly queue: Queue<DeploymentJobData, DeploymentOutcome>;

  constructor() {
    this.queue = new Queue<DeploymentJobData, DeploymentOutcome>(DEPLOYMENT_QUEUE_NAME, {
      connection: config.redis,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { count: 1000 },
        removeOnFail: { count: 5000 },
      },
    });
  }

  schedule(job: DeploymentJobData): void {
    // jobId dedupes repeated schedules of one deployment
    this.queue.add('deploy', job, { jobId: job.deploymentId }).catch((err: Error) => {
      console.error(`[Queue] Failed to enqueue deployment ${job.deploymentId}:`, err.message);
    });
  }

  async stats(): Promise<QueueStats> {
    const counts = await this.queue.getJobCounts('waiting', 'delayed', 'active', 'completed', 'failed');
    return {
      queued: (counts.waiting ?? 0) + (counts.delayed ?? 0),
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
    };
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export function createDeploymentQueue(driver: QueueDriver, store: JobStore, concurrency: number): DeploymentQueue {
  if (driver === 'bullmq') return new BullDeploymentQueue();
  return new InProcessDeploymentQueue((job) => runDeployment(store, job), concurrency);
}
