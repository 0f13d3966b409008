import type { JobStore, TerminalDeploymentStatus } from '../stores/types';

/** Message consumed by the deployment queue workers. */
export interface DeploymentJobData {
  deploymentId: string;
  appId: string;
}

export interface DeploymentStage {
  /** Appended to the deployment log once the stage's work has finished. */
  message: string;
  execute?: (job: DeploymentJobData) => Promise<void>;
}

export interface DeploymentOutcome {
  deploymentId: string;
  /** `skipped`: the record was gone or already finished when the run began. */
  status: TerminalDeploymentStatus | 'skipped';
  error?: string;
}

export interface RunDeploymentOptions {
  stages?: readonly DeploymentStage[];
  now?: () => Date;
}

// Placeholder build stages; real build/test/release work hooks in via `execute`
export const DEFAULT_STAGES: readonly DeploymentStage[] = [
  { message: 'Pulling source code...' },
  { message: 'Building application...' },
  { message: 'Running tests...' },
  { message: 'Deploying to server...' },
  { message: 'Deployment completed successfully' },
];

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drive one deployment from `pending` to `running` or `failed`.
 *
 * The deployment always reaches its terminal status, completion time included,
 * in a single write before the owning app's status is touched, so no reader
 * sees a completed deployment in a non-terminal state or an app ahead of its
 * deployment. Never rejects: faults end as a `failed` deployment. A deployment
 * deleted while queued, or already terminal, is skipped without any write.
 */
export async function runDeployment(
  store: JobStore,
  job: DeploymentJobData,
  options: RunDeploymentOptions = {}
): Promise<DeploymentOutcome> {
  const { deploymentId, appId } = job;
  const stages = options.stages ?? DEFAULT_STAGES;
  const now = options.now ?? (() => new Date());

  let terminal: TerminalDeploymentStatus | null = null;

  try {
    const deployment = await store.findDeployment(deploymentId);
    if (!deployment) {
      console.warn(`[Deploy] Deployment ${deploymentId} no longer exists, skipping`);
      return { deploymentId, status: 'skipped' };
    }
    if (deployment.completedAt !== null) {
      console.warn(`[Deploy] Deployment ${deploymentId} already finished as ${deployment.status}, skipping`);
      return { deploymentId, status: 'skipped' };
    }

    await store.updateDeployment(deploymentId, { status: 'deploying' });

    for (const stage of stages) {
      if (stage.execute) await stage.execute(job);
      await store.appendDeploymentLog(deploymentId, stage.message);
    }

    await store.updateDeployment(deploymentId, { status: 'running', completedAt: now() });
    terminal = 'running';

    await store.setAppStatus(appId, 'running');

    console.log(`[Deploy] Deployment ${deploymentId} completed successfully`);
    return { deploymentId, status: 'running' };
  } catch (err) {
    const message = describeError(err);

    if (terminal) {
      // Deployment already finished; only the app projection is behind
      console.error(`[Deploy] Deployment ${deploymentId} is ${terminal} but app ${appId} was not updated:`, message);
      return { deploymentId, status: terminal, error: message };
    }

    console.error(`[Deploy] Deployment ${deploymentId} failed:`, message);
    await markFailed(store, job, message, now());
    return { deploymentId, status: 'failed', error: message };
  }
}

async function markFailed(
  store: JobStore,
  { deploymentId, appId }: DeploymentJobData,
  message: string,
  completedAt: Date
): Promise<void> {
  try {
    await store.updateDeployment(deploymentId, {
      status: 'failed',
      completedAt,
      appendLog: `Error: ${message}`,
    });
  } catch (err) {
    console.error(`[Deploy] Could not record failure of deployment ${deploymentId}:`, describeError(err));
    return;
  }

  try {
    await store.setAppStatus(appId, 'failed');
  } catch (err) {
    console.error(`[Deploy] Could not mark app ${appId} failed:`, describeError(err));
  }
}
