import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_STAGES, runDeployment } from '../deploymentPipeline';
import type { AppStatus, DeploymentPatch } from '../../stores/types';
import { MemoryJobStore } from '../../__tests__/helpers/memoryStores';

const FINISHED_AT = new Date('2026-03-01T10:00:00.000Z');
const now = () => FINISHED_AT;
const job = { deploymentId: 'dep-1', appId: 'app-1' };

describe('runDeployment', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('walks a deployment through every stage to running', async () => {
    const store = new MemoryJobStore();
    store.addDeployment();

    const outcome = await runDeployment(store, job, { now });

    expect(outcome).toEqual({ deploymentId: 'dep-1', status: 'running' });
    expect(store.events).toEqual([
      { type: 'deployment', id: 'dep-1', patch: { status: 'deploying' } },
      { type: 'log', id: 'dep-1', line: 'Pulling source code...' },
      { type: 'log', id: 'dep-1', line: 'Building application...' },
      { type: 'log', id: 'dep-1', line: 'Running tests...' },
      { type: 'log', id: 'dep-1', line: 'Deploying to server...' },
      { type: 'log', id: 'dep-1', line: 'Deployment completed successfully' },
      { type: 'deployment', id: 'dep-1', patch: { status: 'running', completedAt: FINISHED_AT } },
      { type: 'app', id: 'app-1', status: 'running' },
    ]);

    const deployment = store.deployments.get('dep-1');
    expect(deployment?.status).toBe('running');
    expect(deployment?.completedAt).toEqual(FINISHED_AT);
    expect(deployment?.logs).toEqual(['Deployment initiated', ...DEFAULT_STAGES.map((s) => s.message)]);
    expect(store.appStatuses.get('app-1')).toBe('running');
  });

  it('records a failing stage as a failed deployment and app', async () => {
    const store = new MemoryJobStore();
    store.addDeployment();
    const stages = [
      { message: 'Pulling source code...' },
      {
        message: 'Running tests...',
        execute: async () => {
          throw new Error('3 tests failed');
        },
      },
      { message: 'Deploying to server...' },
    ];

    const outcome = await runDeployment(store, job, { stages, now });

    expect(outcome).toEqual({ deploymentId: 'dep-1', status: 'failed', error: '3 tests failed' });
    expect(store.events).toEqual([
      { type: 'deployment', id: 'dep-1', patch: { status: 'deploying' } },
      { type: 'log', id: 'dep-1', line: 'Pulling source code...' },
      {
        type: 'deployment',
        id: 'dep-1',
        patch: { status: 'failed', completedAt: FINISHED_AT, appendLog: 'Error: 3 tests failed' },
      },
      { type: 'app', id: 'app-1', status: 'failed' },
    ]);
    expect(store.deployments.get('dep-1')?.logs).toEqual([
      'Deployment initiated',
      'Pulling source code...',
      'Error: 3 tests failed',
    ]);
  });

  it('fails the deployment when the store rejects the first transition', async () => {
    class FlakyStore extends MemoryJobStore {
      async updateDeployment(id: string, patch: DeploymentPatch): Promise<void> {
        if (patch.status === 'deploying') throw new Error('connection reset');
        return super.updateDeployment(id, patch);
      }
    }
    const store = new FlakyStore();
    store.addDeployment();

    const outcome = await runDeployment(store, job, { now });

    expect(outcome).toEqual({ deploymentId: 'dep-1', status: 'failed', error: 'connection reset' });
    expect(store.deployments.get('dep-1')).toMatchObject({ status: 'failed', completedAt: FINISHED_AT });
    expect(store.appStatuses.get('app-1')).toBe('failed');
  });

  it('keeps a finished deployment running when only the app update fails', async () => {
    class AppWriteFails extends MemoryJobStore {
      async setAppStatus(_appId: string, _status: AppStatus): Promise<void> {
        throw new Error('app collection unavailable');
      }
    }
    const store = new AppWriteFails();
    store.addDeployment();

    const outcome = await runDeployment(store, job, { now });

    expect(outcome).toEqual({ deploymentId: 'dep-1', status: 'running', error: 'app collection unavailable' });
    expect(store.deployments.get('dep-1')).toMatchObject({ status: 'running', completedAt: FINISHED_AT });
    expect(store.events.filter((e) => e.type === 'deployment')).toHaveLength(2);
  });

  it('resolves even when the failure itself cannot be recorded', async () => {
    class BrokenStore extends MemoryJobStore {
      async updateDeployment(_id: string, _patch: DeploymentPatch): Promise<void> {
        throw new Error('store offline');
      }
    }
    const store = new BrokenStore();
    store.addDeployment();

    await expect(runDeployment(store, job, { now })).resolves.toEqual({
      deploymentId: 'dep-1',
      status: 'failed',
      error: 'store offline',
    });
    expect(store.appStatuses.get('app-1')).toBe('pending');
  });

  it('skips a deployment deleted while it was queued', async () => {
    const store = new MemoryJobStore();

    const outcome = await runDeployment(store, job, { now });

    expect(outcome).toEqual({ deploymentId: 'dep-1', status: 'skipped' });
    expect(store.events).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('[Deploy] Deployment dep-1 no longer exists, skipping');
  });

  it('does not run a deployment that already finished', async () => {
    const store = new MemoryJobStore();
    store.addDeployment({ status: 'failed', completedAt: FINISHED_AT, logs: ['Deployment initiated', 'Error: boom'] });

    const outcome = await runDeployment(store, job, { now });

    expect(outcome).toEqual({ deploymentId: 'dep-1', status: 'skipped' });
    expect(store.events).toEqual([]);
    expect(store.deployments.get('dep-1')?.logs).toEqual(['Deployment initiated', 'Error: boom']);
  });

  it('only sets completedAt on the terminal write', async () => {
    const store = new MemoryJobStore();
    store.addDeployment();

    await runDeployment(store, job, { now });

    const patches = store.events.flatMap((e) => (e.type === 'deployment' ? [e.patch] : []));
    for (const patch of patches) {
      const terminal = patch.status === 'running' || patch.status === 'failed';
      expect(patch.completedAt !== undefined).toBe(terminal);
    }
  });
});
