import { describe, expect, it } from 'vitest';
import { buildDeploymentUpdate } from '../mongoJobStore';

describe('buildDeploymentUpdate', () => {
  it('sets fields without touching the log', () => {
    expect(buildDeploymentUpdate({ status: 'deploying' })).toEqual({ $set: { status: 'deploying' } });
  });

  it('sets the terminal status, completion time and error line in one update', () => {
    const completedAt = new Date('2026-03-01T10:00:00.000Z');

    expect(buildDeploymentUpdate({ status: 'failed', completedAt, appendLog: 'Error: boom' })).toEqual({
      $set: { status: 'failed', completedAt },
      $push: { logs: 'Error: boom' },
    });
  });

  it('only pushes when nothing is set', () => {
    expect(buildDeploymentUpdate({ appendLog: 'Running tests...' })).toEqual({
      $push: { logs: 'Running tests...' },
    });
  });
});
