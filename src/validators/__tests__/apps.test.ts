import { describe, expect, it } from 'vitest';
import { describeIssues } from '../../middleware/validate';
import { createAppSchema } from '../apps';

describe('createAppSchema', () => {
  it('lowercases the name and defaults envVars', () => {
    const parsed = createAppSchema.parse({
      name: 'My-App',
      sourceType: 'docker',
      sourceConfig: { image: 'nginx:1.27' },
    });

    expect(parsed.name).toBe('my-app');
    expect(parsed.envVars).toEqual({});
  });

  it('requires a repository for github sources', () => {
    const result = createAppSchema.safeParse({ name: 'web', sourceType: 'github', sourceConfig: {} });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toEqual(['sourceConfig.repoUrl: GitHub repoUrl required in sourceConfig']);
    }
  });

  it('requires an image for docker sources', () => {
    const result = createAppSchema.safeParse({ name: 'web', sourceType: 'docker', sourceConfig: { repoUrl: 'x' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toEqual(['sourceConfig.image: Docker image required in sourceConfig']);
    }
  });

  it('rejects names with spaces', () => {
    const result = createAppSchema.safeParse({
      name: 'my app',
      sourceType: 'python_script',
      sourceConfig: {},
    });

    expect(result.success).toBe(false);
  });
});
