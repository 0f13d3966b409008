import { describe, expect, it } from 'vitest';
import { API_KEY_PREFIX, generateApiKey, generateId, maskApiKey } from '../crypto';

describe('generateApiKey', () => {
  it('prefixes a url-safe encoding of the requested bytes', () => {
    const key = generateApiKey(32);

    expect(key.startsWith(API_KEY_PREFIX)).toBe(true);
    expect(key).toHaveLength(4 + 43);
    expect(key.slice(4)).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it('does not repeat', () => {
    const keys = new Set(Array.from({ length: 50 }, () => generateApiKey(32)));
    expect(keys.size).toBe(50);
  });
});

describe('maskApiKey', () => {
  it('keeps the first ten and last four characters', () => {
    expect(maskApiKey('cdp_abcdefghijklmnopqrstuvwxyz')).toBe('cdp_abcdef...wxyz');
  });
});

describe('generateId', () => {
  it('encodes 16 random bytes', () => {
    expect(generateId()).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });
});
