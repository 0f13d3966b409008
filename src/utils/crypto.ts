import crypto from 'crypto';

export const API_KEY_PREFIX = 'cdp_';

/**
 * Generate a random API key: cdp_<base64url of `byteLength` random bytes>.
 */
export function generateApiKey(byteLength: number): string {
  return `${API_KEY_PREFIX}${crypto.randomBytes(byteLength).toString('base64url')}`;
}

/**
 * Mask an API key for listings: first 10 chars, "...", last 4 chars.
 */
export function maskApiKey(apiKey: string): string {
  return `${apiKey.slice(0, 10)}...${apiKey.slice(-4)}`;
}

/** Opaque, URL-safe document id. */
export function generateId(): string {
  return crypto.randomBytes(16).toString('base64url');
}
