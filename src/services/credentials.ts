import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { ApiKeyRecord, CredentialStore, UserRecord } from '../stores/types';
import { generateApiKey, generateId, maskApiKey } from '../utils/crypto';
import {
  AccountDisabledError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
} from '../utils/errors';

export type TokenKind = 'access' | 'refresh';

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

export interface CredentialOptions {
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  refreshTokenExpireDays: number;
  /** Random bytes behind each API key secret. */
  apiKeyLength: number;
  bcryptRounds: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

const JWT_ALGORITHM = 'HS256';

const BCRYPT_HASH_PATTERN = /^\$2[aby]?\$\d{2}\$[./A-Za-z0-9]{53}$/;

const sessionClaimsSchema = z.object({
  sub: z.string().min(1),
  typ: z.enum(['access', 'refresh']),
  exp: z.number(),
});

type SessionClaims = z.infer<typeof sessionClaimsSchema>;

/**
 * Password hashing, session tokens, API keys and role checks. Every protected
 * request resolves its caller through {@link CredentialService.authenticate}.
 */
export class CredentialService {
  private readonly now: () => number;
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly store: CredentialStore,
    private readonly options: CredentialOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async hashPassword(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.options.bcryptRounds);
  }

  /**
   * A malformed hash is compared against a throwaway hash before reporting
   * false, so it takes as long as a wrong password. The throwaway hash uses
   * the configured cost; stored hashes made at another cost (after
   * BCRYPT_ROUNDS changed) still answer in a different time.
   */
  async verifyPassword(plaintext: string, hash: string): Promise<boolean> {
    if (BCRYPT_HASH_PATTERN.test(hash)) {
      try {
        return await bcrypt.compare(plaintext, hash);
      } catch (err) {
        console.warn('[Auth] bcrypt rejected a stored hash:', err instanceof Error ? err.message : err);
      }
    }

    await bcrypt.compare(plaintext, await this.getDummyHash());
    return false;
  }

  issueTokens(userId: string): TokenPair {
    return {
      accessToken: this.signToken(userId, 'access', this.options.accessTokenExpireMinutes * 60),
      refreshToken: this.signToken(userId, 'refresh', this.options.refreshTokenExpireDays * 24 * 60 * 60),
      tokenType: 'bearer',
    };
  }

  async createApiKey(userId: string, name: string): Promise<ApiKeyRecord> {
    const apiKey: ApiKeyRecord = {
      id: generateId(),
      name,
      key: generateApiKey(this.options.apiKeyLength),
      createdAt: new Date(this.now()),
    };

    const added = await this.store.pushApiKey(userId, apiKey);
    if (!added) throw new NotFoundError('User');

    return apiKey;
  }

  listApiKeys(user: UserRecord): ApiKeyRecord[] {
    return user.apiKeys.map((k) => ({ ...k, key: maskApiKey(k.key) }));
  }

  async revokeApiKey(userId: string, keyId: string): Promise<void> {
    const removed = await this.store.pullApiKey(userId, keyId);
    if (!removed) throw new NotFoundError('API key');
  }

  /**
   * Resolve a bearer credential: a signed access token first, then an exact
   * API-key match. Refresh tokens are not accepted here.
   */
  async authenticate(credential: string): Promise<UserRecord> {
    if (!credential) throw new UnauthorizedError();

    const claims = this.verifyToken(credential);

    let user: UserRecord | null;
    if (claims) {
      if (claims.typ !== 'access') throw new UnauthorizedError();
      user = await this.store.findUserById(claims.sub);
    } else {
      user = await this.store.findUserByApiKey(credential);
    }

    if (!user) throw new UnauthorizedError();
    if (!user.isActive) throw new AccountDisabledError();

    return user;
  }

  authorizeAdmin(user: UserRecord): UserRecord {
    if (user.role !== 'admin') throw new ForbiddenError();
    return user;
  }

  async login(email: string, password: string): Promise<{ user: UserRecord; tokens: TokenPair }> {
    const user = await this.store.findUserByEmail(email);

    // Unknown email still pays for a comparison
    const valid = await this.verifyPassword(password, user ? user.passwordHash : '');
    if (!user || !valid) throw new UnauthorizedError('Incorrect email or password');
    if (!user.isActive) throw new AccountDisabledError();

    return { user, tokens: this.issueTokens(user.id) };
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    const claims = this.verifyToken(refreshToken);
    if (!claims || claims.typ !== 'refresh') throw new UnauthorizedError('Invalid refresh token');

    const user = await this.store.findUserById(claims.sub);
    if (!user) throw new UnauthorizedError('Invalid refresh token');
    if (!user.isActive) throw new AccountDisabledError();

    return this.issueTokens(user.id);
  }

  private signToken(userId: string, typ: TokenKind, ttlSeconds: number): string {
    const iat = Math.floor(this.now() / 1000);
    return jwt.sign({ sub: userId, typ, iat, exp: iat + ttlSeconds }, this.options.jwtSecret, {
      algorithm: JWT_ALGORITHM,
    });
  }

  /** Null when the string is not a valid, unexpired token signed by us. */
  private verifyToken(token: string): SessionClaims | null {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.jwtSecret, {
        algorithms: [JWT_ALGORITHM],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (err) {
      // TokenExpiredError and NotBeforeError both extend JsonWebTokenError
      if (err instanceof jwt.JsonWebTokenError) return null;
      throw err;
    }

    const parsed = sessionClaimsSchema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = bcrypt.hash('not-a-real-password', this.options.bcryptRounds);
    }
    return this.dummyHash;
  }
}
