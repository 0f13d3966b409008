import { Router, Request, Response, NextFunction } from 'express';
import { User } from '../models/User';
import { toUserRecord } from '../stores/mongoCredentialStore';
import { validate } from '../middleware/validate';
import { AuthenticatedRequest, currentUser, requireUser } from '../middleware/auth';
import {
  SignupInput,
  createApiKeySchema,
  loginSchema,
  refreshSchema,
  signupSchema,
} from '../validators/auth';
import { ConflictError } from '../utils/errors';
import { publicUser } from './serializers';
import type { RouteDeps } from './index';

export function createAuthRouter({ credentials }: RouteDeps): Router {
  const router = Router();
  const authenticated = requireUser(credentials);

  /**
   * POST /api/v1/auth/signup
   */
  router.post(
    '/signup',
    validate(signupSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const input: SignupInput = req.body;

        const existing = await User.findOne({
          $or: [{ email: input.email }, { username: input.username }],
        });
        if (existing) throw new ConflictError('User with this email or username already exists');

        const user = await User.create({
          username:     input.username,
          email:        input.email,
          passwordHash: await credentials.hashPassword(input.password),
        });

        console.log(`[Auth] New user created: ${user.email}`);

        res.status(201).json({ success: true, data: { user: publicUser(toUserRecord(user)) } });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * POST /api/v1/auth/login
   */
  router.post(
    '/login',
    validate(loginSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { user, tokens } = await credentials.login(req.body.email, req.body.password);
        console.log(`[Auth] User logged in: ${user.email}`);
        res.json({ success: true, data: tokens });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * POST /api/v1/auth/refresh — exchange a refresh token for a new pair.
   */
  router.post(
    '/refresh',
    validate(refreshSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const tokens = await credentials.refresh(req.body.refreshToken);
        res.json({ success: true, data: tokens });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get('/me', authenticated, (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: { user: publicUser(currentUser(req)) } });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/v1/auth/api-keys — the full key is only returned here.
   */
  router.post(
    '/api-keys',
    authenticated,
    validate(createApiKeySchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        const apiKey = await credentials.createApiKey(user.id, req.body.name);

        console.log(`[Auth] API key created for user: ${user.email}`);

        res.status(201).json({
          success: true,
          data: { apiKey },
          warning: 'Store this API key securely. It will NOT be shown again.',
        });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get('/api-keys', authenticated, (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: { apiKeys: credentials.listApiKeys(currentUser(req)) } });
    } catch (err) {
      next(err);
    }
  });

  router.delete(
    '/api-keys/:keyId',
    authenticated,
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        await credentials.revokeApiKey(user.id, req.params.keyId);

        console.log(`[Auth] API key deleted for user: ${user.email}`);

        res.json({ success: true, message: 'API key deleted successfully' });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
