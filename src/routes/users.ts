import { Router, Response, NextFunction } from 'express';
import { User } from '../models/User';
import { App } from '../models/App';
import { Deployment } from '../models/Deployment';
import { CloudFunction } from '../models/Function';
import { Log } from '../models/Log';
import { toUserRecord } from '../stores/mongoCredentialStore';
import { AuthenticatedRequest, currentUser, requireUser } from '../middleware/auth';
import { validate } from '../middleware/validate';
import { updateProfileSchema } from '../validators/auth';
import { ConflictError, NotFoundError } from '../utils/errors';
import { publicUser } from './serializers';
import type { RouteDeps } from './index';

export function createUsersRouter({ credentials }: RouteDeps): Router {
  const router = Router();
  router.use(requireUser(credentials));

  /**
   * PATCH /api/v1/users/me
   */
  router.patch(
    '/me',
    validate(updateProfileSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        const update: Record<string, unknown> = {};

        if (req.body.username) {
          const taken = await User.exists({ username: req.body.username, _id: { $ne: user.id } });
          if (taken) throw new ConflictError('Username already taken');
          update.username = req.body.username;
        }

        if (req.body.email) {
          const taken = await User.exists({ email: req.body.email, _id: { $ne: user.id } });
          if (taken) throw new ConflictError('Email already taken');
          update.email = req.body.email;
        }

        const updated = await User.findByIdAndUpdate(user.id, { $set: update }, { new: true });
        if (!updated) throw new NotFoundError('User');

        res.json({ success: true, data: { user: publicUser(toUserRecord(updated)) } });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * DELETE /api/v1/users/me — removes the account and everything it owns.
   */
  router.delete('/me', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);

      const [appIds, functionIds] = await Promise.all([
        App.find({ userId: user.id }).distinct('_id'),
        CloudFunction.find({ userId: user.id }).distinct('_id'),
      ]);

      await Promise.all([
        Log.deleteMany({ $or: [{ appId: { $in: appIds } }, { functionId: { $in: functionIds } }] }),
        Deployment.deleteMany({ userId: user.id }),
        App.deleteMany({ userId: user.id }),
        CloudFunction.deleteMany({ userId: user.id }),
      ]);
      await User.deleteOne({ _id: user.id });

      console.log(`[Users] Account deleted: ${user.email}`);

      res.json({ success: true, message: 'Account deleted successfully' });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
