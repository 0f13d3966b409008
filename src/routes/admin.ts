import { Router, Response, NextFunction } from 'express';
import { User } from '../models/User';
import { App } from '../models/App';
import { Deployment } from '../models/Deployment';
import { CloudFunction } from '../models/Function';
import { toUserRecord } from '../stores/mongoCredentialStore';
import { AuthenticatedRequest, requireAdmin } from '../middleware/auth';
import { validate } from '../middleware/validate';
import { adminUpdateUserSchema } from '../validators/auth';
import { NotFoundError } from '../utils/errors';
import { publicUser } from './serializers';
import type { RouteDeps } from './index';

export function createAdminRouter({ credentials, queue }: RouteDeps): Router {
  const router = Router();
  router.use(requireAdmin(credentials));

  /**
   * GET /api/v1/admin/users
   */
  router.get('/users', async (_req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const users = await User.find().sort({ createdAt: -1 });
      res.json({ success: true, data: { users: users.map((u) => publicUser(toUserRecord(u))) } });
    } catch (err) {
      next(err);
    }
  });

  /**
   * PATCH /api/v1/admin/users/:id — enable/disable an account or change its role.
   */
  router.patch(
    '/users/:id',
    validate(adminUpdateUserSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const update: Record<string, unknown> = {};
        if (req.body.isActive !== undefined) update.isActive = req.body.isActive;
        if (req.body.role !== undefined) update.role = req.body.role;

        const user = await User.findByIdAndUpdate(req.params.id, { $set: update }, { new: true });
        if (!user) throw new NotFoundError('User');

        console.log(`[Admin] User ${user.email} updated by ${req.user?.email}:`, update);

        res.json({ success: true, data: { user: publicUser(toUserRecord(user)) } });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * GET /api/v1/admin/stats
   */
  router.get('/stats', async (_req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const [totalUsers, totalApps, totalDeployments, totalFunctions, deploymentQueue] = await Promise.all([
        User.countDocuments(),
        App.countDocuments(),
        Deployment.countDocuments(),
        CloudFunction.countDocuments(),
        queue.stats(),
      ]);

      res.json({
        success: true,
        data: {
          totalUsers,
          totalApps,
          totalDeployments,
          totalFunctions,
          deploymentQueue,
          timestamp: new Date().toISOString(),
        },
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
