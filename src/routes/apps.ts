import { Router, Response, NextFunction } from 'express';
import { App, IApp } from '../models/App';
import { Deployment } from '../models/Deployment';
import { Log } from '../models/Log';
import { config } from '../config';
import { AuthenticatedRequest, currentUser, requireUser } from '../middleware/auth';
import { validate } from '../middleware/validate';
import { CreateAppInput, createAppSchema, updateAppSchema } from '../validators/apps';
import { recordActivity } from '../services/activityLog';
import type { AppStatus } from '../stores/types';
import { generateId } from '../utils/crypto';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { publicApp } from './serializers';
import type { RouteDeps } from './index';

export function generateAppUrl(name: string, appId: string): string {
  return `https://${name}-${appId.slice(0, 8)}.${config.platform.baseDomain}`;
}

async function findOwnedApp(appId: string, userId: string): Promise<IApp> {
  const app = await App.findOne({ _id: appId, userId });
  if (!app) throw new NotFoundError('App');
  return app;
}

export function createAppsRouter({ credentials }: RouteDeps): Router {
  const router = Router();
  router.use(requireUser(credentials));

  /**
   * POST /api/v1/apps
   */
  router.post(
    '/',
    validate(createAppSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        const input: CreateAppInput = req.body;

        const count = await App.countDocuments({ userId: user.id });
        if (count >= config.platform.maxAppsPerUser) {
          throw new ValidationError(`Maximum ${config.platform.maxAppsPerUser} apps per user`);
        }

        const existing = await App.exists({ userId: user.id, name: input.name });
        if (existing) throw new ConflictError('App with this name already exists');

        const id = generateId();
        const app = await App.create({
          _id:          id,
          userId:       user.id,
          name:         input.name,
          description:  input.description,
          sourceType:   input.sourceType,
          sourceConfig: input.sourceConfig,
          envVars:      input.envVars,
          url:          generateAppUrl(input.name, id),
        });

        await recordActivity({ appId: id, logType: 'deployment', message: `App '${app.name}' created` });

        console.log(`[Apps] App created: ${app.name} by user ${user.email}`);

        res.status(201).json({ success: true, data: { app: publicApp(app) } });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const apps = await App.find({ userId: currentUser(req).id }).sort({ createdAt: -1 });
      res.json({ success: true, data: { apps: apps.map(publicApp) } });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const app = await findOwnedApp(req.params.id, currentUser(req).id);
      res.json({ success: true, data: { app: publicApp(app) } });
    } catch (err) {
      next(err);
    }
  });

  /**
   * PATCH /api/v1/apps/:id
   */
  router.patch(
    '/:id',
    validate(updateAppSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        await findOwnedApp(req.params.id, user.id);

        const update: Record<string, unknown> = {};
        if (req.body.description !== undefined) update.description = req.body.description;
        if (req.body.envVars !== undefined) update.envVars = req.body.envVars;
        if (req.body.status !== undefined) update.status = req.body.status;

        const app = await App.findByIdAndUpdate(req.params.id, { $set: update }, { new: true });
        if (!app) throw new NotFoundError('App');

        console.log(`[Apps] App updated: ${app.name} by user ${user.email}`);

        res.json({ success: true, data: { app: publicApp(app) } });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * DELETE /api/v1/apps/:id — also removes its deployments and logs.
   */
  router.delete('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const app = await findOwnedApp(req.params.id, user.id);

      await App.deleteOne({ _id: app._id });
      await Promise.all([
        Deployment.deleteMany({ appId: app._id }),
        Log.deleteMany({ appId: app._id }),
      ]);

      console.log(`[Apps] App deleted: ${app.name} by user ${user.email}`);

      res.json({ success: true, message: 'App deleted successfully' });
    } catch (err) {
      next(err);
    }
  });

  const transitions: Array<{ action: string; status: AppStatus; verb: string }> = [
    { action: 'start',   status: 'running', verb: 'started' },
    { action: 'stop',    status: 'stopped', verb: 'stopped' },
    { action: 'restart', status: 'running', verb: 'restarted' },
  ];

  for (const { action, status, verb } of transitions) {
    /**
     * POST /api/v1/apps/:id/{start,stop,restart}
     */
    router.post(`/:id/${action}`, async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        const app = await findOwnedApp(req.params.id, user.id);

        await App.updateOne({ _id: app._id }, { $set: { status } });
        await recordActivity({ appId: app._id, logType: 'runtime', message: `App '${app.name}' ${verb}` });

        console.log(`[Apps] App ${verb}: ${app.name} by user ${user.email}`);

        res.json({ success: true, message: `App ${verb} successfully` });
      } catch (err) {
        next(err);
      }
    });
  }

  return router;
}
