import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest, currentUser, requireUser } from '../middleware/auth';
import { validate } from '../middleware/validate';
import { createDeploymentSchema } from '../validators/apps';
import { NotFoundError } from '../utils/errors';
import { publicDeployment } from './serializers';
import type { RouteDeps } from './index';

const LIST_LIMIT = 50;

export function createDeploymentsRouter({ credentials, queue, jobs }: RouteDeps): Router {
  const router = Router();
  router.use(requireUser(credentials));

  /**
   * POST /api/v1/deployments
   * Responds as soon as the record exists; the run happens on the queue.
   */
  router.post(
    '/',
    validate(createDeploymentSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        const { appId, commitSha, dockerImage } = req.body;

        const app = await jobs.findOwnedApp(appId, user.id);
        if (!app) throw new NotFoundError('App');

        const deployment = await jobs.createDeployment({
          appId:       app.id,
          userId:      user.id,
          commitSha:   commitSha ?? null,
          dockerImage: dockerImage ?? null,
        });

        queue.schedule({ deploymentId: deployment.id, appId: app.id });

        console.log(`[Deployments] Deployment created: ${deployment.id} for app ${app.name}`);

        res.status(201).json({ success: true, data: { deployment: publicDeployment(deployment) } });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * GET /api/v1/deployments?appId=x — newest first.
   */
  router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const appId = typeof req.query.appId === 'string' ? req.query.appId : undefined;
      const deployments = await jobs.listDeployments(currentUser(req).id, { appId, limit: LIST_LIMIT });

      res.json({ success: true, data: { deployments: deployments.map(publicDeployment) } });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const deployment = await jobs.findOwnedDeployment(req.params.id, currentUser(req).id);
      if (!deployment) throw new NotFoundError('Deployment');

      res.json({ success: true, data: { deployment: publicDeployment(deployment) } });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
