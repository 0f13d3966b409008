import { Router, Response, NextFunction } from 'express';
import { App } from '../models/App';
import { CloudFunction } from '../models/Function';
import { Log } from '../models/Log';
import { AuthenticatedRequest, currentUser, requireUser } from '../middleware/auth';
import { NotFoundError } from '../utils/errors';
import { publicLog } from './serializers';
import type { RouteDeps } from './index';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createLogsRouter({ credentials, jobs }: RouteDeps): Router {
  const router = Router();
  router.use(requireUser(credentials));

  /**
   * GET /api/v1/logs?appId=&deploymentId=&functionId=&logType=&limit=
   * Every resource filter must name something the caller owns; without one,
   * returns logs of the caller's apps.
   */
  router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const appId = queryString(req.query.appId);
      const deploymentId = queryString(req.query.deploymentId);
      const functionId = queryString(req.query.functionId);
      const logType = queryString(req.query.logType);
      const requested = parseInt(queryString(req.query.limit) || String(DEFAULT_LIMIT), 10);
      const limit = Math.min(Number.isNaN(requested) || requested < 1 ? DEFAULT_LIMIT : requested, MAX_LIMIT);

      const filter: Record<string, unknown> = {};

      if (appId) {
        if (!(await jobs.findOwnedApp(appId, user.id))) throw new NotFoundError('App');
        filter.appId = appId;
      }
      if (deploymentId) {
        if (!(await jobs.findOwnedDeployment(deploymentId, user.id))) throw new NotFoundError('Deployment');
        filter.deploymentId = deploymentId;
      }
      if (functionId) {
        const owned = await CloudFunction.exists({ _id: functionId, userId: user.id });
        if (!owned) throw new NotFoundError('Function');
        filter.functionId = functionId;
      }
      if (logType) filter.logType = logType;

      if (!appId && !deploymentId && !functionId) {
        filter.appId = { $in: await App.find({ userId: user.id }).distinct('_id') };
      }

      const logs = await Log.find(filter).sort({ createdAt: -1 }).limit(limit);

      res.json({ success: true, data: { logs: logs.map(publicLog) } });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
