import { Router } from 'express';
import type { CredentialService } from '../services/credentials';
import type { DeploymentQueue } from '../services/queue';
import type { DeploymentStore } from '../stores/types';
import { createAuthRouter } from './auth';
import { createUsersRouter } from './users';
import { createAppsRouter } from './apps';
import { createDeploymentsRouter } from './deployments';
import { createFunctionsRouter } from './functions';
import { createLogsRouter } from './logs';
import { createAdminRouter } from './admin';

export interface RouteDeps {
  credentials: CredentialService;
  queue: DeploymentQueue;
  jobs: DeploymentStore;
}

export function createApiRouter(deps: RouteDeps): Router {
  const router = Router();

  router.use('/auth', createAuthRouter(deps));
  router.use('/users', createUsersRouter(deps));
  router.use('/apps', createAppsRouter(deps));
  router.use('/deployments', createDeploymentsRouter(deps));
  router.use('/functions', createFunctionsRouter(deps));
  router.use('/logs', createLogsRouter(deps));
  router.use('/admin', createAdminRouter(deps));

  return router;
}
