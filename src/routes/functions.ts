import { Router, Response, NextFunction } from 'express';
import { CloudFunction, IFunction } from '../models/Function';
import { config } from '../config';
import { AuthenticatedRequest, currentUser, requireUser } from '../middleware/auth';
import { validate } from '../middleware/validate';
import { createFunctionSchema, invokeFunctionSchema, updateFunctionSchema } from '../validators/functions';
import { recordActivity } from '../services/activityLog';
import { generateId } from '../utils/crypto';
import { ConflictError, NotFoundError } from '../utils/errors';
import { publicFunction } from './serializers';
import type { RouteDeps } from './index';

export function generateFunctionEndpoint(name: string, functionId: string): string {
  return `https://fn-${name}-${functionId.slice(0, 8)}.${config.platform.baseDomain}/invoke`;
}

async function findOwnedFunction(functionId: string, userId: string): Promise<IFunction> {
  const fn = await CloudFunction.findOne({ _id: functionId, userId });
  if (!fn) throw new NotFoundError('Function');
  return fn;
}

export function createFunctionsRouter({ credentials }: RouteDeps): Router {
  const router = Router();
  router.use(requireUser(credentials));

  router.post(
    '/',
    validate(createFunctionSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        const { name, runtime, code, handler, envVars, timeout } = req.body;

        const existing = await CloudFunction.exists({ userId: user.id, name });
        if (existing) throw new ConflictError('Function with this name already exists');

        const id = generateId();
        const fn = await CloudFunction.create({
          _id: id,
          userId: user.id,
          name,
          runtime,
          code,
          handler,
          envVars,
          timeout,
          endpoint: generateFunctionEndpoint(name, id),
        });

        console.log(`[Functions] Function created: ${fn.name} by user ${user.email}`);

        res.status(201).json({ success: true, data: { function: publicFunction(fn) } });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const functions = await CloudFunction.find({ userId: currentUser(req).id }).sort({ createdAt: -1 });
      res.json({ success: true, data: { functions: functions.map(publicFunction) } });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const fn = await findOwnedFunction(req.params.id, currentUser(req).id);
      res.json({ success: true, data: { function: publicFunction(fn) } });
    } catch (err) {
      next(err);
    }
  });

  router.patch(
    '/:id',
    validate(updateFunctionSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = currentUser(req);
        await findOwnedFunction(req.params.id, user.id);

        const update: Record<string, unknown> = {};
        if (req.body.code !== undefined) update.code = req.body.code;
        if (req.body.envVars !== undefined) update.envVars = req.body.envVars;
        if (req.body.timeout !== undefined) update.timeout = req.body.timeout;

        const fn = await CloudFunction.findByIdAndUpdate(req.params.id, { $set: update }, { new: true });
        if (!fn) throw new NotFoundError('Function');

        console.log(`[Functions] Function updated: ${fn.name} by user ${user.email}`);

        res.json({ success: true, data: { function: publicFunction(fn) } });
      } catch (err) {
        next(err);
      }
    }
  );

  router.delete('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const fn = await findOwnedFunction(req.params.id, user.id);

      await CloudFunction.deleteOne({ _id: fn._id });

      console.log(`[Functions] Function deleted: ${fn.name} by user ${user.email}`);

      res.json({ success: true, message: 'Function deleted successfully' });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/v1/functions/:id/invoke
   * Execution is simulated: the payload is echoed back.
   */
  router.post(
    '/:id/invoke',
    validate(invokeFunctionSchema),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const fn = await findOwnedFunction(req.params.id, currentUser(req).id);
        const startedAt = Date.now();

        const result = {
          functionId: fn._id,
          status: 'success',
          executionTimeMs: Date.now() - startedAt,
          output: {
            message: `Function ${fn.name} executed successfully`,
            payload: req.body.payload,
          },
          timestamp: new Date().toISOString(),
        };

        await recordActivity({ functionId: fn._id, logType: 'function', message: `Function '${fn.name}' invoked` });

        res.json({ success: true, data: result });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
