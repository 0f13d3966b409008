import { z } from 'zod';

export const createFunctionSchema = z.object({
  name: z
    .string()
    .min(3)
    .max(50)
    .regex(/^[A-Za-z0-9_-]+$/, 'Name must be alphanumeric with hyphens or underscores'),
  runtime: z.enum(['python', 'nodejs']),
  code: z.string().min(1),
  handler: z.string().min(1).default('main'),
  envVars: z.record(z.string()).default({}),
  timeout: z.number().int().min(1).max(300).default(30),
});

export const updateFunctionSchema = z.object({
  code: z.string().min(1).optional(),
  envVars: z.record(z.string()).optional(),
  timeout: z.number().int().min(1).max(300).optional(),
});

export const invokeFunctionSchema = z.object({
  payload: z.record(z.unknown()).default({}),
});
