import { z } from 'zod';

const envVarsSchema = z.record(z.string());

export const createAppSchema = z
  .object({
    name: z
      .string()
      .min(3)
      .max(50)
      .regex(/^[A-Za-z0-9_-]+$/, 'Name must be alphanumeric with hyphens or underscores')
      .transform((v) => v.toLowerCase()),
    description: z.string().max(500).optional(),
    sourceType: z.enum(['github', 'docker', 'python_script']),
    sourceConfig: z.record(z.unknown()),
    envVars: envVarsSchema.default({}),
  })
  .superRefine((app, ctx) => {
    if (app.sourceType === 'github' && typeof app.sourceConfig.repoUrl !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sourceConfig', 'repoUrl'],
        message: 'GitHub repoUrl required in sourceConfig',
      });
    }
    if (app.sourceType === 'docker' && typeof app.sourceConfig.image !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sourceConfig', 'image'],
        message: 'Docker image required in sourceConfig',
      });
    }
  });

export const updateAppSchema = z.object({
  description: z.string().max(500).optional(),
  envVars: envVarsSchema.optional(),
  status: z.enum(['pending', 'deploying', 'running', 'stopped', 'failed']).optional(),
});

export const createDeploymentSchema = z.object({
  appId: z.string().min(1),
  commitSha: z.string().min(1).max(64).optional(),
  dockerImage: z.string().min(1).max(300).optional(),
});

export type CreateAppInput = z.infer<typeof createAppSchema>;
