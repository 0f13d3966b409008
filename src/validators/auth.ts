import { z } from 'zod';

export const signupSchema = z.object({
  username: z
    .string()
    .min(3)
    .max(50)
    .regex(/^[A-Za-z0-9_]+$/, 'Username must be alphanumeric with optional underscores'),
  email: z.string().email().transform((v) => v.toLowerCase()),
  password: z.string().min(8),
});

export const loginSchema = z.object({
  email: z.string().email().transform((v) => v.toLowerCase()),
  password: z.string().min(1),
});

export const refreshSchema = z.object({
  refreshToken: z.string().min(1),
});

export const createApiKeySchema = z.object({
  name: z.string().min(1).max(100),
});

export const updateProfileSchema = z.object({
  username: signupSchema.shape.username.optional(),
  email: z.string().email().transform((v) => v.toLowerCase()).optional(),
});

export const adminUpdateUserSchema = z.object({
  isActive: z.boolean().optional(),
  role: z.enum(['user', 'admin']).optional(),
});

export type SignupInput = z.infer<typeof signupSchema>;
