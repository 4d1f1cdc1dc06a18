import { z } from 'zod';
import { RoleSchema } from './auth/policy.js';
import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT, PASSWORD_MAX_BYTES } from '../../shared/config.js';

// Query: ?skip=&limit=
export const paginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
});

export type Page = z.infer<typeof paginationSchema>;

const id = z.coerce.number().int().positive();

export const passwordSchema = z
  .string()
  .min(1)
  .refine((v) => Buffer.byteLength(v, 'utf8') <= PASSWORD_MAX_BYTES, {
    message: `Password must be at most ${PASSWORD_MAX_BYTES} bytes`,
  });

export const userParamSchema = z.object({ userId: id });
export const deviceParamSchema = z.object({ deviceId: id });
export const imageParamSchema = z.object({ imageId: id });

export const userCreateSchema = z.object({
  email: z.string().email(),
  name: z.string().trim().min(1).max(255).refine((v) => !v.includes(':'), {
    message: 'Name must not contain ":"',
  }),
  password: passwordSchema,
  role: RoleSchema.default('user'),
});

export type UserCreate = z.infer<typeof userCreateSchema>;

// The name is the principal's identity and cannot change.
export const userUpdateSchema = z
  .object({
    email: z.string().email().optional(),
    password: passwordSchema.optional(),
    role: RoleSchema.optional(),
    isActive: z.boolean().optional(),
  })
  .strict();

export type UserUpdate = z.infer<typeof userUpdateSchema>;

export const deviceCreateSchema = z.object({
  description: z.string().nullable().optional(),
});

export type DeviceCreate = z.infer<typeof deviceCreateSchema>;

export const imageMetadataSchema = z.array(z.record(z.string()));
