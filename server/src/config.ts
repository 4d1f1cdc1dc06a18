import { z } from 'zod';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_BCRYPT_ROUNDS } from '../../shared/config.js';

const serverRoot = fileURLToPath(new URL('../', import.meta.url));

const optional = z
  .string()
  .optional()
  .transform((v) => (v === '' ? undefined : v));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test', 'local']).default('development'),

  // Storage
  DB_URL: z.string().min(1).default(join(serverRoot, 'data.db')),
  FILES_DIR: z.string().min(1).default(join(serverRoot, 'data/images')),
  UPLOAD_DIR: z.string().min(1).default(join(serverRoot, 'data/uploads')),

  // Credentials
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(DEFAULT_BCRYPT_ROUNDS),

  // Bootstrap admin, created at boot when both name and password are set
  ADMIN_NAME: optional,
  ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  ADMIN_PASSWORD: optional,
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export const CONFIG = loadConfig();
