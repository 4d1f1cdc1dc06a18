import { eq } from 'drizzle-orm';
import type { DB } from './index.js';
import { users } from './schema.js';
import { hashPassword } from '../auth/password.js';

export interface AdminSeed {
  name: string;
  email: string;
  password: string;
}

/**
 * Make sure the bootstrap administrator exists. An existing principal with the
 * same name is left untouched (its password is not reset).
 */
export async function ensureAdmin(db: DB, seed: AdminSeed): Promise<void> {
  const existing = await db.select().from(users).where(eq(users.name, seed.name)).get();
  if (existing) {
    if (existing.role !== 'admin') {
      console.warn(`[Boot] Bootstrap admin '${seed.name}' exists with role '${existing.role}'; not promoting it.`);
    }
    return;
  }

  await db.insert(users).values({
    name: seed.name,
    email: seed.email,
    hashedPassword: await hashPassword(seed.password),
    role: 'admin',
  }).run();
  console.log(`[Boot] Created bootstrap admin '${seed.name}'`);
}
