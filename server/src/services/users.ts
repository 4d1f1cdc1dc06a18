import { eq } from 'drizzle-orm';

import { isUniqueViolation, type DB } from '../db/index.js';
import { users } from '../db/schema.js';
import { assertAllowed, parseRole, type Principal } from '../auth/policy.js';
import { hashPassword, verifyAgainstDecoy, verifyPassword } from '../auth/password.js';
import { conflict, notFound } from '../errors.js';
import type { Page, UserCreate, UserUpdate } from '../validation.js';
import { toUserView, type UserView } from './views.js';

async function findByEmail(db: DB, email: string) {
    return db.select({ id: users.id }).from(users).where(eq(users.email, email)).get();
}

async function findByName(db: DB, name: string) {
    return db.select({ id: users.id }).from(users).where(eq(users.name, name)).get();
}

async function loadUserView(db: DB, userId: number): Promise<UserView | undefined> {
    const row = await db.query.users.findFirst({
        where: eq(users.id, userId),
        columns: { hashedPassword: false },
        with: { devices: { orderBy: (d, { asc }) => [asc(d.id)] } },
    });
    return row && toUserView(row);
}

/**
 * Verify Basic credentials against the store.
 * Unknown identities, wrong passwords and deactivated principals all yield `undefined`.
 */
export async function verifyCredentials(db: DB, identity: string, password: string): Promise<Principal | undefined> {
    const row = await db.select().from(users).where(eq(users.name, identity)).get();
    if (!row) {
        await verifyAgainstDecoy(password);
        return undefined;
    }

    const ok = await verifyPassword(password, row.hashedPassword);
    if (!ok || !row.isActive) return undefined;

    return { id: row.id, identity: row.name, role: parseRole(row.role, row.name) };
}

// POST /users. Public, but minting an admin takes an admin.
export async function createUser(db: DB, requester: Principal | undefined, input: UserCreate): Promise<UserView> {
    if (input.role === 'admin') {
        assertAllowed('admin-only', requester);
    }

    if (await findByEmail(db, input.email)) throw conflict('Email already registered');
    if (await findByName(db, input.name)) throw conflict('Name already registered');

    const hashedPassword = await hashPassword(input.password);

    let created: typeof users.$inferSelect;
    try {
        created = await db.insert(users).values({
            email: input.email,
            name: input.name,
            hashedPassword,
            role: input.role,
        }).returning().get();
    } catch (e) {
        // Lost a race with a concurrent registration
        if (isUniqueViolation(e)) throw conflict('Email or name already registered');
        throw e;
    }

    console.log(`[Users] Created ${created.role} ${created.name} (#${created.id})`);
    return {
        id: created.id,
        email: created.email,
        name: created.name,
        role: parseRole(created.role, created.name),
        isActive: created.isActive,
        createdAt: created.createdAt,
        devices: [],
    };
}

// GET /users. Admin only.
export async function listUsers(db: DB, requester: Principal | undefined, page: Page): Promise<UserView[]> {
    assertAllowed('admin-only', requester);
    if (page.limit === 0) return [];

    const rows = await db.query.users.findMany({
        columns: { hashedPassword: false },
        with: { devices: { orderBy: (d, { asc }) => [asc(d.id)] } },
        orderBy: (u, { asc }) => [asc(u.id)],
        offset: page.skip,
        limit: page.limit,
    });
    return rows.map(toUserView);
}

// GET /users/:userId. Self or admin.
export async function getUser(db: DB, requester: Principal | undefined, userId: number): Promise<UserView> {
    const user = await loadUserView(db, userId);
    assertAllowed('self-or-admin', requester, user?.name);
    if (!user) throw notFound('User not found');
    return user;
}

/**
 * PATCH /users/:userId. Owners may change their email and password; role and
 * activation changes are for admins only.
 */
export async function updateUser(
    db: DB,
    requester: Principal | undefined,
    userId: number,
    patch: UserUpdate,
): Promise<UserView> {
    const existing = await db.select().from(users).where(eq(users.id, userId)).get();
    assertAllowed('self-or-admin', requester, existing?.name);
    if (patch.role !== undefined || patch.isActive !== undefined) {
        assertAllowed('admin-only', requester);
    }
    if (!existing) throw notFound('User not found');

    const changes: Partial<typeof users.$inferInsert> = {};
    if (patch.email !== undefined && patch.email !== existing.email) {
        if (await findByEmail(db, patch.email)) throw conflict('Email already registered');
        changes.email = patch.email;
    }
    if (patch.password !== undefined) changes.hashedPassword = await hashPassword(patch.password);
    if (patch.role !== undefined) changes.role = patch.role;
    if (patch.isActive !== undefined) changes.isActive = patch.isActive;

    if (Object.keys(changes).length > 0) {
        try {
            await db.update(users).set(changes).where(eq(users.id, userId)).run();
        } catch (e) {
            if (isUniqueViolation(e)) throw conflict('Email already registered');
            throw e;
        }
        console.log(`[Users] Updated ${existing.name} (${Object.keys(changes).join(', ')})`);
    }

    const updated = await loadUserView(db, userId);
    if (!updated) throw notFound('User not found');
    return updated;
}
