import { expect } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { createApp, type App } from '../../server/src/app.js';
import { openDb, type DB } from '../../server/src/db/index.js';
import { users } from '../../server/src/db/schema.js';
import { hashPassword } from '../../server/src/auth/password.js';
import type { Principal, Role } from '../../server/src/auth/policy.js';
import { ApiError, type ErrorKind } from '../../server/src/errors.js';
import { LocalStorageService } from '../../server/src/services/storage.js';

export interface TestContext {
    db: DB;
    app: App;
    files: LocalStorageService;
    uploads: LocalStorageService;
    filesDir: string;
    uploadsDir: string;
    cleanup: () => void;
}

/** Fresh in-memory database and temporary storage directories. */
export function createTestContext(): TestContext {
    const root = mkdtempSync(join(tmpdir(), 'device-forge-'));
    const filesDir = join(root, 'images');
    const uploadsDir = join(root, 'uploads');

    const db = openDb(':memory:');
    const files = new LocalStorageService(filesDir);
    const uploads = new LocalStorageService(uploadsDir);
    const app = createApp({ db, files, uploads }, { logRequests: false });

    return {
        db,
        app,
        files,
        uploads,
        filesDir,
        uploadsDir,
        cleanup: () => rmSync(root, { recursive: true, force: true }),
    };
}

export async function seedUser(db: DB, name: string, password: string, role: Role = 'user'): Promise<Principal> {
    const row = await db.insert(users).values({
        name,
        email: `${name}@example.com`,
        hashedPassword: await hashPassword(password),
        role,
    }).returning().get();
    return { id: row.id, identity: row.name, role: row.role };
}

export function basic(name: string, password: string): Record<string, string> {
    return { Authorization: `Basic ${Buffer.from(`${name}:${password}`).toString('base64')}` };
}

export async function expectApiError(promise: Promise<unknown>, kind: ErrorKind, message?: string): Promise<void> {
    const err = await promise.then(
        () => undefined,
        (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(ApiError);
    if (err instanceof ApiError) {
        expect(err.kind).toBe(kind);
        if (message !== undefined) expect(err.message).toBe(message);
    }
}
