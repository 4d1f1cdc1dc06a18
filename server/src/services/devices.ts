import { asc, eq } from 'drizzle-orm';
import { randomUUID } from 'crypto';

import type { DB } from '../db/index.js';
import { devices, users } from '../db/schema.js';
import { assertAllowed, type Principal } from '../auth/policy.js';
import { notFound } from '../errors.js';
import type { DeviceCreate, Page } from '../validation.js';
import type { DeviceView } from './views.js';

async function findOwner(db: DB, userId: number) {
    return db.select({ id: users.id, name: users.name }).from(users).where(eq(users.id, userId)).get();
}

async function findDeviceWithOwner(db: DB, deviceId: number) {
    return db.query.devices.findFirst({
        where: eq(devices.id, deviceId),
        with: { owner: { columns: { name: true } } },
    });
}

// POST /users/:userId/devices. Self or admin.
export async function createDevice(
    db: DB,
    requester: Principal | undefined,
    userId: number,
    input: DeviceCreate,
): Promise<DeviceView> {
    const owner = await findOwner(db, userId);
    assertAllowed('self-or-admin', requester, owner?.name);
    if (!owner) throw notFound('User not found');

    const device = await db.insert(devices).values({
        description: input.description ?? null,
        apikey: randomUUID(),
        ownerId: owner.id,
    }).returning().get();

    console.log(`[Devices] Created device #${device.id} for ${owner.name}`);
    return device;
}

// GET /devices. Admin only, no "own devices" exception.
export async function listDevices(db: DB, requester: Principal | undefined, page: Page): Promise<DeviceView[]> {
    assertAllowed('admin-only', requester);
    return db.select().from(devices).orderBy(asc(devices.id)).limit(page.limit).offset(page.skip).all();
}

// GET /users/:userId/devices. Self or admin.
export async function listUserDevices(db: DB, requester: Principal | undefined, userId: number): Promise<DeviceView[]> {
    const owner = await findOwner(db, userId);
    assertAllowed('self-or-admin', requester, owner?.name);
    if (!owner) throw notFound('User not found');

    return db.select().from(devices).where(eq(devices.ownerId, owner.id)).orderBy(asc(devices.id)).all();
}

// GET /devices/:deviceId. Owner or admin.
export async function getDevice(db: DB, requester: Principal | undefined, deviceId: number): Promise<DeviceView> {
    const found = await findDeviceWithOwner(db, deviceId);
    assertAllowed('self-or-admin', requester, found?.owner?.name);
    if (!found) throw notFound('Device not found');

    const { owner: _owner, ...device } = found;
    return device;
}

// DELETE /devices/:deviceId. Owner or admin.
export async function deleteDevice(db: DB, requester: Principal | undefined, deviceId: number): Promise<void> {
    const found = await findDeviceWithOwner(db, deviceId);
    assertAllowed('self-or-admin', requester, found?.owner?.name);
    if (!found) throw notFound('Device not found');

    await db.delete(devices).where(eq(devices.id, deviceId)).run();
    console.log(`[Devices] Deleted device #${deviceId}`);
}
