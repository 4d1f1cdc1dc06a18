import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdirSync, existsSync } from 'fs';

import type { Principal } from '../../server/src/auth/policy.js';
import { createDevice, deleteDevice, getDevice, listDevices, listUserDevices } from '../../server/src/services/devices.js';
import { deleteImage, getImage, listImages, readImageContent, uploadImage } from '../../server/src/services/images.js';
import { getUser } from '../../server/src/services/users.js';
import type { StorageService } from '../../server/src/services/storage.js';
import { createTestContext, expectApiError, seedUser, type TestContext } from './helpers.js';

const page = { skip: 0, limit: 100 };

function bytes(s: string): ArrayBuffer {
    const encoded = new TextEncoder().encode(s);
    const buffer = new ArrayBuffer(encoded.byteLength);
    new Uint8Array(buffer).set(encoded);
    return buffer;
}

describe('Device Service', () => {
    let ctx: TestContext;
    let admin: Principal;
    let alice: Principal;
    let bob: Principal;

    beforeEach(async () => {
        ctx = createTestContext();
        admin = await seedUser(ctx.db, 'root', 'root-pw', 'admin');
        alice = await seedUser(ctx.db, 'alice', 'pw123');
        bob = await seedUser(ctx.db, 'bob', 'pw456');
    });

    afterEach(() => {
        ctx.cleanup();
    });

    it('creates a device owned by the path user', async () => {
        const device = await createDevice(ctx.db, alice, alice.id, { description: 'sensor' });
        expect(device).toMatchObject({ description: 'sensor', ownerId: alice.id });
        expect(device.apikey).toMatch(/^[0-9a-f-]{36}$/);

        const bare = await createDevice(ctx.db, alice, alice.id, {});
        expect(bare.description).toBeNull();
        expect(bare.apikey).not.toBe(device.apikey);
    });

    it('lets an admin create for anyone and denies users on others', async () => {
        const forBob = await createDevice(ctx.db, admin, bob.id, { description: 'x' });
        expect(forBob.ownerId).toBe(bob.id);

        await expectApiError(createDevice(ctx.db, alice, bob.id, { description: 'x' }), 'Unauthorized');
        await expectApiError(createDevice(ctx.db, undefined, alice.id, {}), 'Unauthorized');
    });

    it('reports a missing owner as not found to admins only', async () => {
        await expectApiError(createDevice(ctx.db, admin, 999, {}), 'NotFound', 'User not found');
        await expectApiError(createDevice(ctx.db, alice, 999, {}), 'Unauthorized');
    });

    it('shows created devices on the owner view', async () => {
        const first = await createDevice(ctx.db, alice, alice.id, { description: 'one' });
        const second = await createDevice(ctx.db, alice, alice.id, { description: 'two' });

        const view = await getUser(ctx.db, alice, alice.id);
        expect(view.devices.map((d) => d.id)).toEqual([first.id, second.id]);
    });

    it('lists all devices for admins only, in id order', async () => {
        const a = await createDevice(ctx.db, alice, alice.id, { description: 'a' });
        const b = await createDevice(ctx.db, bob, bob.id, { description: 'b' });

        expect((await listDevices(ctx.db, admin, page)).map((d) => d.id)).toEqual([a.id, b.id]);
        expect((await listDevices(ctx.db, admin, { skip: 1, limit: 5 })).map((d) => d.id)).toEqual([b.id]);
        expect(await listDevices(ctx.db, admin, { skip: 0, limit: 0 })).toEqual([]);

        // No "own devices" exception on the global listing
        await expectApiError(listDevices(ctx.db, alice, page), 'Unauthorized');
    });

    it('lists the devices of one user for that user', async () => {
        const a = await createDevice(ctx.db, alice, alice.id, { description: 'a' });
        await createDevice(ctx.db, bob, bob.id, { description: 'b' });

        expect((await listUserDevices(ctx.db, alice, alice.id)).map((d) => d.id)).toEqual([a.id]);
        await expectApiError(listUserDevices(ctx.db, alice, bob.id), 'Unauthorized');
    });

    it('reads and deletes under owner-or-admin', async () => {
        const device = await createDevice(ctx.db, alice, alice.id, { description: 'a' });

        expect(await getDevice(ctx.db, alice, device.id)).toEqual(device);
        expect(await getDevice(ctx.db, admin, device.id)).toEqual(device);
        await expectApiError(getDevice(ctx.db, bob, device.id), 'Unauthorized');
        await expectApiError(deleteDevice(ctx.db, bob, device.id), 'Unauthorized');

        await deleteDevice(ctx.db, alice, device.id);
        await expectApiError(getDevice(ctx.db, admin, device.id), 'NotFound', 'Device not found');
        await expectApiError(getDevice(ctx.db, alice, device.id), 'Unauthorized');
    });
});

describe('Image Service', () => {
    let ctx: TestContext;
    let admin: Principal;
    let alice: Principal;
    let bob: Principal;

    beforeEach(async () => {
        ctx = createTestContext();
        admin = await seedUser(ctx.db, 'root', 'root-pw', 'admin');
        alice = await seedUser(ctx.db, 'alice', 'pw123');
        bob = await seedUser(ctx.db, 'bob', 'pw456');
    });

    afterEach(() => {
        ctx.cleanup();
    });

    const upload = (filename: string, content: string, metadata: Record<string, string>[] = []) => ({
        filename,
        data: bytes(content),
        metadata,
    });

    it('stores bytes and a record with metadata', async () => {
        const image = await uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('map.PNG', 'png-bytes', [{ floor: '2' }]));

        expect(image).toMatchObject({
            ownerId: alice.id,
            filename: 'map.PNG',
            contentType: 'image/png',
            size: 9,
            metadata: [{ floor: '2' }],
        });
        expect('storageKey' in image).toBe(false);

        const stored = readdirSync(ctx.uploadsDir);
        expect(stored).toHaveLength(1);
        expect(stored[0]).toMatch(/^[0-9a-f-]{36}\.png$/);
    });

    it('rejects unsupported, empty and missing-owner uploads', async () => {
        await expectApiError(
            uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('notes.txt', 'text')),
            'BadRequest',
            'Unsupported image type: notes.txt',
        );
        await expectApiError(
            uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('empty.png', '')),
            'BadRequest',
            'Uploaded file is empty',
        );
        await expectApiError(uploadImage(ctx.db, ctx.uploads, admin, 999, upload('a.png', 'x')), 'NotFound', 'User not found');
        await expectApiError(uploadImage(ctx.db, ctx.uploads, alice, bob.id, upload('a.png', 'x')), 'Unauthorized');
        expect(existsSync(ctx.uploadsDir)).toBe(false);
    });

    it('serves content to owner and admin, and repeats reads unchanged', async () => {
        const image = await uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('a.jpg', 'jpeg-bytes'));

        const first = await readImageContent(ctx.db, ctx.uploads, alice, image.id);
        const second = await readImageContent(ctx.db, ctx.uploads, admin, image.id);
        expect(first.contentType).toBe('image/jpeg');
        expect(first.filename).toBe('a.jpg');
        expect(new TextDecoder().decode(first.body)).toBe('jpeg-bytes');
        expect(new TextDecoder().decode(second.body)).toBe('jpeg-bytes');

        await expectApiError(readImageContent(ctx.db, ctx.uploads, bob, image.id), 'Unauthorized');
    });

    it('reports missing bytes as not found', async () => {
        const image = await uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('a.gif', 'gif'));
        for (const key of readdirSync(ctx.uploadsDir)) await ctx.uploads.delete(key);

        await expectApiError(readImageContent(ctx.db, ctx.uploads, alice, image.id), 'NotFound', 'Image content not found');
    });

    it('lists images for admins only', async () => {
        const a = await uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('a.png', 'a'));
        const b = await uploadImage(ctx.db, ctx.uploads, bob, bob.id, upload('b.webp', 'b'));

        expect((await listImages(ctx.db, admin, page)).map((i) => i.id)).toEqual([a.id, b.id]);
        await expectApiError(listImages(ctx.db, alice, page), 'Unauthorized');
    });

    it('deletes the record and the bytes', async () => {
        const image = await uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('a.png', 'a'));

        await expectApiError(deleteImage(ctx.db, ctx.uploads, bob, image.id), 'Unauthorized');
        await deleteImage(ctx.db, ctx.uploads, alice, image.id);

        expect(readdirSync(ctx.uploadsDir)).toEqual([]);
        await expectApiError(getImage(ctx.db, admin, image.id), 'NotFound', 'Image not found');
    });

    it('keeps the record when the bytes cannot be removed', async () => {
        const image = await uploadImage(ctx.db, ctx.uploads, alice, alice.id, upload('a.png', 'a'));
        const readOnly: StorageService = {
            get: (key) => ctx.uploads.get(key),
            put: (key, data) => ctx.uploads.put(key, data),
            delete: async () => {
                throw new Error('read-only storage');
            },
            list: () => ctx.uploads.list(),
        };

        await expect(deleteImage(ctx.db, readOnly, alice, image.id)).rejects.toThrow('read-only storage');
        expect((await getImage(ctx.db, alice, image.id)).id).toBe(image.id);

        await deleteImage(ctx.db, ctx.uploads, alice, image.id);
        await expectApiError(getImage(ctx.db, admin, image.id), 'NotFound', 'Image not found');
    });
});
