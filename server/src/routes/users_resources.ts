import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { createMiddleware } from 'hono/factory';
import { zValidator } from '@hono/zod-validator';

import type { AppEnv } from '../types.js';
import type { ImageMetadata } from '../db/schema.js';
import { badRequest } from '../errors.js';
import { createDevice, listUserDevices } from '../services/devices.js';
import { findUploadOwner, uploadImage } from '../services/images.js';
import { deviceCreateSchema, imageMetadataSchema, userParamSchema } from '../validation.js';
import { MAX_UPLOAD_BODY_BYTES } from '../../../shared/config.js';

const app = new Hono<AppEnv>();

const uploadLimit = bodyLimit({
    maxSize: MAX_UPLOAD_BODY_BYTES,
    onError: () => {
        throw badRequest(`Upload exceeds ${MAX_UPLOAD_BODY_BYTES} bytes`);
    },
});

function parseMetadata(raw: string | File | undefined): ImageMetadata {
    if (raw === undefined) return [];
    if (typeof raw !== 'string') throw badRequest('Metadata must be sent as a JSON string field');

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw badRequest('Metadata is not valid JSON');
    }

    const result = imageMetadataSchema.safeParse(parsed);
    if (!result.success) throw badRequest('Metadata must be a list of string-to-string objects');
    return result.data;
}

// POST /users/:userId/devices
app.post('/:userId/devices', zValidator('param', userParamSchema), zValidator('json', deviceCreateSchema), async (c) => {
    const { userId } = c.req.valid('param');
    const device = await createDevice(c.var.db, c.var.principal, userId, c.req.valid('json'));
    return c.json({ device }, 201);
});

// GET /users/:userId/devices
app.get('/:userId/devices', zValidator('param', userParamSchema), async (c) => {
    const { userId } = c.req.valid('param');
    const devices = await listUserDevices(c.var.db, c.var.principal, userId);
    return c.json({ devices });
});

// POST /users/:userId/images (multipart: file, metadata)
// Ownership and size are settled before the body is read.
const checkUploadOwner = createMiddleware<AppEnv>(async (c, next) => {
    const userId = userParamSchema.parse(c.req.param()).userId;
    await findUploadOwner(c.var.db, c.var.principal, userId);
    await next();
});

app.post('/:userId/images', zValidator('param', userParamSchema), checkUploadOwner, uploadLimit, async (c) => {
    const { userId } = c.req.valid('param');

    const body = await c.req.parseBody().catch((e: unknown) => {
        console.warn(`[Images] Could not parse upload for user #${userId}:`, e);
        throw badRequest('Malformed multipart body');
    });
    const file = body['file'];
    if (!(file instanceof File)) throw badRequest('No file uploaded');

    const image = await uploadImage(c.var.db, c.var.uploads, c.var.principal, userId, {
        filename: file.name,
        data: await file.arrayBuffer(),
        metadata: parseMetadata(body['metadata']),
    });
    return c.json({ image }, 201);
});

export default app;
