import { asc, eq } from 'drizzle-orm';
import { randomUUID } from 'crypto';

import type { DB } from '../db/index.js';
import { images, users, type ImageMetadata } from '../db/schema.js';
import { assertAllowed, type Principal } from '../auth/policy.js';
import { badRequest, notFound } from '../errors.js';
import type { Page } from '../validation.js';
import type { StorageService } from './storage.js';
import { toImageView, type ImageView } from './views.js';
import { IMAGE_MIME_TYPES, MAX_IMAGE_BYTES } from '../../../shared/config.js';

export interface ImageUpload {
    filename: string;
    data: ArrayBuffer;
    metadata: ImageMetadata;
}

export interface ImageContent {
    filename: string;
    contentType: string;
    body: ArrayBuffer;
}

async function findImageWithOwner(db: DB, imageId: number) {
    return db.query.images.findFirst({
        where: eq(images.id, imageId),
        with: { owner: { columns: { name: true } } },
    });
}

/** Owner of a new upload, once the requester may write there. Runs before the body is read. */
export async function findUploadOwner(db: DB, requester: Principal | undefined, userId: number) {
    const owner = await db.select({ id: users.id, name: users.name }).from(users).where(eq(users.id, userId)).get();
    assertAllowed('self-or-admin', requester, owner?.name);
    if (!owner) throw notFound('User not found');
    return owner;
}

// POST /users/:userId/images. Self or admin.
export async function uploadImage(
    db: DB,
    uploads: StorageService,
    requester: Principal | undefined,
    userId: number,
    upload: ImageUpload,
): Promise<ImageView> {
    const owner = await findUploadOwner(db, requester, userId);

    const extension = upload.filename.split('.').pop()?.toLowerCase() ?? '';
    const contentType = IMAGE_MIME_TYPES[extension];
    if (!contentType) throw badRequest(`Unsupported image type: ${upload.filename}`);
    if (upload.data.byteLength === 0) throw badRequest('Uploaded file is empty');
    if (upload.data.byteLength > MAX_IMAGE_BYTES) throw badRequest(`Image exceeds ${MAX_IMAGE_BYTES} bytes`);

    // Bytes first, then the record; a failed insert takes the bytes back out.
    const storageKey = `${randomUUID()}.${extension}`;
    await uploads.put(storageKey, upload.data);

    let row: typeof images.$inferSelect;
    try {
        row = await db.insert(images).values({
            ownerId: owner.id,
            storageKey,
            filename: upload.filename,
            contentType,
            size: upload.data.byteLength,
            metadata: upload.metadata,
        }).returning().get();
    } catch (e) {
        await uploads.delete(storageKey);
        throw e;
    }

    console.log(`[Images] Stored image #${row.id} (${row.size} bytes) for ${owner.name}`);
    return toImageView(row);
}

// GET /images. Admin only.
export async function listImages(db: DB, requester: Principal | undefined, page: Page): Promise<ImageView[]> {
    assertAllowed('admin-only', requester);
    const rows = await db.select().from(images).orderBy(asc(images.id)).limit(page.limit).offset(page.skip).all();
    return rows.map(toImageView);
}

// GET /images/:imageId. Owner or admin.
export async function getImage(db: DB, requester: Principal | undefined, imageId: number): Promise<ImageView> {
    const found = await findImageWithOwner(db, imageId);
    assertAllowed('self-or-admin', requester, found?.owner?.name);
    if (!found) throw notFound('Image not found');

    const { owner: _owner, ...row } = found;
    return toImageView(row);
}

// GET /images/:imageId/content. Owner or admin.
export async function readImageContent(
    db: DB,
    uploads: StorageService,
    requester: Principal | undefined,
    imageId: number,
): Promise<ImageContent> {
    const found = await findImageWithOwner(db, imageId);
    assertAllowed('self-or-admin', requester, found?.owner?.name);
    if (!found) throw notFound('Image not found');

    const body = await uploads.get(found.storageKey);
    if (!body) {
        console.warn(`[Images] Image #${imageId} has no bytes at ${found.storageKey}`);
        throw notFound('Image content not found');
    }
    return { filename: found.filename, contentType: found.contentType, body };
}

// DELETE /images/:imageId. Owner or admin.
export async function deleteImage(
    db: DB,
    uploads: StorageService,
    requester: Principal | undefined,
    imageId: number,
): Promise<void> {
    const found = await findImageWithOwner(db, imageId);
    assertAllowed('self-or-admin', requester, found?.owner?.name);
    if (!found) throw notFound('Image not found');

    // Bytes first; a failed unlink leaves the record in place.
    await uploads.delete(found.storageKey);
    await db.delete(images).where(eq(images.id, imageId)).run();
    console.log(`[Images] Deleted image #${imageId}`);
}
