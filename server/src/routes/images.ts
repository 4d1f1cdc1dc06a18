import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';

import type { AppEnv } from '../types.js';
import { deleteImage, getImage, listImages, readImageContent } from '../services/images.js';
import { imageParamSchema, paginationSchema } from '../validation.js';

const app = new Hono<AppEnv>();

// GET /images - All image records (admin)
app.get('/', zValidator('query', paginationSchema), async (c) => {
    const images = await listImages(c.var.db, c.var.principal, c.req.valid('query'));
    return c.json({ images });
});

// GET /images/:imageId - Metadata
app.get('/:imageId', zValidator('param', imageParamSchema), async (c) => {
    const { imageId } = c.req.valid('param');
    const image = await getImage(c.var.db, c.var.principal, imageId);
    return c.json({ image });
});

// GET /images/:imageId/content - Stored bytes
app.get('/:imageId/content', zValidator('param', imageParamSchema), async (c) => {
    const { imageId } = c.req.valid('param');
    const content = await readImageContent(c.var.db, c.var.uploads, c.var.principal, imageId);
    return c.body(content.body, 200, {
        'Content-Type': content.contentType,
        'Content-Disposition': `inline; filename*=UTF-8''${encodeURIComponent(content.filename)}`,
        'Cache-Control': 'private, max-age=86400', // Cache for 1 day
    });
});

// DELETE /images/:imageId - Record and bytes
app.delete('/:imageId', zValidator('param', imageParamSchema), async (c) => {
    const { imageId } = c.req.valid('param');
    await deleteImage(c.var.db, c.var.uploads, c.var.principal, imageId);
    return c.json({ deleted: imageId });
});

export default app;
