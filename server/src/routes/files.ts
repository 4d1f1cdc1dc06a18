import { Hono } from 'hono';

import type { AppEnv } from '../types.js';
import { listFiles, readFile } from '../services/files.js';

const app = new Hono<AppEnv>();

// GET /image - Names of the files in the flat namespace
app.get('/', async (c) => {
    const files = await listFiles(c.var.files, c.var.principal);
    return c.json({ files });
});

// GET /image/:filename - Download by (sanitized) name
app.get('/:filename', async (c) => {
    const file = await readFile(c.var.files, c.var.principal, c.req.param('filename'));
    return c.body(file.body, 200, {
        'Content-Type': file.contentType,
        'Content-Disposition': `attachment; filename*=UTF-8''${encodeURIComponent(file.filename)}`,
    });
});

export default app;
