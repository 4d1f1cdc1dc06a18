import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';

import type { AppEnv } from '../types.js';
import { deleteDevice, getDevice, listDevices } from '../services/devices.js';
import { deviceParamSchema, paginationSchema } from '../validation.js';

const app = new Hono<AppEnv>();

// GET /devices - All devices (admin)
app.get('/', zValidator('query', paginationSchema), async (c) => {
    const devices = await listDevices(c.var.db, c.var.principal, c.req.valid('query'));
    return c.json({ devices });
});

// GET /devices/:deviceId
app.get('/:deviceId', zValidator('param', deviceParamSchema), async (c) => {
    const { deviceId } = c.req.valid('param');
    const device = await getDevice(c.var.db, c.var.principal, deviceId);
    return c.json({ device });
});

// DELETE /devices/:deviceId
app.delete('/:deviceId', zValidator('param', deviceParamSchema), async (c) => {
    const { deviceId } = c.req.valid('param');
    await deleteDevice(c.var.db, c.var.principal, deviceId);
    return c.json({ deleted: deviceId });
});

export default app;
