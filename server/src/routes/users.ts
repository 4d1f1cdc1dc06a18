import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';

import type { AppEnv } from '../types.js';
import { createUser, getUser, listUsers, updateUser } from '../services/users.js';
import { paginationSchema, userCreateSchema, userParamSchema, userUpdateSchema } from '../validation.js';

const app = new Hono<AppEnv>();

// POST /users - Register (public; admin credentials needed for role=admin)
app.post('/', zValidator('json', userCreateSchema), async (c) => {
    const user = await createUser(c.var.db, c.var.principal, c.req.valid('json'));
    return c.json({ user }, 201);
});

// GET /users - List all principals (admin)
app.get('/', zValidator('query', paginationSchema), async (c) => {
    const users = await listUsers(c.var.db, c.var.principal, c.req.valid('query'));
    return c.json({ users });
});

// GET /users/:userId - Single principal with devices
app.get('/:userId', zValidator('param', userParamSchema), async (c) => {
    const { userId } = c.req.valid('param');
    const user = await getUser(c.var.db, c.var.principal, userId);
    return c.json({ user });
});

// PATCH /users/:userId - Email/password rotation; role & activation for admins
app.patch('/:userId', zValidator('param', userParamSchema), zValidator('json', userUpdateSchema), async (c) => {
    const { userId } = c.req.valid('param');
    const user = await updateUser(c.var.db, c.var.principal, userId, c.req.valid('json'));
    return c.json({ user });
});

export default app;
