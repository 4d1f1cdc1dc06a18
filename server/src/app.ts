import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { createMiddleware } from 'hono/factory';

import type { AppDeps, AppEnv } from './types.js';
import { authMiddleware } from './middleware/auth.js';
import { rbacMiddleware } from './middleware/rbac.js';
import { handleError } from './middleware/error-handler.js';
import userRoutes from './routes/users.js';
import userResourceRoutes from './routes/users_resources.js';
import deviceRoutes from './routes/devices.js';
import imageRoutes from './routes/images.js';
import fileRoutes from './routes/files.js';

export interface AppOptions {
  /** Request logging through `hono/logger`. */
  logRequests?: boolean;
}

/**
 * Build the HTTP app around explicit collaborators. Every request gets the
 * store handle and storages on its context; nothing is reached through
 * module-level singletons.
 */
export function createApp(deps: AppDeps, options: AppOptions = {}) {
  const app = new Hono<AppEnv>();

  if (options.logRequests ?? true) {
    app.use('*', logger());
  }

  app.use('*', createMiddleware<AppEnv>(async (c, next) => {
    c.set('db', deps.db);
    c.set('files', deps.files);
    c.set('uploads', deps.uploads);
    await next();
  }));

  app.use('*', authMiddleware);
  app.use('*', rbacMiddleware);

  app.get('/health', (c) => {
    return c.json({ status: 'ok', env: process.env.NODE_ENV || 'development' });
  });

  // Mount sub-apps
  app.route('/users', userRoutes);
  app.route('/users', userResourceRoutes); // Adds /users/:userId/devices and /users/:userId/images
  app.route('/devices', deviceRoutes);
  app.route('/images', imageRoutes);
  app.route('/image', fileRoutes); // Flat file namespace

  app.onError(handleError);

  return app;
}

export type App = ReturnType<typeof createApp>;
