import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ApiError } from '../errors.js';
import { AUTH_REALM } from '../../../shared/config.js';

/**
 * Global error handler (`app.onError`).
 *
 * Tagged core errors become `{ error: message }` with the kind's status.
 * Every 401 carries the same body and a Basic challenge, whatever the cause.
 */
export function handleError(err: Error, c: Context): Response | Promise<Response> {
  if (err instanceof ApiError) {
    if (err.kind === 'Configuration') {
      console.error(`[API] Configuration error on ${c.req.method} ${c.req.path}: ${err.message}`);
    }
    const headers = err.kind === 'Unauthorized' ? { 'WWW-Authenticate': `Basic realm="${AUTH_REALM}"` } : undefined;
    return c.json({ error: err.message }, err.status, headers);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  console.error(`[App Error] ${err.message}`);
  console.error(err.stack);
  return c.json({ error: 'Internal Server Error', message: err.message }, 500);
}
