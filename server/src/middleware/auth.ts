import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';
import { verifyCredentials } from '../services/users.js';

export interface BasicCredentials {
  username: string;
  password: string;
}

/** Decode an `Authorization: Basic ...` header. Anything else yields `undefined`. */
export function parseBasicAuth(header: string | undefined): BasicCredentials | undefined {
  if (!header) return undefined;

  const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header);
  if (!match) return undefined;

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const colon = decoded.indexOf(':');
  if (colon < 0) return undefined;

  return { username: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
}

/**
 * Lenient authentication: when Basic credentials verify, the principal is put
 * on the context; otherwise the request continues anonymously and the RBAC
 * middleware (or the handler) decides whether that is enough.
 */
export const authMiddleware = createMiddleware<AppEnv>(async (c, next) => {
  const credentials = parseBasicAuth(c.req.header('Authorization'));

  if (credentials) {
    const principal = await verifyCredentials(c.var.db, credentials.username, credentials.password);
    if (principal) {
      c.set('principal', principal);
    } else {
      console.warn(`[Auth] Credential verification failed for '${credentials.username}'`);
    }
  }

  await next();
});
