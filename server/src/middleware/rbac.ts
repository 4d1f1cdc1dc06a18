import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';
import { authorize } from '../auth/policy.js';
import { unauthorized } from '../errors.js';
import { rules, type AccessRule } from './rules.js';

/**
 * EXPLANATION:
 * This middleware matches the current request against the operation catalog in `rules.ts`.
 * It is the ONLY place where route-pattern matching occurs to determine the policy.
 * Ownership is NOT decided here: `self-or-admin` routes only need a verified principal
 * at this point, and the handler applies the full rule once it has loaded the target.
 */

function patternToRegex(pattern: string): RegExp {
    // 1. Escape all regex special characters EXCEPT *
    let regexStr = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&');

    // 2. Convert glob stars to regex (order matters: ** first)
    regexStr = regexStr.replace(/\*\*/g, '___DSTAR___');
    regexStr = regexStr.replace(/\*/g, '[^/]+');
    regexStr = regexStr.replace(/___DSTAR___/g, '.*');

    return new RegExp(`^${regexStr}$`);
}

function normalize(path: string): string {
    return path.endsWith('/') && path.length > 1 ? path.slice(0, -1) : path;
}

const compiled = rules.map((rule) => ({ rule, regex: patternToRegex(normalize(rule.pattern.toLowerCase())) }));

/** First catalog entry matching the request, if any. HEAD is treated as GET. */
export function findRule(method: string, path: string): AccessRule | undefined {
    const m = method.toLowerCase() === 'head' ? 'get' : method.toLowerCase();
    const p = normalize(path.toLowerCase());
    return compiled.find(({ rule, regex }) => (rule.method === 'all' || rule.method === m) && regex.test(p))?.rule;
}

export const rbacMiddleware = createMiddleware<AppEnv>(async (c, next) => {
    const method = c.req.method;
    const path = c.req.path;
    const principal = c.var.principal;
    const who = principal ? `${principal.identity} (${principal.role})` : 'anonymous';

    const rule = findRule(method, path);
    if (!rule) {
        console.warn(`[RBAC] No rule found for ${method} ${path}. Requester: ${who}. Denying.`);
        throw unauthorized();
    }

    const gate = rule.policy === 'self-or-admin' ? 'authenticated' : rule.policy;
    if (authorize(gate, principal) === 'DENY') {
        console.warn(`[RBAC] ${method} ${path} denied for ${who} (policy: ${rule.policy})`);
        throw unauthorized();
    }

    await next();
});
