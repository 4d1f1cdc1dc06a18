import type { Policy } from '../auth/policy.js';

export interface AccessRule {
    method: string;
    pattern: string;
    policy: Policy;
}

/**
 * Operation catalog: the policy every route runs under.
 * `*` matches one path segment, `**` any suffix. Routes missing here are denied.
 */
export const rules: AccessRule[] = [
    { method: "get", pattern: "/health", policy: "public" },

    // Principals
    { method: "post", pattern: "/users", policy: "public" },
    { method: "get", pattern: "/users", policy: "admin-only" },
    { method: "get", pattern: "/users/*", policy: "self-or-admin" },
    { method: "patch", pattern: "/users/*", policy: "self-or-admin" },

    // Resources created for a principal
    { method: "post", pattern: "/users/*/devices", policy: "self-or-admin" },
    { method: "get", pattern: "/users/*/devices", policy: "self-or-admin" },
    { method: "post", pattern: "/users/*/images", policy: "self-or-admin" },

    // Devices
    { method: "get", pattern: "/devices", policy: "admin-only" },
    { method: "get", pattern: "/devices/*", policy: "self-or-admin" },
    { method: "delete", pattern: "/devices/*", policy: "self-or-admin" },

    // Images
    { method: "get", pattern: "/images", policy: "admin-only" },
    { method: "get", pattern: "/images/*", policy: "self-or-admin" },
    { method: "get", pattern: "/images/*/content", policy: "self-or-admin" },
    { method: "delete", pattern: "/images/*", policy: "self-or-admin" },

    // Flat file namespace
    { method: "get", pattern: "/image", policy: "authenticated" },
    { method: "get", pattern: "/image/*", policy: "authenticated" },
];
