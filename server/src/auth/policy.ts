import { z } from 'zod';
import { ApiError, unauthorized } from '../errors.js';

export const ROLES = ['user', 'admin'] as const;
export const RoleSchema = z.enum(ROLES);
export type Role = z.infer<typeof RoleSchema>;

/** A requester whose credential has been verified. */
export interface Principal {
  id: number;
  /** Unique, immutable name presented as the Basic auth username. */
  identity: string;
  role: Role;
}

/**
 * Access policies an operation can declare.
 *
 * - `public`: no principal needed.
 * - `authenticated`: any verified principal, no ownership involved.
 * - `self-or-admin`: an admin, or a user acting on a resource they own.
 * - `admin-only`: admins only, ownership is irrelevant.
 */
export type Policy = 'public' | 'authenticated' | 'self-or-admin' | 'admin-only';

export type Decision = 'ALLOW' | 'DENY';

/**
 * Roles read back from the store are checked here. Anything outside the
 * closed set is a broken record, reported as a configuration error rather
 * than treated as a deny.
 */
export function parseRole(value: unknown, identity: string): Role {
  const parsed = RoleSchema.safeParse(value);
  if (!parsed.success) {
    throw new ApiError('Configuration', `Principal ${identity} has unrecognized role '${String(value)}'`);
  }
  return parsed.data;
}

/**
 * Decide whether `requester` may act under `policy`.
 *
 * `ownerIdentity` is the identity owning the target resource; it is only read
 * by `self-or-admin` and is `undefined` when the target does not exist, which
 * denies every non-admin.
 */
export function authorize(policy: Policy, requester: Principal | undefined, ownerIdentity?: string): Decision {
  if (policy === 'public') return 'ALLOW';
  if (!requester) return 'DENY';

  // Admins bypass ownership for every policy.
  if (requester.role === 'admin') return 'ALLOW';

  switch (policy) {
    case 'admin-only':
      return 'DENY';
    case 'authenticated':
      return 'ALLOW';
    case 'self-or-admin':
      return ownerIdentity !== undefined && requester.identity === ownerIdentity ? 'ALLOW' : 'DENY';
  }
}

/** Throws `Unauthorized` unless {@link authorize} allows the request. */
export function assertAllowed(policy: Policy, requester: Principal | undefined, ownerIdentity?: string): void {
  if (authorize(policy, requester, ownerIdentity) === 'DENY') {
    throw unauthorized();
  }
}
