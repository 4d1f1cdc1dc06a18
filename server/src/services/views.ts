import type { devices, images, users } from '../db/schema.js';
import { parseRole, type Role } from '../auth/policy.js';

type UserRow = Omit<typeof users.$inferSelect, 'hashedPassword'>;
type DeviceRow = typeof devices.$inferSelect;
type ImageRow = typeof images.$inferSelect;

export type DeviceView = DeviceRow;

/** A principal as returned by the API; the credential hash never leaves the store. */
export interface UserView {
  id: number;
  email: string;
  name: string;
  role: Role;
  isActive: boolean;
  createdAt: Date;
  devices: DeviceView[];
}

export type ImageView = Omit<ImageRow, 'storageKey'>;

export function toUserView(row: UserRow & { devices: DeviceRow[] }): UserView {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    role: parseRole(row.role, row.name),
    isActive: row.isActive,
    createdAt: row.createdAt,
    devices: row.devices,
  };
}

export function toImageView(row: ImageRow): ImageView {
  const { storageKey: _storageKey, ...view } = row;
  return view;
}
