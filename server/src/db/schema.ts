import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import { relations } from 'drizzle-orm';
import { ROLES } from '../auth/policy.js';

/** One string-to-string map per entry, as sent with an image upload. */
export type ImageMetadata = Record<string, string>[];

// Users Table (principals)
export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  email: text('email').notNull().unique(),
  name: text('name').notNull().unique(), // identity, used as the Basic auth username
  hashedPassword: text('hashed_password').notNull(),
  role: text('role', { enum: ROLES }).notNull().default('user'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: integer('created_at', { mode: 'timestamp' }).notNull().$defaultFn(() => new Date()),
});

// Devices Table
export const devices = sqliteTable('devices', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  description: text('description'),
  apikey: text('apikey').notNull(),
  ownerId: integer('owner_id').notNull().references(() => users.id),
  createdAt: integer('created_at', { mode: 'timestamp' }).notNull().$defaultFn(() => new Date()),
});

// Images Table
export const images = sqliteTable('images', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  ownerId: integer('owner_id').notNull().references(() => users.id),
  storageKey: text('storage_key').notNull().unique(), // `<uuid>.<ext>` in the upload dir
  filename: text('filename').notNull(),
  contentType: text('content_type').notNull(),
  size: integer('size').notNull(),
  metadata: text('metadata', { mode: 'json' }).$type<ImageMetadata>().notNull(),
  createdAt: integer('created_at', { mode: 'timestamp' }).notNull().$defaultFn(() => new Date()),
});

export const usersRelations = relations(users, ({ many }) => ({
  devices: many(devices),
  images: many(images),
}));

export const devicesRelations = relations(devices, ({ one }) => ({
  owner: one(users, { fields: [devices.ownerId], references: [users.id] }),
}));

export const imagesRelations = relations(images, ({ one }) => ({
  owner: one(users, { fields: [images.ownerId], references: [users.id] }),
}));
