import { sqliteTable, text, integer, real, primaryKey } from 'drizzle-orm/sqlite-core';
import { nanoid } from 'nanoid';

export const wallpapers = sqliteTable('wallpapers', {
  catalog: text('catalog', { enum: ['video', 'image'] }).notNull(),
  path: text('path').notNull(),
  position: integer('position').notNull().default(0),
  score: real('score').notNull().default(100),
  skipStreak: integer('skip_streak').notNull().default(0),
  lastSelectedAt: integer('last_selected_at'), // epoch seconds
}, (table) => ({
  pk: primaryKey({ columns: [table.catalog, table.path] }),
}));

export const rotationLog = sqliteTable('rotation_log', {
  id: text('id').primaryKey().$defaultFn(() => nanoid()),
  catalog: text('catalog', { enum: ['video', 'image'] }).notNull(),
  path: text('path').notNull(),
  selectedAt: integer('selected_at', { mode: 'timestamp_ms' }).notNull().$defaultFn(() => new Date()),
  outcome: text('outcome', { enum: ['ok', 'render_failed'] }).notNull(),
  error: text('error'),
});

export const settings = sqliteTable('settings', {
  key: text('key').primaryKey(),
  value: text('value', { mode: 'json' }).notNull().$type<unknown>(),
  updatedAt: integer('updated_at', { mode: 'timestamp' }).notNull().$defaultFn(() => new Date()),
});

// Type exports
export type RotationLogEntry = typeof rotationLog.$inferSelect;
