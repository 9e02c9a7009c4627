import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// One row per origin target, keyed by the sanitized target name.
// A missing row means "healthy, never alerted".
export const failureState = sqliteTable('failure_state', {
  key: text('key').primaryKey(),
  consecutiveFailures: integer('consecutive_failures').notNull().default(0),
  lastAlertAt: integer('last_alert_at').notNull().default(0),
  updatedAt: integer('updated_at').notNull(),
});

export type FailureStateRow = typeof failureState.$inferSelect;
