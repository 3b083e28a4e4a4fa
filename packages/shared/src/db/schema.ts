import {
  pgTable,
  text,
  integer,
  timestamp,
  pgEnum,
  serial,
  index,
} from 'drizzle-orm/pg-core';
import { TASK_STATUSES } from '../types.js';

// ─── Enums ───

export const publishTaskStatusEnum = pgEnum('publish_task_status', TASK_STATUSES);

// ─── Publish Tasks ───

export const publishTasks = pgTable(
  'publish_tasks',
  {
    id: serial('id').primaryKey(),
    videoPath: text('video_path').notNull(),
    title: text('title').notNull(),
    description: text('description').notNull().default(''),
    tags: text('tags').notNull().default('[]'), // JSON-encoded string[]
    platform: text('platform').notNull(),
    accountId: integer('account_id'),
    scheduledTime: timestamp('scheduled_time', { withTimezone: true }).notNull(),
    status: publishTaskStatusEnum('status').notNull().default('pending'),
    lastError: text('last_error'),
    createdTime: timestamp('created_time', { withTimezone: true }).defaultNow().notNull(),
    updatedTime: timestamp('updated_time', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('publish_tasks_queue_idx').on(table.status, table.platform, table.scheduledTime),
  ],
);

export type PublishTaskRow = typeof publishTasks.$inferSelect;
export type NewPublishTaskRow = typeof publishTasks.$inferInsert;
