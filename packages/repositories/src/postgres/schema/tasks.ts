import { sql } from 'drizzle-orm';
import { pgTable, text, smallint, boolean, timestamp, index, check } from 'drizzle-orm/pg-core';
import { residences } from './residences.js';
import { residents } from './residents.js';

export const taskCategories = pgTable(
  'task_category',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    name: text('name').notNull(),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [index('task_category_residence_idx').on(table.residenceId)]
);

/**
 * Task templates table - status1..status6 are the labels a task
 * application's selected_status_index points at.
 */
export const taskTemplates = pgTable(
  'task_template',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    taskCategoryId: text('task_category_id')
      .notNull()
      .references(() => taskCategories.id, { onDelete: 'restrict' }),
    name: text('name').notNull(),
    status1: text('status1'),
    status2: text('status2'),
    status3: text('status3'),
    status4: text('status4'),
    status5: text('status5'),
    status6: text('status6'),
    audioPhrase: text('audio_phrase'),
    isBlock: boolean('is_block'),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [index('task_template_category_idx').on(table.taskCategoryId)]
);

/**
 * Task applications table. selected_status_text is denormalized from the
 * template when the row is written.
 */
export const taskApplications = pgTable(
  'task_application',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    residentId: text('resident_id')
      .notNull()
      .references(() => residents.id, { onDelete: 'restrict' }),
    taskTemplateId: text('task_template_id')
      .notNull()
      .references(() => taskTemplates.id, { onDelete: 'restrict' }),
    appliedBy: text('applied_by').notNull(),
    appliedAt: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
    selectedStatusIndex: smallint('selected_status_index'),
    selectedStatusText: text('selected_status_text'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('task_application_resident_idx').on(table.residentId, table.appliedAt),
    check(
      'task_application_status_index_range',
      sql`"selected_status_index" IS NULL OR "selected_status_index" BETWEEN 1 AND 6`
    ),
  ]
);
