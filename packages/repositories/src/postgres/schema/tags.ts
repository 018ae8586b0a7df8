import { pgTable, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { residences } from './residences.js';
import { residents } from './residents.js';

export const tags = pgTable(
  'tag',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [uniqueIndex('tag_name_unique').on(table.name)]
);

/**
 * Resident tags table - pure association rows, hard-deleted when removed.
 */
export const residentTags = pgTable(
  'resident_tag',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    residentId: text('resident_id')
      .notNull()
      .references(() => residents.id, { onDelete: 'restrict' }),
    tagId: text('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'restrict' }),
    assignedBy: text('assigned_by').notNull(),
    assignedAt: timestamp('assigned_at', { withTimezone: true }).notNull().defaultNow(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('resident_tag_pair_unique').on(table.residentId, table.tagId),
    index('resident_tag_tag_idx').on(table.tagId),
  ]
);
