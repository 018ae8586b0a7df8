import { sql } from 'drizzle-orm';
import { pgTable, text, date, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { residences } from './residences.js';
import { beds } from './locations.js';
import { residentStatusEnum } from './enums.js';

/**
 * Name of the index that holds the bed occupancy rule. Unique violations on
 * it are reported as occupancy conflicts rather than duplicate values.
 */
export const RESIDENT_ACTIVE_BED_INDEX = 'resident_active_bed_unique';

/**
 * Residents table.
 *
 * The partial unique index is checked by Postgres on write, so two concurrent
 * transactions placing residents in the same bed cannot both commit.
 */
export const residents = pgTable(
  'resident',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    fullName: text('full_name').notNull(),
    birthDate: date('birth_date', { mode: 'string' }).notNull(),
    sex: text('sex'),
    comments: text('comments'),
    status: residentStatusEnum('status').notNull().default('active'),
    statusChangedAt: timestamp('status_changed_at', { withTimezone: true }),
    bedId: text('bed_id').references(() => beds.id, { onDelete: 'restrict' }),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('resident_residence_idx').on(table.residenceId),
    index('resident_residence_status_idx').on(table.residenceId, table.status),
    index('resident_bed_idx').on(table.bedId),
    uniqueIndex(RESIDENT_ACTIVE_BED_INDEX)
      .on(table.bedId)
      .where(sql`"status" = 'active' AND "deleted_at" IS NULL AND "bed_id" IS NOT NULL`),
  ]
);
