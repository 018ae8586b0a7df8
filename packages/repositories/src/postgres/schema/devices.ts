import { sql } from 'drizzle-orm';
import { pgTable, text, smallint, timestamp, index, uniqueIndex, check } from 'drizzle-orm/pg-core';
import { residences } from './residences.js';
import { deviceTypeEnum } from './enums.js';

export const devices = pgTable(
  'device',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    type: deviceTypeEnum('type').notNull(),
    name: text('name').notNull(),
    mac: text('mac').notNull(),
    batteryPercent: smallint('battery_percent'),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('device_residence_idx').on(table.residenceId),
    uniqueIndex('device_mac_unique').on(table.mac),
    check('device_battery_range', sql`"battery_percent" BETWEEN 0 AND 100`),
  ]
);
