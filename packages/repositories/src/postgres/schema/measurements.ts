import { pgTable, text, smallint, real, timestamp, index } from 'drizzle-orm/pg-core';
import { residences } from './residences.js';
import { residents } from './residents.js';
import { devices } from './devices.js';
import { measurementSourceEnum, measurementTypeEnum } from './enums.js';

/**
 * Measurements table - one row per reading.
 *
 * Field-group exclusivity per type is enforced by the measurement guard.
 */
export const measurements = pgTable(
  'measurement',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    residentId: text('resident_id')
      .notNull()
      .references(() => residents.id, { onDelete: 'restrict' }),
    recordedBy: text('recorded_by').notNull(),
    source: measurementSourceEnum('source').notNull(),
    deviceId: text('device_id').references(() => devices.id, { onDelete: 'restrict' }),
    type: measurementTypeEnum('type').notNull(),
    systolic: smallint('systolic'),
    diastolic: smallint('diastolic'),
    pulseBpm: smallint('pulse_bpm'),
    spo2: smallint('spo2'),
    weightKg: real('weight_kg'),
    temperatureC: real('temperature_c'),
    takenAt: timestamp('taken_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('measurement_resident_taken_idx').on(table.residentId, table.takenAt),
    index('measurement_residence_idx').on(table.residenceId),
  ]
);
