import { pgTable, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { residences } from './residences.js';

/**
 * Floors table - top level of the location hierarchy inside a residence.
 */
export const floors = pgTable(
  'floor',
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
  (table) => [index('floor_residence_idx').on(table.residenceId)]
);

export const rooms = pgTable(
  'room',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    floorId: text('floor_id')
      .notNull()
      .references(() => floors.id, { onDelete: 'restrict' }),
    name: text('name').notNull(),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [index('room_floor_idx').on(table.floorId)]
);

/**
 * Beds table - a bed name is unique within its room.
 */
export const beds = pgTable(
  'bed',
  {
    id: text('id').primaryKey(),
    residenceId: text('residence_id')
      .notNull()
      .references(() => residences.id, { onDelete: 'restrict' }),
    roomId: text('room_id')
      .notNull()
      .references(() => rooms.id, { onDelete: 'restrict' }),
    name: text('name').notNull(),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('bed_room_idx').on(table.roomId),
    uniqueIndex('bed_room_name_unique').on(table.roomId, table.name),
  ]
);
