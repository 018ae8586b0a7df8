import { pgTable, bigserial, text, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import type { HistorySnapshot, TrackedEntityType } from '@careledger/protocol';
import { changeKindEnum } from './enums.js';

/**
 * History tables share one shape; each tracked entity type gets its own.
 *
 * entity_id carries no foreign key so history outlives a physically deleted row.
 */
function historyTable(tableName: string) {
  return pgTable(
    tableName,
    {
      id: bigserial('id', { mode: 'number' }).primaryKey(),
      entityId: text('entity_id').notNull(),
      changeKind: changeKindEnum('change_kind').notNull(),
      snapshot: jsonb('snapshot').$type<HistorySnapshot>().notNull(),
      actorUserId: text('actor_user_id'),
      at: timestamp('at', { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => [
      index(`${tableName}_entity_idx`).on(table.entityId, table.id),
      index(`${tableName}_at_idx`).on(table.at),
    ]
  );
}

export type HistoryTable = ReturnType<typeof historyTable>;

export const residentHistory = historyTable('resident_history');
export const deviceHistory = historyTable('device_history');
export const measurementHistory = historyTable('measurement_history');
export const taskApplicationHistory = historyTable('task_application_history');

export const historyTables: Record<TrackedEntityType, HistoryTable> = {
  resident: residentHistory,
  device: deviceHistory,
  measurement: measurementHistory,
  task_application: taskApplicationHistory,
};
