import { pgTable, bigserial, text, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import type { EntityType, EventAction } from '@careledger/protocol';
import { residences } from './residences.js';

/**
 * Event log table - append-only, one row per tracked mutation plus
 * guard-derived events.
 *
 * The (residence_id, at desc, id desc) index serves residence timelines.
 */
export const eventLog = pgTable(
  'event_log',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    actorUserId: text('actor_user_id'),
    residenceId: text('residence_id').references(() => residences.id),
    entityType: text('entity_type').$type<EntityType>().notNull(),
    entityId: text('entity_id').notNull(),
    action: text('action').$type<EventAction>().notNull(),
    at: timestamp('at', { withTimezone: true }).notNull().defaultNow(),
    payload: jsonb('payload').$type<unknown>(),
  },
  (table) => [
    index('event_log_residence_at_idx').on(table.residenceId, table.at.desc(), table.id.desc()),
    index('event_log_entity_idx').on(table.entityType, table.entityId, table.id),
  ]
);
