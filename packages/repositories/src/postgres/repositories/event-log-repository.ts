import { and, asc, desc, eq, gte, lte } from 'drizzle-orm';
import type { EntityType, EventLogEntry, Id } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { eventLog } from '../schema/index.js';
import {
  resolveEventLimit,
  type AppendEventInput,
  type EventLogRepository,
  type ResidenceEventFilter,
} from '../../interfaces/index.js';
import { toDate, toIso } from './dates.js';

type EventRow = typeof eventLog.$inferSelect;

export class PgEventLogRepository implements EventLogRepository {
  constructor(private db: Executor) {}

  async append(input: AppendEventInput): Promise<EventLogEntry> {
    const [row] = await this.db
      .insert(eventLog)
      .values({
        actorUserId: input.actorUserId,
        residenceId: input.residenceId,
        entityType: input.entityType,
        entityId: input.entityId,
        action: input.action,
        at: toDate(input.at),
        payload: input.payload,
      })
      .returning();

    return this.rowToEntry(row);
  }

  async listForResidence(residenceId: Id, filter?: ResidenceEventFilter): Promise<EventLogEntry[]> {
    const conditions = [eq(eventLog.residenceId, residenceId)];

    if (filter?.since) {
      conditions.push(gte(eventLog.at, toDate(filter.since)));
    }

    if (filter?.until) {
      conditions.push(lte(eventLog.at, toDate(filter.until)));
    }

    const rows = await this.db
      .select()
      .from(eventLog)
      .where(and(...conditions))
      .orderBy(desc(eventLog.at), desc(eventLog.id))
      .limit(resolveEventLimit(filter?.limit));

    return rows.map((row) => this.rowToEntry(row));
  }

  async listForEntity(entityType: EntityType, entityId: Id): Promise<EventLogEntry[]> {
    const rows = await this.db
      .select()
      .from(eventLog)
      .where(and(eq(eventLog.entityType, entityType), eq(eventLog.entityId, entityId)))
      .orderBy(asc(eventLog.id));

    return rows.map((row) => this.rowToEntry(row));
  }

  private rowToEntry(row: EventRow): EventLogEntry {
    return {
      sequence: row.id,
      actorUserId: row.actorUserId,
      residenceId: row.residenceId,
      entityType: row.entityType,
      entityId: row.entityId,
      action: row.action,
      at: toIso(row.at),
      payload: row.payload,
    };
  }
}
