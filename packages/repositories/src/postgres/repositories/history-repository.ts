import { asc, eq } from 'drizzle-orm';
import type { HistoryEntry, Id, TrackedEntityType } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { historyTables, type HistoryTable } from '../schema/index.js';
import type { AppendHistoryInput, HistoryRepository } from '../../interfaces/index.js';
import { toDate, toIso } from './dates.js';

type HistoryRow = HistoryTable['$inferSelect'];

/**
 * History ledgers in Postgres, one table per tracked entity type.
 * The bigserial id is the sequence.
 */
export class PgHistoryRepository implements HistoryRepository {
  constructor(private db: Executor) {}

  async append(input: AppendHistoryInput): Promise<HistoryEntry> {
    const table = historyTables[input.entityType];

    const [row] = await this.db
      .insert(table)
      .values({
        entityId: input.entityId,
        changeKind: input.changeKind,
        snapshot: input.snapshot,
        actorUserId: input.actorUserId,
        at: toDate(input.at),
      })
      .returning();

    return this.rowToEntry(input.entityType, row);
  }

  async listForEntity(entityType: TrackedEntityType, entityId: Id): Promise<HistoryEntry[]> {
    const table = historyTables[entityType];

    const rows = await this.db
      .select()
      .from(table)
      .where(eq(table.entityId, entityId))
      .orderBy(asc(table.id));

    return rows.map((row) => this.rowToEntry(entityType, row));
  }

  private rowToEntry(entityType: TrackedEntityType, row: HistoryRow): HistoryEntry {
    return {
      sequence: row.id,
      entityType,
      entityId: row.entityId,
      changeKind: row.changeKind,
      snapshot: row.snapshot,
      actorUserId: row.actorUserId,
      at: toIso(row.at),
    };
  }
}
