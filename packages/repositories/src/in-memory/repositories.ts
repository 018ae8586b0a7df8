import {
  DuplicateValueError,
  type BaseRecord,
  type EntityType,
  type EventLogEntry,
  type HistoryEntry,
  type Id,
  type TrackedEntityType,
} from '@careledger/protocol';
import {
  resolveEventLimit,
  type AppendEventInput,
  type AppendHistoryInput,
  type EventLogRepository,
  type HistoryRepository,
  type RecordRepository,
  type ReferenceField,
  type ResidenceEventFilter,
} from '../interfaces/index.js';
import { assertUnique, type InMemoryDataStore, type UniqueConstraint } from './store.js';

/** Resolves the data store a repository works against; swapped per transaction */
export type StoreRef = () => InMemoryDataStore;

/**
 * RecordRepository over one Map of the store.
 *
 * Rows are copied on the way in and out so callers never hold a reference
 * into stored state.
 */
export class InMemoryRecordRepository<T extends BaseRecord, R extends ReferenceField<T> = never>
  implements RecordRepository<T, R>
{
  constructor(
    protected rows: () => Map<Id, T>,
    private tableName: string,
    private constraints: readonly UniqueConstraint<T>[] = []
  ) {}

  async get(id: Id): Promise<T | null> {
    const row = this.rows().get(id);
    return row ? { ...row } : null;
  }

  async getForUpdate(id: Id): Promise<T | null> {
    // Transactions are already serialized by the context lock
    return this.get(id);
  }

  async insert(record: T): Promise<T> {
    const rows = this.rows();
    if (rows.has(record.id)) {
      throw new DuplicateValueError(`${this.tableName}_pkey`);
    }
    assertUnique(rows, record, this.constraints);
    rows.set(record.id, { ...record });
    return { ...record };
  }

  async update(record: T): Promise<T | null> {
    const rows = this.rows();
    if (!rows.has(record.id)) return null;
    assertUnique(rows, record, this.constraints);
    rows.set(record.id, { ...record });
    return { ...record };
  }

  async remove(id: Id): Promise<T | null> {
    const rows = this.rows();
    const row = rows.get(id);
    if (!row) return null;
    rows.delete(id);
    return row;
  }

  async hasReference(field: R, id: Id): Promise<boolean> {
    for (const row of this.rows().values()) {
      if (row[field] === id) return true;
    }
    return false;
  }
}

export class InMemoryHistoryRepository implements HistoryRepository {
  constructor(private store: StoreRef) {}

  async append(input: AppendHistoryInput): Promise<HistoryEntry> {
    const data = this.store();
    const sequence = ++data.sequences.history[input.entityType];
    const entry: HistoryEntry = { sequence, ...input };
    data.history[input.entityType].push(entry);
    return structuredClone(entry);
  }

  async listForEntity(entityType: TrackedEntityType, entityId: Id): Promise<HistoryEntry[]> {
    return this.store()
      .history[entityType].filter((entry) => entry.entityId === entityId)
      .sort((a, b) => a.sequence - b.sequence)
      .map((entry) => structuredClone(entry));
  }
}

export class InMemoryEventLogRepository implements EventLogRepository {
  constructor(private store: StoreRef) {}

  async append(input: AppendEventInput): Promise<EventLogEntry> {
    const data = this.store();
    const sequence = ++data.sequences.events;
    const entry: EventLogEntry = { sequence, ...input };
    data.events.push(entry);
    return structuredClone(entry);
  }

  async listForResidence(residenceId: Id, filter?: ResidenceEventFilter): Promise<EventLogEntry[]> {
    const since = filter?.since ? Date.parse(filter.since) : null;
    const until = filter?.until ? Date.parse(filter.until) : null;

    return this.store()
      .events.filter((event) => {
        if (event.residenceId !== residenceId) return false;
        const at = Date.parse(event.at);
        if (since !== null && at < since) return false;
        if (until !== null && at > until) return false;
        return true;
      })
      .sort((a, b) => Date.parse(b.at) - Date.parse(a.at) || b.sequence - a.sequence)
      .slice(0, resolveEventLimit(filter?.limit))
      .map((event) => structuredClone(event));
  }

  async listForEntity(entityType: EntityType, entityId: Id): Promise<EventLogEntry[]> {
    return this.store()
      .events.filter((event) => event.entityType === entityType && event.entityId === entityId)
      .sort((a, b) => a.sequence - b.sequence)
      .map((event) => structuredClone(event));
  }
}
