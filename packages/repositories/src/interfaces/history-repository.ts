import type { HistoryEntry, Id, TrackedEntityType } from '@careledger/protocol';

/**
 * Input for appending a history row. The sequence is assigned by the store.
 */
export type AppendHistoryInput = Omit<HistoryEntry, 'sequence'>;

/**
 * Append-only access to the per-entity history ledgers.
 *
 * Rows are never updated or removed.
 */
export interface HistoryRepository {
  /**
   * Append a row to the ledger of input.entityType
   */
  append(input: AppendHistoryInput): Promise<HistoryEntry>;

  /**
   * All rows for one entity, oldest first by sequence
   */
  listForEntity(entityType: TrackedEntityType, entityId: Id): Promise<HistoryEntry[]>;
}
