import type { EntityType, EventLogEntry, Id, Timestamp } from '@careledger/protocol';

/**
 * Input for appending an event. The sequence is assigned by the store.
 */
export type AppendEventInput = Omit<EventLogEntry, 'sequence'>;

/**
 * Filter for a residence timeline.
 *
 * limit defaults to 100 and is capped at 1000.
 */
export type ResidenceEventFilter = {
  since?: Timestamp;
  until?: Timestamp;
  limit?: number;
};

export const DEFAULT_EVENT_LIMIT = 100;
export const MAX_EVENT_LIMIT = 1000;

export function resolveEventLimit(limit: number | undefined): number {
  if (limit === undefined || limit <= 0) return DEFAULT_EVENT_LIMIT;
  return Math.min(Math.floor(limit), MAX_EVENT_LIMIT);
}

/**
 * Append-only access to the cross-entity event log.
 */
export interface EventLogRepository {
  /**
   * Append an event
   */
  append(input: AppendEventInput): Promise<EventLogEntry>;

  /**
   * Events scoped to a residence, newest first.
   * Events sharing a timestamp are ordered by sequence, highest first.
   */
  listForResidence(residenceId: Id, filter?: ResidenceEventFilter): Promise<EventLogEntry[]>;

  /**
   * Events about one entity, oldest first by sequence
   */
  listForEntity(entityType: EntityType, entityId: Id): Promise<EventLogEntry[]>;
}
