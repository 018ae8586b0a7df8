// Mutation types - what callers submit to the ledger and what they get back

import type { ActorRef, Id } from './common.js';
import type { EntityRecordMap, EntityType, NewRecord } from './records.js';
import type { EventLogEntry, HistoryEntry } from './audit.js';
import type { LedgerError } from '../errors.js';

export type MutationOperation = 'insert' | 'update' | 'delete';

type MutationBase<K extends EntityType> = {
  entityType: K;

  /** Stamped on history and event rows */
  actor: ActorRef;

  /**
   * The residence the caller is working in.
   * Null only for globally scoped entities (residences themselves, tags).
   */
  residenceId: Id | null;
};

export type InsertRequest<K extends EntityType> = MutationBase<K> & {
  operation: 'insert';
  values: Partial<NewRecord<K>> & { id?: Id };
};

export type UpdateRequest<K extends EntityType> = MutationBase<K> & {
  operation: 'update';
  id: Id;
  values: Partial<NewRecord<K>>;
};

export type DeleteRequest<K extends EntityType> = MutationBase<K> & {
  operation: 'delete';
  id: Id;

  /**
   * Physically remove the row instead of setting its soft-delete marker.
   * Rows without a marker are always removed.
   */
  hard?: boolean;
};

export type MutationRequestFor<K extends EntityType> =
  | InsertRequest<K>
  | UpdateRequest<K>
  | DeleteRequest<K>;

export type MutationRequest = { [K in EntityType]: MutationRequestFor<K> }[EntityType];

export type MutationSuccess<T> = {
  success: true;

  /** Committed state; for a physical delete, the last state before removal */
  data: T;

  /** Null for entity types outside the tracked set */
  history: HistoryEntry<T> | null;

  /** Generic event first, then any guard-derived events */
  events: EventLogEntry[];
};

export type MutationFailure = {
  success: false;
  error: LedgerError;
};

export type MutationResult<T> = MutationSuccess<T> | MutationFailure;

export type MutationResultFor<K extends EntityType> = MutationResult<EntityRecordMap[K]>;
