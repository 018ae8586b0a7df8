// Audit types - per-entity history rows and the cross-entity event log
//
// Both ledgers are append-only. Once written, no component edits or removes
// a row; retention is handled outside this codebase.

import type { Id, Timestamp } from './common.js';
import type { EntityRecord, EntityType } from './records.js';
import type { TrackedEntityType } from '../constants.js';

/**
 * What happened to the row.
 * Soft deletes are updates; 'delete' means the row was physically removed.
 */
export type ChangeKind = 'create' | 'update' | 'delete';

/**
 * Full copies of the row, not a diff, so any single state can be read
 * without replaying the chain.
 *
 * - create: after only
 * - update: before and after
 * - delete: before only
 */
export type HistorySnapshot<T = EntityRecord> = {
  before: T | null;
  after: T | null;
};

/**
 * One immutable row of a tracked entity's history ledger.
 */
export type HistoryEntry<T = EntityRecord> = {
  /** Monotonic within the entity type's ledger; orders rows for one entity */
  sequence: number;

  entityType: TrackedEntityType;
  entityId: Id;
  changeKind: ChangeKind;
  snapshot: HistorySnapshot<T>;

  /** Null when the system acted */
  actorUserId: Id | null;

  at: Timestamp;
};

/**
 * Labels written to the event log: the change kinds plus labels derived by guards.
 */
export type EventAction = ChangeKind | 'assign_bed';

/**
 * One immutable row of the cross-entity event log.
 */
export type EventLogEntry = {
  sequence: number;
  actorUserId: Id | null;

  /** Null for entities with no residence scope (e.g. tags) */
  residenceId: Id | null;

  entityType: EntityType;
  entityId: Id;
  action: EventAction;
  at: Timestamp;

  /** Mirrors the history snapshot, or a guard-specific shape for derived events */
  payload: unknown;
};

/**
 * Payload of an 'assign_bed' event.
 */
export type AssignBedPayload = {
  oldBedId: Id | null;
  newBedId: Id | null;
};

/**
 * Classification of a resident update, in order of precedence.
 */
export type ResidentMovement =
  | 'bed_assignment'
  | 'bed_removal'
  | 'status_change'
  | 'residence_transfer';

/**
 * Payload of a generic create/update/delete event.
 */
export type ChangeEventPayload<T = EntityRecord> = HistorySnapshot<T> & {
  movement?: ResidentMovement | null;
};
