// History recorder
//
// Appends one immutable row per committed change to a tracked entity. Rows
// hold full copies of the record, never a diff.

import type {
  ActorRef,
  ChangeKind,
  EntityRecord,
  HistoryEntry,
  HistorySnapshot,
  Id,
  Timestamp,
  TrackedEntityType,
} from '@careledger/protocol';
import type { HistoryRepository } from '@careledger/repositories';

export type RecordChangeInput<T extends EntityRecord> = {
  entityType: TrackedEntityType;
  entityId: Id;
  changeKind: ChangeKind;
  before: T | null;
  after: T | null;
  actor: ActorRef;
  at: Timestamp;
};

/**
 * The snapshot shape for a change kind: create keeps only the new row,
 * delete only the removed one, update both.
 */
export function snapshotFor<T>(changeKind: ChangeKind, before: T | null, after: T | null): HistorySnapshot<T> {
  switch (changeKind) {
    case 'create':
      return { before: null, after };
    case 'delete':
      return { before, after: null };
    case 'update':
      return { before, after };
  }
}

export async function recordHistory<T extends EntityRecord>(
  history: HistoryRepository,
  input: RecordChangeInput<T>
): Promise<HistoryEntry<T>> {
  const snapshot = snapshotFor(input.changeKind, input.before, input.after);

  const stored = await history.append({
    entityType: input.entityType,
    entityId: input.entityId,
    changeKind: input.changeKind,
    snapshot,
    actorUserId: input.actor.userId,
    at: input.at,
  });

  return {
    sequence: stored.sequence,
    entityType: input.entityType,
    entityId: input.entityId,
    changeKind: input.changeKind,
    snapshot,
    actorUserId: input.actor.userId,
    at: input.at,
  };
}
