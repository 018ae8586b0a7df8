// Event log writer
//
// The cross-entity timeline. Every tracked change gets one event mirroring
// its history row; guards may add their own events after it.

import type {
  ActorRef,
  ChangeEventPayload,
  ChangeKind,
  EntityRecord,
  EntityType,
  EventLogEntry,
  Id,
  Timestamp,
} from '@careledger/protocol';
import type { EventLogRepository } from '@careledger/repositories';
import type { DerivedEvent } from '../guards/index.js';
import { snapshotFor } from '../history/index.js';

export type EventSubject = {
  entityType: EntityType;
  entityId: Id;
  residenceId: Id | null;
  actor: ActorRef;
  at: Timestamp;
};

export async function appendChangeEvent<T extends EntityRecord>(
  events: EventLogRepository,
  subject: EventSubject,
  change: {
    changeKind: ChangeKind;
    before: T | null;
    after: T | null;
    details?: Omit<ChangeEventPayload<T>, 'before' | 'after'>;
  }
): Promise<EventLogEntry> {
  const payload: ChangeEventPayload<T> = {
    ...snapshotFor(change.changeKind, change.before, change.after),
    ...change.details,
  };

  return events.append({
    actorUserId: subject.actor.userId,
    residenceId: subject.residenceId,
    entityType: subject.entityType,
    entityId: subject.entityId,
    action: change.changeKind,
    at: subject.at,
    payload,
  });
}

/**
 * Append guard-derived events in the order the guards produced them.
 */
export async function appendDerivedEvents(
  events: EventLogRepository,
  subject: EventSubject,
  derived: readonly DerivedEvent[]
): Promise<EventLogEntry[]> {
  const appended: EventLogEntry[] = [];
  for (const event of derived) {
    appended.push(
      await events.append({
        actorUserId: subject.actor.userId,
        residenceId: subject.residenceId,
        entityType: subject.entityType,
        entityId: subject.entityId,
        action: event.action,
        at: subject.at,
        payload: event.payload,
      })
    );
  }
  return appended;
}
