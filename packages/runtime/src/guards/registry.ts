// Guard registry
//
// The ordered guard list each entity type's writes pass through. Guards run
// in order, each seeing the row as rewritten by the ones before it.

import type { EntityRecordMap, EntityType } from '@careledger/protocol';
import type { DerivedEvent, Guard, GuardContext } from './types.js';
import { bedAssignmentGuard } from './bed-assignment.js';
import { measurementShapeGuard } from './measurement-shape.js';
import { ownershipGuard } from './ownership.js';
import { taskStatusGuard } from './task-status.js';
import { timestampGuard } from './timestamp.js';

export type GuardRegistry = { [K in EntityType]: Guard<K>[] };

export const DEFAULT_GUARDS: GuardRegistry = {
  residence: [timestampGuard],
  floor: [timestampGuard],
  room: [ownershipGuard, timestampGuard],
  bed: [ownershipGuard, timestampGuard],
  resident: [bedAssignmentGuard, timestampGuard],
  device: [timestampGuard],
  measurement: [measurementShapeGuard, ownershipGuard, timestampGuard],
  task_category: [timestampGuard],
  task_template: [ownershipGuard, timestampGuard],
  task_application: [ownershipGuard, taskStatusGuard, timestampGuard],
  tag: [timestampGuard],
  resident_tag: [ownershipGuard, timestampGuard],
};

/**
 * Run a list of guards over a candidate row.
 * Returns the row to write and the events the guards derived, in guard order.
 */
export async function runGuards<K extends EntityType>(
  guards: readonly Guard<K>[],
  context: GuardContext<K>
): Promise<{ record: EntityRecordMap[K]; events: DerivedEvent[] }> {
  let record = context.record;
  const events: DerivedEvent[] = [];

  for (const guard of guards) {
    const result = await guard({ ...context, record });
    record = result.record;
    events.push(...(result.events ?? []));
  }

  return { record, events };
}
