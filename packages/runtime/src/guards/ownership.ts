// Referential ownership guard
//
// Every reference a row holds must point at an existing row of the same
// residence. Tags are global, so a tag reference only has to exist. Bed
// references are left to the bed assignment guard, and task templates to the
// task status guard, which tolerates a missing template.

import {
  CrossTenantViolationError,
  ReferenceNotFoundError,
  type EntityRecord,
  type EntityRecordMap,
  type EntityType,
  type Id,
} from '@careledger/protocol';
import type { RepositoryContext } from '@careledger/repositories';
import type { GuardContext, GuardResult } from './types.js';

type OwnerType = 'floor' | 'room' | 'resident' | 'device' | 'task_category' | 'tag';

type OwnedReference = {
  field: string;
  target: OwnerType;
  /** Null references are skipped */
  id: Id | null;
};

/** A null residence marks a global owner */
type Owner = { residenceId: Id | null };

const OWNERS: Record<OwnerType, (repos: RepositoryContext, id: Id) => Promise<Owner | null>> = {
  floor: (repos, id) => repos.floors.get(id),
  room: (repos, id) => repos.rooms.get(id),
  resident: (repos, id) => repos.residents.get(id),
  device: (repos, id) => repos.devices.get(id),
  task_category: (repos, id) => repos.taskCategories.get(id),
  tag: async (repos, id) => ((await repos.tags.get(id)) ? { residenceId: null } : null),
};

const REFERENCES: {
  [K in EntityType]: (record: EntityRecordMap[K]) => OwnedReference[];
} = {
  residence: () => [],
  floor: () => [],
  room: (room) => [{ field: 'floorId', target: 'floor', id: room.floorId }],
  bed: (bed) => [{ field: 'roomId', target: 'room', id: bed.roomId }],
  resident: () => [],
  device: () => [],
  measurement: (measurement) => [
    { field: 'residentId', target: 'resident', id: measurement.residentId },
    { field: 'deviceId', target: 'device', id: measurement.deviceId },
  ],
  task_category: () => [],
  task_template: (template) => [
    { field: 'taskCategoryId', target: 'task_category', id: template.taskCategoryId },
  ],
  task_application: (application) => [
    { field: 'residentId', target: 'resident', id: application.residentId },
  ],
  tag: () => [],
  resident_tag: (residentTag) => [
    { field: 'residentId', target: 'resident', id: residentTag.residentId },
    { field: 'tagId', target: 'tag', id: residentTag.tagId },
  ],
};

/**
 * The references of a row, as checked by ownershipGuard.
 */
export function referencesOf<K extends EntityType>(
  entityType: K,
  record: EntityRecordMap[K]
): OwnedReference[] {
  const references: (record: EntityRecordMap[K]) => OwnedReference[] = REFERENCES[entityType];
  return references(record);
}

function residenceIdOf(record: EntityRecord): Id | null {
  return 'residenceId' in record ? record.residenceId : null;
}

export async function ownershipGuard<K extends EntityType>(
  context: GuardContext<K>
): Promise<GuardResult<K>> {
  const { entityType, record, repos } = context;
  const residenceId = residenceIdOf(record);

  for (const reference of referencesOf(entityType, record)) {
    if (reference.id === null) continue;

    const owner = await OWNERS[reference.target](repos, reference.id);
    if (!owner) {
      throw new ReferenceNotFoundError(reference.target, reference.id, { field: reference.field });
    }
    if (owner.residenceId !== null && owner.residenceId !== residenceId) {
      throw new CrossTenantViolationError({
        entityType,
        entityId: record.id,
        field: reference.field,
        expectedResidenceId: residenceId,
        actualResidenceId: owner.residenceId,
      });
    }
  }

  return { record };
}
