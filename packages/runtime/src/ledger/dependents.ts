// Dependents - rows that keep another row from being removed
//
// A hard delete is refused while any row still refers to its target,
// soft-deleted rows included. Postgres enforces the same rule with
// restrict foreign keys; this check runs first so both stores fail alike.

import { StillReferencedError, type EntityType, type Id } from '@careledger/protocol';
import type { RepositoryContext } from '@careledger/repositories';

type Dependent = {
  entityType: string;
  field: string;
  exists: (repos: RepositoryContext, id: Id) => Promise<boolean>;
};

function dependent(entityType: string, field: string, exists: Dependent['exists']): Dependent {
  return { entityType, field, exists };
}

const byResidence: Dependent[] = [
  dependent('floor', 'residenceId', (repos, id) => repos.floors.hasReference('residenceId', id)),
  dependent('room', 'residenceId', (repos, id) => repos.rooms.hasReference('residenceId', id)),
  dependent('bed', 'residenceId', (repos, id) => repos.beds.hasReference('residenceId', id)),
  dependent('resident', 'residenceId', (repos, id) =>
    repos.residents.hasReference('residenceId', id)
  ),
  dependent('device', 'residenceId', (repos, id) => repos.devices.hasReference('residenceId', id)),
  dependent('measurement', 'residenceId', (repos, id) =>
    repos.measurements.hasReference('residenceId', id)
  ),
  dependent('task_category', 'residenceId', (repos, id) =>
    repos.taskCategories.hasReference('residenceId', id)
  ),
  dependent('task_template', 'residenceId', (repos, id) =>
    repos.taskTemplates.hasReference('residenceId', id)
  ),
  dependent('task_application', 'residenceId', (repos, id) =>
    repos.taskApplications.hasReference('residenceId', id)
  ),
  dependent('resident_tag', 'residenceId', (repos, id) =>
    repos.residentTags.hasReference('residenceId', id)
  ),
  dependent('event_log', 'residenceId', async (repos, id) => {
    const events = await repos.events.listForResidence(id, { limit: 1 });
    return events.length > 0;
  }),
];

const DEPENDENTS: Record<EntityType, Dependent[]> = {
  residence: byResidence,
  floor: [
    dependent('room', 'floorId', (repos, id) => repos.rooms.hasReference('floorId', id)),
  ],
  room: [
    dependent('bed', 'roomId', (repos, id) => repos.beds.hasReference('roomId', id)),
  ],
  bed: [
    dependent('resident', 'bedId', (repos, id) => repos.residents.hasReference('bedId', id)),
  ],
  resident: [
    dependent('measurement', 'residentId', (repos, id) =>
      repos.measurements.hasReference('residentId', id)
    ),
    dependent('task_application', 'residentId', (repos, id) =>
      repos.taskApplications.hasReference('residentId', id)
    ),
    dependent('resident_tag', 'residentId', (repos, id) =>
      repos.residentTags.hasReference('residentId', id)
    ),
  ],
  device: [
    dependent('measurement', 'deviceId', (repos, id) =>
      repos.measurements.hasReference('deviceId', id)
    ),
  ],
  measurement: [],
  task_category: [
    dependent('task_template', 'taskCategoryId', (repos, id) =>
      repos.taskTemplates.hasReference('taskCategoryId', id)
    ),
  ],
  task_template: [
    dependent('task_application', 'taskTemplateId', (repos, id) =>
      repos.taskApplications.hasReference('taskTemplateId', id)
    ),
  ],
  task_application: [],
  tag: [
    dependent('resident_tag', 'tagId', (repos, id) => repos.residentTags.hasReference('tagId', id)),
  ],
  resident_tag: [],
};

/**
 * Throw StillReferencedError naming the first row type found that refers to
 * the given row.
 */
export async function assertUnreferenced(
  entityType: EntityType,
  id: Id,
  repos: RepositoryContext
): Promise<void> {
  for (const referrer of DEPENDENTS[entityType]) {
    if (await referrer.exists(repos, id)) {
      throw new StillReferencedError(entityType, id, {
        entityType: referrer.entityType,
        field: referrer.field,
      });
    }
  }
}
