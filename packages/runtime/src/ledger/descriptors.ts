// Entity descriptors
//
// How the ledger reaches and shapes each entity type. Adding an entity type
// means adding a descriptor and a guard list, not branching in the pipeline.

import type {
  BaseRecord,
  ChangeEventPayload,
  EntityRecordMap,
  EntityType,
  Id,
  NewRecord,
  SoftDeletable,
  Timestamp,
} from '@careledger/protocol';
import type { RecordRepository, RepositoryContext } from '@careledger/repositories';
import { classifyResidentMovement } from '../events/index.js';

export type EntityDescriptor<K extends EntityType> = {
  repository: (repos: RepositoryContext) => RecordRepository<EntityRecordMap[K]>;

  /** Join validated values with the store-assigned fields */
  assemble: (values: NewRecord<K>, base: BaseRecord) => EntityRecordMap[K];

  /** Residence scope of a row; null for global entities */
  residenceOf: (record: EntityRecordMap[K]) => Id | null;

  /** Whether inserts take their residenceId from the request scope */
  scoped: boolean;

  /** Field stamped with the acting user on insert when the caller leaves it out */
  creatorField: string | null;

  /** Values an insert falls back to when the caller leaves them out */
  insertDefaults?: (now: Timestamp) => Record<string, unknown>;

  /** Soft-delete rewrite; null when rows can only be physically removed */
  softDelete: ((record: EntityRecordMap[K], now: Timestamp) => EntityRecordMap[K]) | null;

  /** Extra fields for the generic event payload */
  changeDetails?: (
    before: EntityRecordMap[K] | null,
    after: EntityRecordMap[K] | null
  ) => Omit<ChangeEventPayload, 'before' | 'after'>;
};

/**
 * Set the soft-delete marker, keeping an earlier one.
 */
export function markDeleted<T extends SoftDeletable>(record: T, now: Timestamp): T {
  return { ...record, deletedAt: record.deletedAt ?? now };
}

export const DESCRIPTORS: { [K in EntityType]: EntityDescriptor<K> } = {
  residence: {
    repository: (repos) => repos.residences,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (residence) => residence.id,
    scoped: false,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  floor: {
    repository: (repos) => repos.floors,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (floor) => floor.residenceId,
    scoped: true,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  room: {
    repository: (repos) => repos.rooms,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (room) => room.residenceId,
    scoped: true,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  bed: {
    repository: (repos) => repos.beds,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (bed) => bed.residenceId,
    scoped: true,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  resident: {
    repository: (repos) => repos.residents,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (resident) => resident.residenceId,
    scoped: true,
    creatorField: 'createdBy',
    softDelete: markDeleted,
    changeDetails: (before, after) =>
      before && after ? { movement: classifyResidentMovement(before, after) } : {},
  },
  device: {
    repository: (repos) => repos.devices,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (device) => device.residenceId,
    scoped: true,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  measurement: {
    repository: (repos) => repos.measurements,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (measurement) => measurement.residenceId,
    scoped: true,
    creatorField: 'recordedBy',
    softDelete: markDeleted,
  },
  task_category: {
    repository: (repos) => repos.taskCategories,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (category) => category.residenceId,
    scoped: true,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  task_template: {
    repository: (repos) => repos.taskTemplates,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (template) => template.residenceId,
    scoped: true,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  task_application: {
    repository: (repos) => repos.taskApplications,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (application) => application.residenceId,
    scoped: true,
    creatorField: 'appliedBy',
    insertDefaults: (now) => ({ appliedAt: now }),
    softDelete: markDeleted,
  },
  tag: {
    repository: (repos) => repos.tags,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: () => null,
    scoped: false,
    creatorField: 'createdBy',
    softDelete: markDeleted,
  },
  resident_tag: {
    repository: (repos) => repos.residentTags,
    assemble: (values, base) => ({ ...values, ...base }),
    residenceOf: (residentTag) => residentTag.residenceId,
    scoped: true,
    creatorField: 'assignedBy',
    insertDefaults: (now) => ({ assignedAt: now }),
    softDelete: null,
  },
};
