// In-memory data store: the tables, their uniqueness rules and snapshot copies

import {
  DuplicateValueError,
  OccupancyConflictError,
  type Bed,
  type Device,
  type EventLogEntry,
  type Floor,
  type HistoryEntry,
  type Id,
  type LedgerError,
  type Measurement,
  type Residence,
  type Resident,
  type ResidentTag,
  type Room,
  type Tag,
  type TaskApplication,
  type TaskCategory,
  type TaskTemplate,
  type TrackedEntityType,
} from '@careledger/protocol';

/**
 * Underlying data of an in-memory context, exposed for inspection in tests.
 */
export type InMemoryDataStore = {
  residences: Map<Id, Residence>;
  floors: Map<Id, Floor>;
  rooms: Map<Id, Room>;
  beds: Map<Id, Bed>;
  residents: Map<Id, Resident>;
  devices: Map<Id, Device>;
  measurements: Map<Id, Measurement>;
  taskCategories: Map<Id, TaskCategory>;
  taskTemplates: Map<Id, TaskTemplate>;
  taskApplications: Map<Id, TaskApplication>;
  tags: Map<Id, Tag>;
  residentTags: Map<Id, ResidentTag>;
  history: Record<TrackedEntityType, HistoryEntry[]>;
  events: EventLogEntry[];

  /** Last sequence handed out per ledger */
  sequences: {
    history: Record<TrackedEntityType, number>;
    events: number;
  };
};

export function createEmptyStore(): InMemoryDataStore {
  return {
    residences: new Map(),
    floors: new Map(),
    rooms: new Map(),
    beds: new Map(),
    residents: new Map(),
    devices: new Map(),
    measurements: new Map(),
    taskCategories: new Map(),
    taskTemplates: new Map(),
    taskApplications: new Map(),
    tags: new Map(),
    residentTags: new Map(),
    history: { resident: [], device: [], measurement: [], task_application: [] },
    events: [],
    sequences: {
      history: { resident: 0, device: 0, measurement: 0, task_application: 0 },
      events: 0,
    },
  };
}

/**
 * Deep copy used as a transaction's working set.
 */
export function cloneStore(store: InMemoryDataStore): InMemoryDataStore {
  return structuredClone(store);
}

/**
 * A uniqueness rule over one table, mirroring a unique index in Postgres.
 */
export type UniqueConstraint<T> = {
  name: string;

  /** The indexed key, or null when the row falls outside the index */
  key: (record: T) => string | null;

  /** Error for a violating row; defaults to DuplicateValueError */
  violation?: (record: T) => LedgerError;
};

export const RESIDENCE_CONSTRAINTS: UniqueConstraint<Residence>[] = [
  { name: 'residence_name_unique', key: (residence) => residence.name },
];

export const BED_CONSTRAINTS: UniqueConstraint<Bed>[] = [
  { name: 'bed_room_name_unique', key: (bed) => `${bed.roomId}\u0000${bed.name}` },
];

export const RESIDENT_CONSTRAINTS: UniqueConstraint<Resident>[] = [
  {
    name: 'resident_active_bed_unique',
    key: (resident) =>
      resident.status === 'active' && resident.deletedAt === null ? resident.bedId : null,
    violation: (resident) => new OccupancyConflictError(resident.bedId),
  },
];

export const DEVICE_CONSTRAINTS: UniqueConstraint<Device>[] = [
  { name: 'device_mac_unique', key: (device) => device.mac },
];

export const TAG_CONSTRAINTS: UniqueConstraint<Tag>[] = [
  { name: 'tag_name_unique', key: (tag) => tag.name },
];

export const RESIDENT_TAG_CONSTRAINTS: UniqueConstraint<ResidentTag>[] = [
  {
    name: 'resident_tag_pair_unique',
    key: (residentTag) => `${residentTag.residentId}\u0000${residentTag.tagId}`,
  },
];

/**
 * Throw if writing `record` would break one of the table's uniqueness rules.
 * The row with the same id is ignored, so updates can keep their own key.
 */
export function assertUnique<T extends { id: Id }>(
  rows: Map<Id, T>,
  record: T,
  constraints: readonly UniqueConstraint<T>[]
): void {
  for (const constraint of constraints) {
    const key = constraint.key(record);
    if (key === null) continue;

    for (const existing of rows.values()) {
      if (existing.id !== record.id && constraint.key(existing) === key) {
        throw constraint.violation
          ? constraint.violation(record)
          : new DuplicateValueError(constraint.name);
      }
    }
  }
}
