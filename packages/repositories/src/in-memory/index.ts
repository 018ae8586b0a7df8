// In-memory repository implementations for development and testing
//
// Transactions are real: each one works on a copy of the committed data,
// which replaces the committed data only when the function resolves. A
// lock runs transactions one at a time, so uniqueness rules such as bed
// occupancy are checked against everything committed before.
//
// Data does not persist between restarts.

import type {
  Bed,
  Device,
  Floor,
  Measurement,
  Residence,
  Resident,
  ResidentTag,
  Room,
  Tag,
  TaskApplication,
  TaskCategory,
  TaskTemplate,
} from '@careledger/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../interfaces/index.js';
import {
  BED_CONSTRAINTS,
  DEVICE_CONSTRAINTS,
  RESIDENCE_CONSTRAINTS,
  RESIDENT_CONSTRAINTS,
  RESIDENT_TAG_CONSTRAINTS,
  TAG_CONSTRAINTS,
  cloneStore,
  createEmptyStore,
  type InMemoryDataStore,
} from './store.js';
import {
  InMemoryEventLogRepository,
  InMemoryHistoryRepository,
  InMemoryRecordRepository,
  type StoreRef,
} from './repositories.js';

export type { InMemoryDataStore, UniqueConstraint } from './store.js';
export {
  InMemoryRecordRepository,
  InMemoryHistoryRepository,
  InMemoryEventLogRepository,
} from './repositories.js';

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Committed data (for debugging/testing) */
  readonly _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function createContextOver(store: StoreRef): RepositoryContext {
  return {
    residences: new InMemoryRecordRepository<Residence>(
      () => store().residences,
      'residence',
      RESIDENCE_CONSTRAINTS
    ),
    floors: new InMemoryRecordRepository<Floor, 'residenceId'>(() => store().floors, 'floor'),
    rooms: new InMemoryRecordRepository<Room, 'residenceId' | 'floorId'>(() => store().rooms, 'room'),
    beds: new InMemoryRecordRepository<Bed, 'residenceId' | 'roomId'>(
      () => store().beds,
      'bed',
      BED_CONSTRAINTS
    ),
    residents: new InMemoryRecordRepository<Resident, 'residenceId' | 'bedId'>(
      () => store().residents,
      'resident',
      RESIDENT_CONSTRAINTS
    ),
    devices: new InMemoryRecordRepository<Device, 'residenceId'>(
      () => store().devices,
      'device',
      DEVICE_CONSTRAINTS
    ),
    measurements: new InMemoryRecordRepository<
      Measurement,
      'residenceId' | 'residentId' | 'deviceId'
    >(() => store().measurements, 'measurement'),
    taskCategories: new InMemoryRecordRepository<TaskCategory, 'residenceId'>(
      () => store().taskCategories,
      'task_category'
    ),
    taskTemplates: new InMemoryRecordRepository<TaskTemplate, 'residenceId' | 'taskCategoryId'>(
      () => store().taskTemplates,
      'task_template'
    ),
    taskApplications: new InMemoryRecordRepository<
      TaskApplication,
      'residenceId' | 'residentId' | 'taskTemplateId'
    >(() => store().taskApplications, 'task_application'),
    tags: new InMemoryRecordRepository<Tag>(() => store().tags, 'tag', TAG_CONSTRAINTS),
    residentTags: new InMemoryRecordRepository<ResidentTag, 'residenceId' | 'residentId' | 'tagId'>(
      () => store().residentTags,
      'resident_tag',
      RESIDENT_TAG_CONSTRAINTS
    ),
    history: new InMemoryHistoryRepository(store),
    events: new InMemoryEventLogRepository(store),
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.transaction(async (tx) => {
 *   await tx.residences.insert(residence);
 * });
 *
 * repos._data.residences.size; // 1
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  let committed = createEmptyStore();
  let lock: Promise<void> = Promise.resolve();

  const context = createContextOver(() => committed);

  async function transaction<T>(fn: TransactionFn<T>): Promise<T> {
    const run = lock.then(async () => {
      const working = cloneStore(committed);
      const result = await fn(createContextOver(() => working));
      committed = working;
      return result;
    });

    // The next transaction waits for this one whether it commits or not
    lock = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  return {
    ...context,
    transaction,
    get _data() {
      return committed;
    },
    clear() {
      committed = createEmptyStore();
    },
  };
}
