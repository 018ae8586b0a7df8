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
import type { RecordRepository } from './record-repository.js';
import type { HistoryRepository } from './history-repository.js';
import type { EventLogRepository } from './event-log-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the dependency injection point for the ledger. Pass a
 * RepositoryContext to code that needs data access and swap implementations
 * (Postgres, in-memory) without changing the consuming code.
 */
export interface RepositoryContext {
  readonly residences: RecordRepository<Residence>;
  readonly floors: RecordRepository<Floor, 'residenceId'>;
  readonly rooms: RecordRepository<Room, 'residenceId' | 'floorId'>;
  readonly beds: RecordRepository<Bed, 'residenceId' | 'roomId'>;

  /** Holds the bed occupancy rule; a violating write fails with OccupancyConflictError */
  readonly residents: RecordRepository<Resident, 'residenceId' | 'bedId'>;
  readonly devices: RecordRepository<Device, 'residenceId'>;
  readonly measurements: RecordRepository<Measurement, 'residenceId' | 'residentId' | 'deviceId'>;
  readonly taskCategories: RecordRepository<TaskCategory, 'residenceId'>;
  readonly taskTemplates: RecordRepository<TaskTemplate, 'residenceId' | 'taskCategoryId'>;
  readonly taskApplications: RecordRepository<
    TaskApplication,
    'residenceId' | 'residentId' | 'taskTemplateId'
  >;
  readonly tags: RecordRepository<Tag>;
  readonly residentTags: RecordRepository<ResidentTag, 'residenceId' | 'residentId' | 'tagId'>;
  readonly history: HistoryRepository;
  readonly events: EventLogRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 *
 * Guard evaluation, the row write, the history append and the event append
 * of one mutation all run inside a single transaction() call.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function are atomic.
   *
   * @throws Rolls back the transaction if the function throws, then rethrows.
   *         Storage failures are rethrown as ledger errors.
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
