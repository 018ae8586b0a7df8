import type { Executor } from '../db.js';
import { translateStorageError } from '../errors.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgResidenceRepository } from './residence-repository.js';
import { PgBedRepository, PgFloorRepository, PgRoomRepository } from './location-repository.js';
import { PgResidentRepository } from './resident-repository.js';
import { PgDeviceRepository } from './device-repository.js';
import { PgMeasurementRepository } from './measurement-repository.js';
import {
  PgTaskApplicationRepository,
  PgTaskCategoryRepository,
  PgTaskTemplateRepository,
} from './task-repository.js';
import { PgResidentTagRepository, PgTagRepository } from './tag-repository.js';
import { PgHistoryRepository } from './history-repository.js';
import { PgEventLogRepository } from './event-log-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: config.databaseUrl });
 * const repos = createPgRepositoryContext(db);
 *
 * const resident = await repos.residents.get('res-1');
 * ```
 */
export function createPgRepositoryContext(db: Executor): RepositoryContext {
  return {
    residences: new PgResidenceRepository(db),
    floors: new PgFloorRepository(db),
    rooms: new PgRoomRepository(db),
    beds: new PgBedRepository(db),
    residents: new PgResidentRepository(db),
    devices: new PgDeviceRepository(db),
    measurements: new PgMeasurementRepository(db),
    taskCategories: new PgTaskCategoryRepository(db),
    taskTemplates: new PgTaskTemplateRepository(db),
    taskApplications: new PgTaskApplicationRepository(db),
    tags: new PgTagRepository(db),
    residentTags: new PgResidentTagRepository(db),
    history: new PgHistoryRepository(db),
    events: new PgEventLogRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: config.databaseUrl });
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * await repos.transaction(async (txRepos) => {
 *   const resident = await txRepos.residents.getForUpdate('res-1');
 *   // ...
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Executor
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly residences: PgResidenceRepository;
  readonly floors: PgFloorRepository;
  readonly rooms: PgRoomRepository;
  readonly beds: PgBedRepository;
  readonly residents: PgResidentRepository;
  readonly devices: PgDeviceRepository;
  readonly measurements: PgMeasurementRepository;
  readonly taskCategories: PgTaskCategoryRepository;
  readonly taskTemplates: PgTaskTemplateRepository;
  readonly taskApplications: PgTaskApplicationRepository;
  readonly tags: PgTagRepository;
  readonly residentTags: PgResidentTagRepository;
  readonly history: PgHistoryRepository;
  readonly events: PgEventLogRepository;

  constructor(private db: Executor) {
    this.residences = new PgResidenceRepository(db);
    this.floors = new PgFloorRepository(db);
    this.rooms = new PgRoomRepository(db);
    this.beds = new PgBedRepository(db);
    this.residents = new PgResidentRepository(db);
    this.devices = new PgDeviceRepository(db);
    this.measurements = new PgMeasurementRepository(db);
    this.taskCategories = new PgTaskCategoryRepository(db);
    this.taskTemplates = new PgTaskTemplateRepository(db);
    this.taskApplications = new PgTaskApplicationRepository(db);
    this.tags = new PgTagRepository(db);
    this.residentTags = new PgResidentTagRepository(db);
    this.history = new PgHistoryRepository(db);
    this.events = new PgEventLogRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * If fn throws, the transaction is rolled back and the error rethrown.
   * Driver errors, including those raised at COMMIT, are rethrown as
   * ledger errors.
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => fn(createPgRepositoryContext(tx)));
    } catch (error) {
      throw translateStorageError(error);
    }
  }
}
