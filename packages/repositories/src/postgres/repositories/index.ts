// Postgres repository implementations
export { PgResidenceRepository } from './residence-repository.js';
export { PgFloorRepository, PgRoomRepository, PgBedRepository } from './location-repository.js';
export { PgResidentRepository } from './resident-repository.js';
export { PgDeviceRepository } from './device-repository.js';
export { PgMeasurementRepository } from './measurement-repository.js';
export {
  PgTaskCategoryRepository,
  PgTaskTemplateRepository,
  PgTaskApplicationRepository,
} from './task-repository.js';
export { PgTagRepository, PgResidentTagRepository } from './tag-repository.js';
export { PgHistoryRepository } from './history-repository.js';
export { PgEventLogRepository } from './event-log-repository.js';
export { createPgRepositoryContext, createTransactionalPgRepositoryContext } from './context.js';
