// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { RecordRepository, ReferenceField } from './record-repository.js';

export type { HistoryRepository, AppendHistoryInput } from './history-repository.js';

export {
  DEFAULT_EVENT_LIMIT,
  MAX_EVENT_LIMIT,
  resolveEventLimit,
  type EventLogRepository,
  type AppendEventInput,
  type ResidenceEventFilter,
} from './event-log-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
