import type { EntityRecordMap, EntityType, EventAction, Timestamp } from '@careledger/protocol';
import type { RepositoryContext } from '@careledger/repositories';

/**
 * An event a guard asks the ledger to append besides the generic one.
 */
export type DerivedEvent = {
  action: EventAction;
  payload: unknown;
};

/**
 * What a guard sees: the candidate row, the row it replaces and the
 * transaction's repositories.
 */
export type GuardContext<K extends EntityType> = {
  entityType: K;
  operation: 'insert' | 'update';

  /** Row about to be written, after earlier guards ran */
  record: EntityRecordMap[K];

  /** Locked prior row; null on insert */
  prior: EntityRecordMap[K] | null;

  repos: RepositoryContext;

  /** The mutation's single clock reading */
  now: Timestamp;
};

export type GuardResult<K extends EntityType> = {
  /** Possibly rewritten row */
  record: EntityRecordMap[K];
  events?: DerivedEvent[];
};

/**
 * A pre-write validator bound to one entity type. It either returns the row
 * to write (rewritten or not) or throws a LedgerError, aborting the mutation.
 */
export type Guard<K extends EntityType> = (
  context: GuardContext<K>
) => GuardResult<K> | Promise<GuardResult<K>>;
