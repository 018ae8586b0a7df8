// Ledger - the guarded mutation boundary
//
// Every write to a record goes through execute(), which runs one transaction:
// 1. Lock and read the prior row
// 2. Validate the proposed values and run the entity's guards
// 3. Write the row; a row that others still refer to is never removed
// 4. Append the history row and the event-log rows
//
// A failure at any step rolls back all of it.

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  CrossTenantViolationError,
  RECORD_SCHEMAS,
  ReferenceNotFoundError,
  ValidationError,
  isLedgerError,
  isTrackedEntityType,
  type ChangeKind,
  type DeleteRequest,
  type EntityRecordMap,
  type EntityType,
  type EventLogEntry,
  type Id,
  type InsertRequest,
  type MutationRequestFor,
  type MutationResultFor,
  type MutationSuccess,
  type NewRecord,
  type Timestamp,
  type TrackedEntityType,
  type UpdateRequest,
  type HistoryEntry,
} from '@careledger/protocol';
import type {
  RepositoryContext,
  ResidenceEventFilter,
  TransactionalRepositoryContext,
} from '@careledger/repositories';
import { DEFAULT_GUARDS, runGuards, type DerivedEvent } from '../guards/index.js';
import { recordHistory } from '../history/index.js';
import { appendChangeEvent, appendDerivedEvents, type EventSubject } from '../events/index.js';
import { createLogger, type Logger } from '../logger.js';
import { assertUnreferenced } from './dependents.js';
import { DESCRIPTORS, type EntityDescriptor } from './descriptors.js';

export type LedgerOptions = {
  /** Must support transactions; every mutation runs in one */
  repos: TransactionalRepositoryContext;

  /** Parent logger; the ledger logs through a child bound to component=ledger */
  logger?: Logger;

  /** Read once per mutation */
  clock?: () => Date;
};

type Change<K extends EntityType> = {
  changeKind: ChangeKind;
  before: EntityRecordMap[K] | null;
  after: EntityRecordMap[K] | null;

  /** Returned to the caller */
  data: EntityRecordMap[K];

  derived: DerivedEvent[];
};

/**
 * Ledger - the guarded mutation boundary.
 *
 * @example
 * ```ts
 * const ledger = createLedger({
 *   repos: createTransactionalPgRepositoryContext(db),
 *   logger,
 * });
 *
 * const result = await ledger.execute({
 *   entityType: 'resident',
 *   operation: 'update',
 *   id: 'res-1',
 *   values: { status: 'discharged' },
 *   actor: { userId: 'user-1' },
 *   residenceId: 'residence-1',
 * });
 *
 * if (result.success) {
 *   console.log(result.data.bedId); // null
 * }
 * ```
 */
export class Ledger {
  private repos: TransactionalRepositoryContext;
  private logger: Logger;
  private clock: () => Date;

  constructor(options: LedgerOptions) {
    this.repos = options.repos;
    this.logger = (options.logger ?? createLogger()).child({ component: 'ledger' });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Apply one mutation atomically.
   *
   * Typed failures (LedgerError) come back as `{ success: false, error }`.
   * Anything else is logged and rethrown.
   */
  async execute<K extends EntityType>(request: MutationRequestFor<K>): Promise<MutationResultFor<K>> {
    const startTime = Date.now();
    const now = this.clock().toISOString();

    try {
      const result = await this.repos.transaction((tx) => this.apply(request, tx, now));

      this.logger.debug(
        {
          entityType: request.entityType,
          entityId: result.data.id,
          operation: request.operation,
          historySequence: result.history?.sequence ?? null,
          eventCount: result.events.length,
          durationMs: Date.now() - startTime,
        },
        'mutation committed'
      );

      return result;
    } catch (error) {
      if (isLedgerError(error)) {
        this.logger.warn(
          {
            entityType: request.entityType,
            operation: request.operation,
            code: error.code,
            retryable: error.retryable,
            details: error.details,
          },
          'mutation rejected'
        );
        return { success: false, error };
      }

      this.logger.error(
        { err: error, entityType: request.entityType, operation: request.operation },
        'mutation failed'
      );
      throw error;
    }
  }

  /**
   * History rows of one tracked entity, oldest first.
   */
  async historyOf(entityType: TrackedEntityType, entityId: Id): Promise<HistoryEntry[]> {
    return this.repos.transaction((tx) => tx.history.listForEntity(entityType, entityId));
  }

  /**
   * Events scoped to a residence, newest first.
   */
  async eventsForResidence(residenceId: Id, filter?: ResidenceEventFilter): Promise<EventLogEntry[]> {
    return this.repos.transaction((tx) => tx.events.listForResidence(residenceId, filter));
  }

  /**
   * Events about one entity, oldest first.
   */
  async eventsForEntity(entityType: EntityType, entityId: Id): Promise<EventLogEntry[]> {
    return this.repos.transaction((tx) => tx.events.listForEntity(entityType, entityId));
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  private async apply<K extends EntityType>(
    request: MutationRequestFor<K>,
    tx: RepositoryContext,
    now: Timestamp
  ): Promise<MutationSuccess<EntityRecordMap[K]>> {
    const descriptor: EntityDescriptor<K> = DESCRIPTORS[request.entityType];
    const change = await this.write(request, descriptor, tx, now);
    return this.audit(request, descriptor, tx, now, change);
  }

  private async write<K extends EntityType>(
    request: MutationRequestFor<K>,
    descriptor: EntityDescriptor<K>,
    tx: RepositoryContext,
    now: Timestamp
  ): Promise<Change<K>> {
    switch (request.operation) {
      case 'insert':
        return this.insert(request, descriptor, tx, now);
      case 'update':
        return this.update(request, descriptor, tx, now);
      case 'delete':
        return this.remove(request, descriptor, tx, now);
    }
  }

  private async insert<K extends EntityType>(
    request: InsertRequest<K>,
    descriptor: EntityDescriptor<K>,
    tx: RepositoryContext,
    now: Timestamp
  ): Promise<Change<K>> {
    const input = mergeInput(descriptor.insertDefaults?.(now) ?? {}, request.values);

    if (descriptor.scoped) {
      if (input.residenceId === undefined) {
        input.residenceId = request.residenceId;
      } else if (request.residenceId !== null && input.residenceId !== request.residenceId) {
        throw new CrossTenantViolationError({
          entityType: request.entityType,
          field: 'residenceId',
          expectedResidenceId: request.residenceId,
          actualResidenceId: typeof input.residenceId === 'string' ? input.residenceId : null,
        });
      }
    }

    if (descriptor.creatorField && input[descriptor.creatorField] === undefined) {
      input[descriptor.creatorField] = request.actor.userId;
    }

    const values = parseValues(request.entityType, input);
    const candidate = descriptor.assemble(values, {
      id: typeof input.id === 'string' ? input.id : randomUUID(),
      createdAt: now,
      updatedAt: now,
    });

    const { record, events } = await runGuards(DEFAULT_GUARDS[request.entityType], {
      entityType: request.entityType,
      operation: 'insert',
      record: candidate,
      prior: null,
      repos: tx,
      now,
    });

    const stored = await descriptor.repository(tx).insert(record);
    return { changeKind: 'create', before: null, after: stored, data: stored, derived: events };
  }

  private async update<K extends EntityType>(
    request: UpdateRequest<K>,
    descriptor: EntityDescriptor<K>,
    tx: RepositoryContext,
    now: Timestamp
  ): Promise<Change<K>> {
    const prior = await this.lockPrior(request, descriptor, tx);
    const values = parseValues(request.entityType, mergeInput(prior, request.values));
    const candidate = descriptor.assemble(values, {
      id: prior.id,
      createdAt: prior.createdAt,
      updatedAt: prior.updatedAt,
    });

    const from = descriptor.residenceOf(prior);
    const to = descriptor.residenceOf(candidate);
    if (request.residenceId !== null && to !== from) {
      throw new CrossTenantViolationError({
        entityType: request.entityType,
        entityId: prior.id,
        field: 'residenceId',
        expectedResidenceId: request.residenceId,
        actualResidenceId: to,
      });
    }

    return this.replace(request, descriptor, tx, now, prior, candidate);
  }

  private async remove<K extends EntityType>(
    request: DeleteRequest<K>,
    descriptor: EntityDescriptor<K>,
    tx: RepositoryContext,
    now: Timestamp
  ): Promise<Change<K>> {
    const prior = await this.lockPrior(request, descriptor, tx);

    if (descriptor.softDelete && !request.hard) {
      return this.replace(request, descriptor, tx, now, prior, descriptor.softDelete(prior, now));
    }

    await assertUnreferenced(request.entityType, prior.id, tx);
    const removed = await descriptor.repository(tx).remove(prior.id);
    if (!removed) {
      throw new ReferenceNotFoundError(request.entityType, prior.id);
    }
    return { changeKind: 'delete', before: prior, after: null, data: prior, derived: [] };
  }

  /**
   * Guard and write a new version of an existing row.
   */
  private async replace<K extends EntityType>(
    request: UpdateRequest<K> | DeleteRequest<K>,
    descriptor: EntityDescriptor<K>,
    tx: RepositoryContext,
    now: Timestamp,
    prior: EntityRecordMap[K],
    candidate: EntityRecordMap[K]
  ): Promise<Change<K>> {
    const { record, events } = await runGuards(DEFAULT_GUARDS[request.entityType], {
      entityType: request.entityType,
      operation: 'update',
      record: candidate,
      prior,
      repos: tx,
      now,
    });

    const stored = await descriptor.repository(tx).update(record);
    if (!stored) {
      throw new ReferenceNotFoundError(request.entityType, prior.id);
    }
    return { changeKind: 'update', before: prior, after: stored, data: stored, derived: events };
  }

  /**
   * Read the row being changed under a row lock and check it is in scope.
   */
  private async lockPrior<K extends EntityType>(
    request: UpdateRequest<K> | DeleteRequest<K>,
    descriptor: EntityDescriptor<K>,
    tx: RepositoryContext
  ): Promise<EntityRecordMap[K]> {
    const prior = await descriptor.repository(tx).getForUpdate(request.id);
    if (!prior) {
      throw new ReferenceNotFoundError(request.entityType, request.id);
    }

    const actual = descriptor.residenceOf(prior);
    if (request.residenceId !== null && actual !== null && actual !== request.residenceId) {
      throw new CrossTenantViolationError({
        entityType: request.entityType,
        entityId: request.id,
        expectedResidenceId: request.residenceId,
        actualResidenceId: actual,
      });
    }

    return prior;
  }

  /**
   * Append the history row and events for a written change.
   * Untracked entity types get neither history nor a generic event.
   */
  private async audit<K extends EntityType>(
    request: MutationRequestFor<K>,
    descriptor: EntityDescriptor<K>,
    tx: RepositoryContext,
    now: Timestamp,
    change: Change<K>
  ): Promise<MutationSuccess<EntityRecordMap[K]>> {
    const entityType: EntityType = request.entityType;
    const subject: EventSubject = {
      entityType,
      entityId: change.data.id,
      residenceId: descriptor.residenceOf(change.data),
      actor: request.actor,
      at: now,
    };

    let history: HistoryEntry<EntityRecordMap[K]> | null = null;
    const events: EventLogEntry[] = [];

    if (isTrackedEntityType(entityType)) {
      history = await recordHistory(tx.history, {
        entityType,
        entityId: change.data.id,
        changeKind: change.changeKind,
        before: change.before,
        after: change.after,
        actor: request.actor,
        at: now,
      });

      events.push(
        await appendChangeEvent(tx.events, subject, {
          changeKind: change.changeKind,
          before: change.before,
          after: change.after,
          details: descriptor.changeDetails?.(change.before, change.after),
        })
      );
    }

    events.push(...(await appendDerivedEvents(tx.events, subject, change.derived)));

    return { success: true, data: change.data, history, events };
  }
}

export function createLedger(options: LedgerOptions): Ledger {
  return new Ledger(options);
}

/**
 * Merge value sources into one untyped input for schema parsing.
 * Later sources win; undefined values are skipped.
 */
function mergeInput(...sources: object[]): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) input[key] = value;
    }
  }
  return input;
}

function parseValues<K extends EntityType>(entityType: K, input: Record<string, unknown>): NewRecord<K> {
  const schema: z.ZodType<NewRecord<K>, z.ZodTypeDef, unknown> = RECORD_SCHEMAS[entityType];
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${entityType} values`,
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  return parsed.data;
}
