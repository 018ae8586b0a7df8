// Ledger error types
//
// Every failure of a mutation attempt is one of these. Each is scoped to the
// attempt that raised it; the transaction is rolled back and nothing else is
// affected.

import type { Id } from './types/common.js';
import type { MeasurementType, MeasurementValueField } from './constants.js';

export type LedgerErrorCode =
  | 'REFERENCE_NOT_FOUND'
  | 'CROSS_TENANT_VIOLATION'
  | 'OCCUPANCY_CONFLICT'
  | 'MALFORMED_MEASUREMENT'
  | 'INVALID_INDEX'
  | 'STORAGE_UNAVAILABLE'
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_VALUE'
  | 'STILL_REFERENCED';

/**
 * Base class for all ledger errors.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  /** True only when no partial effect can have occurred and retrying is safe */
  readonly retryable: boolean;

  readonly details: Record<string, unknown>;

  constructor(
    code: LedgerErrorCode,
    message: string,
    options?: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LedgerError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details ?? {};
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

/**
 * A referenced row (bed, resident, the row being updated, ...) does not exist.
 */
export class ReferenceNotFoundError extends LedgerError {
  readonly entityType: string;
  readonly entityId: Id;
  readonly field?: string;

  constructor(entityType: string, entityId: Id, options?: { field?: string; cause?: unknown }) {
    const via = options?.field ? ` (via ${options.field})` : '';
    super('REFERENCE_NOT_FOUND', `${entityType} not found: ${entityId}${via}`, {
      details: { entityType, entityId, field: options?.field },
      cause: options?.cause,
    });
    this.name = 'ReferenceNotFoundError';
    this.entityType = entityType;
    this.entityId = entityId;
    this.field = options?.field;
  }
}

/**
 * A referenced row, or the row being written, belongs to another residence.
 * Never auto-corrected.
 */
export class CrossTenantViolationError extends LedgerError {
  readonly expectedResidenceId: Id | null;
  readonly actualResidenceId: Id | null;

  constructor(options: {
    entityType: string;
    entityId?: Id;
    field?: string;
    expectedResidenceId: Id | null;
    actualResidenceId: Id | null;
  }) {
    const subject = options.field
      ? `${options.entityType}.${options.field}`
      : `${options.entityType}${options.entityId ? ` ${options.entityId}` : ''}`;
    super(
      'CROSS_TENANT_VIOLATION',
      `${subject} belongs to residence ${options.actualResidenceId ?? '(none)'}, expected ${options.expectedResidenceId ?? '(none)'}`,
      { details: { ...options } }
    );
    this.name = 'CrossTenantViolationError';
    this.expectedResidenceId = options.expectedResidenceId;
    this.actualResidenceId = options.actualResidenceId;
  }
}

/**
 * A second active, non-deleted resident was placed in an occupied bed.
 * The caller must re-decide; the ledger never retries this.
 */
export class OccupancyConflictError extends LedgerError {
  readonly bedId: Id | null;

  constructor(bedId: Id | null, options?: { cause?: unknown }) {
    super(
      'OCCUPANCY_CONFLICT',
      bedId ? `Bed ${bedId} is already occupied by an active resident` : 'Bed is already occupied by an active resident',
      { details: { bedId }, cause: options?.cause }
    );
    this.name = 'OccupancyConflictError';
    this.bedId = bedId;
  }
}

/**
 * A measurement's populated fields do not match its type's field group.
 */
export class MalformedMeasurementError extends LedgerError {
  readonly measurementType: MeasurementType;
  readonly field: MeasurementValueField;
  readonly problem: 'missing' | 'unexpected';

  constructor(
    measurementType: MeasurementType,
    field: MeasurementValueField,
    problem: 'missing' | 'unexpected'
  ) {
    const message =
      problem === 'missing'
        ? `Measurement of type "${measurementType}" requires ${field}`
        : `Measurement of type "${measurementType}" must not set ${field}`;
    super('MALFORMED_MEASUREMENT', message, {
      details: { measurementType, field, problem },
    });
    this.name = 'MalformedMeasurementError';
    this.measurementType = measurementType;
    this.field = field;
    this.problem = problem;
  }
}

/**
 * A task status index fell outside the template's slots.
 */
export class InvalidIndexError extends LedgerError {
  readonly index: number;

  constructor(index: number, bounds: { min: number; max: number }) {
    super('INVALID_INDEX', `Status index ${index} is outside [${bounds.min}, ${bounds.max}]`, {
      details: { index, ...bounds },
    });
    this.name = 'InvalidIndexError';
    this.index = index;
  }
}

/**
 * The store could not be reached or could not commit. Nothing was applied,
 * so the caller may retry.
 */
export class StorageUnavailableError extends LedgerError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super('STORAGE_UNAVAILABLE', message, {
      retryable: true,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'StorageUnavailableError';
  }
}

export type ValidationIssue = {
  path: string;
  message: string;
};

/**
 * Proposed values do not form a valid record.
 */
export class ValidationError extends LedgerError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], options?: { cause?: unknown }) {
    super('VALIDATION_ERROR', message, { details: { issues }, cause: options?.cause });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A uniqueness rule other than bed occupancy was violated.
 */
export class DuplicateValueError extends LedgerError {
  readonly constraint: string;

  constructor(constraint: string, options?: { cause?: unknown }) {
    super('DUPLICATE_VALUE', `Duplicate value violates ${constraint}`, {
      details: { constraint },
      cause: options?.cause,
    });
    this.name = 'DuplicateValueError';
    this.constraint = constraint;
  }
}

/**
 * A physical delete targeted a row that other rows still point at.
 * Nothing was removed.
 */
export class StillReferencedError extends LedgerError {
  readonly entityType: string;
  readonly entityId: Id;

  /** The first referencing table and field found */
  readonly referencedBy: { entityType: string; field: string | null };

  constructor(
    entityType: string,
    entityId: Id,
    referencedBy: { entityType: string; field: string | null },
    options?: { cause?: unknown }
  ) {
    const via = referencedBy.field ? `.${referencedBy.field}` : '';
    super(
      'STILL_REFERENCED',
      `${entityType} ${entityId} is still referenced by ${referencedBy.entityType}${via}`,
      { details: { entityType, entityId, referencedBy }, cause: options?.cause }
    );
    this.name = 'StillReferencedError';
    this.entityType = entityType;
    this.entityId = entityId;
    this.referencedBy = referencedBy;
  }
}
