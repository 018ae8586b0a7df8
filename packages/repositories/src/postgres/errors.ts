// Postgres error translation
//
// Turns postgres.js driver errors into ledger errors so callers never see
// SQLSTATE codes. Errors that are already ledger errors pass through.

import {
  DuplicateValueError,
  OccupancyConflictError,
  ReferenceNotFoundError,
  StillReferencedError,
  StorageUnavailableError,
  ValidationError,
  isLedgerError,
} from '@careledger/protocol';
import { RESIDENT_ACTIVE_BED_INDEX } from './schema/residents.js';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
const CHECK_VIOLATION = '23514';

/** SQLSTATEs after which the transaction is known to have had no effect */
const RETRYABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '40001', '40P01']);

/** postgres.js and socket-level connection failures */
const CONNECTION_ERROR_CODES = new Set([
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
]);

type DriverError = {
  code: string;
  message?: string;
  constraint_name?: string;
  detail?: string;
  table_name?: string;
};

function isDriverError(error: unknown): error is DriverError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Pull the key value out of a detail line such as
 * `Key (bed_id)=(bed-1) already exists.`
 */
function keyValueFromDetail(detail: string | undefined): string | null {
  const match = detail?.match(/\)=\((.*)\)/);
  return match?.[1] ?? null;
}

/**
 * Pull the column and referenced table out of a foreign-key detail line such as
 * `Key (bed_id)=(bed-1) is not present in table "bed".`
 */
function referenceFromDetail(detail: string | undefined): { column: string | null; table: string | null } {
  return {
    column: detail?.match(/Key \(([^)]+)\)=/)?.[1] ?? null,
    table: detail?.match(/table "([^"]+)"/)?.[1] ?? null,
  };
}

/**
 * Pull the referencing table out of a restrict violation detail such as
 * `Key (id)=(bed-1) is still referenced from table "resident".`
 */
function referencingTableFromDetail(detail: string | undefined): string | null {
  return detail?.match(/is still referenced from table "([^"]+)"/)?.[1] ?? null;
}

/**
 * Pull the table being deleted from out of a message such as
 * `update or delete on table "bed" violates foreign key constraint ...`
 */
function deletedTableFromMessage(message: string | undefined): string | null {
  return message?.match(/on table "([^"]+)" violates/)?.[1] ?? null;
}

/**
 * Translate a driver error into the matching ledger error.
 * Unknown errors are returned unchanged.
 */
export function translateStorageError(error: unknown): unknown {
  if (isLedgerError(error) || !isDriverError(error)) {
    return error;
  }

  const { code } = error;

  if (code === UNIQUE_VIOLATION) {
    if (error.constraint_name === RESIDENT_ACTIVE_BED_INDEX) {
      return new OccupancyConflictError(keyValueFromDetail(error.detail), { cause: error });
    }
    return new DuplicateValueError(error.constraint_name ?? error.table_name ?? 'unique constraint', {
      cause: error,
    });
  }

  if (code === FOREIGN_KEY_VIOLATION) {
    const referencingTable = referencingTableFromDetail(error.detail);
    if (referencingTable !== null) {
      return new StillReferencedError(
        deletedTableFromMessage(error.message) ?? 'row',
        keyValueFromDetail(error.detail) ?? 'unknown',
        { entityType: referencingTable, field: error.constraint_name ?? null },
        { cause: error }
      );
    }
    const reference = referenceFromDetail(error.detail);
    return new ReferenceNotFoundError(
      reference.table ?? error.table_name ?? 'row',
      keyValueFromDetail(error.detail) ?? 'unknown',
      { field: reference.column ?? error.constraint_name, cause: error }
    );
  }

  if (code === CHECK_VIOLATION) {
    return new ValidationError(`Check constraint failed: ${error.constraint_name ?? 'unknown'}`, [], {
      cause: error,
    });
  }

  if (code.startsWith('08') || RETRYABLE_SQLSTATES.has(code) || CONNECTION_ERROR_CODES.has(code)) {
    return new StorageUnavailableError(`Storage unavailable (${code})`, {
      cause: error,
      details: { driverCode: code },
    });
  }

  return error;
}
