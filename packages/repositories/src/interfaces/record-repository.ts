import type { BaseRecord, Id } from '@careledger/protocol';

/**
 * Names of a record's fields that hold the id of another row.
 */
export type ReferenceField<T> = {
  [F in keyof T]: Id extends T[F] ? F : never;
}[keyof T] &
  string;

/**
 * Current-state access to one entity type.
 *
 * The store does not decide invariants; it exposes the primitives the guards
 * build on. Uniqueness rules declared by the store (bed occupancy, device MAC,
 * ...) are enforced on write and surface as typed ledger errors.
 */
export interface RecordRepository<T extends BaseRecord, R extends ReferenceField<T> = never> {
  /**
   * Get a row by ID
   */
  get(id: Id): Promise<T | null>;

  /**
   * Get a row by ID and lock it until the surrounding transaction ends.
   * Outside a transaction this behaves like get().
   */
  getForUpdate(id: Id): Promise<T | null>;

  /**
   * Insert a complete row
   */
  insert(record: T): Promise<T>;

  /**
   * Replace the row with the same ID.
   * @returns The stored row, or null if no row with that ID exists
   */
  update(record: T): Promise<T | null>;

  /**
   * Physically remove a row.
   * @returns The removed row, or null if it did not exist
   */
  remove(id: Id): Promise<T | null>;

  /**
   * Whether any row, soft-deleted or not, holds `id` in reference field `field`
   */
  hasReference(field: R, id: Id): Promise<boolean>;
}
