// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * Calendar date without a time component (YYYY-MM-DD)
 */
export type CalendarDate = string;

/**
 * The identity a mutation is attributed to.
 *
 * This is an opaque reference: the ledger records who acted, it never decides
 * whether they were allowed to. A null userId means the system acted on its own.
 */
export type ActorRef = {
  userId: Id | null;
};

/**
 * Columns every stored record carries.
 */
export type BaseRecord = {
  id: Id;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * Records hidden by timestamp rather than removed.
 */
export type SoftDeletable = {
  deletedAt: Timestamp | null;
};
