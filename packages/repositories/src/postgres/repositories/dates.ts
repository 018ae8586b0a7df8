import type { Timestamp } from '@careledger/protocol';

// Records carry ISO strings; drizzle timestamp columns carry Dates.

export function toIso(date: Date): Timestamp {
  return date.toISOString();
}

export function toIsoOrNull(date: Date | null): Timestamp | null {
  return date ? date.toISOString() : null;
}

export function toDate(timestamp: Timestamp): Date {
  return new Date(timestamp);
}

export function toDateOrNull(timestamp: Timestamp | null): Date | null {
  return timestamp ? new Date(timestamp) : null;
}
