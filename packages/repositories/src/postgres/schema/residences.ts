import { pgTable, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Residences table - the tenancy root.
 */
export const residences = pgTable(
  'residence',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    address: text('address'),
    // Stored as received; encryption happens before the ledger sees the value
    phoneEncrypted: text('phone_encrypted'),
    emailEncrypted: text('email_encrypted'),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [uniqueIndex('residence_name_unique').on(table.name)]
);
