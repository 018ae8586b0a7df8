import { eq, sql } from 'drizzle-orm';
import type { PgColumn, PgTable } from 'drizzle-orm/pg-core';
import type { Id } from '@careledger/protocol';
import type { Executor } from '../db.js';

/**
 * Whether any row of `table` holds `id` in `column`.
 */
export async function hasRowWith(db: Executor, table: PgTable, column: PgColumn, id: Id): Promise<boolean> {
  const rows = await db
    .select({ found: sql<number>`1` })
    .from(table)
    .where(eq(column, id))
    .limit(1);
  return rows.length > 0;
}
