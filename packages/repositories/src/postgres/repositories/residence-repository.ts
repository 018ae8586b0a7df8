import { eq } from 'drizzle-orm';
import type { Id, Residence } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { residences } from '../schema/index.js';
import type { RecordRepository } from '../../interfaces/index.js';
import { toDate, toDateOrNull, toIso, toIsoOrNull } from './dates.js';

type ResidenceRow = typeof residences.$inferSelect;

export class PgResidenceRepository implements RecordRepository<Residence> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Residence | null> {
    const [row] = await this.db.select().from(residences).where(eq(residences.id, id));
    return row ? this.rowToResidence(row) : null;
  }

  async getForUpdate(id: Id): Promise<Residence | null> {
    const [row] = await this.db
      .select()
      .from(residences)
      .where(eq(residences.id, id))
      .for('update');
    return row ? this.rowToResidence(row) : null;
  }

  async insert(record: Residence): Promise<Residence> {
    const [row] = await this.db.insert(residences).values(this.residenceToRow(record)).returning();
    return this.rowToResidence(row);
  }

  async update(record: Residence): Promise<Residence | null> {
    const [row] = await this.db
      .update(residences)
      .set(this.residenceToRow(record))
      .where(eq(residences.id, record.id))
      .returning();
    return row ? this.rowToResidence(row) : null;
  }

  async remove(id: Id): Promise<Residence | null> {
    const [row] = await this.db.delete(residences).where(eq(residences.id, id)).returning();
    return row ? this.rowToResidence(row) : null;
  }

  /** No field of this table refers to another row */
  async hasReference(): Promise<boolean> {
    return false;
  }

  private residenceToRow(record: Residence): ResidenceRow {
    return {
      id: record.id,
      name: record.name,
      address: record.address,
      phoneEncrypted: record.phoneEncrypted,
      emailEncrypted: record.emailEncrypted,
      createdBy: record.createdBy,
      createdAt: toDate(record.createdAt),
      updatedAt: toDate(record.updatedAt),
      deletedAt: toDateOrNull(record.deletedAt),
    };
  }

  private rowToResidence(row: ResidenceRow): Residence {
    return {
      id: row.id,
      name: row.name,
      address: row.address,
      phoneEncrypted: row.phoneEncrypted,
      emailEncrypted: row.emailEncrypted,
      createdBy: row.createdBy,
      createdAt: toIso(row.createdAt),
      updatedAt: toIso(row.updatedAt),
      deletedAt: toIsoOrNull(row.deletedAt),
    };
  }
}
