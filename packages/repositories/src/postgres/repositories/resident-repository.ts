import { eq } from 'drizzle-orm';
import type { Id, Resident } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { residents } from '../schema/index.js';
import type { RecordRepository } from '../../interfaces/index.js';
import { toDate, toDateOrNull, toIso, toIsoOrNull } from './dates.js';
import { hasRowWith } from './references.js';

const RESIDENT_REFERENCES = { residenceId: residents.residenceId, bedId: residents.bedId };

type ResidentRow = typeof residents.$inferSelect;

/**
 * Resident rows. The occupancy rule lives in the resident_active_bed_unique
 * partial index; a violating write raises 23505 on that index, which
 * translateStorageError turns into OccupancyConflictError.
 */
export class PgResidentRepository implements RecordRepository<Resident, 'residenceId' | 'bedId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Resident | null> {
    const [row] = await this.db.select().from(residents).where(eq(residents.id, id));
    return row ? this.rowToResident(row) : null;
  }

  async getForUpdate(id: Id): Promise<Resident | null> {
    const [row] = await this.db
      .select()
      .from(residents)
      .where(eq(residents.id, id))
      .for('update');
    return row ? this.rowToResident(row) : null;
  }

  async insert(record: Resident): Promise<Resident> {
    const [row] = await this.db.insert(residents).values(this.residentToRow(record)).returning();
    return this.rowToResident(row);
  }

  async update(record: Resident): Promise<Resident | null> {
    const [row] = await this.db
      .update(residents)
      .set(this.residentToRow(record))
      .where(eq(residents.id, record.id))
      .returning();
    return row ? this.rowToResident(row) : null;
  }

  async remove(id: Id): Promise<Resident | null> {
    const [row] = await this.db.delete(residents).where(eq(residents.id, id)).returning();
    return row ? this.rowToResident(row) : null;
  }

  async hasReference(field: keyof typeof RESIDENT_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, residents, RESIDENT_REFERENCES[field], id);
  }

  private residentToRow(record: Resident): ResidentRow {
    return {
      id: record.id,
      residenceId: record.residenceId,
      fullName: record.fullName,
      birthDate: record.birthDate,
      sex: record.sex,
      comments: record.comments,
      status: record.status,
      statusChangedAt: toDateOrNull(record.statusChangedAt),
      bedId: record.bedId,
      createdBy: record.createdBy,
      createdAt: toDate(record.createdAt),
      updatedAt: toDate(record.updatedAt),
      deletedAt: toDateOrNull(record.deletedAt),
    };
  }

  private rowToResident(row: ResidentRow): Resident {
    return {
      id: row.id,
      residenceId: row.residenceId,
      fullName: row.fullName,
      birthDate: row.birthDate,
      sex: row.sex,
      comments: row.comments,
      status: row.status,
      statusChangedAt: toIsoOrNull(row.statusChangedAt),
      bedId: row.bedId,
      createdBy: row.createdBy,
      createdAt: toIso(row.createdAt),
      updatedAt: toIso(row.updatedAt),
      deletedAt: toIsoOrNull(row.deletedAt),
    };
  }
}
