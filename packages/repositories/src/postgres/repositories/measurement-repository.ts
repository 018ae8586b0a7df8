import { eq } from 'drizzle-orm';
import type { Id, Measurement } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { measurements } from '../schema/index.js';
import type { RecordRepository } from '../../interfaces/index.js';
import { toDate, toDateOrNull, toIso, toIsoOrNull } from './dates.js';
import { hasRowWith } from './references.js';

const MEASUREMENT_REFERENCES = { residenceId: measurements.residenceId, residentId: measurements.residentId, deviceId: measurements.deviceId };

type MeasurementRow = typeof measurements.$inferSelect;

export class PgMeasurementRepository implements RecordRepository<Measurement, 'residenceId' | 'residentId' | 'deviceId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Measurement | null> {
    const [row] = await this.db.select().from(measurements).where(eq(measurements.id, id));
    return row ? this.rowToMeasurement(row) : null;
  }

  async getForUpdate(id: Id): Promise<Measurement | null> {
    const [row] = await this.db
      .select()
      .from(measurements)
      .where(eq(measurements.id, id))
      .for('update');
    return row ? this.rowToMeasurement(row) : null;
  }

  async insert(record: Measurement): Promise<Measurement> {
    const [row] = await this.db
      .insert(measurements)
      .values(this.measurementToRow(record))
      .returning();
    return this.rowToMeasurement(row);
  }

  async update(record: Measurement): Promise<Measurement | null> {
    const [row] = await this.db
      .update(measurements)
      .set(this.measurementToRow(record))
      .where(eq(measurements.id, record.id))
      .returning();
    return row ? this.rowToMeasurement(row) : null;
  }

  async remove(id: Id): Promise<Measurement | null> {
    const [row] = await this.db.delete(measurements).where(eq(measurements.id, id)).returning();
    return row ? this.rowToMeasurement(row) : null;
  }

  async hasReference(field: keyof typeof MEASUREMENT_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, measurements, MEASUREMENT_REFERENCES[field], id);
  }

  private measurementToRow(record: Measurement): MeasurementRow {
    return {
      id: record.id,
      residenceId: record.residenceId,
      residentId: record.residentId,
      recordedBy: record.recordedBy,
      source: record.source,
      deviceId: record.deviceId,
      type: record.type,
      systolic: record.systolic,
      diastolic: record.diastolic,
      pulseBpm: record.pulseBpm,
      spo2: record.spo2,
      weightKg: record.weightKg,
      temperatureC: record.temperatureC,
      takenAt: toDate(record.takenAt),
      createdAt: toDate(record.createdAt),
      updatedAt: toDate(record.updatedAt),
      deletedAt: toDateOrNull(record.deletedAt),
    };
  }

  private rowToMeasurement(row: MeasurementRow): Measurement {
    return {
      id: row.id,
      residenceId: row.residenceId,
      residentId: row.residentId,
      recordedBy: row.recordedBy,
      source: row.source,
      deviceId: row.deviceId,
      type: row.type,
      systolic: row.systolic,
      diastolic: row.diastolic,
      pulseBpm: row.pulseBpm,
      spo2: row.spo2,
      weightKg: row.weightKg,
      temperatureC: row.temperatureC,
      takenAt: toIso(row.takenAt),
      createdAt: toIso(row.createdAt),
      updatedAt: toIso(row.updatedAt),
      deletedAt: toIsoOrNull(row.deletedAt),
    };
  }
}
