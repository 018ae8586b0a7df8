import { eq } from 'drizzle-orm';
import type { Device, Id } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { devices } from '../schema/index.js';
import type { RecordRepository } from '../../interfaces/index.js';
import { toDate, toDateOrNull, toIso, toIsoOrNull } from './dates.js';
import { hasRowWith } from './references.js';

const DEVICE_REFERENCES = { residenceId: devices.residenceId };

type DeviceRow = typeof devices.$inferSelect;

export class PgDeviceRepository implements RecordRepository<Device, 'residenceId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Device | null> {
    const [row] = await this.db.select().from(devices).where(eq(devices.id, id));
    return row ? this.rowToDevice(row) : null;
  }

  async getForUpdate(id: Id): Promise<Device | null> {
    const [row] = await this.db.select().from(devices).where(eq(devices.id, id)).for('update');
    return row ? this.rowToDevice(row) : null;
  }

  async insert(record: Device): Promise<Device> {
    const [row] = await this.db.insert(devices).values(this.deviceToRow(record)).returning();
    return this.rowToDevice(row);
  }

  async update(record: Device): Promise<Device | null> {
    const [row] = await this.db
      .update(devices)
      .set(this.deviceToRow(record))
      .where(eq(devices.id, record.id))
      .returning();
    return row ? this.rowToDevice(row) : null;
  }

  async remove(id: Id): Promise<Device | null> {
    const [row] = await this.db.delete(devices).where(eq(devices.id, id)).returning();
    return row ? this.rowToDevice(row) : null;
  }

  async hasReference(field: keyof typeof DEVICE_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, devices, DEVICE_REFERENCES[field], id);
  }

  private deviceToRow(record: Device): DeviceRow {
    return {
      id: record.id,
      residenceId: record.residenceId,
      type: record.type,
      name: record.name,
      mac: record.mac,
      batteryPercent: record.batteryPercent,
      createdBy: record.createdBy,
      createdAt: toDate(record.createdAt),
      updatedAt: toDate(record.updatedAt),
      deletedAt: toDateOrNull(record.deletedAt),
    };
  }

  private rowToDevice(row: DeviceRow): Device {
    return {
      id: row.id,
      residenceId: row.residenceId,
      type: row.type,
      name: row.name,
      mac: row.mac,
      batteryPercent: row.batteryPercent,
      createdBy: row.createdBy,
      createdAt: toIso(row.createdAt),
      updatedAt: toIso(row.updatedAt),
      deletedAt: toIsoOrNull(row.deletedAt),
    };
  }
}
