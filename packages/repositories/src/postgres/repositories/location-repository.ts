import { eq } from 'drizzle-orm';
import type { Bed, Floor, Id, Room } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { beds, floors, rooms } from '../schema/index.js';
import type { RecordRepository } from '../../interfaces/index.js';
import { toDate, toDateOrNull, toIso, toIsoOrNull } from './dates.js';
import { hasRowWith } from './references.js';

const FLOOR_REFERENCES = { residenceId: floors.residenceId };
const ROOM_REFERENCES = { residenceId: rooms.residenceId, floorId: rooms.floorId };
const BED_REFERENCES = { residenceId: beds.residenceId, roomId: beds.roomId };

// Floors, rooms and beds only matter to the ledger as the targets of
// ownership checks and the bed occupancy rule.

export class PgFloorRepository implements RecordRepository<Floor, 'residenceId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Floor | null> {
    const [row] = await this.db.select().from(floors).where(eq(floors.id, id));
    return row ? rowToFloor(row) : null;
  }

  async getForUpdate(id: Id): Promise<Floor | null> {
    const [row] = await this.db.select().from(floors).where(eq(floors.id, id)).for('update');
    return row ? rowToFloor(row) : null;
  }

  async insert(record: Floor): Promise<Floor> {
    const [row] = await this.db.insert(floors).values(floorToRow(record)).returning();
    return rowToFloor(row);
  }

  async update(record: Floor): Promise<Floor | null> {
    const [row] = await this.db
      .update(floors)
      .set(floorToRow(record))
      .where(eq(floors.id, record.id))
      .returning();
    return row ? rowToFloor(row) : null;
  }

  async remove(id: Id): Promise<Floor | null> {
    const [row] = await this.db.delete(floors).where(eq(floors.id, id)).returning();
    return row ? rowToFloor(row) : null;
  }

  async hasReference(field: keyof typeof FLOOR_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, floors, FLOOR_REFERENCES[field], id);
  }
}

export class PgRoomRepository implements RecordRepository<Room, 'residenceId' | 'floorId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Room | null> {
    const [row] = await this.db.select().from(rooms).where(eq(rooms.id, id));
    return row ? rowToRoom(row) : null;
  }

  async getForUpdate(id: Id): Promise<Room | null> {
    const [row] = await this.db.select().from(rooms).where(eq(rooms.id, id)).for('update');
    return row ? rowToRoom(row) : null;
  }

  async insert(record: Room): Promise<Room> {
    const [row] = await this.db.insert(rooms).values(roomToRow(record)).returning();
    return rowToRoom(row);
  }

  async update(record: Room): Promise<Room | null> {
    const [row] = await this.db
      .update(rooms)
      .set(roomToRow(record))
      .where(eq(rooms.id, record.id))
      .returning();
    return row ? rowToRoom(row) : null;
  }

  async remove(id: Id): Promise<Room | null> {
    const [row] = await this.db.delete(rooms).where(eq(rooms.id, id)).returning();
    return row ? rowToRoom(row) : null;
  }

  async hasReference(field: keyof typeof ROOM_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, rooms, ROOM_REFERENCES[field], id);
  }
}

export class PgBedRepository implements RecordRepository<Bed, 'residenceId' | 'roomId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Bed | null> {
    const [row] = await this.db.select().from(beds).where(eq(beds.id, id));
    return row ? rowToBed(row) : null;
  }

  async getForUpdate(id: Id): Promise<Bed | null> {
    const [row] = await this.db.select().from(beds).where(eq(beds.id, id)).for('update');
    return row ? rowToBed(row) : null;
  }

  async insert(record: Bed): Promise<Bed> {
    const [row] = await this.db.insert(beds).values(bedToRow(record)).returning();
    return rowToBed(row);
  }

  async update(record: Bed): Promise<Bed | null> {
    const [row] = await this.db
      .update(beds)
      .set(bedToRow(record))
      .where(eq(beds.id, record.id))
      .returning();
    return row ? rowToBed(row) : null;
  }

  async remove(id: Id): Promise<Bed | null> {
    const [row] = await this.db.delete(beds).where(eq(beds.id, id)).returning();
    return row ? rowToBed(row) : null;
  }

  async hasReference(field: keyof typeof BED_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, beds, BED_REFERENCES[field], id);
  }
}

function floorToRow(record: Floor): typeof floors.$inferSelect {
  return {
    id: record.id,
    residenceId: record.residenceId,
    name: record.name,
    createdBy: record.createdBy,
    createdAt: toDate(record.createdAt),
    updatedAt: toDate(record.updatedAt),
    deletedAt: toDateOrNull(record.deletedAt),
  };
}

function rowToFloor(row: typeof floors.$inferSelect): Floor {
  return {
    id: row.id,
    residenceId: row.residenceId,
    name: row.name,
    createdBy: row.createdBy,
    createdAt: toIso(row.createdAt),
    updatedAt: toIso(row.updatedAt),
    deletedAt: toIsoOrNull(row.deletedAt),
  };
}

function roomToRow(record: Room): typeof rooms.$inferSelect {
  return { ...floorToRow(record), floorId: record.floorId };
}

function rowToRoom(row: typeof rooms.$inferSelect): Room {
  return { ...rowToFloor(row), floorId: row.floorId };
}

function bedToRow(record: Bed): typeof beds.$inferSelect {
  return { ...floorToRow(record), roomId: record.roomId };
}

function rowToBed(row: typeof beds.$inferSelect): Bed {
  return { ...rowToFloor(row), roomId: row.roomId };
}
