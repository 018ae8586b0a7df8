import { eq } from 'drizzle-orm';
import type { Id, ResidentTag, Tag } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { residentTags, tags } from '../schema/index.js';
import type { RecordRepository } from '../../interfaces/index.js';
import { toDate, toDateOrNull, toIso, toIsoOrNull } from './dates.js';
import { hasRowWith } from './references.js';

const RESIDENT_TAG_REFERENCES = { residenceId: residentTags.residenceId, residentId: residentTags.residentId, tagId: residentTags.tagId };

type TagRow = typeof tags.$inferSelect;
type ResidentTagRow = typeof residentTags.$inferSelect;

export class PgTagRepository implements RecordRepository<Tag> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<Tag | null> {
    const [row] = await this.db.select().from(tags).where(eq(tags.id, id));
    return row ? rowToTag(row) : null;
  }

  async getForUpdate(id: Id): Promise<Tag | null> {
    const [row] = await this.db.select().from(tags).where(eq(tags.id, id)).for('update');
    return row ? rowToTag(row) : null;
  }

  async insert(record: Tag): Promise<Tag> {
    const [row] = await this.db.insert(tags).values(tagToRow(record)).returning();
    return rowToTag(row);
  }

  async update(record: Tag): Promise<Tag | null> {
    const [row] = await this.db
      .update(tags)
      .set(tagToRow(record))
      .where(eq(tags.id, record.id))
      .returning();
    return row ? rowToTag(row) : null;
  }

  async remove(id: Id): Promise<Tag | null> {
    const [row] = await this.db.delete(tags).where(eq(tags.id, id)).returning();
    return row ? rowToTag(row) : null;
  }

  /** No field of this table refers to another row */
  async hasReference(): Promise<boolean> {
    return false;
  }
}

export class PgResidentTagRepository implements RecordRepository<ResidentTag, 'residenceId' | 'residentId' | 'tagId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<ResidentTag | null> {
    const [row] = await this.db.select().from(residentTags).where(eq(residentTags.id, id));
    return row ? rowToResidentTag(row) : null;
  }

  async getForUpdate(id: Id): Promise<ResidentTag | null> {
    const [row] = await this.db
      .select()
      .from(residentTags)
      .where(eq(residentTags.id, id))
      .for('update');
    return row ? rowToResidentTag(row) : null;
  }

  async insert(record: ResidentTag): Promise<ResidentTag> {
    const [row] = await this.db
      .insert(residentTags)
      .values(residentTagToRow(record))
      .returning();
    return rowToResidentTag(row);
  }

  async update(record: ResidentTag): Promise<ResidentTag | null> {
    const [row] = await this.db
      .update(residentTags)
      .set(residentTagToRow(record))
      .where(eq(residentTags.id, record.id))
      .returning();
    return row ? rowToResidentTag(row) : null;
  }

  async remove(id: Id): Promise<ResidentTag | null> {
    const [row] = await this.db.delete(residentTags).where(eq(residentTags.id, id)).returning();
    return row ? rowToResidentTag(row) : null;
  }

  async hasReference(field: keyof typeof RESIDENT_TAG_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, residentTags, RESIDENT_TAG_REFERENCES[field], id);
  }
}

function tagToRow(record: Tag): TagRow {
  return {
    id: record.id,
    name: record.name,
    createdBy: record.createdBy,
    createdAt: toDate(record.createdAt),
    updatedAt: toDate(record.updatedAt),
    deletedAt: toDateOrNull(record.deletedAt),
  };
}

function rowToTag(row: TagRow): Tag {
  return {
    id: row.id,
    name: row.name,
    createdBy: row.createdBy,
    createdAt: toIso(row.createdAt),
    updatedAt: toIso(row.updatedAt),
    deletedAt: toIsoOrNull(row.deletedAt),
  };
}

function residentTagToRow(record: ResidentTag): ResidentTagRow {
  return {
    id: record.id,
    residenceId: record.residenceId,
    residentId: record.residentId,
    tagId: record.tagId,
    assignedBy: record.assignedBy,
    assignedAt: toDate(record.assignedAt),
    createdAt: toDate(record.createdAt),
    updatedAt: toDate(record.updatedAt),
  };
}

function rowToResidentTag(row: ResidentTagRow): ResidentTag {
  return {
    id: row.id,
    residenceId: row.residenceId,
    residentId: row.residentId,
    tagId: row.tagId,
    assignedBy: row.assignedBy,
    assignedAt: toIso(row.assignedAt),
    createdAt: toIso(row.createdAt),
    updatedAt: toIso(row.updatedAt),
  };
}
