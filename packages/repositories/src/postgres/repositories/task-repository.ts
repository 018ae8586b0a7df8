import { eq } from 'drizzle-orm';
import type { Id, TaskApplication, TaskCategory, TaskTemplate } from '@careledger/protocol';
import type { Executor } from '../db.js';
import { taskApplications, taskCategories, taskTemplates } from '../schema/index.js';
import type { RecordRepository } from '../../interfaces/index.js';
import { toDate, toDateOrNull, toIso, toIsoOrNull } from './dates.js';
import { hasRowWith } from './references.js';

const TASK_CATEGORY_REFERENCES = { residenceId: taskCategories.residenceId };
const TASK_TEMPLATE_REFERENCES = { residenceId: taskTemplates.residenceId, taskCategoryId: taskTemplates.taskCategoryId };
const TASK_APPLICATION_REFERENCES = { residenceId: taskApplications.residenceId, residentId: taskApplications.residentId, taskTemplateId: taskApplications.taskTemplateId };

type TaskCategoryRow = typeof taskCategories.$inferSelect;
type TaskTemplateRow = typeof taskTemplates.$inferSelect;
type TaskApplicationRow = typeof taskApplications.$inferSelect;

export class PgTaskCategoryRepository implements RecordRepository<TaskCategory, 'residenceId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<TaskCategory | null> {
    const [row] = await this.db.select().from(taskCategories).where(eq(taskCategories.id, id));
    return row ? rowToTaskCategory(row) : null;
  }

  async getForUpdate(id: Id): Promise<TaskCategory | null> {
    const [row] = await this.db
      .select()
      .from(taskCategories)
      .where(eq(taskCategories.id, id))
      .for('update');
    return row ? rowToTaskCategory(row) : null;
  }

  async insert(record: TaskCategory): Promise<TaskCategory> {
    const [row] = await this.db
      .insert(taskCategories)
      .values(taskCategoryToRow(record))
      .returning();
    return rowToTaskCategory(row);
  }

  async update(record: TaskCategory): Promise<TaskCategory | null> {
    const [row] = await this.db
      .update(taskCategories)
      .set(taskCategoryToRow(record))
      .where(eq(taskCategories.id, record.id))
      .returning();
    return row ? rowToTaskCategory(row) : null;
  }

  async remove(id: Id): Promise<TaskCategory | null> {
    const [row] = await this.db.delete(taskCategories).where(eq(taskCategories.id, id)).returning();
    return row ? rowToTaskCategory(row) : null;
  }

  async hasReference(field: keyof typeof TASK_CATEGORY_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, taskCategories, TASK_CATEGORY_REFERENCES[field], id);
  }
}

export class PgTaskTemplateRepository implements RecordRepository<TaskTemplate, 'residenceId' | 'taskCategoryId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<TaskTemplate | null> {
    const [row] = await this.db.select().from(taskTemplates).where(eq(taskTemplates.id, id));
    return row ? rowToTaskTemplate(row) : null;
  }

  async getForUpdate(id: Id): Promise<TaskTemplate | null> {
    const [row] = await this.db
      .select()
      .from(taskTemplates)
      .where(eq(taskTemplates.id, id))
      .for('update');
    return row ? rowToTaskTemplate(row) : null;
  }

  async insert(record: TaskTemplate): Promise<TaskTemplate> {
    const [row] = await this.db
      .insert(taskTemplates)
      .values(taskTemplateToRow(record))
      .returning();
    return rowToTaskTemplate(row);
  }

  async update(record: TaskTemplate): Promise<TaskTemplate | null> {
    const [row] = await this.db
      .update(taskTemplates)
      .set(taskTemplateToRow(record))
      .where(eq(taskTemplates.id, record.id))
      .returning();
    return row ? rowToTaskTemplate(row) : null;
  }

  async remove(id: Id): Promise<TaskTemplate | null> {
    const [row] = await this.db.delete(taskTemplates).where(eq(taskTemplates.id, id)).returning();
    return row ? rowToTaskTemplate(row) : null;
  }

  async hasReference(field: keyof typeof TASK_TEMPLATE_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, taskTemplates, TASK_TEMPLATE_REFERENCES[field], id);
  }
}

export class PgTaskApplicationRepository implements RecordRepository<TaskApplication, 'residenceId' | 'residentId' | 'taskTemplateId'> {
  constructor(private db: Executor) {}

  async get(id: Id): Promise<TaskApplication | null> {
    const [row] = await this.db
      .select()
      .from(taskApplications)
      .where(eq(taskApplications.id, id));
    return row ? rowToTaskApplication(row) : null;
  }

  async getForUpdate(id: Id): Promise<TaskApplication | null> {
    const [row] = await this.db
      .select()
      .from(taskApplications)
      .where(eq(taskApplications.id, id))
      .for('update');
    return row ? rowToTaskApplication(row) : null;
  }

  async insert(record: TaskApplication): Promise<TaskApplication> {
    const [row] = await this.db
      .insert(taskApplications)
      .values(taskApplicationToRow(record))
      .returning();
    return rowToTaskApplication(row);
  }

  async update(record: TaskApplication): Promise<TaskApplication | null> {
    const [row] = await this.db
      .update(taskApplications)
      .set(taskApplicationToRow(record))
      .where(eq(taskApplications.id, record.id))
      .returning();
    return row ? rowToTaskApplication(row) : null;
  }

  async remove(id: Id): Promise<TaskApplication | null> {
    const [row] = await this.db
      .delete(taskApplications)
      .where(eq(taskApplications.id, id))
      .returning();
    return row ? rowToTaskApplication(row) : null;
  }

  async hasReference(field: keyof typeof TASK_APPLICATION_REFERENCES, id: Id): Promise<boolean> {
    return hasRowWith(this.db, taskApplications, TASK_APPLICATION_REFERENCES[field], id);
  }
}

function taskCategoryToRow(record: TaskCategory): TaskCategoryRow {
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

function rowToTaskCategory(row: TaskCategoryRow): TaskCategory {
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

function taskTemplateToRow(record: TaskTemplate): TaskTemplateRow {
  return {
    id: record.id,
    residenceId: record.residenceId,
    taskCategoryId: record.taskCategoryId,
    name: record.name,
    status1: record.status1,
    status2: record.status2,
    status3: record.status3,
    status4: record.status4,
    status5: record.status5,
    status6: record.status6,
    audioPhrase: record.audioPhrase,
    isBlock: record.isBlock,
    createdBy: record.createdBy,
    createdAt: toDate(record.createdAt),
    updatedAt: toDate(record.updatedAt),
    deletedAt: toDateOrNull(record.deletedAt),
  };
}

function rowToTaskTemplate(row: TaskTemplateRow): TaskTemplate {
  return {
    id: row.id,
    residenceId: row.residenceId,
    taskCategoryId: row.taskCategoryId,
    name: row.name,
    status1: row.status1,
    status2: row.status2,
    status3: row.status3,
    status4: row.status4,
    status5: row.status5,
    status6: row.status6,
    audioPhrase: row.audioPhrase,
    isBlock: row.isBlock,
    createdBy: row.createdBy,
    createdAt: toIso(row.createdAt),
    updatedAt: toIso(row.updatedAt),
    deletedAt: toIsoOrNull(row.deletedAt),
  };
}

function taskApplicationToRow(record: TaskApplication): TaskApplicationRow {
  return {
    id: record.id,
    residenceId: record.residenceId,
    residentId: record.residentId,
    taskTemplateId: record.taskTemplateId,
    appliedBy: record.appliedBy,
    appliedAt: toDate(record.appliedAt),
    selectedStatusIndex: record.selectedStatusIndex,
    selectedStatusText: record.selectedStatusText,
    createdAt: toDate(record.createdAt),
    updatedAt: toDate(record.updatedAt),
    deletedAt: toDateOrNull(record.deletedAt),
  };
}

function rowToTaskApplication(row: TaskApplicationRow): TaskApplication {
  return {
    id: row.id,
    residenceId: row.residenceId,
    residentId: row.residentId,
    taskTemplateId: row.taskTemplateId,
    appliedBy: row.appliedBy,
    appliedAt: toIso(row.appliedAt),
    selectedStatusIndex: row.selectedStatusIndex,
    selectedStatusText: row.selectedStatusText,
    createdAt: toIso(row.createdAt),
    updatedAt: toIso(row.updatedAt),
    deletedAt: toIsoOrNull(row.deletedAt),
  };
}
