// Record validation
//
// Zod schemas for the caller-controlled part of each record. The ledger parses
// every candidate row with these before guards run, so guards can rely on
// enum values, bounds and nullability.

import { z } from 'zod';
import type { EntityType, NewRecord } from '../types/records.js';
import {
  DEVICE_TYPES,
  MEASUREMENT_SOURCES,
  MEASUREMENT_TYPES,
  RESIDENT_STATUSES,
  TASK_STATUS_SLOTS,
} from '../constants.js';

const id = z.string().min(1);
const timestamp = z.string().datetime({ offset: true });
const nullableText = z.string().nullable().default(null);
const nullableTimestamp = timestamp.nullable().default(null);
const name = z.string().trim().min(1);

const residence = z.object({
  name,
  address: nullableText,
  phoneEncrypted: nullableText,
  emailEncrypted: nullableText,
  createdBy: id.nullable().default(null),
  deletedAt: nullableTimestamp,
});

const floor = z.object({
  residenceId: id,
  name,
  createdBy: id.nullable().default(null),
  deletedAt: nullableTimestamp,
});

const room = floor.extend({ floorId: id });

const bed = floor.extend({ roomId: id });

const resident = z.object({
  residenceId: id,
  fullName: name,
  birthDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD'),
  sex: nullableText,
  comments: nullableText,
  status: z.enum(RESIDENT_STATUSES).default('active'),
  statusChangedAt: nullableTimestamp,
  bedId: id.nullable().default(null),
  createdBy: id.nullable().default(null),
  deletedAt: nullableTimestamp,
});

const device = z.object({
  residenceId: id,
  type: z.enum(DEVICE_TYPES),
  name,
  mac: z.string().trim().min(1),
  batteryPercent: z.number().int().min(0).max(100).nullable().default(null),
  createdBy: id.nullable().default(null),
  deletedAt: nullableTimestamp,
});

const reading = z.number().int().nullable().default(null);

const measurement = z.object({
  residenceId: id,
  residentId: id,
  recordedBy: id,
  source: z.enum(MEASUREMENT_SOURCES),
  deviceId: id.nullable().default(null),
  type: z.enum(MEASUREMENT_TYPES),
  systolic: reading,
  diastolic: reading,
  pulseBpm: reading,
  spo2: reading,
  weightKg: z.number().positive().nullable().default(null),
  temperatureC: z.number().nullable().default(null),
  takenAt: timestamp,
  deletedAt: nullableTimestamp,
});

const taskCategory = floor;

const taskTemplate = z.object({
  residenceId: id,
  taskCategoryId: id,
  name,
  status1: nullableText,
  status2: nullableText,
  status3: nullableText,
  status4: nullableText,
  status5: nullableText,
  status6: nullableText,
  audioPhrase: nullableText,
  isBlock: z.boolean().nullable().default(null),
  createdBy: id.nullable().default(null),
  deletedAt: nullableTimestamp,
});

// The index is range-checked by the task status guard so that it can fail
// with its own error kind; here it only has to be an integer.
const taskApplication = z.object({
  residenceId: id,
  residentId: id,
  taskTemplateId: id,
  appliedBy: id,
  appliedAt: timestamp,
  selectedStatusIndex: z.number().int().nullable().default(null),
  selectedStatusText: nullableText,
  deletedAt: nullableTimestamp,
});

const tag = z.object({
  name,
  createdBy: id.nullable().default(null),
  deletedAt: nullableTimestamp,
});

const residentTag = z.object({
  residenceId: id,
  residentId: id,
  tagId: id,
  assignedBy: id,
  assignedAt: timestamp,
});

type RecordSchema<K extends EntityType> = z.ZodType<NewRecord<K>, z.ZodTypeDef, unknown>;

export const RECORD_SCHEMAS: { [K in EntityType]: RecordSchema<K> } = {
  residence,
  floor,
  room,
  bed,
  resident,
  device,
  measurement,
  task_category: taskCategory,
  task_template: taskTemplate,
  task_application: taskApplication,
  tag,
  resident_tag: residentTag,
};

/**
 * Number of status labels a template can hold.
 */
export const TASK_STATUS_SLOT_COUNT = TASK_STATUS_SLOTS.length;
