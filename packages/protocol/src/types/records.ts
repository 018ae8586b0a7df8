// Record types - current-state rows held by the entity store

import type { BaseRecord, CalendarDate, Id, SoftDeletable, Timestamp } from './common.js';
import type {
  DeviceType,
  MeasurementSource,
  MeasurementType,
  ResidentStatus,
} from '../constants.js';

/**
 * Tenancy root. Every other scoped record belongs to exactly one Residence.
 */
export type Residence = BaseRecord &
  SoftDeletable & {
    /** Globally unique */
    name: string;
    address: string | null;

    /** Contact fields arrive already encrypted; the ledger never decrypts them */
    phoneEncrypted: string | null;
    emailEncrypted: string | null;

    createdBy: Id | null;
  };

export type Floor = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    name: string;
    createdBy: Id | null;
  };

export type Room = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    floorId: Id;
    name: string;
    createdBy: Id | null;
  };

/**
 * A bed, uniquely named within its Room.
 */
export type Bed = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    roomId: Id;
    name: string;
    createdBy: Id | null;
  };

/**
 * A person living in a Residence.
 *
 * A bed reference is only allowed while status is 'active', and at most one
 * active, non-deleted resident may hold a given bed.
 */
export type Resident = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    fullName: string;
    birthDate: CalendarDate;
    sex: string | null;
    comments: string | null;
    status: ResidentStatus;

    /** Set when the resident leaves the 'active' status */
    statusChangedAt: Timestamp | null;

    bedId: Id | null;
    createdBy: Id | null;
  };

export type Device = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    type: DeviceType;
    name: string;

    /** Globally unique hardware address */
    mac: string;

    /** 0-100 */
    batteryPercent: number | null;

    createdBy: Id | null;
  };

/**
 * A vital-sign reading. Exactly the field group matching `type` is populated.
 */
export type Measurement = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    residentId: Id;
    recordedBy: Id;
    source: MeasurementSource;
    deviceId: Id | null;
    type: MeasurementType;
    systolic: number | null;
    diastolic: number | null;
    pulseBpm: number | null;
    spo2: number | null;
    weightKg: number | null;
    temperatureC: number | null;
    takenAt: Timestamp;
  };

export type TaskCategory = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    name: string;
    createdBy: Id | null;
  };

/**
 * A reusable task with up to six ordered status labels.
 */
export type TaskTemplate = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    taskCategoryId: Id;
    name: string;
    status1: string | null;
    status2: string | null;
    status3: string | null;
    status4: string | null;
    status5: string | null;
    status6: string | null;
    audioPhrase: string | null;
    isBlock: boolean | null;
    createdBy: Id | null;
  };

/**
 * A task carried out for a resident.
 *
 * `selectedStatusText` is copied from the template at write time and is
 * never recomputed on read.
 */
export type TaskApplication = BaseRecord &
  SoftDeletable & {
    residenceId: Id;
    residentId: Id;
    taskTemplateId: Id;
    appliedBy: Id;
    appliedAt: Timestamp;
    selectedStatusIndex: number | null;
    selectedStatusText: string | null;
  };

export type Tag = BaseRecord &
  SoftDeletable & {
    /** Globally unique */
    name: string;
    createdBy: Id | null;
  };

/**
 * Association row between a Resident and a Tag. Hard-deleted when removed.
 */
export type ResidentTag = BaseRecord & {
  residenceId: Id;
  residentId: Id;
  tagId: Id;
  assignedBy: Id;
  assignedAt: Timestamp;
};

/**
 * Every record type the entity store holds, keyed by entity type name.
 */
export type EntityRecordMap = {
  residence: Residence;
  floor: Floor;
  room: Room;
  bed: Bed;
  resident: Resident;
  device: Device;
  measurement: Measurement;
  task_category: TaskCategory;
  task_template: TaskTemplate;
  task_application: TaskApplication;
  tag: Tag;
  resident_tag: ResidentTag;
};

export type EntityType = keyof EntityRecordMap;

export type EntityRecord = EntityRecordMap[EntityType];

/**
 * Values of a record the store assigns itself.
 */
export type NewRecord<K extends EntityType> = Omit<
  EntityRecordMap[K],
  'id' | 'createdAt' | 'updatedAt'
>;
