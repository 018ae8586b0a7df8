// Product constants
//
// The tracked entity set, the task status slots and the measurement field
// groups are product decisions rather than structural ones. Guards and the
// history recorder read them from here instead of branching on names.

import type { EntityType, TaskTemplate } from './types/records.js';

export const RESIDENT_STATUSES = ['active', 'discharged', 'deceased'] as const;
export type ResidentStatus = (typeof RESIDENT_STATUSES)[number];

export const DEVICE_TYPES = ['blood_pressure', 'pulse_oximeter', 'scale', 'thermometer'] as const;
export type DeviceType = (typeof DEVICE_TYPES)[number];

export const MEASUREMENT_TYPES = ['bp', 'spo2', 'weight', 'temperature'] as const;
export type MeasurementType = (typeof MEASUREMENT_TYPES)[number];

export const MEASUREMENT_SOURCES = ['device', 'voice', 'manual'] as const;
export type MeasurementSource = (typeof MEASUREMENT_SOURCES)[number];

// ============================================================================
// History tracking
// ============================================================================

/**
 * Entity types whose every change is captured in a per-entity history ledger.
 * Other types are only timestamp-guarded.
 */
export const TRACKED_ENTITY_TYPES = [
  'resident',
  'device',
  'measurement',
  'task_application',
] as const satisfies readonly EntityType[];

export type TrackedEntityType = (typeof TRACKED_ENTITY_TYPES)[number];

export function isTrackedEntityType(entityType: EntityType): entityType is TrackedEntityType {
  return TRACKED_ENTITY_TYPES.some((tracked) => tracked === entityType);
}

// ============================================================================
// Task status slots
// ============================================================================

/**
 * Template columns addressed by `selectedStatusIndex`, in order.
 * Index 1 selects the first entry.
 */
export const TASK_STATUS_SLOTS = [
  'status1',
  'status2',
  'status3',
  'status4',
  'status5',
  'status6',
] as const satisfies readonly (keyof TaskTemplate)[];

export type TaskStatusSlot = (typeof TASK_STATUS_SLOTS)[number];

// ============================================================================
// Measurement field groups
// ============================================================================

export const MEASUREMENT_VALUE_FIELDS = [
  'systolic',
  'diastolic',
  'pulseBpm',
  'spo2',
  'weightKg',
  'temperatureC',
] as const;

export type MeasurementValueField = (typeof MEASUREMENT_VALUE_FIELDS)[number];

export type MeasurementFieldGroup = {
  /** Must be non-null */
  required: readonly MeasurementValueField[];

  /** May be null or set; every field outside required and optional must be null */
  optional: readonly MeasurementValueField[];
};

export const MEASUREMENT_FIELD_GROUPS: Record<MeasurementType, MeasurementFieldGroup> = {
  bp: { required: ['systolic', 'diastolic'], optional: ['pulseBpm'] },
  spo2: { required: ['spo2'], optional: ['pulseBpm'] },
  weight: { required: ['weightKg'], optional: [] },
  temperature: { required: ['temperatureC'], optional: [] },
};
