// Invariant guards - per-entity pre-write validators

export type { Guard, GuardContext, GuardResult, DerivedEvent } from './types.js';
export { DEFAULT_GUARDS, runGuards, type GuardRegistry } from './registry.js';
export { timestampGuard } from './timestamp.js';
export { bedAssignmentGuard } from './bed-assignment.js';
export { taskStatusGuard, resolveStatusText } from './task-status.js';
export { measurementShapeGuard, assertMeasurementShape } from './measurement-shape.js';
export { ownershipGuard, referencesOf } from './ownership.js';
