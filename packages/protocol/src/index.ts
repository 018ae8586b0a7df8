// @careledger/protocol
// Record, audit and mutation types shared by the store and the runtime.

export * from './types/index.js';
export * from './constants.js';
export * from './errors.js';
export { RECORD_SCHEMAS, TASK_STATUS_SLOT_COUNT } from './validation/records.js';
