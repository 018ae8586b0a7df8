// Re-export all schema tables
export * from './enums.js';
export * from './residences.js';
export * from './locations.js';
export * from './residents.js';
export * from './devices.js';
export * from './measurements.js';
export * from './tasks.js';
export * from './tags.js';
export * from './history.js';
export * from './event-log.js';
