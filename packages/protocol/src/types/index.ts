// Re-export all protocol types

export * from './common.js';
export * from './records.js';
export * from './audit.js';
export * from './mutations.js';
