// Postgres substrate: schema, connection, repositories and error translation

export { createDatabase, closeDatabase, type Database, type DatabaseConfig, type Executor } from './db.js';
export { translateStorageError } from './errors.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
