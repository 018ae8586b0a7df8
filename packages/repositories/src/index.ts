// @careledger/repositories
// The versioned entity store: repository contracts plus Postgres and
// in-memory implementations.
//
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Uniqueness rules (bed occupancy, device MAC, ...) are enforced by the
//   store on write and surface as ledger errors

export * from './interfaces/index.js';
export * as postgres from './postgres/index.js';
export * as inMemory from './in-memory/index.js';
