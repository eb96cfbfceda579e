/**
 * @catalog-sync/shared - Types, schemas and pure domain logic
 *
 * Everything here is free of I/O so the server and the tests can use it
 * without a database or the remote platform.
 */

// Entity types (type-only export for pure interfaces)
export type * from './types/index.js';

export * from './schemas/index.js';
export * from './errors/index.js';
export * from './domain/index.js';
