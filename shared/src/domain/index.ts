/**
 * Domain Layer
 *
 * Catalog merge, projection and diff logic plus the sync item lifecycle.
 * Pure functions only; the server owns all I/O.
 */

export * from './catalog/index.js';
export * from './sync/index.js';
