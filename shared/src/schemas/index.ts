/**
 * Shared Zod schemas for catalog-sync
 */

export * from './catalogSync.js';
