/**
 * @module store
 * Document persistence for diagnosis records.
 */

export * from './types.js';
export { SQLiteDocumentStore, NoopDocumentStore, createDocumentStore } from './document-store.js';
export { MemoryDocumentStore } from './memory-document-store.js';
export { applyMigrations, LATEST_SCHEMA_VERSION } from './migrations.js';
