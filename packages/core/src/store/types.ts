/**
 * @module store/types
 * Type definitions for document persistence.
 */

import type { Suggestion } from '../knowledge/types.js';

/** Arbitrary JSON-serializable document payload. */
export type DocumentData = Record<string, unknown>;

/** Top-level field equality; an empty filter matches every document. */
export type DocumentFilter = Record<string, string | number | boolean | null>;

/** A document as read back from the store. */
export type StoredDocument<T extends DocumentData = DocumentData> = T & {
  _id: string;
  created_at: string;
  updated_at: string;
};

/** Diagnosis request/response pair persisted once per diagnose call. */
export interface DiagnosisRecord extends DocumentData {
  name: string;
  model: string;
  fault_code: string | null;
  description: string;
  suggestions: Suggestion[];
}

/** Snapshot reported by the status endpoint. */
export interface StoreStatus {
  connected: boolean;
  databaseName: string | null;
  collections: string[];
}

/** Storage backend selection. */
export interface DatabaseConfig {
  /** `none` means no database is configured; writes and reads fail. */
  storage: 'sqlite' | 'memory' | 'none';
  /** SQLite file path (relative paths resolve against the config directory). */
  path?: string;
  name?: string;
}

/** Interface for persisting and querying documents by collection. */
export interface DocumentStore {
  createDocument(collection: string, data: DocumentData): string;
  getDocuments(collection: string, filter: DocumentFilter, limit: number): StoredDocument[];
  describe(): StoreStatus;
  close(): void;
}
