/**
 * @module store/memory-document-store
 * In-memory implementation of DocumentStore for tests and `storage: memory`.
 */

import { randomUUID } from 'node:crypto';
import type {
  DocumentData,
  DocumentFilter,
  DocumentStore,
  StoreStatus,
  StoredDocument,
} from './types.js';

export class MemoryDocumentStore implements DocumentStore {
  private collections = new Map<string, StoredDocument[]>();

  constructor(private readonly databaseName: string | null = null) {}

  createDocument(collection: string, data: DocumentData): string {
    const id = randomUUID();
    const now = new Date().toISOString();
    const docs = this.collections.get(collection) ?? [];
    docs.push({ ...structuredClone(data), _id: id, created_at: now, updated_at: now });
    this.collections.set(collection, docs);
    return id;
  }

  getDocuments(collection: string, filter: DocumentFilter, limit: number): StoredDocument[] {
    const docs = this.collections.get(collection) ?? [];
    const conditions = Object.entries(filter);
    return docs
      .filter((doc) => conditions.every(([field, value]) => (doc[field] ?? null) === value))
      .reverse()
      .slice(0, limit)
      .map((doc) => structuredClone(doc));
  }

  describe(): StoreStatus {
    return {
      connected: true,
      databaseName: this.databaseName,
      collections: [...this.collections.keys()].sort(),
    };
  }

  close(): void {
    this.collections.clear();
  }
}
