/**
 * @module store/document-store
 * SQLiteDocumentStore, NoopDocumentStore and the createDocumentStore factory.
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import path from 'node:path';
import fs from 'node:fs';
import { AutoDiagError, errorMessage } from '../errors.js';
import type {
  DatabaseConfig,
  DocumentData,
  DocumentFilter,
  DocumentStore,
  StoreStatus,
  StoredDocument,
} from './types.js';
import { applyMigrations } from './migrations.js';
import { MemoryDocumentStore } from './memory-document-store.js';

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =====================================================================
// SQLiteDocumentStore
// =====================================================================

export class SQLiteDocumentStore implements DocumentStore {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private readonly databaseName: string | null = null,
  ) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');

    applyMigrations(this.db);
  }

  createDocument(collection: string, data: DocumentData): string {
    const id = randomUUID();
    const now = new Date().toISOString();
    this.db.prepare(
      'INSERT INTO documents (id, collection, data, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
    ).run(id, collection, JSON.stringify(data), now, now);
    return id;
  }

  getDocuments(collection: string, filter: DocumentFilter, limit: number): StoredDocument[] {
    const conditions: string[] = ['collection = ?'];
    const params: unknown[] = [collection];

    for (const [field, value] of Object.entries(filter)) {
      if (!FIELD_NAME.test(field)) {
        throw new AutoDiagError('PERSISTENCE_FAILED', `Invalid filter field: ${field}`, { field });
      }
      if (value === null) {
        conditions.push('json_extract(data, ?) IS NULL');
        params.push(`$.${field}`);
      } else {
        conditions.push('json_extract(data, ?) = ?');
        params.push(`$.${field}`, typeof value === 'boolean' ? Number(value) : value);
      }
    }

    const rows = this.db.prepare(
      `SELECT * FROM documents WHERE ${conditions.join(' AND ')} ORDER BY created_at DESC, rowid DESC LIMIT ?`,
    ).all(...params, limit) as DocumentRow[];

    return rows.map(mapDocumentRow);
  }

  describe(): StoreStatus {
    const rows = this.db.prepare(
      'SELECT DISTINCT collection FROM documents ORDER BY collection ASC',
    ).all() as Array<{ collection: string }>;
    return {
      connected: true,
      databaseName: this.databaseName,
      collections: rows.map((r) => r.collection),
    };
  }

  close(): void {
    this.db.close();
  }
}

// =====================================================================
// NoopDocumentStore: used when no database is configured
// =====================================================================

export class NoopDocumentStore implements DocumentStore {
  createDocument(): string {
    throw new AutoDiagError('DATABASE_UNAVAILABLE', 'Database not available');
  }
  getDocuments(): StoredDocument[] {
    throw new AutoDiagError('DATABASE_UNAVAILABLE', 'Database not available');
  }
  describe(): StoreStatus {
    return { connected: false, databaseName: null, collections: [] };
  }
  close(): void { /* no-op */ }
}

// =====================================================================
// Factory
// =====================================================================

/**
 * Create a DocumentStore based on config.
 * - Returns NoopDocumentStore for `storage: 'none'`
 * - Returns MemoryDocumentStore for `storage: 'memory'`
 * - Returns SQLiteDocumentStore for `storage: 'sqlite'`, with fallback to MemoryDocumentStore on failure
 */
export function createDocumentStore(config: DatabaseConfig, baseDir: string): DocumentStore {
  if (config.storage === 'none') {
    return new NoopDocumentStore();
  }

  if (config.storage === 'memory') {
    return new MemoryDocumentStore(config.name ?? null);
  }

  const dbPath = !config.path
    ? path.resolve(baseDir, '.autodiag', 'autodiag.db')
    : config.path === ':memory:'
      ? ':memory:'
      : path.resolve(baseDir, config.path);

  try {
    return new SQLiteDocumentStore(dbPath, config.name ?? null);
  } catch (err) {
    console.warn(
      `[store] Failed to open SQLite at ${dbPath}, falling back to memory store: ${errorMessage(err)}`,
    );
    return new MemoryDocumentStore(config.name ?? null);
  }
}

// =====================================================================
// Row Mapping Helpers
// =====================================================================

interface DocumentRow {
  id: string;
  collection: string;
  data: string;
  created_at: string;
  updated_at: string;
}

function mapDocumentRow(row: DocumentRow): StoredDocument {
  const data: unknown = JSON.parse(row.data);
  const fields: DocumentData = data !== null && typeof data === 'object' && !Array.isArray(data)
    ? { ...data }
    : {};
  return {
    ...fields,
    _id: row.id,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}
