import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DiagnosisService, DIAGNOSIS_COLLECTION } from '../../../src/diagnosis/diagnosis-service.js';
import { DiagnoseRequestSchema } from '../../../src/diagnosis/schemas.js';
import { ScoringEngine } from '../../../src/knowledge/scoring-engine.js';
import { MemoryDocumentStore } from '../../../src/store/memory-document-store.js';
import { NoopDocumentStore } from '../../../src/store/document-store.js';
import type { DocumentStore } from '../../../src/store/types.js';

function makeLogger() {
  return { warn: vi.fn<(msg: string) => void>() };
}

describe('DiagnosisService', () => {
  let store: MemoryDocumentStore;
  let logger: ReturnType<typeof makeLogger>;
  let service: DiagnosisService;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    logger = makeLogger();
    service = new DiagnosisService(new ScoringEngine(), store, logger);
  });

  describe('diagnose', () => {
    it('returns suggestions and the id of the stored record', () => {
      const result = service.diagnose({
        name: 'Toyota',
        model: 'Camry 2015',
        fault_code: null,
        description: 'car makes noise',
      });

      expect(result.suggestions.map((s) => s.part)).toEqual(['Battery', 'Alternator', 'Spark Plugs']);
      expect(result.id).toEqual(expect.any(String));

      const [doc] = store.getDocuments(DIAGNOSIS_COLLECTION, {}, 1);
      expect(doc).toMatchObject({
        _id: result.id,
        name: 'Toyota',
        model: 'Camry 2015',
        fault_code: null,
        description: 'car makes noise',
        suggestions: result.suggestions,
      });
    });

    it('stores a missing fault code as null', () => {
      service.diagnose({ name: 'Honda', model: 'Civic 2012', description: 'dies at idle' });
      expect(store.getDocuments(DIAGNOSIS_COLLECTION, {}, 1)[0]!['fault_code']).toBeNull();
    });

    it('returns suggestions with a null id when persistence fails', () => {
      const failing: DocumentStore = {
        createDocument: () => { throw new Error('disk full'); },
        getDocuments: () => [],
        describe: () => ({ connected: true, databaseName: null, collections: [] }),
        close: () => {},
      };
      const degraded = new DiagnosisService(new ScoringEngine(), failing, logger);

      const result = degraded.diagnose({
        name: 'Ford',
        model: 'Focus 2011',
        fault_code: 'P0301',
        description: 'rough idle',
      });

      expect(result.id).toBeNull();
      expect(result.suggestions[0]).toMatchObject({ part: 'Spark Plugs', reason: 'Engine misfire detected (matched P030)' });
      expect(logger.warn).toHaveBeenCalledWith('[diagnose] Failed to persist diagnosis: disk full');
    });

    it('returns a null id when no database is configured', () => {
      const degraded = new DiagnosisService(new ScoringEngine(), new NoopDocumentStore(), logger);
      const result = degraded.diagnose({ name: 'Kia', model: 'Rio', description: '' });
      expect(result.id).toBeNull();
      expect(result.suggestions).toHaveLength(3);
    });
  });

  describe('history', () => {
    it('returns stored diagnoses newest first with string ids', () => {
      service.diagnose({ name: 'Toyota', model: 'Camry', description: 'noise' });
      service.diagnose({ name: 'Honda', model: 'Accord', description: 'hiss' });

      const { items } = service.history();
      expect(items.map((i) => i['name'])).toEqual(['Honda', 'Toyota']);
      expect(items.every((i) => typeof i._id === 'string')).toBe(true);
    });

    it('applies limit and filter', () => {
      for (const name of ['Toyota', 'Honda', 'Toyota', 'Toyota']) {
        service.diagnose({ name, model: 'X', description: '' });
      }

      expect(service.history({ limit: 2 }).items).toHaveLength(2);
      expect(service.history({ filter: { name: 'Toyota' } }).items).toHaveLength(3);
    });

    it('returns an empty list when the store fails', () => {
      const degraded = new DiagnosisService(new ScoringEngine(), new NoopDocumentStore(), logger);
      expect(degraded.history()).toEqual({ items: [] });
      expect(logger.warn).toHaveBeenCalledWith('[history] Failed to read diagnosis history: Database not available');
    });
  });
});

describe('DiagnoseRequestSchema', () => {
  it('accepts a request without a fault code', () => {
    const parsed = DiagnoseRequestSchema.safeParse({ name: 'Toyota', model: 'Camry 2015', description: 'noise' });
    expect(parsed.success).toBe(true);
  });

  it('accepts a null fault code', () => {
    const parsed = DiagnoseRequestSchema.safeParse({ name: 'Toyota', model: 'Camry', fault_code: null, description: '' });
    expect(parsed.success).toBe(true);
  });

  it('rejects missing required fields', () => {
    const parsed = DiagnoseRequestSchema.safeParse({ name: 'Toyota', fault_code: 'P0300' });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues.map((i) => i.path.join('.')).sort()).toEqual(['description', 'model']);
    }
  });

  it('rejects a non-string fault code', () => {
    const parsed = DiagnoseRequestSchema.safeParse({ name: 'A', model: 'B', fault_code: 300, description: 'c' });
    expect(parsed.success).toBe(false);
  });
});
