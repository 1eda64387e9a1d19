/**
 * @module diagnosis/diagnosis-service
 * DiagnosisService: scores a request, then records it in the document store.
 * Persistence failures degrade to a null id or an empty history.
 */

import type { ScoringEngine } from '../knowledge/scoring-engine.js';
import type { Suggestion } from '../knowledge/types.js';
import type { DiagnosisRecord, DocumentFilter, DocumentStore, StoredDocument } from '../store/types.js';
import { errorMessage } from '../errors.js';
import type { DiagnoseRequest } from './schemas.js';

/** Collection holding one document per diagnose call. */
export const DIAGNOSIS_COLLECTION = 'carissue';

export const DEFAULT_HISTORY_LIMIT = 20;

export interface DiagnoseResponse {
  suggestions: Suggestion[];
  id: string | null;
}

export interface HistoryQuery {
  limit?: number;
  filter?: DocumentFilter;
}

export interface HistoryResponse {
  items: StoredDocument[];
}

/** Minimal logger surface; Fastify's pino logger and `console` both satisfy it. */
export interface ServiceLogger {
  warn(msg: string): void;
}

export class DiagnosisService {
  constructor(
    private readonly engine: ScoringEngine,
    private readonly store: DocumentStore,
    private readonly logger: ServiceLogger = console,
  ) {}

  diagnose(request: DiagnoseRequest): DiagnoseResponse {
    const faultCode = request.fault_code ?? null;
    const suggestions = this.engine.diagnose(faultCode, request.description);

    const record: DiagnosisRecord = {
      name: request.name,
      model: request.model,
      fault_code: faultCode,
      description: request.description,
      suggestions,
    };

    let id: string | null;
    try {
      id = this.store.createDocument(DIAGNOSIS_COLLECTION, record);
    } catch (err) {
      this.logger.warn(`[diagnose] Failed to persist diagnosis: ${errorMessage(err)}`);
      id = null;
    }

    return { suggestions, id };
  }

  history(query: HistoryQuery = {}): HistoryResponse {
    try {
      const items = this.store.getDocuments(
        DIAGNOSIS_COLLECTION,
        query.filter ?? {},
        query.limit ?? DEFAULT_HISTORY_LIMIT,
      );
      return { items: items.map((item) => ({ ...item, _id: String(item._id) })) };
    } catch (err) {
      this.logger.warn(`[history] Failed to read diagnosis history: ${errorMessage(err)}`);
      return { items: [] };
    }
  }
}
