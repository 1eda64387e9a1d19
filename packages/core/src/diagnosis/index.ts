/**
 * @module diagnosis
 * Request schemas and the scoring + persistence service.
 */

export { DiagnoseRequestSchema } from './schemas.js';
export type { DiagnoseRequest } from './schemas.js';
export {
  DiagnosisService,
  DIAGNOSIS_COLLECTION,
  DEFAULT_HISTORY_LIMIT,
} from './diagnosis-service.js';
export type {
  DiagnoseResponse,
  HistoryQuery,
  HistoryResponse,
  ServiceLogger,
} from './diagnosis-service.js';
