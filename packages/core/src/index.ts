// autodiag-core - scoring engine, knowledge base and persistence

// Errors
export {
  AutoDiagError,
  ERROR_METADATA,
  createStructuredError,
  errorMessage,
} from './errors.js';
export type {
  AutoDiagErrorCode,
  ErrorCategory,
  ErrorSeverity,
  StructuredError,
} from './errors.js';

// Config Loader
export {
  loadConfig,
  AutoDiagConfigSchema,
  ServerSchema,
  DatabaseSchema,
  KnowledgeSchema,
  CONFIG_FILE_NAMES,
} from './config-loader.js';
export type { AutoDiagConfig, LoadedConfig } from './config-loader.js';

// Knowledge Base & Scoring
export * from './knowledge/index.js';

// Document Store
export * from './store/index.js';

// Diagnosis Service
export * from './diagnosis/index.js';
