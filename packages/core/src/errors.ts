/**
 * @module errors
 * Structured error types and error code registry.
 *
 * Every failure the service reports carries a machine-readable code so the
 * HTTP layer can map it to a status without parsing free-text messages.
 */

// =====================================================================
// Error Code Union & Enums
// =====================================================================

/** All known AutoDiag error codes. */
export type AutoDiagErrorCode =
  | 'INVALID_REQUEST'
  | 'CONFIG_INVALID'
  | 'KNOWLEDGE_BASE_INVALID'
  | 'DATABASE_UNAVAILABLE'
  | 'PERSISTENCE_FAILED';

/** Broad classification of error origin. */
export type ErrorCategory = 'validation' | 'configuration' | 'persistence';

/** Impact severity guiding recovery strategy. */
export type ErrorSeverity = 'fatal' | 'recoverable';

/** Machine-readable error payload. */
export interface StructuredError {
  code: AutoDiagErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details: Record<string, unknown>;
  timestamp: number;
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  defaultSeverity: ErrorSeverity;
}

export const ERROR_METADATA: ReadonlyMap<AutoDiagErrorCode, ErrorMetadataEntry> = new Map<AutoDiagErrorCode, ErrorMetadataEntry>([
  ['INVALID_REQUEST', { category: 'validation', defaultSeverity: 'recoverable' }],
  ['CONFIG_INVALID', { category: 'configuration', defaultSeverity: 'fatal' }],
  ['KNOWLEDGE_BASE_INVALID', { category: 'configuration', defaultSeverity: 'fatal' }],
  ['DATABASE_UNAVAILABLE', { category: 'persistence', defaultSeverity: 'recoverable' }],
  ['PERSISTENCE_FAILED', { category: 'persistence', defaultSeverity: 'recoverable' }],
]);

/**
 * Create a complete StructuredError from an error code.
 * Category and severity come from the registry unless overridden.
 */
export function createStructuredError(
  code: AutoDiagErrorCode,
  message: string,
  details: Record<string, unknown> = {},
  severityOverride?: ErrorSeverity,
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  return {
    code,
    category: metadata?.category ?? 'configuration',
    severity: severityOverride ?? metadata?.defaultSeverity ?? 'fatal',
    message,
    details,
    timestamp: Date.now(),
  };
}

// =====================================================================
// AutoDiagError Class
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 *
 * Use `toJSON()` for serialization into HTTP error bodies.
 */
export class AutoDiagError extends Error {
  public readonly structuredError: StructuredError;

  constructor(
    code: AutoDiagErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    severityOverride?: ErrorSeverity,
  ) {
    super(message);
    this.name = 'AutoDiagError';
    this.structuredError = createStructuredError(code, message, details, severityOverride);
  }

  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): AutoDiagErrorCode {
    return this.structuredError.code;
  }

  get category(): ErrorCategory {
    return this.structuredError.category;
  }

  get severity(): ErrorSeverity {
    return this.structuredError.severity;
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
