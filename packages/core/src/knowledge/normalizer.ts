/**
 * @module knowledge/normalizer
 * Input normalization and score arithmetic shared by the scoring engine.
 */

/** Fault-code families are identified by their first 4 characters. */
export const FAULT_CODE_PREFIX_LENGTH = 4;

/**
 * Trim, uppercase and cut a fault code down to its family prefix.
 * Returns null for absent, empty or whitespace-only codes.
 */
export function normalizeFaultCode(faultCode: string | null | undefined): string | null {
  if (!faultCode) return null;
  const clean = faultCode.trim().toUpperCase();
  const prefix = clean.slice(0, FAULT_CODE_PREFIX_LENGTH);
  return prefix.length > 0 ? prefix : null;
}

export function clampScore(score: number): number {
  return Math.max(0, Math.min(1, score));
}

export function roundLikelihood(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * True when `candidatePart` starts with the first word of `hintPart`,
 * case-insensitively. "Fuel Pump" therefore also matches "Fuel Injectors".
 */
export function matchesHintPart(candidatePart: string, hintPart: string): boolean {
  const firstWord = hintPart.toLowerCase().split(/\s+/).find((w) => w.length > 0) ?? '';
  return candidatePart.toLowerCase().startsWith(firstWord);
}
