/**
 * @module knowledge/types
 * Type definitions for the fault-code knowledge base and scoring engine.
 */

/** A part the knowledge base proposes, with its base score. */
export interface CandidateEntry {
  part: string;
  /** Base score; intended range [0, 1] but not enforced until clamping. */
  base: number;
  reason: string;
}

/** Maps a fault-code prefix (e.g. `P030`) to its candidate parts. */
export interface FaultCodeRule {
  readonly prefix: string;
  readonly candidates: readonly CandidateEntry[];
}

/** Adds `boost` to matching candidates when any keyword occurs in the description. */
export interface KeywordHint {
  /** Lowercase substrings searched for in the lowercased description. */
  readonly keywords: readonly string[];
  /** Target part; matched on its first word, case-insensitively. */
  readonly part: string;
  readonly boost: number;
}

/** Immutable rule data consumed by the scoring engine. */
export interface KnowledgeBase {
  /** Ordered; candidates of every applicable rule are seeded in this order. */
  readonly faultCodeRules: readonly FaultCodeRule[];
  readonly keywordHints: readonly KeywordHint[];
  /** Seeded when no fault-code rule applies. */
  readonly fallbackCandidates: readonly CandidateEntry[];
}

/** A ranked part suggestion returned to the caller. */
export interface Suggestion {
  part: string;
  /** Normalized score in [0, 1], rounded to 3 decimals. */
  likelihood: number;
  reason: string;
}
