/**
 * @module knowledge/scoring-engine
 * ScoringEngine: orchestrates normalize → seed → boost → normalize → rank.
 */

import type { CandidateEntry, KnowledgeBase, Suggestion } from './types.js';
import { BUILT_IN_KNOWLEDGE_BASE } from './built-in-knowledge.js';
import {
  normalizeFaultCode,
  clampScore,
  roundLikelihood,
  matchesHintPart,
} from './normalizer.js';

/** At most this many suggestions are returned per diagnosis. */
export const MAX_SUGGESTIONS = 5;

export class ScoringEngine {
  constructor(private readonly knowledge: KnowledgeBase = BUILT_IN_KNOWLEDGE_BASE) {}

  /**
   * Rank probable failing parts for a fault code and free-text description.
   * 1. Normalize fault code → 4-character prefix
   * 2. Seed candidates from every rule the prefix starts with
   * 3. Fallback: seed the default candidates when nothing matched
   * 4. Apply keyword boosts found in the description
   * 5. Clamp to [0, 1] and normalize by the total
   * 6. Annotate reasons with the matched prefix
   * 7. Sort descending (stable) and keep the top 5
   *
   * Duplicate part names from different rules are kept as separate entries.
   */
  diagnose(faultCode: string | null | undefined, description: string): Suggestion[] {
    const prefix = normalizeFaultCode(faultCode);

    let candidates = prefix === null ? [] : this.seed(prefix);
    if (candidates.length === 0) {
      candidates = this.knowledge.fallbackCandidates.map(copyCandidate);
    }

    this.applyKeywordBoosts(candidates, description);

    let total = candidates.reduce((sum, c) => sum + clampScore(c.base), 0);
    if (total === 0) total = 1.0;

    const suffix = prefix === null ? '' : ` (matched ${prefix})`;
    const ranked: Suggestion[] = candidates.map((c) => ({
      part: c.part,
      likelihood: roundLikelihood(clampScore(c.base) / total),
      reason: c.reason + suffix,
    }));

    ranked.sort((a, b) => b.likelihood - a.likelihood);
    return ranked.slice(0, MAX_SUGGESTIONS);
  }

  private seed(prefix: string): CandidateEntry[] {
    const seeded: CandidateEntry[] = [];
    for (const rule of this.knowledge.faultCodeRules) {
      if (prefix.startsWith(rule.prefix)) {
        seeded.push(...rule.candidates.map(copyCandidate));
      }
    }
    return seeded;
  }

  private applyKeywordBoosts(candidates: CandidateEntry[], description: string): void {
    const desc = description.toLowerCase();
    if (desc.length === 0) return;

    for (const hint of this.knowledge.keywordHints) {
      if (!hint.keywords.some((k) => desc.includes(k))) continue;
      for (const candidate of candidates) {
        if (matchesHintPart(candidate.part, hint.part)) {
          candidate.base += hint.boost;
        }
      }
    }
  }
}

function copyCandidate(entry: CandidateEntry): CandidateEntry {
  return { part: entry.part, base: entry.base, reason: entry.reason };
}

const defaultEngine = new ScoringEngine();

/** Score with the built-in knowledge base. */
export function diagnose(faultCode: string | null | undefined, description: string): Suggestion[] {
  return defaultEngine.diagnose(faultCode, description);
}
