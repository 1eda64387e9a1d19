/**
 * @module knowledge
 * Fault-code knowledge base and part scoring subsystem.
 */

export type {
  CandidateEntry,
  FaultCodeRule,
  KeywordHint,
  KnowledgeBase,
  Suggestion,
} from './types.js';

export {
  KnowledgeBaseSchema,
  CandidateEntrySchema,
  FaultCodeRuleSchema,
  KeywordHintSchema,
  createKnowledgeBase,
  loadKnowledgeBase,
} from './knowledge-base.js';
export { BUILT_IN_KNOWLEDGE_BASE } from './built-in-knowledge.js';
export {
  FAULT_CODE_PREFIX_LENGTH,
  normalizeFaultCode,
  clampScore,
  roundLikelihood,
  matchesHintPart,
} from './normalizer.js';
export { ScoringEngine, MAX_SUGGESTIONS, diagnose } from './scoring-engine.js';
