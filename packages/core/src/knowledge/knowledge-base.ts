/**
 * @module knowledge/knowledge-base
 * Validation, freezing and file loading of knowledge base tables.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import { AutoDiagError, errorMessage } from '../errors.js';
import type { KnowledgeBase } from './types.js';

// =====================================================================
// Zod Schemas
// =====================================================================

export const CandidateEntrySchema = z.object({
  part: z.string().min(1).describe('Part name'),
  base: z.number().finite().describe('Base score, intended range [0, 1]'),
  reason: z.string().describe('Human-readable explanation'),
});

export const FaultCodeRuleSchema = z.object({
  prefix: z.string().min(1).transform((p) => p.trim().toUpperCase()).describe('Fault-code prefix, e.g. P030'),
  candidates: z.array(CandidateEntrySchema).describe('Candidate parts for codes with this prefix'),
});

export const KeywordHintSchema = z.object({
  keywords: z.array(z.string().min(1).transform((k) => k.toLowerCase())).min(1).describe('Substrings searched for in the description'),
  part: z.string().trim().min(1).describe('Target part, matched on its first word'),
  boost: z.number().finite().describe('Additive score adjustment'),
});

export const KnowledgeBaseSchema = z.object({
  faultCodeRules: z.array(FaultCodeRuleSchema).default([]),
  keywordHints: z.array(KeywordHintSchema).default([]),
  fallbackCandidates: z.array(CandidateEntrySchema).default([]),
}).describe('Fault-code knowledge base');

// =====================================================================
// Construction
// =====================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw rule data and return an immutable KnowledgeBase.
 * @throws {AutoDiagError} KNOWLEDGE_BASE_INVALID listing every issue
 */
export function createKnowledgeBase(input: unknown, source = '<inline>'): KnowledgeBase {
  const result = KnowledgeBaseSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new AutoDiagError(
      'KNOWLEDGE_BASE_INVALID',
      `Knowledge base validation failed (${source}):\n${issues}`,
      { source },
    );
  }
  return deepFreeze(result.data);
}

/**
 * Load a knowledge base from a YAML or JSON file.
 * @throws {AutoDiagError} KNOWLEDGE_BASE_INVALID if the file is missing, unparsable or invalid
 */
export async function loadKnowledgeBase(filePath: string): Promise<KnowledgeBase> {
  const resolvedPath = path.resolve(filePath);

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new AutoDiagError('KNOWLEDGE_BASE_INVALID', `Knowledge base file not found: ${resolvedPath}`, { source: resolvedPath });
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new AutoDiagError(
      'KNOWLEDGE_BASE_INVALID',
      `Syntax error in ${resolvedPath}: ${errorMessage(err)}`,
      { source: resolvedPath },
    );
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object') {
    throw new AutoDiagError(
      'KNOWLEDGE_BASE_INVALID',
      `Knowledge base file is empty or not a valid object: ${resolvedPath}`,
      { source: resolvedPath },
    );
  }

  return createKnowledgeBase(parsed, resolvedPath);
}
