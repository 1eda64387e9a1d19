/**
 * @module knowledge/built-in-knowledge
 * Default fault-code table, keyword hints and fallback seeds.
 */

import { createKnowledgeBase } from './knowledge-base.js';
import type { KnowledgeBase } from './types.js';

/** Prefixes are 4 characters so that e.g. P0300-P0309 share one family. */
export const BUILT_IN_KNOWLEDGE_BASE: KnowledgeBase = createKnowledgeBase({
  faultCodeRules: [
    {
      prefix: 'P030',
      candidates: [
        { part: 'Spark Plugs', base: 0.6, reason: 'Engine misfire detected' },
        { part: 'Ignition Coils', base: 0.5, reason: 'Weak/no spark' },
        { part: 'Fuel Injectors', base: 0.35, reason: 'Fuel delivery issues' },
        { part: 'Vacuum Leak', base: 0.25, reason: 'Unmetered air causing lean' },
      ],
    },
    {
      prefix: 'P017',
      candidates: [
        { part: 'O2 Sensor (Upstream)', base: 0.5, reason: 'Fuel trim lean' },
        { part: 'MAF Sensor', base: 0.45, reason: 'Airflow reading incorrect' },
        { part: 'Vacuum Leak', base: 0.4, reason: 'Extra air entering intake' },
        { part: 'Fuel Pump/Filter', base: 0.3, reason: 'Low fuel pressure' },
      ],
    },
    {
      prefix: 'P042',
      candidates: [
        { part: 'Catalytic Converter', base: 0.6, reason: 'Efficiency below threshold' },
        { part: 'O2 Sensor (Downstream)', base: 0.4, reason: 'Sensor aging or slow' },
        { part: 'Exhaust Leak', base: 0.25, reason: 'False oxygen readings' },
      ],
    },
    {
      prefix: 'P012',
      candidates: [
        { part: 'Throttle Position Sensor', base: 0.5, reason: 'TPS circuit issues' },
        { part: 'Wiring/Connector', base: 0.35, reason: 'Signal interruption' },
      ],
    },
  ],
  keywordHints: [
    { keywords: ['rough idle', 'shakes', 'vibration'], part: 'Spark Plugs', boost: 0.15 },
    { keywords: ['stalls', 'dies', 'no start'], part: 'Fuel Pump', boost: 0.2 },
    { keywords: ['hesitation', 'lag', 'surge'], part: 'MAF Sensor', boost: 0.12 },
    { keywords: ['rotten egg', 'sulfur'], part: 'Catalytic Converter', boost: 0.18 },
    { keywords: ['whistle', 'hiss'], part: 'Vacuum Leak', boost: 0.15 },
  ],
  fallbackCandidates: [
    { part: 'Battery', base: 0.25, reason: 'Common electrical issue' },
    { part: 'Alternator', base: 0.2, reason: 'Charging system faults' },
    { part: 'Spark Plugs', base: 0.18, reason: 'Wear item, causes misfires' },
  ],
});
