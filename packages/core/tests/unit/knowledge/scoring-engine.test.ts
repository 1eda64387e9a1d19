import { describe, it, expect } from 'vitest';
import { ScoringEngine, MAX_SUGGESTIONS, diagnose } from '../../../src/knowledge/scoring-engine.js';
import { createKnowledgeBase } from '../../../src/knowledge/knowledge-base.js';
import { BUILT_IN_KNOWLEDGE_BASE } from '../../../src/knowledge/built-in-knowledge.js';
import type { Suggestion } from '../../../src/knowledge/types.js';

function parts(suggestions: Suggestion[]): string[] {
  return suggestions.map((s) => s.part);
}

function likelihoodSum(suggestions: Suggestion[]): number {
  return suggestions.reduce((sum, s) => sum + s.likelihood, 0);
}

describe('ScoringEngine', () => {
  const engine = new ScoringEngine();

  describe('fallback seeding', () => {
    it('returns the normalized fallback triple when no fault code is given', () => {
      expect(engine.diagnose(null, 'car makes noise')).toEqual([
        { part: 'Battery', likelihood: 0.397, reason: 'Common electrical issue' },
        { part: 'Alternator', likelihood: 0.317, reason: 'Charging system faults' },
        { part: 'Spark Plugs', likelihood: 0.286, reason: 'Wear item, causes misfires' },
      ]);
    });

    it('treats undefined, empty and whitespace-only codes as absent', () => {
      const expected = engine.diagnose(null, 'car makes noise');
      expect(engine.diagnose(undefined, 'car makes noise')).toEqual(expected);
      expect(engine.diagnose('', 'car makes noise')).toEqual(expected);
      expect(engine.diagnose('   ', 'car makes noise')).toEqual(expected);
    });

    it('falls back but still annotates reasons when the code matches no rule', () => {
      const result = engine.diagnose('B1234', 'no start');
      expect(parts(result)).toEqual(['Battery', 'Alternator', 'Spark Plugs']);
      expect(result[0]!.reason).toBe('Common electrical issue (matched B123)');
    });

    it('uses the whole code as prefix when shorter than 4 characters', () => {
      const result = engine.diagnose('p03', 'noise');
      expect(parts(result)).toEqual(['Battery', 'Alternator', 'Spark Plugs']);
      expect(result.every((s) => s.reason.endsWith(' (matched P03)'))).toBe(true);
    });

    it('boosts fallback candidates from the description', () => {
      expect(engine.diagnose(null, 'shakes and dies')).toEqual([
        { part: 'Spark Plugs', likelihood: 0.423, reason: 'Wear item, causes misfires' },
        { part: 'Battery', likelihood: 0.321, reason: 'Common electrical issue' },
        { part: 'Alternator', likelihood: 0.256, reason: 'Charging system faults' },
      ]);
    });
  });

  describe('fault code matching', () => {
    it('seeds the four misfire candidates for P0301', () => {
      expect(engine.diagnose('P0301', '')).toEqual([
        { part: 'Spark Plugs', likelihood: 0.353, reason: 'Engine misfire detected (matched P030)' },
        { part: 'Ignition Coils', likelihood: 0.294, reason: 'Weak/no spark (matched P030)' },
        { part: 'Fuel Injectors', likelihood: 0.206, reason: 'Fuel delivery issues (matched P030)' },
        { part: 'Vacuum Leak', likelihood: 0.147, reason: 'Unmetered air causing lean (matched P030)' },
      ]);
    });

    it('trims and uppercases the fault code', () => {
      const result = engine.diagnose('  p0420 ', 'rotten egg smell, sulfur');
      expect(result).toEqual([
        { part: 'Catalytic Converter', likelihood: 0.545, reason: 'Efficiency below threshold (matched P042)' },
        { part: 'O2 Sensor (Downstream)', likelihood: 0.28, reason: 'Sensor aging or slow (matched P042)' },
        { part: 'Exhaust Leak', likelihood: 0.175, reason: 'False oxygen readings (matched P042)' },
      ]);
    });

    it('ends every reason with the matched prefix', () => {
      const result = engine.diagnose('P0128', 'hesitation');
      expect(result.map((s) => s.reason)).toEqual([
        'TPS circuit issues (matched P012)',
        'Signal interruption (matched P012)',
      ]);
    });
  });

  describe('keyword boosting', () => {
    it('raises Spark Plugs for a rough idle on P0300', () => {
      const plain = engine.diagnose('P0300', '');
      const boosted = engine.diagnose('P0300', 'Rough idle at lights');

      expect(plain[0]).toMatchObject({ part: 'Spark Plugs', likelihood: 0.353 });
      expect(boosted[0]).toMatchObject({ part: 'Spark Plugs', likelihood: 0.405 });
      expect(boosted.map((s) => s.likelihood)).toEqual([0.405, 0.27, 0.189, 0.135]);
    });

    it('moves Vacuum Leak to the top when a hiss is reported on P0171', () => {
      const result = engine.diagnose('P0171', 'loud hiss under hood');
      expect(parts(result)).toEqual(['Vacuum Leak', 'O2 Sensor (Upstream)', 'MAF Sensor', 'Fuel Pump/Filter']);
      expect(result.map((s) => s.likelihood)).toEqual([0.306, 0.278, 0.25, 0.167]);
    });

    it('matches hint parts on their first word only', () => {
      // "Fuel Pump" hint boosts "Fuel Injectors" as well
      const result = engine.diagnose('P0300', 'engine stalls');
      expect(parts(result)).toEqual(['Spark Plugs', 'Fuel Injectors', 'Ignition Coils', 'Vacuum Leak']);
      expect(result.map((s) => s.likelihood)).toEqual([0.316, 0.289, 0.263, 0.132]);
    });

    it('ignores hints whose target part is not among the candidates', () => {
      expect(engine.diagnose('P0121', 'rough idle')).toEqual(engine.diagnose('P0121', ''));
    });

    it('applies a hint once however many of its keywords match', () => {
      const kb = createKnowledgeBase({
        faultCodeRules: [{ prefix: 'X100', candidates: [
          { part: 'Alpha', base: 0.2, reason: 'a' },
          { part: 'Beta', base: 0.4, reason: 'b' },
        ] }],
        keywordHints: [{ keywords: ['knock', 'ping'], part: 'Alpha', boost: 0.2 }],
      });
      const result = new ScoringEngine(kb).diagnose('X100', 'knock and ping');
      expect(result.map((s) => s.likelihood)).toEqual([0.5, 0.5]);
      expect(parts(result)).toEqual(['Alpha', 'Beta']);
    });
  });

  describe('normalization', () => {
    it('clamps boosted scores to 1 before normalizing', () => {
      const kb = createKnowledgeBase({
        faultCodeRules: [{ prefix: 'X100', candidates: [
          { part: 'Alpha', base: 0.9, reason: 'a' },
          { part: 'Beta', base: 0.5, reason: 'b' },
        ] }],
        keywordHints: [{ keywords: ['boom'], part: 'Alpha Unit', boost: 0.5 }],
      });
      const result = new ScoringEngine(kb).diagnose('X1001', 'loud boom');
      expect(result).toEqual([
        { part: 'Alpha', likelihood: 0.667, reason: 'a (matched X100)' },
        { part: 'Beta', likelihood: 0.333, reason: 'b (matched X100)' },
      ]);
    });

    it('returns all-zero likelihoods when the total score is zero', () => {
      const kb = createKnowledgeBase({
        faultCodeRules: [{ prefix: 'Z000', candidates: [
          { part: 'Alpha', base: 0, reason: 'a' },
          { part: 'Beta', base: -0.2, reason: 'b' },
        ] }],
      });
      expect(new ScoringEngine(kb).diagnose('Z000', '')).toEqual([
        { part: 'Alpha', likelihood: 0, reason: 'a (matched Z000)' },
        { part: 'Beta', likelihood: 0, reason: 'b (matched Z000)' },
      ]);
    });

    it('sums likelihoods to 1 within rounding', () => {
      for (const [code, description] of [
        ['P0301', ''],
        ['P0171', 'hesitation and a whistle'],
        [null, 'car makes noise'],
      ] as const) {
        expect(likelihoodSum(engine.diagnose(code, description))).toBeCloseTo(1, 2);
      }
    });
  });

  describe('ranking', () => {
    it('keeps duplicate part names from different rules as separate entries', () => {
      const kb = createKnowledgeBase({
        faultCodeRules: [
          { prefix: 'P0', candidates: [{ part: 'Vacuum Leak', base: 0.4, reason: 'first' }] },
          { prefix: 'P01', candidates: [
            { part: 'Vacuum Leak', base: 0.4, reason: 'second' },
            { part: 'MAF Sensor', base: 0.2, reason: 'third' },
          ] },
        ],
      });
      expect(new ScoringEngine(kb).diagnose('P0171', '')).toEqual([
        { part: 'Vacuum Leak', likelihood: 0.4, reason: 'first (matched P017)' },
        { part: 'Vacuum Leak', likelihood: 0.4, reason: 'second (matched P017)' },
        { part: 'MAF Sensor', likelihood: 0.2, reason: 'third (matched P017)' },
      ]);
    });

    it('truncates to the top 5 suggestions', () => {
      const kb = createKnowledgeBase({
        faultCodeRules: [{
          prefix: 'U010',
          candidates: ['A', 'B', 'C', 'D', 'E', 'F', 'G'].map((part, i) => ({
            part,
            base: (i + 1) / 10,
            reason: part,
          })),
        }],
      });
      const result = new ScoringEngine(kb).diagnose('U0100', '');
      expect(result).toHaveLength(MAX_SUGGESTIONS);
      expect(parts(result)).toEqual(['G', 'F', 'E', 'D', 'C']);
      expect(result.map((s) => s.likelihood)).toEqual([0.25, 0.214, 0.179, 0.143, 0.107]);
    });

    it('returns 1 to 5 suggestions sorted descending with likelihoods in [0, 1]', () => {
      const inputs: Array<[string | null, string]> = [
        ['P0300', 'shakes, stalls, hiss'],
        ['P0420', 'sulfur'],
        ['C0035', ''],
        [null, 'hesitation'],
      ];
      for (const [code, description] of inputs) {
        const result = engine.diagnose(code, description);
        expect(result.length).toBeGreaterThanOrEqual(1);
        expect(result.length).toBeLessThanOrEqual(5);
        for (let i = 0; i < result.length; i++) {
          expect(result[i]!.likelihood).toBeGreaterThanOrEqual(0);
          expect(result[i]!.likelihood).toBeLessThanOrEqual(1);
          if (i > 0) expect(result[i - 1]!.likelihood).toBeGreaterThanOrEqual(result[i]!.likelihood);
        }
      }
    });

    it('returns an empty list when nothing matches and there is no fallback', () => {
      expect(new ScoringEngine(createKnowledgeBase({})).diagnose('P0300', 'rough idle')).toEqual([]);
    });
  });

  describe('purity', () => {
    it('returns identical suggestions for identical inputs', () => {
      const first = engine.diagnose('P0300', 'rough idle and hiss');
      const second = engine.diagnose('P0300', 'rough idle and hiss');
      expect(second).toEqual(first);
    });

    it('does not mutate the knowledge base when boosting', () => {
      engine.diagnose('P0300', 'rough idle, shakes, vibration');
      const misfire = BUILT_IN_KNOWLEDGE_BASE.faultCodeRules.find((r) => r.prefix === 'P030');
      expect(misfire?.candidates[0]).toEqual({ part: 'Spark Plugs', base: 0.6, reason: 'Engine misfire detected' });
    });

    it('exposes the built-in engine through diagnose()', () => {
      expect(diagnose('P0301', '')).toEqual(engine.diagnose('P0301', ''));
    });
  });
});
