import { describe, it, expect } from 'vitest';
import { CATEGORY_WEIGHTS, PROJECT_CATEGORIES, isProjectCategory, resolveWeights } from '../profiles.js';
import { weight } from '../weighter.js';
import { FIXED_FONT_RULE, corpusOf, ruleDefinition } from '../../__tests__/rule_fixtures.js';
import type { Finding, RuleDefinition } from '../../types.js';

const RULES: RuleDefinition[] = [
  FIXED_FONT_RULE,
  ruleDefinition('heavy-shadow', { shape: { call: ['shadow'] } }, {
    severity: 'minor',
    perspectives: ['deference'],
    platforms: ['ios', 'macos'],
  }),
  ruleDefinition('hardcoded-color', { shape: { call: ['Color'] } }, {
    severity: 'important',
    perspectives: ['consistency', 'deference'],
  }),
  ruleDefinition('watch-lines', { shape: { call: ['lineLimit'] } }, {
    severity: 'minor',
    perspectives: ['clarity'],
    platforms: ['watchos'],
  }),
];
const corpus = corpusOf(RULES);

function finding(ruleId: string, file: string, line: number, extra: Partial<Finding> = {}): Finding {
  const rule = corpus.get(ruleId);
  if (!rule) throw new Error(`missing ${ruleId}`);
  const { severity, perspectives, accessibility, fix_hint } = rule.definition;
  return {
    ruleId,
    file,
    lineStart: line,
    lineEnd: line,
    column: 1,
    text: 'x',
    message: 'm',
    occurrences: 1,
    severity,
    declaredSeverity: severity,
    perspectives: [...perspectives],
    accessibility,
    fixHint: fix_hint,
    suppressed: false,
    ...extra,
  };
}

describe('profiles', () => {
  it('knows every category of the weight table', () => {
    expect(PROJECT_CATEGORIES).toEqual([
      'productivity', 'media', 'utility', 'social', 'game', 'education', 'health', 'finance', 'general',
    ]);
    expect(isProjectCategory('toString')).toBe(false);
  });

  it('returns a fresh copy of the row', () => {
    const weights = resolveWeights('media');
    weights.clarity = 0;

    expect(resolveWeights('media')).toEqual({ clarity: 0.7, consistency: 0.8, deference: 1.0 });
    expect(CATEGORY_WEIGHTS.media.clarity).toBe(0.7);
  });

  it('falls back to neutral weights', () => {
    expect(resolveWeights('unheard-of')).toEqual({ clarity: 1, consistency: 1, deference: 1 });
  });
});

describe('weight', () => {
  it('scores by severity rank and perspective weight and orders the result', () => {
    const findings = [
      finding('hardcoded-color', 'B.swift', 3),
      finding('heavy-shadow', 'A.swift', 9),
      finding('hardcoded-color', 'A.swift', 7),
    ];

    const result = weight(findings, { category: 'utility', platforms: [] }, corpus);

    expect(result.weighted.map((w) => [w.finding.file, w.finding.lineStart, w.perspective, w.score])).toEqual([
      ['A.swift', 7, 'consistency', 3 * 0.8],
      ['B.swift', 3, 'consistency', 3 * 0.8],
      ['A.swift', 7, 'deference', 3 * 0.5],
      ['B.swift', 3, 'deference', 3 * 0.5],
      ['A.swift', 9, 'deference', 1 * 0.5],
    ]);
    expect(result.visible.map((f) => `${f.file}:${f.lineStart}`)).toEqual(['A.swift:7', 'A.swift:9', 'B.swift:3']);
  });

  it('never down-weights accessibility rules', () => {
    const result = weight([finding('swiftui-fixed-font-size', 'A.swift', 1)], { category: 'game', platforms: [] }, corpus);

    expect(result.weighted).toHaveLength(1);
    expect(result.weighted[0]).toMatchObject({ perspective: 'clarity', weight: 1, score: 4 });
  });

  it('drops rules for platforms outside the profile', () => {
    const findings = [
      finding('watch-lines', 'A.swift', 1),
      finding('heavy-shadow', 'A.swift', 2),
      finding('hardcoded-color', 'A.swift', 3),
    ];

    const result = weight(findings, { category: 'general', platforms: ['ios'] }, corpus);

    expect(result.visible.map((f) => f.ruleId)).toEqual(['heavy-shadow', 'hardcoded-color']);
    expect(result.dropped).toBe(1);
  });

  it('keeps every rule when the profile names no platforms', () => {
    const result = weight([finding('watch-lines', 'A.swift', 1)], { category: 'general', platforms: [] }, corpus);

    expect(result.dropped).toBe(0);
    expect(result.visible).toHaveLength(1);
  });

  it('keeps suppressed findings out of the weighted groups', () => {
    const hidden = finding('hardcoded-color', 'A.swift', 4, {
      suppressed: true,
      suppression: { line: 3, justification: 'legacy' },
    });

    const result = weight([hidden], { category: 'general', platforms: [] }, corpus);

    expect(result.weighted).toEqual([]);
    expect(result.visible).toEqual([]);
    expect(result.suppressed).toEqual([hidden]);
  });
});
