import { describe, it, expect } from 'vitest';
import { aggregate, countSeverities } from '../aggregator.js';
import type { ReportMeta } from '../aggregator.js';
import { exceedsThreshold, formatLocation, renderJson, renderText, isFailOn } from '../render.js';
import { weight } from '../../weighting/weighter.js';
import { FIXED_FONT_RULE, corpusOf, ruleDefinition } from '../../__tests__/rule_fixtures.js';
import type { Finding, Report } from '../../types.js';

const corpus = corpusOf([
  FIXED_FONT_RULE,
  ruleDefinition('hardcoded-color', { shape: { call: ['Color'] } }, {
    perspectives: ['consistency', 'deference'],
    fix_hint: 'Use a semantic color',
  }),
]);

function finding(ruleId: string, file: string, lineStart: number, lineEnd: number, message: string, extra: Partial<Finding> = {}): Finding {
  const rule = corpus.get(ruleId);
  if (!rule) throw new Error(`missing ${ruleId}`);
  const { severity, perspectives, accessibility, fix_hint } = rule.definition;
  return {
    ruleId,
    file,
    lineStart,
    lineEnd,
    column: 1,
    text: 'x',
    message,
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

const FONT = finding('swiftui-fixed-font-size', 'A.swift', 3, 3, 'Font size 17 is fixed and ignores Dynamic Type');
const COLOR = finding('hardcoded-color', 'B.swift', 5, 6, 'matched Color');
const SUPPRESSED = finding('hardcoded-color', 'A.swift', 9, 9, 'matched Color', {
  suppressed: true,
  suppression: { line: 8, justification: 'brand color' },
});

const META: ReportMeta = {
  profile: { category: 'utility', platforms: [] },
  corpusVersion: 'test-corpus',
  overrides: [],
  warnings: [],
  filesScanned: 2,
  filesSkipped: 1,
  truncated: false,
};

function reportOf(findings: Finding[], meta: Partial<ReportMeta> = {}): Report {
  const merged = { ...META, ...meta };
  return aggregate(weight(findings, merged.profile, corpus), merged);
}

describe('aggregate', () => {
  it('counts unique visible findings and groups them by perspective', () => {
    const report = reportOf([COLOR, SUPPRESSED, FONT]);

    expect(report.summary).toEqual({ critical: 1, important: 1, contextDependent: 0, minor: 0, total: 2, suppressed: 1 });
    expect(report.perspectives.clarity).toMatchObject({
      status: 'issues_found',
      weight: 1,
      counts: { critical: 1, important: 0, contextDependent: 0, minor: 0 },
    });
    expect(report.perspectives.consistency.issues.map((entry) => entry.score)).toEqual([3 * 0.8]);
    expect(report.perspectives.deference.issues.map((entry) => entry.finding)).toEqual([COLOR]);
    expect(report.suppressed).toEqual([SUPPRESSED]);
  });

  it('reports every perspective as clean on empty input', () => {
    const report = reportOf([]);

    expect(report.summary.total).toBe(0);
    expect(Object.values(report.perspectives).map((section) => section.status)).toEqual([
      'no_issues',
      'no_issues',
      'no_issues',
    ]);
  });

  it('counts severities', () => {
    expect(countSeverities([FONT, COLOR, { ...COLOR, severity: 'context-dependent' }])).toEqual({
      critical: 1,
      important: 1,
      contextDependent: 1,
      minor: 0,
    });
  });
});

describe('renderJson', () => {
  it('emits snake_case findings per perspective', () => {
    const parsed: unknown = JSON.parse(renderJson(reportOf([COLOR, SUPPRESSED, FONT])));

    expect(parsed).toEqual({
      summary: { critical: 1, important: 1, context_dependent: 0, minor: 0, total: 2, suppressed: 1 },
      perspectives: {
        clarity: [
          {
            rule_id: 'swiftui-fixed-font-size',
            file: 'A.swift',
            line_start: 3,
            line_end: 3,
            severity: 'critical',
            message: 'Font size 17 is fixed and ignores Dynamic Type',
          },
        ],
        consistency: [
          { rule_id: 'hardcoded-color', file: 'B.swift', line_start: 5, line_end: 6, severity: 'important', message: 'matched Color' },
        ],
        deference: [
          { rule_id: 'hardcoded-color', file: 'B.swift', line_start: 5, line_end: 6, severity: 'important', message: 'matched Color' },
        ],
      },
      truncated: false,
      profile: { category: 'utility', platforms: [] },
      corpus_version: 'test-corpus',
      files_scanned: 2,
      files_skipped: 1,
      overrides: [],
    });
  });

  it('adds suppressed findings with their justification on request', () => {
    const parsed: unknown = JSON.parse(renderJson(reportOf([SUPPRESSED]), { includeSuppressed: true }));

    expect(parsed).toMatchObject({
      suppressed: [
        {
          rule_id: 'hardcoded-color',
          file: 'A.swift',
          line_start: 9,
          line_end: 9,
          severity: 'important',
          message: 'matched Color',
          justification: 'brand color',
        },
      ],
    });
  });

  it('renders byte-identical output for identical reports', () => {
    expect(renderJson(reportOf([FONT, COLOR]))).toBe(renderJson(reportOf([COLOR, FONT])));
  });
});

describe('renderText', () => {
  it('lists every section with its findings', () => {
    const text = renderText(reportOf([COLOR, SUPPRESSED, FONT]), { includeSuppressed: true });

    expect(text).toBe([
      'UI audit report',
      'Profile: utility (platforms: all)',
      'Files: 2 scanned, 1 skipped',
      'Summary: 1 critical, 1 important, 0 context-dependent, 0 minor (2 total, 1 suppressed)',
      '',
      'Clarity (weight 1.00): issues found',
      '  critical  A.swift:3  swiftui-fixed-font-size',
      '    Font size 17 is fixed and ignores Dynamic Type',
      '',
      'Consistency (weight 0.80): issues found',
      '  important  B.swift:5-6  hardcoded-color',
      '    matched Color',
      '    Fix: Use a semantic color',
      '',
      'Deference (weight 0.50): issues found',
      '  important  B.swift:5-6  hardcoded-color',
      '    matched Color',
      '    Fix: Use a semantic color',
      '',
      'Suppressed:',
      '  A.swift:9  hardcoded-color: brand color',
      '',
    ].join('\n'));
  });

  it('notes overrides and truncation', () => {
    const text = renderText(reportOf([], {
      profile: { category: 'game', platforms: ['ios', 'watchos'] },
      truncated: true,
      overrides: [
        { ruleId: 'hardcoded-color', file: 'C.swift', line: 2, from: 'important', to: 'minor', justification: 'themed screen' },
      ],
    }));

    expect(text.split('\n')).toEqual([
      'UI audit report',
      'Profile: game (platforms: ios, watchos)',
      'Files: 2 scanned, 1 skipped',
      'Summary: 0 critical, 0 important, 0 context-dependent, 0 minor (0 total, 0 suppressed)',
      '',
      'Clarity (weight 0.60): no issues',
      '',
      'Consistency (weight 0.70): no issues',
      '',
      'Deference (weight 1.00): no issues',
      '',
      'Severity overrides:',
      '  C.swift:2  hardcoded-color important -> minor: themed screen',
      '',
      'Run cancelled before every file was audited; results are partial.',
      '',
    ]);
  });

  it('formats single and multi-line locations', () => {
    expect(formatLocation({ file: 'a.kt', lineStart: 4, lineEnd: 4 })).toBe('a.kt:4');
    expect(formatLocation({ file: 'a.kt', lineStart: 4, lineEnd: 7 })).toBe('a.kt:4-7');
  });
});

describe('exceedsThreshold', () => {
  it('compares the summary against the fail-on level', () => {
    const withCritical = reportOf([FONT]);
    const importantOnly = reportOf([COLOR]);
    const clean = reportOf([SUPPRESSED]);

    expect(exceedsThreshold(withCritical, 'critical')).toBe(true);
    expect(exceedsThreshold(importantOnly, 'critical')).toBe(false);
    expect(exceedsThreshold(importantOnly, 'important')).toBe(true);
    expect(exceedsThreshold(importantOnly, 'minor')).toBe(true);
    expect(exceedsThreshold(clean, 'minor')).toBe(false);
  });

  it('accepts only known levels', () => {
    expect(isFailOn('important')).toBe(true);
    expect(isFailOn('context-dependent')).toBe(false);
  });
});
