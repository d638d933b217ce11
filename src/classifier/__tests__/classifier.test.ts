import { describe, it, expect, vi, afterEach } from 'vitest';
import { EngineError } from '../../core/errors.js';
import { classify, dedupeFindings } from '../classifier.js';
import { FIXED_FONT_RULE, corpusOf, ruleDefinition } from '../../__tests__/rule_fixtures.js';
import type { RawFinding, SuppressionDirective } from '../../types.js';

const corpus = corpusOf([
  FIXED_FONT_RULE,
  ruleDefinition('heavy-shadow', { shape: { call: ['shadow'] } }, { severity: 'minor', perspectives: ['deference'] }),
]);

function raw(ruleId: string, lineStart: number, lineEnd = lineStart, file = 'A.swift'): RawFinding {
  return { ruleId, file, lineStart, lineEnd, column: 1, text: 'x', message: `${ruleId} message`, occurrences: 1 };
}

function directive(targetLine: number, extra: Partial<SuppressionDirective> = {}): SuppressionDirective {
  return { file: 'A.swift', line: targetLine - 1, targetLine, ruleIds: [], justification: 'reviewed', ...extra };
}

describe('classify', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves rule metadata for unsuppressed findings', () => {
    const result = classify([raw('swiftui-fixed-font-size', 4)], new Map(), corpus);

    expect(result.findings).toEqual([
      {
        ...raw('swiftui-fixed-font-size', 4),
        severity: 'critical',
        declaredSeverity: 'critical',
        perspectives: ['clarity'],
        accessibility: true,
        fixHint: '',
        suppressed: false,
      },
    ]);
    expect(result.overrides).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('suppresses a finding whose span covers the directive target', () => {
    const directives = new Map([['A.swift', [directive(5, { ruleIds: ['swiftui-fixed-font-size'] })]]]);

    const result = classify([raw('swiftui-fixed-font-size', 4, 6)], directives, corpus);

    expect(result.findings[0]).toMatchObject({
      suppressed: true,
      severity: 'critical',
      suppression: { line: 4, justification: 'reviewed' },
    });
    expect(result.warnings).toEqual([]);
  });

  it('leaves findings of other rules alone', () => {
    const directives = new Map([['A.swift', [directive(4, { ruleIds: ['heavy-shadow'] })]]]);

    const result = classify([raw('swiftui-fixed-font-size', 4)], directives, corpus);

    expect(result.findings[0].suppressed).toBe(false);
    expect(result.warnings).toEqual([
      { kind: 'suppression', file: 'A.swift', line: 3, message: 'Unused suppression at A.swift:3 for heavy-shadow' },
    ]);
  });

  it('applies a severity override, records it and logs it', () => {
    const info = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const directives = new Map([['A.swift', [directive(4, { override: 'minor' })]]]);

    const result = classify([raw('swiftui-fixed-font-size', 4)], directives, corpus);

    expect(result.findings[0]).toMatchObject({ suppressed: false, severity: 'minor', declaredSeverity: 'critical' });
    expect(result.overrides).toEqual([
      { ruleId: 'swiftui-fixed-font-size', file: 'A.swift', line: 3, from: 'critical', to: 'minor', justification: 'reviewed' },
    ]);
    expect(info).toHaveBeenCalledWith('[ui-audit] severity override', result.overrides[0]);
  });

  it('reports an override that a suppression on the same finding supersedes', () => {
    const directives = new Map([['A.swift', [directive(4, { override: 'minor' }), directive(5)]]]);

    const result = classify([raw('swiftui-fixed-font-size', 4, 5)], directives, corpus);

    expect(result.findings[0]).toMatchObject({ suppressed: true, severity: 'critical', suppression: { line: 4 } });
    expect(result.overrides).toEqual([]);
    expect(result.warnings).toEqual([
      {
        kind: 'suppression',
        file: 'A.swift',
        line: 3,
        message: 'Severity override at A.swift:3 is superseded by the suppression at A.swift:4',
      },
    ]);
  });

  it('does not apply a directive with an unknown severity', () => {
    const directives = new Map([['A.swift', [directive(4, { invalidOverride: 'urgent' })]]]);

    const result = classify([raw('swiftui-fixed-font-size', 4)], directives, corpus);

    expect(result.findings[0]).toMatchObject({ suppressed: false, severity: 'critical' });
    expect(result.warnings).toEqual([
      {
        kind: 'suppression',
        file: 'A.swift',
        line: 3,
        message: 'Suppression at A.swift:3 has unknown severity "urgent"; directive ignored',
      },
    ]);
  });

  it('mentions unknown rule ids in unused warnings', () => {
    const directives = new Map([['A.swift', [directive(9, { ruleIds: ['no-such-rule'] })]]]);

    const result = classify([], directives, corpus);

    expect(result.warnings.map((w) => w.message)).toEqual([
      'Unused suppression at A.swift:8 for no-such-rule (unknown rule no-such-rule)',
    ]);
  });

  it('keeps conflicting findings of different rules on one line', () => {
    const result = classify([raw('heavy-shadow', 2), raw('swiftui-fixed-font-size', 2)], new Map(), corpus);

    expect(result.findings.map((f) => [f.ruleId, f.severity])).toEqual([
      ['heavy-shadow', 'minor'],
      ['swiftui-fixed-font-size', 'critical'],
    ]);
  });

  it('fails when a finding names a rule outside the corpus', () => {
    expect(() => classify([raw('ghost-rule', 1)], new Map(), corpus)).toThrow(EngineError);
  });
});

describe('dedupeFindings', () => {
  it('keeps one finding per rule, file and span', () => {
    const deduped = dedupeFindings([raw('heavy-shadow', 2), raw('heavy-shadow', 2), raw('heavy-shadow', 2, 3)]);

    expect(deduped.map((f) => [f.lineStart, f.lineEnd, f.occurrences])).toEqual([
      [2, 2, 2],
      [2, 3, 1],
    ]);
  });
});
