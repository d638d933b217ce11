import { describe, it, expect } from 'vitest';
import { matchUnit, mergeMatches } from '../engine.js';
import { FIXED_FONT_RULE, compiled, unitOf } from '../../__tests__/rule_fixtures.js';
import { compileRule } from '../../rules/compile.js';
import type { PatternMatch } from '../../types.js';

function match(lineStart: number, lineEnd: number, text: string): PatternMatch {
  return { lineStart, lineEnd, column: 1, text, captures: { match: text } };
}

describe('mergeMatches', () => {
  it('merges overlapping spans of one rule into their union', () => {
    const rule = compiled('r', { sequence: 'x' });

    const findings = mergeMatches(rule, 'A.swift', [match(2, 5, 'second'), match(1, 3, 'first'), match(7, 7, 'third')]);

    expect(findings).toEqual([
      { ruleId: 'r', file: 'A.swift', lineStart: 1, lineEnd: 5, column: 1, text: 'first', message: 'matched first', occurrences: 2 },
      { ruleId: 'r', file: 'A.swift', lineStart: 7, lineEnd: 7, column: 1, text: 'third', message: 'matched third', occurrences: 1 },
    ]);
  });
});

describe('matchUnit', () => {
  it('reports the fixed font size as one finding', () => {
    const unit = unitOf('Text("Hi").font(.system(size: 17))');

    const findings = matchUnit(unit, [compileRule(FIXED_FONT_RULE)]);

    expect(findings).toEqual([
      {
        ruleId: 'swiftui-fixed-font-size',
        file: 'Sources/View.swift',
        lineStart: 1,
        lineEnd: 1,
        column: 18,
        text: 'system ( size : 17 )',
        message: 'Font size 17 is fixed and ignores Dynamic Type',
        occurrences: 1,
      },
    ]);
  });

  it('counts repeated matches on one line once', () => {
    const unit = unitOf('foo(); foo()\nfoo()');

    const findings = matchUnit(unit, [compiled('foo-call', { sequence: 'foo()' })]);

    expect(findings.map((f) => [f.lineStart, f.occurrences])).toEqual([
      [1, 2],
      [2, 1],
    ]);
  });

  it('skips rules for other languages', () => {
    const unit = unitOf('Text("Hi").font(.system(size: 17))', 'kotlin', 'Screen.kt');

    expect(matchUnit(unit, [compileRule(FIXED_FONT_RULE)])).toEqual([]);
  });

  it('keeps findings of different rules on the same line', () => {
    const unit = unitOf('Text("Hi").font(.system(size: 17))');
    const rules = [compileRule(FIXED_FONT_RULE), compiled('text-call', { sequence: 'Text($STR)' })];

    const findings = matchUnit(unit, rules);

    expect(findings.map((f) => f.ruleId)).toEqual(['text-call', 'swiftui-fixed-font-size']);
  });

  it('produces nothing when no rule matches', () => {
    expect(matchUnit(unitOf('let a = 1'), [compileRule(FIXED_FONT_RULE)])).toEqual([]);
  });
});
