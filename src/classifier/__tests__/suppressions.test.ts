import { describe, it, expect } from 'vitest';
import { parseDirective, parseSuppressions } from '../suppressions.js';
import { unitOf } from '../../__tests__/rule_fixtures.js';

describe('parseDirective', () => {
  const comment = (text: string, trailing = false, line = 3, endLine = line) => ({ text, line, endLine, trailing });

  it('reads rule ids, override and justification', () => {
    const directive = parseDirective(
      comment('ui-audit-allow swiftui-fixed-font-size,heavy-shadow as=minor -- brand header is fixed'),
      'A.swift',
    );

    expect(directive).toEqual({
      file: 'A.swift',
      line: 3,
      targetLine: 4,
      ruleIds: ['swiftui-fixed-font-size', 'heavy-shadow'],
      override: 'minor',
      justification: 'brand header is fixed',
    });
  });

  it('treats a bare directive as a blanket suppression', () => {
    expect(parseDirective(comment('ui-audit-allow', true), 'A.swift')).toEqual({
      file: 'A.swift',
      line: 3,
      targetLine: 3,
      ruleIds: [],
      justification: '',
    });
  });

  it('targets the line after a multi-line block comment', () => {
    const directive = parseDirective(comment('* ui-audit-allow heavy-shadow\n * -- design\n * review', false, 10, 12), 'A.swift');

    expect(directive).toMatchObject({ targetLine: 13, ruleIds: ['heavy-shadow'], justification: 'design * review' });
  });

  it('keeps an unknown severity aside', () => {
    const directive = parseDirective(comment('ui-audit-allow x as=urgent'), 'A.swift');

    expect(directive).toMatchObject({ ruleIds: ['x'], invalidOverride: 'urgent' });
    expect(directive?.override).toBeUndefined();
  });

  it('ignores comments without the marker', () => {
    expect(parseDirective(comment('ui-audit-allowed later'), 'A.swift')).toBeNull();
    expect(parseDirective(comment('plain note'), 'A.swift')).toBeNull();
  });
});

describe('parseSuppressions', () => {
  it('collects directives from the unit comments', () => {
    const unit = unitOf([
      '// ui-audit-allow heavy-shadow -- design',
      'card.shadow(radius: 20)',
      'Text("x").font(.system(size: 9)) // ui-audit-allow',
    ].join('\n'));

    const directives = parseSuppressions(unit);

    expect(directives.map((d) => [d.line, d.targetLine, d.ruleIds])).toEqual([
      [1, 2, ['heavy-shadow']],
      [3, 3, []],
    ]);
  });
});
