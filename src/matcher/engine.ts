/**
 * @fileoverview Matcher Engine
 *
 * Runs compiled rules over one SourceUnit and turns pattern matches into raw
 * findings. Same-rule matches whose line spans overlap collapse into one
 * finding covering the union; matches from different rules never merge.
 *
 * @packageDocumentation
 */

import type { CompiledRule, PatternMatch, RawFinding, SourceUnit } from '../types.js';
import { compareStrings } from '../utils/sort.js';

export function appliesToLanguage(rule: CompiledRule, unit: SourceUnit): boolean {
  return rule.languages.size === 0 || rule.languages.has(unit.language);
}

function byPosition(a: PatternMatch, b: PatternMatch): number {
  return a.lineStart - b.lineStart || a.column - b.column || a.lineEnd - b.lineEnd;
}

/**
 * Collapse overlapping matches of one rule. The earliest match supplies the
 * text and message of the merged finding.
 */
export function mergeMatches(rule: CompiledRule, file: string, matches: readonly PatternMatch[]): RawFinding[] {
  const findings: RawFinding[] = [];
  let current: RawFinding | null = null;

  for (const match of [...matches].sort(byPosition)) {
    if (current && match.lineStart <= current.lineEnd) {
      current.lineEnd = Math.max(current.lineEnd, match.lineEnd);
      current.occurrences++;
      continue;
    }
    current = {
      ruleId: rule.definition.id,
      file,
      lineStart: match.lineStart,
      lineEnd: match.lineEnd,
      column: match.column,
      text: match.text,
      message: rule.render(match.captures),
      occurrences: 1,
    };
    findings.push(current);
  }

  return findings;
}

export function matchUnit(unit: SourceUnit, rules: readonly CompiledRule[]): RawFinding[] {
  const findings: RawFinding[] = [];
  for (const rule of rules) {
    if (!appliesToLanguage(rule, unit)) continue;
    const matches = rule.find(unit);
    if (matches.length === 0) continue;
    findings.push(...mergeMatches(rule, unit.path, matches));
  }
  return findings.sort((a, b) => a.lineStart - b.lineStart || a.column - b.column || compareStrings(a.ruleId, b.ruleId));
}
