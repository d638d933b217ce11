/**
 * @fileoverview Shared builders for rule and source fixtures.
 */

import { buildSourceUnit } from '../indexer/source_indexer.js';
import { compileRuleCorpus } from '../rules/corpus.js';
import { compileRule } from '../rules/compile.js';
import type { CompiledRule, Language, RuleCorpus, RuleDefinition, RulePattern, SourceUnit } from '../types.js';

export function ruleDefinition(id: string, pattern: RulePattern, overrides: Partial<RuleDefinition> = {}): RuleDefinition {
  return {
    id,
    title: id,
    pattern,
    severity: 'important',
    perspectives: ['clarity'],
    platforms: [],
    languages: [],
    accessibility: false,
    message: 'matched {{match}}',
    fix_hint: '',
    ...overrides,
  };
}

export function compiled(id: string, pattern: RulePattern, overrides: Partial<RuleDefinition> = {}): CompiledRule {
  return compileRule(ruleDefinition(id, pattern, overrides));
}

export function corpusOf(definitions: RuleDefinition[], version = 'test-corpus'): RuleCorpus {
  return compileRuleCorpus({ version: 1, rules: definitions }, { source: 'fixtures', version });
}

export function unitOf(source: string, language: Language = 'swift', filePath = 'Sources/View.swift'): SourceUnit {
  return buildSourceUnit(filePath, source, language);
}

/** The fixed-font-size rule as shipped in the bundled corpus. */
export const FIXED_FONT_RULE: RuleDefinition = ruleDefinition(
  'swiftui-fixed-font-size',
  { shape: { call: ['system'], argument: { label: 'size', kind: 'number' } } },
  {
    title: 'Fixed system font size',
    severity: 'critical',
    perspectives: ['clarity'],
    platforms: ['ios', 'ipados', 'macos', 'watchos', 'tvos', 'visionos'],
    languages: ['swift'],
    accessibility: true,
    message: 'Font size {{value}} is fixed and ignores Dynamic Type',
  },
);
