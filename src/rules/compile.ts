import { RuleCompileError } from '../core/errors.js';
import { compileRegexPattern } from '../matcher/regex_matcher.js';
import { compileSequencePattern } from '../matcher/sequence_matcher.js';
import { compileShapePattern } from '../matcher/shape_matcher.js';
import type { CompiledRule, PatternMatcher, RuleDefinition } from '../types.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

export function templatePlaceholders(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map((match) => match[1]);
}

export function renderTemplate(template: string, captures: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (_, name: string) => captures[name] ?? '');
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

function compilePattern(definition: RuleDefinition): PatternMatcher {
  const { pattern, id } = definition;
  if ('sequence' in pattern) return compileSequencePattern(pattern, id);
  if ('regex' in pattern) return compileRegexPattern(pattern, id);
  return compileShapePattern(pattern);
}

/**
 * Compile one validated rule record. Throws RuleCompileError when the pattern
 * is malformed or the message references a placeholder the pattern cannot fill.
 */
export function compileRule(definition: RuleDefinition): CompiledRule {
  const matcher = compilePattern(definition);

  const unknown = templatePlaceholders(definition.message).filter((name) => !matcher.placeholders.has(name));
  if (unknown.length > 0) {
    const available = [...matcher.placeholders].map((name) => `{{${name}}}`).join(', ');
    throw new RuleCompileError(
      definition.id,
      `message uses unknown placeholder ${unknown.map((name) => `{{${name}}}`).join(', ')} (available: ${available})`,
    );
  }

  return Object.freeze({
    definition: deepFreeze(definition),
    kind: matcher.kind,
    languages: new Set(definition.languages),
    platforms: new Set(definition.platforms),
    find: (unit) => matcher.find(unit),
    render: (captures) => renderTemplate(definition.message, captures),
  } satisfies CompiledRule);
}
