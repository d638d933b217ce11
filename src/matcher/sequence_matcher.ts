/**
 * @fileoverview Token sequence patterns
 *
 * A sequence pattern is written in source syntax and tokenized with the same
 * tokenizer as the audited code, so `Font . system ( size : $NUM )` and
 * `Font.system(size: $NUM)` are the same pattern. Supported extras:
 *
 * - `$ANY`, `$IDENT`, `$NUM`, `$STR`, `$LIT` wildcards (each captured as `{{1}}`, `{{2}}`, ...)
 * - `a | b` alternatives for a single position
 * - `...` gaps of 0..max_gap tokens
 *
 * Matching walks the token array from every start index and expands gaps
 * lazily (shortest first) under a fixed step budget.
 *
 * @packageDocumentation
 */

import { RuleCompileError } from '../core/errors.js';
import { tokenize } from '../indexer/tokenizer.js';
import type { PatternMatch, PatternMatcher, SequencePattern, SourceUnit, Token } from '../types.js';
import { compileScopeFilter } from './scope_filter.js';

// ============================================================================
// TYPES
// ============================================================================

export const WILDCARDS = ['ANY', 'IDENT', 'NUM', 'STR', 'LIT'] as const;
export type Wildcard = (typeof WILDCARDS)[number];

type Alternative =
  | { kind: 'literal'; text: string }
  | { kind: 'wildcard'; wildcard: Wildcard };

type Element =
  | { type: 'gap' }
  | { type: 'token'; alternatives: Alternative[]; capture: number | null };

export const DEFAULT_MAX_GAP = 8;
export const MAX_GAPS = 4;
const STEPS_PER_ELEMENT = 256;

const LITERAL_WORDS = new Set(['true', 'false', 'null', 'nil']);

function isWildcard(value: string): value is Wildcard {
  const known: readonly string[] = WILDCARDS;
  return known.includes(value);
}

// ============================================================================
// PARSING
// ============================================================================

function parseAlternative(token: Token, ruleId: string): Alternative {
  if (token.kind === 'identifier' && token.text.startsWith('$') && token.text.length > 1) {
    const name = token.text.slice(1);
    if (!isWildcard(name)) {
      throw new RuleCompileError(ruleId, `unknown wildcard ${token.text} (expected one of ${WILDCARDS.map((w) => `$${w}`).join(', ')})`);
    }
    return { kind: 'wildcard', wildcard: name };
  }
  return { kind: 'literal', text: token.text };
}

export function parseSequence(sequence: string, ruleId: string): Element[] {
  const elements: Element[] = [];
  let pending: Alternative[] | null = null;
  let expectAlternative = false;

  const flush = (): void => {
    if (pending) elements.push({ type: 'token', alternatives: pending, capture: null });
    pending = null;
  };

  for (const token of tokenize(sequence).tokens) {
    if (token.kind === 'punct' && token.text === '...') {
      if (expectAlternative) throw new RuleCompileError(ruleId, 'a gap cannot follow `|`');
      flush();
      if (elements[elements.length - 1]?.type === 'gap') {
        throw new RuleCompileError(ruleId, 'consecutive gaps');
      }
      elements.push({ type: 'gap' });
      continue;
    }
    if (token.kind === 'punct' && token.text === '|') {
      if (pending === null || expectAlternative) throw new RuleCompileError(ruleId, 'dangling `|`');
      expectAlternative = true;
      continue;
    }
    const alternative = parseAlternative(token, ruleId);
    if (expectAlternative && pending !== null) {
      pending.push(alternative);
      expectAlternative = false;
    } else {
      flush();
      pending = [alternative];
    }
  }
  if (expectAlternative) throw new RuleCompileError(ruleId, 'dangling `|`');
  flush();

  if (elements.length === 0) throw new RuleCompileError(ruleId, 'empty sequence pattern');
  if (elements[0].type === 'gap' || elements[elements.length - 1].type === 'gap') {
    throw new RuleCompileError(ruleId, 'a sequence cannot start or end with a gap');
  }
  const gaps = elements.filter((element) => element.type === 'gap').length;
  if (gaps > MAX_GAPS) {
    throw new RuleCompileError(ruleId, `${gaps} gaps exceed the limit of ${MAX_GAPS}`);
  }

  let captures = 0;
  return elements.map((element) => {
    if (element.type === 'token' && element.alternatives.some((alt) => alt.kind === 'wildcard')) {
      captures++;
      return { ...element, capture: captures };
    }
    return element;
  });
}

// ============================================================================
// MATCHING
// ============================================================================

function accepts(alternative: Alternative, token: Token): boolean {
  if (alternative.kind === 'literal') return token.text === alternative.text;
  switch (alternative.wildcard) {
    case 'ANY':
      return true;
    case 'IDENT':
      return token.kind === 'identifier';
    case 'NUM':
      return token.kind === 'number';
    case 'STR':
      return token.kind === 'string';
    case 'LIT':
      return token.kind === 'number' || token.kind === 'string' || LITERAL_WORDS.has(token.text);
  }
}

export function compileSequencePattern(pattern: SequencePattern, ruleId: string): PatternMatcher {
  const elements = parseSequence(pattern.sequence, ruleId);
  const maxGap = pattern.max_gap ?? DEFAULT_MAX_GAP;
  const budget = elements.length * STEPS_PER_ELEMENT;
  const scopeFilter = compileScopeFilter(pattern);
  const captureCount = elements.filter((element) => element.type === 'token' && element.capture !== null).length;

  const placeholders = new Set(['match']);
  for (let i = 1; i <= captureCount; i++) placeholders.add(String(i));

  const matchAt = (tokens: readonly Token[], start: number, captured: number[]): number => {
    let steps = 0;

    const step = (elementIndex: number, tokenIndex: number): number => {
      if (elementIndex === elements.length) return tokenIndex;
      if (++steps > budget) return -1;

      const element = elements[elementIndex];
      if (element.type === 'gap') {
        for (let skip = 0; skip <= maxGap && tokenIndex + skip < tokens.length; skip++) {
          const end = step(elementIndex + 1, tokenIndex + skip);
          if (end >= 0) return end;
          if (steps > budget) return -1;
        }
        return -1;
      }

      const token = tokens[tokenIndex];
      if (!token || !element.alternatives.some((alt) => accepts(alt, token))) return -1;
      if (element.capture !== null) captured[element.capture] = tokenIndex;
      return step(elementIndex + 1, tokenIndex + 1);
    };

    return step(0, start);
  };

  return {
    kind: 'sequence',
    placeholders,
    find(unit: SourceUnit): PatternMatch[] {
      const { tokens } = unit;
      const matches: PatternMatch[] = [];

      for (let start = 0; start < tokens.length; start++) {
        const captured: number[] = [];
        const end = matchAt(tokens, start, captured);
        if (end < 0) continue;
        if (scopeFilter && !scopeFilter(unit, start)) continue;

        const span = tokens.slice(start, end);
        const captures: Record<string, string> = { match: span.map((t) => t.text).join(' ') };
        for (let i = 1; i <= captureCount; i++) {
          captures[String(i)] = tokens[captured[i]]?.text ?? '';
        }
        matches.push({
          lineStart: tokens[start].line,
          lineEnd: Math.max(...span.map((t) => t.endLine)),
          column: tokens[start].column,
          text: captures.match,
          captures,
        });
      }

      return matches;
    },
  };
}
