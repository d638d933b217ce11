/**
 * @fileoverview Call-site shape patterns
 *
 * A shape pattern describes a call rather than a token run:
 *
 * ```yaml
 * shape:
 *   call: [system]
 *   argument: { label: size, kind: number }
 *   not_within_calls: [scaledFont]
 * ```
 *
 * The call is located from the token stream (`callee (` with a balanced
 * closing paren), arguments are split on depth-0 commas, and the modifier
 * chain after the call (`.foo(...)`, trailing closures) is walked for
 * `chain_lacks`.
 *
 * @packageDocumentation
 */

import { enclosingCalls } from '../indexer/scopes.js';
import type {
  PatternMatch,
  PatternMatcher,
  ShapeArgument,
  ShapePattern,
  SourceUnit,
  Token,
} from '../types.js';
import { compileScopeFilter } from './scope_filter.js';

// ============================================================================
// CALL STRUCTURE
// ============================================================================

export interface CallArgument {
  label: string | null;
  /** Token indexes of the value (after any label). */
  start: number;
  end: number;
}

const DECLARATION_WORDS = new Set(['func', 'fun', 'function', 'def', 'fn']);
const NULL_WORDS = new Set(['null', 'nil']);
const BOOLEAN_WORDS = new Set(['true', 'false']);
const MAX_MATCH_TOKENS = 32;

/**
 * Split the arguments between the parens at `open` and `close` on depth-0 commas.
 */
export function splitArguments(unit: SourceUnit, open: number, close: number): CallArgument[] {
  const { tokens, matching } = unit;
  const args: CallArgument[] = [];
  let start = open + 1;

  const push = (end: number): void => {
    if (end < start) return;
    const first = tokens[start];
    const second = tokens[start + 1];
    const labelled = first.kind === 'identifier' && second !== undefined && start + 1 < end
      && (second.text === ':' || second.text === '=');
    args.push(labelled
      ? { label: first.text, start: start + 2, end }
      : { label: null, start, end });
  };

  for (let j = open + 1; j < close; j++) {
    const text = tokens[j].text;
    if ((text === '(' || text === '[' || text === '{') && matching[j] > j && matching[j] < close) {
      j = matching[j];
      continue;
    }
    if (text === ',') {
      push(j - 1);
      start = j + 1;
    }
  }
  push(close - 1);

  return args;
}

export function parseNumericLiteral(text: string): number {
  const cleaned = text.replace(/_/g, '');
  if (/^0[xXbBoO]/.test(cleaned)) return Number(cleaned.replace(/[lLuU]+$/, ''));
  return Number.parseFloat(cleaned);
}

/**
 * Test the value tokens of an argument against the selector's kind, units
 * and bounds.
 */
export function valueMatches(tokens: readonly Token[], start: number, end: number, selector: ShapeArgument): boolean {
  let first = start;
  let negative = false;
  if (selector.kind === 'number' && (tokens[first]?.text === '-' || tokens[first]?.text === '+')) {
    negative = tokens[first].text === '-';
    first++;
  }
  const value = tokens.slice(first, end + 1);
  if (value.length === 0) return false;

  switch (selector.kind) {
    case 'number': {
      if (value[0].kind !== 'number') return false;
      const units = selector.units ?? [];
      if (units.length > 0) {
        if (value.length !== 3 || value[1].text !== '.' || !units.includes(value[2].text)) return false;
      } else if (value.length !== 1) {
        return false;
      }
      const parsed = parseNumericLiteral(value[0].text) * (negative ? -1 : 1);
      if (Number.isNaN(parsed)) return false;
      if (selector.below !== undefined && !(parsed < selector.below)) return false;
      if (selector.above !== undefined && !(parsed > selector.above)) return false;
      return true;
    }
    case 'string':
      return value.length === 1 && value[0].kind === 'string';
    case 'null':
      return value.length === 1 && NULL_WORDS.has(value[0].text);
    case 'boolean':
      return value.length === 1 && BOOLEAN_WORDS.has(value[0].text);
    case 'identifier':
      return isDottedIdentifier(value);
  }
}

function isDottedIdentifier(value: readonly Token[]): boolean {
  let expectIdentifier = true;
  for (let i = 0; i < value.length; i++) {
    const token = value[i];
    if (i === 0 && token.text === '.') continue;
    if (expectIdentifier) {
      if (token.kind !== 'identifier' || NULL_WORDS.has(token.text) || BOOLEAN_WORDS.has(token.text)) return false;
    } else if (token.text !== '.' && token.text !== '?.') {
      return false;
    }
    expectIdentifier = !expectIdentifier;
  }
  return !expectIdentifier;
}

function selectArgument(args: readonly CallArgument[], selector: ShapeArgument): CallArgument | undefined {
  if (selector.label !== undefined) {
    return args.find((arg) => arg.label === selector.label);
  }
  if (selector.position !== undefined) {
    const arg = args[selector.position];
    if (arg && selector.unlabeled && arg.label !== null) return undefined;
    return arg;
  }
  return undefined;
}

/**
 * Modifier names chained after the call closing at `close`:
 * `Image("x").resizable().accessibilityLabel("X")` yields resizable, accessibilityLabel.
 */
export function chainedModifiers(unit: SourceUnit, close: number): string[] {
  const { tokens, matching } = unit;
  const names: string[] = [];
  let k = close + 1;

  const skipGroup = (opener: string): void => {
    if (tokens[k]?.text === opener && matching[k] > k) k = matching[k] + 1;
  };

  skipGroup('{');
  while (k < tokens.length) {
    const dot = tokens[k];
    const name = tokens[k + 1];
    if ((dot.text !== '.' && dot.text !== '?.') || !name || name.kind !== 'identifier') break;
    names.push(name.text);
    k += 2;
    skipGroup('(');
    skipGroup('{');
  }

  return names;
}

// ============================================================================
// COMPILE
// ============================================================================

export function compileShapePattern(pattern: ShapePattern): PatternMatcher {
  const { shape } = pattern;
  const callees = new Set(shape.call);
  const receivers = shape.receiver ? new Set(shape.receiver) : null;
  const notWithin = shape.not_within_calls ?? [];
  const lacks = shape.chain_lacks ?? [];
  const scopeFilter = compileScopeFilter(pattern);
  const selector = shape.argument;

  return {
    kind: 'shape',
    placeholders: new Set(['match', 'callee', 'label', 'value']),
    find(unit: SourceUnit): PatternMatch[] {
      const { tokens, matching } = unit;
      const matches: PatternMatch[] = [];

      for (let i = 0; i < tokens.length - 1; i++) {
        const callee = tokens[i];
        if (callee.kind !== 'identifier' || !callees.has(callee.text)) continue;
        if (tokens[i + 1].text !== '(') continue;
        const close = matching[i + 1];
        if (close < 0) continue;
        if (i > 0 && DECLARATION_WORDS.has(tokens[i - 1].text)) continue;

        let first = i;
        if (receivers) {
          const receiver = tokens[i - 2];
          if (i < 2 || tokens[i - 1].text !== '.' || !receiver || !receivers.has(receiver.text)) continue;
          first = i - 2;
        }

        if (notWithin.length > 0 && enclosingCalls(unit, i).some((name) => notWithin.includes(name))) continue;
        if (lacks.length > 0 && chainedModifiers(unit, close).some((name) => lacks.includes(name))) continue;
        if (scopeFilter && !scopeFilter(unit, i)) continue;

        let argument: CallArgument | undefined;
        if (selector) {
          argument = selectArgument(splitArguments(unit, i + 1, close), selector);
          if (!argument || !valueMatches(tokens, argument.start, argument.end, selector)) continue;
        }

        // The span opens at the call so a directive above a multi-line call covers it.
        const spanEnd = argument ? argument.end : close;
        const spanTokens = tokens.slice(first, spanEnd + 1);
        const callTokens = tokens.slice(first, close + 1);
        const matchText = callTokens.length > MAX_MATCH_TOKENS
          ? `${callTokens.slice(0, MAX_MATCH_TOKENS).map((t) => t.text).join(' ')} ...`
          : callTokens.map((t) => t.text).join(' ');
        const value = argument ? tokens.slice(argument.start, argument.end + 1).map((t) => t.text).join('') : '';

        matches.push({
          lineStart: tokens[first].line,
          lineEnd: Math.max(...spanTokens.map((t) => t.endLine)),
          column: tokens[first].column,
          text: matchText,
          captures: {
            match: matchText,
            callee: callee.text,
            label: argument?.label ?? '',
            value,
          },
        });
      }

      return matches;
    },
  };
}
