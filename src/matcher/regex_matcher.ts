import { RuleCompileError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import type { PatternMatch, PatternMatcher, RegexPattern, SourceUnit, Token } from '../types.js';
import { compileScopeFilter } from './scope_filter.js';

const ALLOWED_FLAGS = /^[ius]*$/;

interface NormalizedLine {
  line: number;
  text: string;
  /** Token indexes on this line with their offsets into `text`. */
  tokens: Array<{ index: number; offset: number }>;
}

/**
 * Group tokens by their starting line and join each group with single spaces.
 * Regex rules see this normalized text, never raw source.
 */
export function normalizeLines(tokens: readonly Token[]): NormalizedLine[] {
  const lines: NormalizedLine[] = [];
  let current: NormalizedLine | null = null;

  tokens.forEach((token, index) => {
    if (!current || current.line !== token.line) {
      current = { line: token.line, text: '', tokens: [] };
      lines.push(current);
    }
    if (current.text.length > 0) current.text += ' ';
    current.tokens.push({ index, offset: current.text.length });
    current.text += token.text;
  });

  return lines;
}

function tokenAtOffset(line: NormalizedLine, offset: number): number {
  let found = line.tokens[0].index;
  for (const entry of line.tokens) {
    if (entry.offset > offset) break;
    found = entry.index;
  }
  return found;
}

export function compileRegexPattern(pattern: RegexPattern, ruleId: string): PatternMatcher {
  const flags = pattern.flags ?? '';
  if (!ALLOWED_FLAGS.test(flags)) {
    throw new RuleCompileError(ruleId, `unsupported regex flags "${flags}" (allowed: i, u, s)`);
  }

  let regex: RegExp;
  let probe: RegExpExecArray | null;
  try {
    regex = new RegExp(pattern.regex, `${flags}g`);
    probe = new RegExp(`(?:${pattern.regex})|`, flags).exec('');
  } catch (error: unknown) {
    throw new RuleCompileError(ruleId, `invalid regex: ${getErrorMessage(error)}`);
  }

  const groupCount = probe ? probe.length - 1 : 0;
  const groupNames = probe?.groups ? Object.keys(probe.groups) : [];
  const placeholders = new Set(['match', ...groupNames]);
  for (let i = 1; i <= groupCount; i++) placeholders.add(String(i));

  const scopeFilter = compileScopeFilter(pattern);

  return {
    kind: 'regex',
    placeholders,
    find(unit: SourceUnit): PatternMatch[] {
      const matches: PatternMatch[] = [];

      for (const line of normalizeLines(unit.tokens)) {
        for (const match of line.text.matchAll(regex)) {
          if (match[0].length === 0) continue;
          const offset = match.index ?? 0;
          const anchor = tokenAtOffset(line, offset);
          const last = tokenAtOffset(line, offset + match[0].length - 1);
          if (scopeFilter && !scopeFilter(unit, anchor)) continue;

          const captures: Record<string, string> = { match: match[0] };
          for (let i = 1; i <= groupCount; i++) captures[String(i)] = match[i] ?? '';
          for (const [name, value] of Object.entries(match.groups ?? {})) captures[name] = value ?? '';

          matches.push({
            lineStart: line.line,
            lineEnd: unit.tokens[last].endLine,
            column: unit.tokens[anchor].column,
            text: match[0],
            captures,
          });
        }
      }

      return matches;
    },
  };
}
