/**
 * @fileoverview Language-neutral tokenizer
 *
 * Produces a whitespace- and comment-insensitive token stream for the C-family
 * syntaxes UI code is written in (Swift, Kotlin, Java, Dart, JS/TS, ObjC).
 * Comments are not tokens; they are returned separately because suppression
 * directives live in them.
 *
 * @packageDocumentation
 */

import type { SourceComment, Token, TokenKind } from '../types.js';

export interface TokenizeResult {
  tokens: Token[];
  comments: SourceComment[];
  lineCount: number;
}

// Longest first.
const MULTI_CHAR_PUNCT = [
  '===', '!==', '...', '..<',
  '->', '=>', '==', '!=', '<=', '>=', '&&', '||', '??', '?.', '::', '+=', '-=', '*=', '/=', '..',
];

const IDENT_START = /[A-Za-z_$\p{L}]/u;
const IDENT_PART = /[A-Za-z0-9_$\p{L}\p{N}]/u;
const DIGIT = /[0-9]/;
const HEX_DIGIT = /[0-9A-Fa-f_]/;
const WHITESPACE = /\s/;

export function tokenize(source: string): TokenizeResult {
  const tokens: Token[] = [];
  const comments: SourceComment[] = [];
  let pos = 0;
  let line = 1;
  let column = 1;
  let lastCodeLine = 0;

  const at = (offset = 0): string => source[pos + offset] ?? '';

  const advance = (count = 1): void => {
    for (let i = 0; i < count && pos < source.length; i++) {
      if (source[pos] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
      pos++;
    }
  };

  const push = (kind: TokenKind, start: number, startLine: number, startColumn: number): void => {
    tokens.push({
      kind,
      text: source.slice(start, pos),
      line: startLine,
      column: startColumn,
      endLine: line,
      endColumn: column - 1,
    });
    lastCodeLine = line;
  };

  const readQuoted = (quote: string): void => {
    const triple = at(1) === quote && at(2) === quote;
    if (triple) {
      advance(3);
      while (pos < source.length && !(at() === quote && at(1) === quote && at(2) === quote)) {
        advance(at() === '\\' ? 2 : 1);
      }
      advance(3);
      return;
    }
    advance();
    const multiline = quote === '`';
    while (pos < source.length && at() !== quote) {
      if (at() === '\n' && !multiline) return;
      advance(at() === '\\' ? 2 : 1);
    }
    advance();
  };

  const readNumber = (): void => {
    if (at() === '0' && /[xXbBoO]/.test(at(1))) {
      advance(2);
      while (HEX_DIGIT.test(at())) advance();
      return;
    }
    while (DIGIT.test(at()) || at() === '_') advance();
    if (at() === '.' && DIGIT.test(at(1))) {
      advance();
      while (DIGIT.test(at()) || at() === '_') advance();
    }
    if (/[eE]/.test(at()) && (DIGIT.test(at(1)) || (/[+-]/.test(at(1)) && DIGIT.test(at(2))))) {
      advance(2);
      while (DIGIT.test(at())) advance();
    }
    // Type suffixes: 17f, 10L, 2.5f
    while (/[A-Za-z]/.test(at())) advance();
  };

  const previousAllowsLeadingDot = (): boolean => {
    const prev = tokens[tokens.length - 1];
    if (!prev) return true;
    return !(prev.kind === 'identifier' || prev.kind === 'number' || prev.text === ')' || prev.text === ']');
  };

  while (pos < source.length) {
    const ch = at();

    if (WHITESPACE.test(ch)) {
      advance();
      continue;
    }

    const startLine = line;
    const startColumn = column;
    const start = pos;

    if (ch === '/' && at(1) === '/') {
      const trailing = lastCodeLine === line;
      while (pos < source.length && at() !== '\n') advance();
      comments.push({ text: source.slice(start + 2, pos).trim(), line: startLine, endLine: startLine, trailing });
      continue;
    }

    if (ch === '/' && at(1) === '*') {
      const trailing = lastCodeLine === line;
      advance(2);
      while (pos < source.length && !(at() === '*' && at(1) === '/')) advance();
      const end = pos;
      advance(2);
      comments.push({ text: source.slice(start + 2, end).trim(), line: startLine, endLine: line, trailing });
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') {
      readQuoted(ch);
      push('string', start, startLine, startColumn);
      continue;
    }

    if (DIGIT.test(ch) || (ch === '.' && DIGIT.test(at(1)) && previousAllowsLeadingDot())) {
      readNumber();
      push('number', start, startLine, startColumn);
      continue;
    }

    if (IDENT_START.test(ch) || ((ch === '@' || ch === '#') && IDENT_START.test(at(1)))) {
      advance();
      while (pos < source.length && IDENT_PART.test(at())) advance();
      push('identifier', start, startLine, startColumn);
      continue;
    }

    const multi = MULTI_CHAR_PUNCT.find((op) => source.startsWith(op, pos));
    advance(multi ? multi.length : 1);
    push('punct', start, startLine, startColumn);
  }

  const lineCount = source.length === 0 ? 0 : source.split('\n').length;
  return { tokens, comments, lineCount };
}
