/**
 * @fileoverview Structural facts from bracket nesting
 *
 * Derives a scope tree from `{ }` nesting and call nesting from `( )` without
 * parsing the language. A scope is named from the statement head that opens
 * it: `struct Card: View {` is a declaration scope `Card`, `VStack(spacing: 8) {`
 * a call scope `VStack`, `if ready {` a block scope `if`.
 */

import type { Scope, ScopeKind, SourceUnit, Token } from '../types.js';

export interface StructureFacts {
  scopes: Scope[];
  tokenScope: number[];
  innermostParen: number[];
  matching: number[];
}

const DECLARATION_KEYWORDS = new Set([
  'class', 'struct', 'enum', 'protocol', 'extension', 'interface', 'object', 'actor',
  'func', 'fun', 'function', 'fn', 'def', 'init', 'constructor', 'typealias',
  'var', 'let', 'val', 'const', 'get', 'set', 'willSet', 'didSet',
]);

const CONTROL_KEYWORDS = new Set([
  'if', 'else', 'for', 'while', 'switch', 'guard', 'do', 'try', 'catch', 'finally',
  'when', 'repeat', 'defer', 'case', 'default',
]);

/** Tokens that let a statement head continue onto the previous line. */
const CONTINUATION_TAIL = new Set([
  '(', ',', '.', ':', '=', '->', '=>', '&&', '||', '+', '-', '*', '/', '<', '?', '??',
]);

const OPENERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };
const MAX_HEAD_TOKENS = 48;

export function analyzeStructure(tokens: readonly Token[]): StructureFacts {
  const scopes: Scope[] = [];
  const tokenScope = new Array<number>(tokens.length).fill(-1);
  const innermostParen = new Array<number>(tokens.length).fill(-1);
  const matching = new Array<number>(tokens.length).fill(-1);

  const bracketStack: number[] = [];
  const parenStack: number[] = [];
  const scopeStack: number[] = [];
  const braceScope = new Map<number, number>();

  const top = (stack: number[]): number => (stack.length > 0 ? stack[stack.length - 1] : -1);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    innermostParen[i] = top(parenStack);
    tokenScope[i] = top(scopeStack);
    if (token.kind !== 'punct') continue;

    switch (token.text) {
      case '(':
        parenStack.push(i);
        bracketStack.push(i);
        break;
      case '[':
        bracketStack.push(i);
        break;
      case '{': {
        const { name, kind } = nameScope(tokens, i);
        const parentId = labelledClosureOwner(tokens, i, matching, braceScope) ?? top(scopeStack);
        const scope: Scope = {
          id: scopes.length,
          name,
          kind,
          parent: parentId >= 0 ? parentId : null,
          startLine: token.line,
          endLine: token.line,
        };
        scopes.push(scope);
        scopeStack.push(scope.id);
        braceScope.set(i, scope.id);
        bracketStack.push(i);
        tokenScope[i] = scope.id;
        break;
      }
      case ')':
      case ']':
      case '}': {
        const opener = OPENERS[token.text];
        let depth = bracketStack.length - 1;
        while (depth >= 0 && tokens[bracketStack[depth]].text !== opener) depth--;
        if (depth < 0) break;

        const openIndex = bracketStack[depth];
        // Anything left open inside the pair is unbalanced; drop it.
        const dropped = bracketStack.splice(depth);
        matching[openIndex] = i;
        matching[i] = openIndex;

        for (const index of dropped) {
          if (tokens[index].text === '(') {
            const at = parenStack.lastIndexOf(index);
            if (at >= 0) parenStack.splice(at);
          } else if (tokens[index].text === '{') {
            const scopeId = braceScope.get(index);
            if (scopeId === undefined) continue;
            scopes[scopeId].endLine = token.line;
            const at = scopeStack.lastIndexOf(scopeId);
            if (at >= 0) scopeStack.splice(at);
          }
        }

        if (token.text === ')') {
          innermostParen[i] = top(parenStack);
        } else if (token.text === '}') {
          tokenScope[i] = braceScope.get(openIndex) ?? -1;
        }
        break;
      }
      default:
        break;
    }
  }

  const lastLine = tokens.length > 0 ? tokens[tokens.length - 1].endLine : 0;
  for (const scopeId of scopeStack) {
    scopes[scopeId].endLine = lastLine;
  }

  return { scopes, tokenScope, innermostParen, matching };
}

/**
 * `Button { ... } label: { ... }`: a labelled closure that follows a closing
 * brace continues the call of that brace, so its scope nests under it.
 */
function labelledClosureOwner(
  tokens: readonly Token[],
  braceIndex: number,
  matching: readonly number[],
  braceScope: ReadonlyMap<number, number>,
): number | undefined {
  if (braceIndex < 3) return undefined;
  const colon = tokens[braceIndex - 1];
  const label = tokens[braceIndex - 2];
  const close = tokens[braceIndex - 3];
  if (colon.text !== ':' || label.kind !== 'identifier' || close.text !== '}') return undefined;
  const open = matching[braceIndex - 3];
  return open >= 0 ? braceScope.get(open) : undefined;
}

/**
 * Name the scope opened by the `{` at `braceIndex` from its statement head.
 */
export function nameScope(tokens: readonly Token[], braceIndex: number): { name: string; kind: ScopeKind } {
  const head = collectHead(tokens, braceIndex);
  if (head.length === 0) return { name: '', kind: 'block' };

  const first = head[0];
  if (first.token.kind === 'identifier' && CONTROL_KEYWORDS.has(first.token.text)) {
    return { name: first.token.text, kind: 'block' };
  }

  for (let i = 0; i < head.length; i++) {
    const entry = head[i];
    if (entry.depth !== 0 || entry.token.kind !== 'identifier') continue;
    if (!DECLARATION_KEYWORDS.has(entry.token.text)) continue;
    const next = head[i + 1];
    const name = next && next.depth === 0 && next.token.kind === 'identifier' ? next.token.text : entry.token.text;
    return { name, kind: 'declaration' };
  }

  // Trailing closure: `VStack {`, `.onTapGesture {`
  const last = head[head.length - 1];
  if (last.token.kind === 'identifier') {
    return { name: last.token.text, kind: 'call' };
  }

  // `Callee(args) {`, or `Type name(args) {` for C-style method declarations.
  if (last.token.text === ')') {
    const calleeAt = head.findIndex((entry, i) => {
      const next = head[i + 1];
      return entry.depth === 0 && entry.token.kind === 'identifier' && next?.token.text === '(' && next.depth === 0
        && isLastGroup(head, i + 1);
    });
    if (calleeAt >= 0) {
      const callee = head[calleeAt];
      const before = head[calleeAt - 1];
      const isDeclaration = before !== undefined && before.depth === 0 && before.token.kind === 'identifier'
        && before.token.text !== 'new' && before.token.text !== 'return';
      return { name: callee.token.text, kind: isDeclaration ? 'declaration' : 'call' };
    }
  }

  // Closure passed as a labelled argument: `action: {`
  if (last.token.text === ':' && head.length >= 2 && head[head.length - 2].token.kind === 'identifier') {
    return { name: head[head.length - 2].token.text, kind: 'block' };
  }

  return { name: '', kind: 'block' };
}

interface HeadEntry {
  token: Token;
  depth: number;
}

function collectHead(tokens: readonly Token[], braceIndex: number): HeadEntry[] {
  const head: HeadEntry[] = [];
  let depth = 0;

  for (let j = braceIndex - 1; j >= 0 && head.length < MAX_HEAD_TOKENS; j--) {
    const token = tokens[j];
    const later = tokens[j + 1];

    if (depth === 0) {
      if (token.kind === 'punct' && (token.text === ';' || token.text === '{' || token.text === '}')) break;
      if (token.kind === 'punct' && (token.text === '(' || token.text === '[')) break;
      const crossesLine = token.endLine < later.line;
      if (crossesLine && !CONTINUATION_TAIL.has(token.text) && later.text !== '.' && later.text !== '?.') break;
    }

    if (token.text === ')' || token.text === ']') {
      head.unshift({ token, depth });
      depth++;
      continue;
    }
    if (token.text === '(' || token.text === '[') {
      depth--;
      head.unshift({ token, depth });
      continue;
    }
    head.unshift({ token, depth });
  }

  return head;
}

/** True when the `(` at `openAt` starts the last depth-0 group of the head. */
function isLastGroup(head: HeadEntry[], openAt: number): boolean {
  for (let i = openAt + 1; i < head.length; i++) {
    if (head[i].depth === 0 && head[i].token.text === '(') return false;
  }
  return true;
}

// ============================================================================
// QUERIES
// ============================================================================

/**
 * Enclosing scopes of a token, innermost first.
 */
export function scopeStackAt(unit: SourceUnit, tokenIndex: number): Scope[] {
  const stack: Scope[] = [];
  let id: number | null = unit.tokenScope[tokenIndex] ?? -1;
  while (id !== null && id >= 0) {
    const scope: Scope | undefined = unit.scopes[id];
    if (!scope) break;
    stack.push(scope);
    id = scope.parent;
  }
  return stack;
}

/**
 * Callee names of the open parentheses around a token, innermost first.
 */
export function enclosingCalls(unit: SourceUnit, tokenIndex: number): string[] {
  const names: string[] = [];
  let paren = unit.innermostParen[tokenIndex] ?? -1;
  while (paren >= 0) {
    const callee = unit.tokens[paren - 1];
    if (callee && callee.kind === 'identifier') names.push(callee.text);
    paren = unit.innermostParen[paren];
  }
  return names;
}

/**
 * Names a token is structurally inside: scope names plus enclosing callees.
 */
export function enclosingNames(unit: SourceUnit, tokenIndex: number): Set<string> {
  const names = new Set<string>();
  for (const scope of scopeStackAt(unit, tokenIndex)) {
    if (scope.name) names.add(scope.name);
  }
  for (const callee of enclosingCalls(unit, tokenIndex)) {
    names.add(callee);
  }
  return names;
}
