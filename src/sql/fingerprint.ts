/**
 * @fileoverview Operation fingerprinting
 *
 * Reduces an operation's text to its shape: every literal becomes `?`,
 * keywords fold to upper case, `IN` lists and repeated `VALUES` tuples
 * collapse, and tokens are re-joined with single spaces. Two operations
 * that differ only in literal values or whitespace share a fingerprint,
 * and `fingerprint(fingerprint(x)) === fingerprint(x)`.
 */

import { DEFAULT_DIALECT, type SqlDialect } from './dialect.js';
import { isKeyword, isKeywordToken, isLiteral, tokenizeSql, type SqlToken } from './tokenizer.js';

const PLACEHOLDER: SqlToken = { type: 'parameter', value: '?' };

/** Keywords written like function calls, with no space before `(`. */
const CALL_KEYWORDS = new Set(['COUNT', 'SUM', 'AVG', 'MIN', 'MAX', 'COALESCE', 'CAST']);

function isUnaryPosition(previous: SqlToken | undefined): boolean {
  if (!previous) return true;
  if (previous.type === 'operator') return true;
  if (previous.type === 'punctuation') return previous.value !== ')';
  return previous.type === 'word' && isKeyword(previous.value);
}

/**
 * Literals to placeholders, keyword case folding and unary minus folding.
 */
function canonicalize(tokens: readonly SqlToken[]): SqlToken[] {
  const out: SqlToken[] = [];
  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];
    if (!token) continue;
    const next = tokens[i + 1];
    const previous = out[out.length - 1];

    if (token.type === 'operator' && token.value === '-' && next?.type === 'number' && isUnaryPosition(previous)) {
      out.push(PLACEHOLDER);
      i += 1;
      continue;
    }
    if (isLiteral(token)) {
      out.push(PLACEHOLDER);
      continue;
    }
    const afterDot = previous?.type === 'punctuation' && previous.value === '.';
    if (token.type === 'word' && !afterDot && isKeyword(token.value)) {
      out.push({ type: 'word', value: token.value.toUpperCase() });
      continue;
    }
    out.push(token);
  }
  return out;
}

function isPunct(token: SqlToken | undefined, value: string): boolean {
  return token?.type === 'punctuation' && token.value === value;
}

function isPlaceholder(token: SqlToken | undefined): boolean {
  return token?.type === 'parameter';
}

/** Index just past a `( ? , ? , … )` list starting at `start`, or -1. */
function placeholderListEnd(tokens: readonly SqlToken[], start: number): number {
  if (!isPunct(tokens[start], '(') || !isPlaceholder(tokens[start + 1])) return -1;
  let i = start + 2;
  while (isPunct(tokens[i], ',') && isPlaceholder(tokens[i + 1])) {
    i += 2;
  }
  return isPunct(tokens[i], ')') ? i + 1 : -1;
}

/** Index just past the balanced group opening at `start`, or -1. */
function groupEnd(tokens: readonly SqlToken[], start: number): number {
  if (!isPunct(tokens[start], '(')) return -1;
  let depth = 0;
  for (let i = start; i < tokens.length; i += 1) {
    if (isPunct(tokens[i], '(')) depth += 1;
    if (isPunct(tokens[i], ')')) {
      depth -= 1;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function sameTokens(a: readonly SqlToken[], b: readonly SqlToken[]): boolean {
  return a.length === b.length && a.every((token, index) => token.value === b[index]?.value);
}

function collapseLists(tokens: readonly SqlToken[]): SqlToken[] {
  const out: SqlToken[] = [];
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    if (!token) break;
    out.push(token);
    i += 1;

    if (isKeywordToken(token, 'IN')) {
      const end = placeholderListEnd(tokens, i);
      if (end !== -1) {
        out.push({ type: 'punctuation', value: '(' }, PLACEHOLDER, { type: 'punctuation', value: ')' });
        i = end;
      }
      continue;
    }

    if (isKeywordToken(token, 'VALUES')) {
      const end = groupEnd(tokens, i);
      if (end === -1) continue;
      const tuple = tokens.slice(i, end);
      out.push(...tuple);
      i = end;
      while (isPunct(tokens[i], ',')) {
        const nextEnd = groupEnd(tokens, i + 1);
        if (nextEnd === -1 || !sameTokens(tokens.slice(i + 1, nextEnd), tuple)) break;
        i = nextEnd;
      }
    }
  }
  return out;
}

function needsSpace(previous: SqlToken, current: SqlToken): boolean {
  if (current.type === 'punctuation' && [',', ')', '.', ';', ']'].includes(current.value)) return false;
  if (previous.type === 'punctuation' && ['(', '.', '['].includes(previous.value)) return false;
  if (isPunct(current, '(') && previous.type === 'word') {
    const upper = previous.value.toUpperCase();
    return isKeyword(upper) && !CALL_KEYWORDS.has(upper);
  }
  return true;
}

function join(tokens: readonly SqlToken[]): string {
  let result = '';
  let previous: SqlToken | undefined;
  for (const token of tokens) {
    if (previous && needsSpace(previous, token)) {
      result += ' ';
    }
    result += token.value;
    previous = token;
  }
  return result;
}

export function fingerprint(text: string, dialect: SqlDialect = DEFAULT_DIALECT): string {
  return join(collapseLists(canonicalize(tokenizeSql(text, dialect))));
}

/**
 * Memoizing wrapper for one analysis pass; many traces repeat the same text.
 */
export class FingerprintCache {
  private readonly entries = new Map<string, string>();

  constructor(readonly dialect: SqlDialect = DEFAULT_DIALECT) {}

  get(text: string): string {
    const cached = this.entries.get(text);
    if (cached !== undefined) return cached;
    const value = fingerprint(text, this.dialect);
    this.entries.set(text, value);
    return value;
  }
}
