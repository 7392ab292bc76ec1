/**
 * @fileoverview Token scans shared by the analyzers that read statement text
 */

import { isKeyword, isKeywordToken, type SqlToken } from './tokenizer.js';

/** A column, table or alias name: a non-keyword word or a quoted identifier. */
export function isIdentifier(token: SqlToken | undefined): token is SqlToken {
  if (!token) return false;
  if (token.type === 'quoted_identifier') return true;
  return token.type === 'word' && !isKeyword(token.value);
}

export function isPunctuation(token: SqlToken | undefined, value: string): boolean {
  return token?.type === 'punctuation' && token.value === value;
}

/** Dotted name ending at `end`, such as `o.total`, or undefined when `end` is not an identifier. */
export function qualifiedNameEndingAt(tokens: readonly SqlToken[], end: number): string | undefined {
  const last = tokens[end];
  if (!isIdentifier(last)) return undefined;
  const parts = [last.value];
  let i = end;
  while (isPunctuation(tokens[i - 1], '.')) {
    const segment = tokens[i - 2];
    if (!isIdentifier(segment)) break;
    parts.unshift(segment.value);
    i -= 2;
  }
  return parts.join('.');
}

export interface QualifiedName {
  readonly name: string;
  /** Index of the name's last token. */
  readonly end: number;
}

/** Dotted name starting at `start`, or undefined when `start` is not an identifier. */
export function qualifiedNameStartingAt(tokens: readonly SqlToken[], start: number): QualifiedName | undefined {
  const first = tokens[start];
  if (!isIdentifier(first)) return undefined;
  const parts = [first.value];
  let end = start;
  while (isPunctuation(tokens[end + 1], '.')) {
    const segment = tokens[end + 2];
    if (!isIdentifier(segment)) break;
    parts.push(segment.value);
    end += 2;
  }
  return { name: parts.join('.'), end };
}

export function countKeyword(tokens: readonly SqlToken[], keyword: string): number {
  return tokens.filter((token) => isKeywordToken(token, keyword)).length;
}

export function hasKeyword(tokens: readonly SqlToken[], keyword: string): boolean {
  return tokens.some((token) => isKeywordToken(token, keyword));
}

/** Index of the first `keyword` outside parentheses, or -1. */
export function topLevelIndex(tokens: readonly SqlToken[], keyword: string): number {
  let depth = 0;
  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];
    if (isPunctuation(token, '(')) depth += 1;
    if (isPunctuation(token, ')')) depth = Math.max(0, depth - 1);
    if (depth === 0 && isKeywordToken(token, keyword)) return i;
  }
  return -1;
}
