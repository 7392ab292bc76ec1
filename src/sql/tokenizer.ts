/**
 * @fileoverview SQL tokenizer
 *
 * A total lexer: it never throws, and any character it does not recognise
 * becomes a one-character operator token. Comments are dropped. An
 * unterminated quote consumes the rest of the input. The dialect decides
 * whether `"..."` is a string or an identifier and whether backslashes
 * escape inside strings.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_DIALECT, quotingFor, type SqlDialect } from './dialect.js';

export type SqlTokenType =
  | 'word'
  | 'quoted_identifier'
  | 'string'
  | 'number'
  | 'parameter'
  | 'operator'
  | 'punctuation';

export interface SqlToken {
  readonly type: SqlTokenType;
  readonly value: string;
}

const keywordList = z
  .array(z.string().min(1))
  .parse(JSON.parse(readFileSync(new URL('../../data/sql_keywords.json', import.meta.url), 'utf8')));

const KEYWORDS: ReadonlySet<string> = new Set(keywordList.map((word) => word.toUpperCase()));

export function isKeyword(word: string): boolean {
  return KEYWORDS.has(word.toUpperCase());
}

/** True for a `word` token that is the given keyword, case-insensitively. */
export function isKeywordToken(token: SqlToken | undefined, keyword: string): boolean {
  return token?.type === 'word' && token.value.toUpperCase() === keyword;
}

const MULTI_CHAR_OPERATORS = ['<=>', '->>', '<=', '>=', '<>', '!=', '||', '::', '->', '=='];
const PUNCTUATION = new Set(['(', ')', ',', ';', '.', '[', ']']);
const NUMBER_PATTERN = /^(?:0x[0-9a-f]+|\d+(?:\.\d*)?(?:e[+-]?\d+)?|\.\d+(?:e[+-]?\d+)?)/i;
const WORD_START = /[A-Za-z_\u0080-￿]/;
const WORD_PART = /[A-Za-z0-9_$\u0080-￿]/;

function readQuoted(text: string, start: number, quote: string, backslashEscapes: boolean): number {
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (backslashEscapes && ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (text[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i += 1;
  }
  return text.length;
}

function readWord(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length && WORD_PART.test(text[i] ?? '')) {
    i += 1;
  }
  return i;
}

export function tokenizeSql(text: string, dialect: SqlDialect = DEFAULT_DIALECT): SqlToken[] {
  const { doubleQuotedStrings, backslashEscapes } = quotingFor(dialect);
  const tokens: SqlToken[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i] ?? '';
    const next = text[i + 1] ?? '';

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (ch === '-' && next === '-') {
      const end = text.indexOf('\n', i);
      i = end === -1 ? text.length : end + 1;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = text.indexOf('*/', i + 2);
      i = end === -1 ? text.length : end + 2;
      continue;
    }

    if (ch === "'" || (ch === '"' && doubleQuotedStrings)) {
      const end = readQuoted(text, i, ch, backslashEscapes);
      tokens.push({ type: 'string', value: text.slice(i, end) });
      i = end;
      continue;
    }

    if (ch === '"' || ch === '`') {
      const end = readQuoted(text, i, ch, false);
      tokens.push({ type: 'quoted_identifier', value: text.slice(i, end) });
      i = end;
      continue;
    }

    const numberMatch = /[0-9.]/.test(ch) ? NUMBER_PATTERN.exec(text.slice(i)) : null;
    if (numberMatch) {
      tokens.push({ type: 'number', value: numberMatch[0] });
      i += numberMatch[0].length;
      continue;
    }

    if (ch === '?') {
      tokens.push({ type: 'parameter', value: '?' });
      i += 1;
      continue;
    }

    if (ch === '$' && /\d/.test(next)) {
      let end = i + 1;
      while (end < text.length && /\d/.test(text[end] ?? '')) end += 1;
      tokens.push({ type: 'parameter', value: text.slice(i, end) });
      i = end;
      continue;
    }

    if (ch === ':' && WORD_START.test(next)) {
      const end = readWord(text, i + 1);
      tokens.push({ type: 'parameter', value: text.slice(i, end) });
      i = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      const end = readWord(text, i);
      tokens.push({ type: 'word', value: text.slice(i, end) });
      i = end;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ type: 'punctuation', value: ch });
      i += 1;
      continue;
    }

    const operator = MULTI_CHAR_OPERATORS.find((op) => text.startsWith(op, i)) ?? ch;
    tokens.push({ type: 'operator', value: operator });
    i += operator.length;
  }

  return tokens;
}

export function isLiteral(token: SqlToken): boolean {
  return token.type === 'string' || token.type === 'number' || token.type === 'parameter';
}

/** Unquoted text of a string token, with doubled quotes folded. */
export function stringLiteralValue(token: SqlToken): string {
  const quote = token.value.charAt(0);
  const body = token.value.endsWith(quote) && token.value.length > 1
    ? token.value.slice(1, -1)
    : token.value.slice(1);
  return body.split(quote + quote).join(quote);
}
