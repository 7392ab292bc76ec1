/**
 * @fileoverview SQL structure extraction
 *
 * Answers the handful of structural questions the trace analyzers ask
 * (statement type, WHERE / LIMIT / ORDER BY presence, referenced tables,
 * aggregate-only projections, leading-wildcard LIKE patterns).
 *
 * The node-sql-parser AST is consulted first. Text it cannot parse (vendor
 * syntax, placeholders the grammar rejects) falls back to a top-level
 * token scan, which answers the same questions less precisely.
 */

import sqlParser from 'node-sql-parser';
import { getArray, getProperty, getString, hasProperty } from '../core/property_access.js';
import { logDebug } from '../telemetry/logger.js';
import type { OperationParameters } from '../types.js';
import { DEFAULT_DIALECT, type SqlDialect } from './dialect.js';
import { isKeyword, isKeywordToken, stringLiteralValue, tokenizeSql, type SqlToken } from './tokenizer.js';

// ============================================================================
// TYPES
// ============================================================================

export type StatementType = 'select' | 'insert' | 'update' | 'delete' | 'other';

export interface SqlStructure {
  readonly statement: StatementType;
  readonly hasWhere: boolean;
  readonly hasLimit: boolean;
  readonly hasOrderBy: boolean;
  /** Every projected column is an aggregate (`COUNT(*)`, `SUM(x)`, ...). */
  readonly aggregateOnly: boolean;
  readonly tables: readonly string[];
  readonly source: 'ast' | 'tokens';
}

export type { SqlDialect } from './dialect.js';

const AGGREGATES = new Set(['COUNT', 'SUM', 'AVG', 'MIN', 'MAX']);
const STATEMENTS: ReadonlySet<string> = new Set(['select', 'insert', 'update', 'delete']);
const TABLE_INTRODUCERS = ['FROM', 'JOIN', 'UPDATE', 'INTO'];

function toStatementType(value: string | undefined): StatementType {
  const lower = value?.toLowerCase() ?? '';
  if (lower === 'select' || lower === 'insert' || lower === 'update' || lower === 'delete') {
    return lower;
  }
  // node-sql-parser reports REPLACE INTO as its own type
  return lower === 'replace' ? 'insert' : 'other';
}

// ============================================================================
// AST PATH
// ============================================================================

function isAggregateColumn(column: unknown): boolean {
  const expr = getProperty(column, 'expr');
  return getString(expr, 'type') === 'aggr_func';
}

function tablesFromAst(ast: unknown): string[] {
  const tables: string[] = [];
  const items = [...(getArray(ast, 'from') ?? []), ...(getArray(ast, 'table') ?? [])];
  for (const item of items) {
    const table = getString(item, 'table');
    if (table && !tables.includes(table)) {
      tables.push(table);
    }
  }
  return tables;
}

function structureFromAst(ast: unknown): SqlStructure | null {
  const statement = toStatementType(getString(ast, 'type'));
  if (!STATEMENTS.has(statement)) {
    return null;
  }
  const columns = getArray(ast, 'columns');
  const limitValues = getArray(getProperty(ast, 'limit'), 'value');
  const orderBy = getArray(ast, 'orderby');
  return {
    statement,
    hasWhere: hasProperty(ast, 'where'),
    hasLimit: limitValues !== undefined && limitValues.length > 0,
    hasOrderBy: orderBy !== undefined && orderBy.length > 0,
    aggregateOnly: columns !== undefined && columns.length > 0 && columns.every(isAggregateColumn),
    tables: tablesFromAst(ast),
    source: 'ast',
  };
}

// ============================================================================
// TOKEN PATH
// ============================================================================

interface DepthToken {
  readonly token: SqlToken;
  readonly depth: number;
}

function withDepth(tokens: readonly SqlToken[]): DepthToken[] {
  let depth = 0;
  return tokens.map((token) => {
    if (token.type === 'punctuation' && token.value === ')') depth = Math.max(0, depth - 1);
    const entry = { token, depth };
    if (token.type === 'punctuation' && token.value === '(') depth += 1;
    return entry;
  });
}

function unquote(identifier: string): string {
  const first = identifier.charAt(0);
  return (first === '"' || first === '`') && identifier.length > 1 ? identifier.slice(1, -1) : identifier;
}

function tableAfter(tokens: readonly SqlToken[], index: number): string | undefined {
  let i = index;
  let name: string | undefined;
  // schema.table keeps the last segment
  while (true) {
    const token = tokens[i];
    if (!token || (token.type !== 'word' && token.type !== 'quoted_identifier')) break;
    if (token.type === 'word' && isKeyword(token.value)) break;
    name = unquote(token.value);
    const dot = tokens[i + 1];
    if (dot?.type !== 'punctuation' || dot.value !== '.') break;
    i += 2;
  }
  return name;
}

function projectionIsAggregateOnly(top: readonly DepthToken[], selectIndex: number): boolean {
  const items: DepthToken[][] = [[]];
  for (let i = selectIndex + 1; i < top.length; i += 1) {
    const entry = top[i];
    if (!entry) break;
    if (entry.depth === 0 && isKeywordToken(entry.token, 'FROM')) break;
    if (entry.depth === 0 && entry.token.type === 'punctuation' && entry.token.value === ',') {
      items.push([]);
      continue;
    }
    items[items.length - 1]?.push(entry);
  }
  return items.every((item) => {
    const [head, open] = item;
    return (
      head !== undefined &&
      head.token.type === 'word' &&
      AGGREGATES.has(head.token.value.toUpperCase()) &&
      open?.token.value === '('
    );
  });
}

/**
 * Structure from a depth-aware token scan. Exported for the cases the AST
 * path never reaches in practice (unparseable vendor syntax).
 */
export function structureFromTokens(text: string, dialect: SqlDialect = DEFAULT_DIALECT): SqlStructure {
  const tokens = tokenizeSql(text, dialect);
  const entries = withDepth(tokens);
  const topLevel = (keyword: string): number =>
    entries.findIndex((entry) => entry.depth === 0 && isKeywordToken(entry.token, keyword));

  const leading = entries.find((entry) => entry.depth === 0 && entry.token.type === 'word');
  let statement = toStatementType(leading?.token.value);
  if (leading && isKeywordToken(leading.token, 'WITH')) {
    const main = entries.find(
      (entry) =>
        entry.depth === 0 &&
        entry.token.type === 'word' &&
        STATEMENTS.has(entry.token.value.toLowerCase()),
    );
    statement = toStatementType(main?.token.value);
  }

  const orderIndex = topLevel('ORDER');
  const selectIndex = topLevel('SELECT');
  const tables: string[] = [];
  tokens.forEach((token, index) => {
    if (!TABLE_INTRODUCERS.some((keyword) => isKeywordToken(token, keyword))) return;
    const table = tableAfter(tokens, index + 1);
    if (table && !tables.includes(table)) tables.push(table);
  });

  return {
    statement,
    hasWhere: topLevel('WHERE') !== -1,
    hasLimit: topLevel('LIMIT') !== -1 || topLevel('FETCH') !== -1 || topLevel('TOP') !== -1,
    hasOrderBy: orderIndex !== -1 && isKeywordToken(entries[orderIndex + 1]?.token, 'BY'),
    aggregateOnly: statement === 'select' && selectIndex !== -1 && projectionIsAggregateOnly(entries, selectIndex),
    tables,
    source: 'tokens',
  };
}

// ============================================================================
// LIKE PATTERNS
// ============================================================================

function boundValue(token: SqlToken, positional: number, parameters: OperationParameters): unknown {
  if (token.value === '?') {
    return parameters.get(positional);
  }
  if (token.value.startsWith('$')) {
    return parameters.get(Number(token.value.slice(1)) - 1);
  }
  const name = token.value.slice(1);
  return parameters.get(name) ?? parameters.get(token.value);
}

/**
 * LIKE / ILIKE comparisons whose pattern starts with `%`, either written
 * inline or bound through a parameter marker.
 */
export function countLeadingWildcardLikes(
  text: string,
  parameters: OperationParameters,
  dialect: SqlDialect = DEFAULT_DIALECT,
): number {
  const tokens = tokenizeSql(text, dialect);
  let positional = 0;
  let count = 0;
  tokens.forEach((token, index) => {
    const previous = tokens[index - 1];
    const comparesLike = isKeywordToken(previous, 'LIKE') || isKeywordToken(previous, 'ILIKE');
    if (token.type === 'parameter') {
      const value = boundValue(token, positional, parameters);
      if (token.value === '?') positional += 1;
      if (comparesLike && typeof value === 'string' && value.startsWith('%')) count += 1;
      return;
    }
    if (comparesLike && token.type === 'string' && stringLiteralValue(token).startsWith('%')) {
      count += 1;
    }
  });
  return count;
}

// ============================================================================
// READER
// ============================================================================

/**
 * Parses and tokenizes each distinct text once per reader. One reader serves
 * one pass.
 */
export class SqlStructureReader {
  private readonly parser = new sqlParser.Parser();
  private readonly cache = new Map<string, SqlStructure>();
  private readonly tokenCache = new Map<string, readonly SqlToken[]>();

  constructor(readonly dialect: SqlDialect = DEFAULT_DIALECT) {}

  tokens(text: string): readonly SqlToken[] {
    const cached = this.tokenCache.get(text);
    if (cached) return cached;
    const tokens = tokenizeSql(text, this.dialect);
    this.tokenCache.set(text, tokens);
    return tokens;
  }

  read(text: string): SqlStructure {
    const cached = this.cache.get(text);
    if (cached) return cached;
    const structure = this.parse(text);
    this.cache.set(text, structure);
    return structure;
  }

  private parse(text: string): SqlStructure {
    try {
      const parsed: unknown = this.parser.astify(text, { database: this.dialect });
      const ast: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
      const structure = structureFromAst(ast);
      if (structure) return structure;
    } catch (error) {
      logDebug('[sql] parser rejected text, using token scan', {
        dialect: this.dialect,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return structureFromTokens(text, this.dialect);
  }
}
