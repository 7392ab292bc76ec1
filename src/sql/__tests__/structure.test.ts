/**
 * @fileoverview Tests for SQL structure extraction
 */

import { describe, it, expect } from 'vitest';
import { countLeadingWildcardLikes, SqlStructureReader, structureFromTokens } from '../structure.js';

describe('structureFromTokens', () => {
  it('reads clauses at the top level only', () => {
    const structure = structureFromTokens(
      'SELECT * FROM public.users u WHERE u.id IN (SELECT user_id FROM orders LIMIT 5)',
    );

    expect(structure).toEqual({
      statement: 'select',
      hasWhere: true,
      hasLimit: false,
      hasOrderBy: false,
      aggregateOnly: false,
      tables: ['users', 'orders'],
      source: 'tokens',
    });
  });

  it('looks past a WITH clause to the main statement', () => {
    const structure = structureFromTokens('WITH recent AS (SELECT * FROM posts) SELECT id FROM recent ORDER BY id');

    expect(structure.statement).toBe('select');
    expect(structure.hasOrderBy).toBe(true);
    expect(structure.hasLimit).toBe(false);
    expect(structure.tables).toEqual(['posts', 'recent']);
  });

  it('recognises aggregate-only projections', () => {
    expect(structureFromTokens('SELECT COUNT(*), MAX(age) FROM users').aggregateOnly).toBe(true);
    expect(structureFromTokens('SELECT COUNT(*), name FROM users').aggregateOnly).toBe(false);
  });

  it('treats TOP and FETCH as row limits', () => {
    expect(structureFromTokens('SELECT TOP 10 * FROM logs').hasLimit).toBe(true);
    expect(structureFromTokens('SELECT * FROM logs FETCH FIRST 10 ROWS ONLY').hasLimit).toBe(true);
  });

  it('unquotes table names of write statements', () => {
    const structure = structureFromTokens('UPDATE `accounts` SET balance = 0');

    expect(structure.statement).toBe('update');
    expect(structure.hasWhere).toBe(false);
    expect(structure.tables).toEqual(['accounts']);
  });

  it('reports other statements as other', () => {
    expect(structureFromTokens('SHOW VARIABLES').statement).toBe('other');
  });
});

describe('countLeadingWildcardLikes', () => {
  it('counts inline patterns starting with %', () => {
    expect(countLeadingWildcardLikes("SELECT * FROM users WHERE name LIKE '%son'", new Map())).toBe(1);
    expect(countLeadingWildcardLikes("SELECT * FROM users WHERE name LIKE 'son%'", new Map())).toBe(0);
  });

  it('resolves positional, numbered and named parameters', () => {
    expect(
      countLeadingWildcardLikes(
        'SELECT * FROM users WHERE a = ? AND name LIKE ?',
        new Map<string | number, unknown>([
          [0, 1],
          [1, '%x'],
        ]),
      ),
    ).toBe(1);
    expect(countLeadingWildcardLikes('SELECT * FROM users WHERE name ILIKE $2', new Map([[1, '%a']]))).toBe(1);
    expect(countLeadingWildcardLikes('SELECT * FROM users WHERE name LIKE :term', new Map([['term', '%a']]))).toBe(1);
  });

  it('ignores wildcards outside LIKE comparisons', () => {
    expect(countLeadingWildcardLikes("SELECT * FROM users WHERE name = '%a'", new Map())).toBe(0);
  });
});

describe('SqlStructureReader', () => {
  it('answers the same questions for simple statements', () => {
    const reader = new SqlStructureReader();

    const structure = reader.read('SELECT * FROM users WHERE id = 1');

    expect(structure.statement).toBe('select');
    expect(structure.hasWhere).toBe(true);
    expect(structure.hasLimit).toBe(false);
    expect(structure.hasOrderBy).toBe(false);
    expect(structure.aggregateOnly).toBe(false);
    expect(structure.tables).toEqual(['users']);
  });

  it('detects aggregate-only selects', () => {
    expect(new SqlStructureReader().read('SELECT COUNT(*) FROM users').aggregateOnly).toBe(true);
  });

  it('falls back to the token scan for text the parser rejects', () => {
    const structure = new SqlStructureReader().read('SELECT * FROM users WHERE id = ) LIMIT 5');

    expect(structure.statement).toBe('select');
    expect(structure.hasWhere).toBe(true);
    expect(structure.hasLimit).toBe(true);
  });

  it('parses each distinct text once', () => {
    const reader = new SqlStructureReader();
    const text = 'SELECT name FROM users ORDER BY name';

    expect(reader.read(text)).toBe(reader.read(text));
  });
});
