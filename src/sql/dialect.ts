/**
 * @fileoverview SQL dialects and their quoting rules
 */

export const SQL_DIALECTS = ['mysql', 'postgresql', 'mariadb', 'sqlite', 'transactsql', 'bigquery'] as const;

export type SqlDialect = (typeof SQL_DIALECTS)[number];

export const DEFAULT_DIALECT: SqlDialect = 'mysql';

export interface DialectQuoting {
  /** `"..."` is a string literal rather than a quoted identifier. */
  readonly doubleQuotedStrings: boolean;
  /** A backslash escapes the next character inside a quoted string. */
  readonly backslashEscapes: boolean;
}

const QUOTING: Record<SqlDialect, DialectQuoting> = {
  mysql: { doubleQuotedStrings: true, backslashEscapes: true },
  mariadb: { doubleQuotedStrings: true, backslashEscapes: true },
  bigquery: { doubleQuotedStrings: true, backslashEscapes: true },
  postgresql: { doubleQuotedStrings: false, backslashEscapes: false },
  sqlite: { doubleQuotedStrings: false, backslashEscapes: false },
  transactsql: { doubleQuotedStrings: false, backslashEscapes: false },
};

export function quotingFor(dialect: SqlDialect): DialectQuoting {
  return QUOTING[dialect];
}
