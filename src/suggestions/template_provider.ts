/**
 * @fileoverview Template suggestion provider
 *
 * Renders `{{key}}` templates. Each template enumerates the context keys
 * it recognises; a template referencing a key outside that list, or a
 * context missing one of them, renders nothing.
 */

import type { Suggestion, SuggestionParameters } from '../types.js';
import type { SuggestionProvider } from './types.js';

export interface SuggestionTemplate {
  readonly code: string;
  readonly description: string;
  readonly keys: readonly string[];
}

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

export const DEFAULT_TEMPLATES: Readonly<Record<string, SuggestionTemplate>> = {
  n_plus_one: {
    code: '// Load the related rows in one query instead of one per parent:\n// {{fingerprint}}\n// e.g. WHERE parent_id IN (?) or a JOIN on the parent query',
    description: 'The same query ran {{count}} times in one unit of work. Batch it or join it into the parent query.',
    keys: ['fingerprint', 'count'],
  },
  slow_query: {
    code: 'EXPLAIN {{fingerprint}}',
    description: 'This query took {{durationMs}}ms. Inspect its plan and add an index or narrow the columns it reads.',
    keys: ['fingerprint', 'durationMs'],
  },
  find_all: {
    code: 'SELECT ... FROM {{table}} WHERE ... LIMIT 100',
    description: 'The query loaded {{rows}} rows from {{table}} with no filter or limit. Filter, paginate or stream the result.',
    keys: ['table', 'rows'],
  },
  order_by_without_limit: {
    code: 'SELECT ... FROM {{table}} ORDER BY ... LIMIT 100',
    description: 'Sorting {{rows}} rows without a LIMIT sorts the whole result set. Add a LIMIT or paginate.',
    keys: ['table', 'rows'],
  },
  missing_index: {
    code: 'CREATE INDEX idx_{{table}}_lookup ON {{table}} (/* filtered columns */);',
    description: 'A full scan of {{table}} examined {{rowsScanned}} rows. Index the columns used in WHERE and JOIN conditions.',
    keys: ['table', 'rowsScanned'],
  },
  frequent_query: {
    code: '// Cache or memoize the result of:\n// {{fingerprint}}',
    description: 'This query ran {{count}} times. Cache its result for the unit of work or fetch it once.',
    keys: ['fingerprint', 'count'],
  },
  ineffective_like: {
    code: '-- Full-text index, or a trailing wildcard only:\n-- ... LIKE \'term%\'',
    description: 'A LIKE pattern starting with % cannot use an index: {{fingerprint}}',
    keys: ['fingerprint'],
  },
  timezone_mismatch: {
    code: "SET GLOBAL time_zone = '{{applicationTimeZone}}';",
    description: 'The database time zone ({{databaseTimeZone}}) differs from the application time zone ({{applicationTimeZone}}). Dates will shift on read and write.',
    keys: ['databaseTimeZone', 'applicationTimeZone'],
  },
  strict_mode_disabled: {
    code: "SET GLOBAL sql_mode = CONCAT(@@sql_mode, ',STRICT_TRANS_TABLES');",
    description: 'sql_mode is "{{sqlMode}}". Without strict mode invalid values are silently truncated or replaced.',
    keys: ['sqlMode'],
  },
  sensitive_data_exposure: {
    code: '{{methodName}}() {\n  const { {{fields}}, ...safe } = this;\n  return safe;\n}',
    description: '{{className}}.{{methodName}}() serializes sensitive fields ({{fields}}). Exclude them explicitly.',
    keys: ['className', 'methodName', 'fields'],
  },
  raw_query_interpolation: {
    code: "{{callee}}('... WHERE id = ?', [value])",
    description: 'The statement passed to {{callee}}() at line {{line}} is built from runtime values. Bind them as parameters.',
    keys: ['callee', 'line'],
  },
  null_comparison: {
    code: '-- Instead of: {{incorrect}}\n-- Write:      {{correct}}',
    description: 'A comparison with NULL using = or <> is never true. Use IS NULL or IS NOT NULL.',
    keys: ['incorrect', 'correct'],
  },
  division_by_zero: {
    code: '{{dividend}} / NULLIF({{divisor}}, 0)',
    description: 'Dividing by {{divisor}} fails or yields NULL when it is zero. Guard the divisor with NULLIF or CASE.',
    keys: ['dividend', 'divisor'],
  },
  eager_loading: {
    code: '// Load the main rows first, then each collection in its own query:\n// SELECT ... FROM parent WHERE ...\n// SELECT ... FROM child WHERE parent_id IN (?)',
    description: 'The query joins {{joins}} tables. Split it and load the collections separately.',
    keys: ['joins'],
  },
  limit_with_collection_join: {
    code: '-- Page the parent ids first, then fetch the joined rows for them:\nSELECT id FROM {{table}} ORDER BY id LIMIT 20;\nSELECT ... FROM {{table}} JOIN ... WHERE {{table}}.id IN (?);',
    description: 'LIMIT counts joined rows, not rows of {{table}}. Paginate the parent ids in a separate query.',
    keys: ['table'],
  },
  sql_injection: {
    code: "db.query('SELECT ... WHERE name = ?', [name])",
    description: 'Statement text shows signs of values written into it ({{indicators}}). Bind every value as a parameter.',
    keys: ['indicators'],
  },
  charset_misconfigured: {
    code: '-- Convert the database and its tables to {{recommended}}',
    description: 'The character set in use is {{current}}. Switch to {{recommended}}.',
    keys: ['current', 'recommended'],
  },
};

/** Render one template, or null when a key is unknown to it or missing from the context. */
export function renderTemplate(template: SuggestionTemplate, context: SuggestionParameters): Suggestion | null {
  const allowed = new Set(template.keys);
  let complete = true;
  const render = (text: string): string =>
    text.replace(PLACEHOLDER, (placeholder: string, key: string) => {
      const value = context[key];
      if (!allowed.has(key) || value === undefined) {
        complete = false;
        return placeholder;
      }
      return String(value);
    });

  const code = render(template.code);
  const description = render(template.description);
  return complete ? { code, description } : null;
}

export class TemplateSuggestionProvider implements SuggestionProvider {
  private readonly templates: Map<string, SuggestionTemplate>;

  constructor(templates: Readonly<Record<string, SuggestionTemplate>> = DEFAULT_TEMPLATES) {
    this.templates = new Map(Object.entries(templates));
  }

  suggest(kind: string, parameters: SuggestionParameters): Suggestion | null {
    const template = this.templates.get(kind);
    return template ? renderTemplate(template, parameters) : null;
  }
}
