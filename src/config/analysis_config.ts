/**
 * @fileoverview Analysis configuration
 *
 * Shape validation uses zod; resolution checks threshold names against
 * the registered analyzers and merges them over the defaults. Both fail
 * with ConfigurationError before any pass runs.
 *
 * @example
 * ```yaml
 * analyzers:
 *   n_plus_one:
 *     thresholds: { minOccurrences: 3 }
 *   missing_index:
 *     enabled: false
 * capabilityTimeoutMs: 2000
 * applicationTimeZone: UTC
 * ```
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import type { AnalysisSettings } from '../analyzers/types.js';
import type { AnalyzerRegistry } from '../analyzers/registry.js';
import { DEFAULT_CAPABILITY_TIMEOUT_MS } from '../capabilities/gateway.js';
import { Errors } from '../core/errors.js';
import { defaultThresholdsFor, isBuiltInKind, type Thresholds } from '../severity/thresholds.js';
import { DEFAULT_VOCABULARY, toSnakeCase } from '../source/sensitive_vocabulary.js';
import { DEFAULT_DIALECT, SQL_DIALECTS, type SqlDialect } from '../sql/dialect.js';

// ============================================================================
// SCHEMA
// ============================================================================

const ThresholdValueSchema = z
  .number({ invalid_type_error: 'threshold must be a number' })
  .finite('threshold must be finite')
  .nonnegative('threshold must not be negative');

const AnalyzerConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    thresholds: z.record(ThresholdValueSchema).optional(),
  })
  .strict();

export const AnalysisConfigSchema = z
  .object({
    analyzers: z.record(AnalyzerConfigSchema).optional(),
    capabilityTimeoutMs: z.number().finite().positive('capabilityTimeoutMs must be positive').optional(),
    applicationTimeZone: z.string().min(1).optional(),
    sensitiveFields: z.array(z.string().min(1)).optional(),
    dialect: z.enum(SQL_DIALECTS).optional(),
  })
  .strict();

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

export interface ResolvedAnalysisConfig {
  readonly disabled: ReadonlySet<string>;
  readonly thresholds: ReadonlyMap<string, Thresholds>;
  readonly capabilityTimeoutMs: number;
  readonly settings: AnalysisSettings;
  readonly dialect: SqlDialect;
}

function toConfigurationError(error: ZodError) {
  const [issue] = error.errors;
  const key = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
  return Errors.config(key, issue?.message ?? 'invalid configuration');
}

/**
 * Validate the shape of a raw configuration object.
 *
 * @throws ConfigurationError
 */
export function parseAnalysisConfig(raw: unknown): AnalysisConfig {
  const parsed = AnalysisConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }
  return parsed.data;
}

// ============================================================================
// RESOLUTION
// ============================================================================

function knownThresholds(kind: string, registry: AnalyzerRegistry): Thresholds {
  return isBuiltInKind(kind) ? defaultThresholdsFor(kind) : registry.get(kind)?.defaultThresholds ?? {};
}

/**
 * Merge configured thresholds over the defaults of every registered
 * analyzer.
 *
 * @throws ConfigurationError for an unknown analyzer kind or threshold name
 */
export function resolveAnalysisConfig(
  config: AnalysisConfig,
  registry: AnalyzerRegistry,
): ResolvedAnalysisConfig {
  const disabled = new Set<string>();
  const thresholds = new Map<string, Thresholds>();

  for (const analyzer of registry.getAll()) {
    thresholds.set(analyzer.kind, { ...knownThresholds(analyzer.kind, registry) });
  }

  for (const [kind, entry] of Object.entries(config.analyzers ?? {})) {
    if (!registry.has(kind)) {
      throw Errors.config(`analyzers.${kind}`, 'no analyzer with this kind is registered');
    }
    if (entry.enabled === false) {
      disabled.add(kind);
    }
    const defaults = knownThresholds(kind, registry);
    for (const name of Object.keys(entry.thresholds ?? {})) {
      if (!(name in defaults)) {
        const accepted = Object.keys(defaults).join(', ') || 'none';
        throw Errors.config(`analyzers.${kind}.thresholds.${name}`, `unknown threshold (accepted: ${accepted})`);
      }
    }
    thresholds.set(kind, { ...defaults, ...entry.thresholds });
  }

  const extraPatterns = (config.sensitiveFields ?? []).map(toSnakeCase);
  return {
    disabled,
    thresholds,
    capabilityTimeoutMs: config.capabilityTimeoutMs ?? DEFAULT_CAPABILITY_TIMEOUT_MS,
    settings: {
      ...(config.applicationTimeZone !== undefined ? { applicationTimeZone: config.applicationTimeZone } : {}),
      sensitivePatterns: [...DEFAULT_VOCABULARY.patterns, ...extraPatterns],
    },
    dialect: config.dialect ?? DEFAULT_DIALECT,
  };
}

// ============================================================================
// FILE LOADING
// ============================================================================

/**
 * Read a YAML or JSON configuration file and validate its shape.
 *
 * @throws ConfigurationError when the file cannot be read or parsed
 */
export async function loadConfigFile(filePath: string): Promise<AnalysisConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw Errors.config(filePath, `cannot read file: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw Errors.config(filePath, `cannot parse file: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseAnalysisConfig(raw);
}
