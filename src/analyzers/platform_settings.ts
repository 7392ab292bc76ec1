/**
 * @fileoverview Platform configuration analyzers
 *
 * Each reads server settings through `fetchPlatformSetting`. A setting the
 * platform does not report (null) produces no finding.
 */

import type { Finding } from '../types.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

// ============================================================================
// TIME ZONE
// ============================================================================

const UTC_ALIASES = new Set(['utc', 'etc/utc', 'gmt', 'etc/gmt', 'z', '+00:00', '-00:00', '+0000', 'zulu']);

function normalizeZone(zone: string): string {
  const lower = zone.trim().toLowerCase();
  return UTC_ALIASES.has(lower) ? 'utc' : lower;
}

export const timezoneMismatchAnalyzer: TraceAnalyzer = {
  kind: 'timezone_mismatch',
  target: 'traces',
  requires: ['fetchPlatformSetting'],

  async analyze({ gateway, settings }: TraceAnalysisContext): Promise<Finding[]> {
    const applicationTimeZone = settings.applicationTimeZone;
    if (applicationTimeZone === undefined) return [];

    let databaseTimeZone = await gateway.fetchPlatformSetting('time_zone');
    // MySQL reports SYSTEM when it follows the host clock.
    if (databaseTimeZone?.toUpperCase() === 'SYSTEM') {
      databaseTimeZone = await gateway.fetchPlatformSetting('system_time_zone');
    }
    if (databaseTimeZone === null || normalizeZone(databaseTimeZone) === normalizeZone(applicationTimeZone)) {
      return [];
    }

    return [
      {
        kind: 'timezone_mismatch',
        title: 'Database and application time zones differ',
        narrative:
          `The database session uses ${databaseTimeZone} while the application uses ${applicationTimeZone}. ` +
          'Timestamps written without an explicit zone are shifted on the way in or out.',
        metrics: { mismatch: 1 },
        relatedOperations: [],
        suggestionParameters: { databaseTimeZone, applicationTimeZone },
      },
    ];
  },
};

// ============================================================================
// STRICT MODE
// ============================================================================

const STRICT_MODES = ['STRICT_TRANS_TABLES', 'STRICT_ALL_TABLES'];

export const strictModeAnalyzer: TraceAnalyzer = {
  kind: 'strict_mode_disabled',
  target: 'traces',
  requires: ['fetchPlatformSetting'],

  async analyze({ gateway }: TraceAnalysisContext): Promise<Finding[]> {
    const sqlMode = await gateway.fetchPlatformSetting('sql_mode');
    if (sqlMode === null) return [];

    const modes = sqlMode.split(',').map((mode) => mode.trim().toUpperCase());
    if (STRICT_MODES.some((mode) => modes.includes(mode))) return [];

    return [
      {
        kind: 'strict_mode_disabled',
        title: 'SQL strict mode is disabled',
        narrative:
          `sql_mode is "${sqlMode}". Out-of-range and invalid values are stored as truncated or ` +
          'zero values with a warning instead of failing the statement.',
        metrics: { missingModes: 1 },
        relatedOperations: [],
        suggestionParameters: { sqlMode },
      },
    ];
  },
};

// ============================================================================
// CHARACTER SET
// ============================================================================

// utf8 in MySQL is the three-byte utf8mb3, which cannot store four-byte characters.
const MYSQL_LEGACY_CHARSETS = new Set(['utf8', 'utf8mb3']);
const POSTGRES_LEGACY_ENCODINGS = new Set(['SQL_ASCII', 'LATIN1', 'WIN1252']);

async function mysqlCharsetFindings(gateway: TraceAnalysisContext['gateway']): Promise<Finding[]> {
  const charset = await gateway.fetchPlatformSetting('character_set_database');
  if (charset === null || !MYSQL_LEGACY_CHARSETS.has(charset.trim().toLowerCase())) return [];
  return [
    {
      kind: 'charset_misconfigured',
      title: `Database character set is ${charset}`,
      narrative:
        `${charset} stores at most three bytes per character. Emoji and other supplementary characters ` +
        'are rejected or truncated. Use utf8mb4.',
      metrics: { legacyEncoding: 1, unsafeEncoding: 0 },
      relatedOperations: [],
      suggestionParameters: { current: charset, recommended: 'utf8mb4' },
    },
  ];
}

async function postgresEncodingFindings(gateway: TraceAnalysisContext['gateway']): Promise<Finding[]> {
  const server = await gateway.fetchPlatformSetting('server_encoding');
  if (server === null) return [];
  const findings: Finding[] = [];
  const encoding = server.trim().toUpperCase();

  if (POSTGRES_LEGACY_ENCODINGS.has(encoding)) {
    findings.push({
      kind: 'charset_misconfigured',
      title: `Database encoding is ${server}`,
      narrative:
        encoding === 'SQL_ASCII'
          ? 'SQL_ASCII performs no encoding validation. Bytes are stored as sent and cannot be reliably converted. Use UTF8.'
          : `${server} covers a single-byte character repertoire. Text outside it cannot be stored. Use UTF8.`,
      metrics: { legacyEncoding: 1, unsafeEncoding: encoding === 'SQL_ASCII' ? 1 : 0 },
      relatedOperations: [],
      suggestionParameters: { current: server, recommended: 'UTF8' },
    });
  }

  const client = await gateway.fetchPlatformSetting('client_encoding');
  if (client !== null && client.trim().toUpperCase() !== encoding) {
    findings.push({
      kind: 'charset_misconfigured',
      title: 'Client and server encodings differ',
      narrative: `The server stores ${server} while the client sends ${client}. Text is converted on every round trip.`,
      metrics: { legacyEncoding: 0, unsafeEncoding: 0 },
      relatedOperations: [],
      suggestionParameters: { current: client, recommended: server },
    });
  }
  return findings;
}

export const charsetAnalyzer: TraceAnalyzer = {
  kind: 'charset_misconfigured',
  target: 'traces',
  requires: ['fetchPlatformSetting'],

  async analyze({ gateway, structure }: TraceAnalysisContext): Promise<Finding[]> {
    switch (structure.dialect) {
      case 'mysql':
      case 'mariadb':
        return mysqlCharsetFindings(gateway);
      case 'postgresql':
        return postgresEncodingFindings(gateway);
      default:
        return [];
    }
  },
};
