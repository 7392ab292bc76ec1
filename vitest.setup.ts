/**
 * Centralized Vitest setup for query-lens
 *
 * Engine passes log dropped records and skipped analyzers at `warn`; keep
 * test output quiet unless QUERY_LENS_LOG_LEVEL is set explicitly. Tests
 * that assert on log lines set their own level.
 */

if (process.env.QUERY_LENS_LOG_LEVEL === undefined) {
  process.env.QUERY_LENS_LOG_LEVEL = 'silent';
}
