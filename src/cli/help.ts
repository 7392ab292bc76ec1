/**
 * @fileoverview Detailed help text for query-lens CLI commands
 */

const HELP_TEXT = new Map<string, string>([
  [
    'main',
    `
query-lens - database access analysis for one unit of work

USAGE:
    query-lens <command> [options]

COMMANDS:
    analyze <traces.json>   Analyze a trace dump (and optionally source files)
    help [command]          Show help for a command

GLOBAL OPTIONS:
    -h, --help              Show help information
    -v, --version           Show version information

ENVIRONMENT:
    QUERY_LENS_LOG_LEVEL    debug | info | warn | error | silent (default: warn)

Run 'query-lens help <command>' for details on a command.
`,
  ],
  [
    'analyze',
    `
query-lens analyze - Analyze executed database operations

USAGE:
    query-lens analyze <traces.json> [options]

OPTIONS:
    -s, --source <file>     Source file to scan; repeat for several files
    -c, --config <file>     Configuration file (.yaml, .yml or .json)
    --json                  Print the report as JSON
    --fail-on <severity>    Exit with 1 when an issue at or above this severity
                            (critical | warning | info) is reported

INPUT:
    A JSON array of trace records, or an object with a "traces" array.
    Each record carries the statement text and its timing:
      { "text": "SELECT ...", "parameters": [1], "durationMs": 12.5,
        "rowCount": 3, "origin": [{ "file": "src/repo.ts", "line": 42 }] }
    The older field names sql, params, executionMS, row_count and
    backtrace are accepted too. Malformed records are skipped and counted.

DESCRIPTION:
    Analyzers that need a live connection (missing_index,
    timezone_mismatch, strict_mode_disabled) are disabled here unless the
    configuration sets "enabled: true" for them.

EXIT CODES:
    0   Analysis completed
    1   --fail-on matched at least one issue
    2   Invalid arguments
    3   An input file could not be read
    4   An input file could not be parsed
    5   Invalid configuration
    6   Analysis not performed (interrupted)

EXAMPLES:
    query-lens analyze traces.json
    query-lens analyze traces.json --source src/user.ts --json
    query-lens analyze traces.json --config query-lens.yaml --fail-on critical
`,
  ],
]);

export function getCommandHelp(command?: string): string {
  const main = HELP_TEXT.get('main') ?? '';
  return (command ? HELP_TEXT.get(command) : undefined) ?? main;
}

export function showHelp(command?: string): void {
  if (command && !HELP_TEXT.has(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}
