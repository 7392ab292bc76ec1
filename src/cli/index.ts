#!/usr/bin/env node
/**
 * @fileoverview query-lens CLI
 *
 * Commands:
 *   query-lens analyze <traces.json>  - Analyze a trace dump
 *   query-lens help [command]         - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { QUERY_LENS_VERSION } from '../index.js';
import { analyzeCommand } from './commands/analyze.js';
import { classifyError, createError, formatError, getExitCode } from './errors.js';
import { showHelp } from './help.js';

type Command = 'analyze' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  analyze: {
    description: 'Analyze executed database operations',
    usage: 'query-lens analyze <traces.json> [--source <file>...] [--config <file>] [--json] [--fail-on <severity>]',
  },
  help: {
    description: 'Show help information',
    usage: 'query-lens help [command]',
  },
};

function isCommand(value: string): value is Command {
  return value in COMMANDS;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Global options only; each command parses its own.
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    console.log(`query-lens ${QUERY_LENS_VERSION}`);
    return;
  }

  const [command, ...commandArgs] = positionals;
  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : command);
    return;
  }

  const jsonMode = args.includes('--json');
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    if (!isCommand(command)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}. Available: ${Object.keys(COMMANDS).join(', ')}`);
    }
    // The command reads its own flags from everything after its name.
    const rest = args.slice(args.indexOf(command) + 1);
    process.exitCode = await analyzeCommand({ args: rest, signal: controller.signal });
  } catch (error) {
    const cliError = classifyError(error);
    console.error(formatError(cliError, jsonMode));
    process.exitCode = getExitCode(cliError);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 70;
});
