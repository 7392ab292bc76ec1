/**
 * @fileoverview Source unit parsing
 *
 * Wraps `ts.createSourceFile` so source analyzers receive a syntax tree
 * plus the helpers they need to report locations. Units with syntax
 * errors are rejected up front instead of being walked half-parsed.
 */

import * as path from 'node:path';
import * as ts from 'typescript';
import { Errors } from '../core/errors.js';
import type { OriginFrame } from '../types.js';

export interface SourceUnit {
  readonly fileName: string;
  readonly sourceFile: ts.SourceFile;
}

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX,
};

/**
 * Parse a code unit.
 *
 * @throws ParseError on the first syntax error, with its 1-based position
 */
export function parseSourceUnit(fileName: string, text: string): SourceUnit {
  const scriptKind = SCRIPT_KINDS[path.extname(fileName).toLowerCase()] ?? ts.ScriptKind.TS;
  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, scriptKind);

  // transpileModule reports syntactic diagnostics only, which is all we need
  const { diagnostics = [] } = ts.transpileModule(text, { fileName, reportDiagnostics: true });
  const syntaxError = diagnostics.find((diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error);
  if (syntaxError) {
    const message = ts.flattenDiagnosticMessageText(syntaxError.messageText, ' ');
    const position =
      syntaxError.start !== undefined ? sourceFile.getLineAndCharacterOfPosition(syntaxError.start) : undefined;
    throw Errors.parse(
      fileName,
      message,
      position ? position.line + 1 : undefined,
      position ? position.character + 1 : undefined,
    );
  }

  return { fileName, sourceFile };
}

/** 1-based origin frame of a node. */
export function frameOf(unit: SourceUnit, node: ts.Node): OriginFrame {
  const { line } = unit.sourceFile.getLineAndCharacterOfPosition(node.getStart(unit.sourceFile));
  return { file: unit.fileName, line: line + 1 };
}
