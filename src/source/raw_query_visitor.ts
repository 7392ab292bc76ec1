/**
 * @fileoverview Raw query interpolation visitor
 *
 * Flags query-execution calls whose first argument builds the statement
 * text from runtime values: a template literal with substitutions, or a
 * `+` concatenation involving a string. Tagged templates (`sql\`...\``)
 * bind their values and are not flagged.
 */

import * as ts from 'typescript';
import { SourceVisitor, calleeName } from './visitor.js';

const QUERY_CALLS = new Set(['query', 'execute', 'raw', 'queryRaw', 'executeQuery', 'whereRaw', 'unsafe']);

export function isQueryCall(name: string): boolean {
  return QUERY_CALLS.has(name) || /^unsafe/i.test(name) || /Unsafe$/.test(name);
}

function unwrap(node: ts.Expression): ts.Expression {
  return ts.isParenthesizedExpression(node) ? unwrap(node.expression) : node;
}

function concatOperands(node: ts.Expression): ts.Expression[] {
  const inner = unwrap(node);
  if (ts.isBinaryExpression(inner) && inner.operatorToken.kind === ts.SyntaxKind.PlusToken) {
    return [...concatOperands(inner.left), ...concatOperands(inner.right)];
  }
  return [inner];
}

function isConstantText(node: ts.Expression): boolean {
  return ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node);
}

function isInterpolated(node: ts.Expression): boolean {
  const operands = concatOperands(node);
  if (operands.some((operand) => ts.isTemplateExpression(operand))) return true;
  // '...' + value: text joined with something that is not constant text
  return (
    operands.length > 1 &&
    operands.some(isConstantText) &&
    operands.some((operand) => !isConstantText(operand) && !ts.isNumericLiteral(operand))
  );
}

export interface RawQueryCall {
  readonly callee: string;
  /** 1-based */
  readonly line: number;
  /** 1-based */
  readonly column: number;
}

export class RawQueryVisitor extends SourceVisitor<RawQueryCall> {
  constructor(private readonly sourceFile: ts.SourceFile) {
    super();
  }

  protected inspect(node: ts.Node): void {
    if (!ts.isCallExpression(node)) return;
    const name = calleeName(node);
    const [first] = node.arguments;
    if (name === undefined || first === undefined || !isQueryCall(name)) return;
    if (isInterpolated(first)) {
      const { line, character } = this.sourceFile.getLineAndCharacterOfPosition(node.getStart(this.sourceFile));
      const call: RawQueryCall = { callee: name, line: line + 1, column: character + 1 };
      this.record(call, `${call.line}:${call.column}`);
    }
  }
}
