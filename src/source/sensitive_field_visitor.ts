/**
 * @fileoverview Sensitive field visitor
 *
 * Matches three independent reference families against a vocabulary of
 * field names:
 *
 * - an object-literal entry keyed by the name (`{ password: ... }`,
 *   `{ 'password': ... }`, `{ password }`)
 * - an accessor call on `this` whose decapitalized suffix is the name
 *   (`this.getPassword()`)
 * - a read of the name on `this` (`this.password`)
 *
 * Every match resolves to the bare field name. Comments and unrelated
 * string literals are never nodes of these shapes, so they never match.
 */

import * as ts from 'typescript';
import { SourceVisitor, isThisMember, staticName } from './visitor.js';

function accessorField(methodName: string): string | undefined {
  if (methodName.length <= 3 || !methodName.startsWith('get')) return undefined;
  const suffix = methodName.slice(3);
  const initial = suffix.charAt(0);
  if (initial !== initial.toUpperCase()) return undefined;
  return initial.toLowerCase() + suffix.slice(1);
}

function isAssignmentTarget(node: ts.Node): boolean {
  const parent = node.parent;
  return (
    ts.isBinaryExpression(parent) &&
    parent.left === node &&
    parent.operatorToken.kind >= ts.SyntaxKind.FirstAssignment &&
    parent.operatorToken.kind <= ts.SyntaxKind.LastAssignment
  );
}

export class SensitiveFieldVisitor extends SourceVisitor {
  private readonly vocabulary: ReadonlySet<string>;

  constructor(fieldNames: Iterable<string>) {
    super();
    this.vocabulary = new Set(fieldNames);
  }

  protected inspect(node: ts.Node): void {
    if (ts.isPropertyAssignment(node) && ts.isObjectLiteralExpression(node.parent)) {
      this.matchName(staticName(node.name));
      return;
    }
    if (ts.isShorthandPropertyAssignment(node)) {
      this.matchName(node.name.text);
      return;
    }
    if (ts.isCallExpression(node) && isThisMember(node.expression)) {
      const name = staticName(node.expression.name);
      this.matchName(name === undefined ? undefined : accessorField(name));
      return;
    }
    if (isThisMember(node) && !ts.isCallExpression(node.parent) && !isAssignmentTarget(node)) {
      this.matchName(staticName(node.name));
    }
  }

  private matchName(name: string | undefined): void {
    if (name !== undefined && this.vocabulary.has(name)) {
      this.record(name);
    }
  }
}
