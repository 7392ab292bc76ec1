/**
 * @fileoverview Whole-object serialization visitor
 *
 * Flags code that serializes `this` wholesale, so every field (sensitive
 * or not) leaves the object: `JSON.stringify(this)`, `serialize(this)`,
 * `Object.assign({}, this)` and `{ ...this }`.
 */

import * as ts from 'typescript';
import { SourceVisitor, calleeName } from './visitor.js';

const SERIALIZERS = new Set(['stringify', 'serialize', 'assign']);

function isThis(node: ts.Node | undefined): boolean {
  return node?.kind === ts.SyntaxKind.ThisKeyword;
}

export class SerializationVisitor extends SourceVisitor {
  protected inspect(node: ts.Node): void {
    if (ts.isSpreadAssignment(node) && isThis(node.expression)) {
      this.record('{...this}');
      return;
    }
    if (!ts.isCallExpression(node)) return;
    const name = calleeName(node);
    if (name === undefined || !SERIALIZERS.has(name)) return;
    if (node.arguments.some((argument) => isThis(argument))) {
      this.record(`${node.expression.getText()}(this)`);
    }
  }
}
