/**
 * @fileoverview Base syntax-tree visitor
 *
 * A visitor walks a tree once, in source order, and accumulates what it
 * matched. Matches are deduplicated by key in first-seen order; a string
 * match is its own key. Visitors only read nodes.
 */

import * as ts from 'typescript';

export abstract class SourceVisitor<T = string> {
  private readonly found = new Map<string, T>();

  /** Walk `root` and every descendant. */
  walk(root: ts.Node): this {
    const visit = (node: ts.Node): void => {
      this.inspect(node);
      ts.forEachChild(node, visit);
    };
    visit(root);
    return this;
  }

  matches(): readonly T[] {
    return [...this.found.values()];
  }

  hasMatches(): boolean {
    return this.found.size > 0;
  }

  protected record(match: T, key: string = String(match)): void {
    if (!this.found.has(key)) {
      this.found.set(key, match);
    }
  }

  protected abstract inspect(node: ts.Node): void;
}

/** Property name text for identifiers and string-like keys; computed keys have none. */
export function staticName(name: ts.PropertyName | ts.MemberName): string | undefined {
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name)) {
    return name.text.replace(/^#/, '');
  }
  if (ts.isStringLiteral(name) || ts.isNoSubstitutionTemplateLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}

export function isThisMember(node: ts.Node): node is ts.PropertyAccessExpression {
  return ts.isPropertyAccessExpression(node) && node.expression.kind === ts.SyntaxKind.ThisKeyword;
}

/** Callee name of `f(...)` or `x.f(...)`. */
export function calleeName(call: ts.CallExpression): string | undefined {
  const callee = call.expression;
  if (ts.isIdentifier(callee)) return callee.text;
  if (ts.isPropertyAccessExpression(callee)) return staticName(callee.name);
  return undefined;
}
