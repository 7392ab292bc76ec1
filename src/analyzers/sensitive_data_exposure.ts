/**
 * @fileoverview Sensitive data exposure in serialization methods
 *
 * For every class declaring sensitive fields, the serialization methods
 * (`toJSON`, `toArray`, `serialize`, `jsonSerialize`, `toString`) are
 * walked with two visitors: one naming the sensitive fields they reference,
 * one detecting `this` serialized wholesale. Either makes a finding.
 */

import * as ts from 'typescript';
import { frameOf, type SourceUnit } from '../source/parse.js';
import { isSensitiveFieldName } from '../source/sensitive_vocabulary.js';
import { SensitiveFieldVisitor } from '../source/sensitive_field_visitor.js';
import { SerializationVisitor } from '../source/serialization_visitor.js';
import { staticName } from '../source/visitor.js';
import type { Finding } from '../types.js';
import type { SourceAnalysisContext, SourceAnalyzer } from './types.js';

const SERIALIZATION_METHODS = new Set(['toJSON', 'toArray', 'serialize', 'jsonSerialize', 'toString']);

function isStatic(member: ts.ClassElement): boolean {
  return ts.canHaveModifiers(member) && (ts.getModifiers(member) ?? []).some((m) => m.kind === ts.SyntaxKind.StaticKeyword);
}

/** Instance fields, including constructor parameter properties. */
function fieldNames(declaration: ts.ClassLikeDeclaration): string[] {
  const names: string[] = [];
  for (const member of declaration.members) {
    if (ts.isPropertyDeclaration(member) && !isStatic(member)) {
      const name = staticName(member.name);
      if (name !== undefined) names.push(name);
    }
    if (ts.isConstructorDeclaration(member)) {
      for (const parameter of member.parameters) {
        if (ts.isParameterPropertyDeclaration(parameter, member) && ts.isIdentifier(parameter.name)) {
          names.push(parameter.name.text);
        }
      }
    }
  }
  return names;
}

function classes(unit: SourceUnit): ts.ClassLikeDeclaration[] {
  const found: ts.ClassLikeDeclaration[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) found.push(node);
    ts.forEachChild(node, visit);
  };
  visit(unit.sourceFile);
  return found;
}

function inspectClass(unit: SourceUnit, declaration: ts.ClassLikeDeclaration, patterns: readonly string[]): Finding[] {
  const sensitive = fieldNames(declaration).filter((name) => isSensitiveFieldName(name, patterns));
  if (sensitive.length === 0) return [];

  const className = declaration.name?.text ?? '(anonymous class)';
  const findings: Finding[] = [];
  for (const member of declaration.members) {
    if (!ts.isMethodDeclaration(member) || !member.body) continue;
    const methodName = staticName(member.name);
    if (methodName === undefined || !SERIALIZATION_METHODS.has(methodName)) continue;

    const exposed = new SensitiveFieldVisitor(sensitive).walk(member.body).matches();
    const wholeObject = new SerializationVisitor().walk(member.body).hasMatches();
    if (exposed.length === 0 && !wholeObject) continue;

    const fields = exposed.length > 0 ? exposed : sensitive;
    findings.push({
      kind: 'sensitive_data_exposure',
      title: `Sensitive data exposed by ${className}.${methodName}()`,
      narrative: wholeObject
        ? `${methodName}() serializes the whole object, including ${fields.join(', ')}.`
        : `${methodName}() includes ${fields.join(', ')} in its output.`,
      metrics: { exposedFields: exposed.length, wholeObject: wholeObject ? 1 : 0 },
      relatedOperations: [],
      relatedOrigin: frameOf(unit, member),
      suggestionParameters: { className, methodName, fields: fields.join(', ') },
    });
  }
  return findings;
}

export const sensitiveDataExposureAnalyzer: SourceAnalyzer = {
  kind: 'sensitive_data_exposure',
  target: 'source',

  analyze({ units, settings }: SourceAnalysisContext): Finding[] {
    return units.flatMap((unit) =>
      classes(unit).flatMap((declaration) => inspectClass(unit, declaration, settings.sensitivePatterns)),
    );
  },
};
