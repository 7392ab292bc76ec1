/**
 * @fileoverview Report rendering for the analyze command
 */

import { exportIssues, summarizeIssues, type IssueSummary, type PlainIssue } from '../assembly/export.js';
import type { ErrorJSON } from '../core/errors.js';
import type { CompletedAnalysis } from '../engine/analysis_engine.js';
import { SEVERITY_RANK, type Issue, type Severity } from '../types.js';

export interface JsonReport {
  summary: IssueSummary;
  issues: PlainIssue[];
  notes: ErrorJSON[];
  rejected: Array<{ index: number; reason: string }>;
}

export function toJsonReport(outcome: CompletedAnalysis): JsonReport {
  return {
    summary: summarizeIssues(outcome.issues),
    issues: exportIssues(outcome.issues),
    notes: outcome.notes.map((note) => {
      // Stacks are noise in a report meant for other tools.
      const { stack: _stack, ...rest } = note.toJSON();
      return rest;
    }),
    rejected: outcome.rejected.map((entry) => ({ index: entry.index, reason: entry.error.message })),
  };
}

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

function formatIssue(issue: Issue): string {
  const lines = [`[${issue.severity}] ${issue.kind}: ${issue.title}`, indent(issue.narrative, '    ')];
  if (issue.origin) {
    const column = issue.origin.column === undefined ? '' : `:${issue.origin.column}`;
    lines.push(`    at ${issue.origin.file}:${issue.origin.line}${column}`);
  }
  for (const operation of issue.operations) {
    const times = operation.occurrences > 1 ? ` (x${operation.occurrences})` : '';
    lines.push(`    operation: ${operation.fingerprint}${times}`);
  }
  if (issue.suggestion) {
    lines.push(`    suggestion: ${issue.suggestion.description}`);
    lines.push(indent(issue.suggestion.code, '      '));
  }
  return lines.join('\n');
}

export function formatSummaryLine(summary: IssueSummary): string {
  const noun = summary.total === 1 ? 'issue' : 'issues';
  const { critical, warning, info } = summary.bySeverity;
  return `query-lens: ${summary.total} ${noun} (${critical} critical, ${warning} warning, ${info} info)`;
}

export function formatTextReport(outcome: CompletedAnalysis): string {
  const sections = [formatSummaryLine(summarizeIssues(outcome.issues))];
  for (const issue of outcome.issues) {
    sections.push(formatIssue(issue));
  }
  if (outcome.notes.length > 0) {
    sections.push(outcome.notes.map((note) => `note: ${note.message}`).join('\n'));
  }
  if (outcome.rejected.length > 0) {
    const noun = outcome.rejected.length === 1 ? 'record' : 'records';
    sections.push(`${outcome.rejected.length} trace ${noun} rejected`);
  }
  return sections.join('\n\n');
}

/** True when any issue ranks at or above `threshold`. */
export function hasIssuesAtOrAbove(issues: readonly Issue[], threshold: Severity): boolean {
  return issues.some((issue) => SEVERITY_RANK[issue.severity] <= SEVERITY_RANK[threshold]);
}
