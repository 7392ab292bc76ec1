/**
 * @fileoverview Missing index detection
 *
 * Each distinct SELECT shape with an execution at or above
 * `slowThresholdMs` is explained once, using its slowest execution. Plan
 * steps that scan a whole table and examine at least `minRowsScanned`
 * rows make one finding per shape.
 *
 * When the host can describe tables, metadata is read through the
 * metadata cache: tables known to hold fewer than `minTableRows` rows are
 * skipped, and existing indexes are named in the narrative.
 */

import type { PlanStep, TableMetadata } from '../capabilities/types.js';
import { thresholdValue } from '../severity/thresholds.js';
import type { Finding, OperationTrace } from '../types.js';
import { formatMs, groupByFingerprint, truncate } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

function slowest(traces: readonly OperationTrace[]): OperationTrace | undefined {
  let result: OperationTrace | undefined;
  for (const trace of traces) {
    if (!result || trace.durationMs > result.durationMs) result = trace;
  }
  return result;
}

async function tableMetadata(context: TraceAnalysisContext, table: string): Promise<TableMetadata | undefined> {
  if (!context.gateway.has('describeTable')) return undefined;
  return context.cache.getOrLoad(table, () => context.gateway.describeTable(table));
}

export const missingIndexAnalyzer: TraceAnalyzer = {
  kind: 'missing_index',
  target: 'traces',
  requires: ['explainPlan'],

  async analyze(context: TraceAnalysisContext): Promise<Finding[]> {
    const { traces, thresholds, fingerprints, structure, gateway } = context;
    const slowThresholdMs = thresholdValue(thresholds, 'missing_index', 'slowThresholdMs');
    const minRowsScanned = thresholdValue(thresholds, 'missing_index', 'minRowsScanned');
    const minTableRows = thresholdValue(thresholds, 'missing_index', 'minTableRows');
    const findings: Finding[] = [];

    for (const group of groupByFingerprint(traces, fingerprints)) {
      const candidate = slowest(group.traces);
      if (!candidate || candidate.durationMs < slowThresholdMs) continue;
      if (structure.read(candidate.text).statement !== 'select') continue;

      const plan = await gateway.explainPlan(candidate.text, candidate.parameters);
      const scans: PlanStep[] = [];
      const knownIndexes: string[] = [];
      for (const step of plan.steps) {
        if (!step.fullScan || step.rowsExamined < minRowsScanned) continue;
        const metadata = step.table ? await tableMetadata(context, step.table) : undefined;
        if (metadata?.rowCount !== undefined && metadata.rowCount < minTableRows) continue;
        scans.push(step);
        knownIndexes.push(...(metadata?.indexes.map((index) => index.name) ?? []));
      }
      if (scans.length === 0) continue;

      const rowsScanned = Math.max(...scans.map((step) => step.rowsExamined));
      const table = scans.find((step) => step.table !== undefined)?.table;
      const indexNote = knownIndexes.length > 0 ? ` Existing indexes: ${knownIndexes.join(', ')}.` : '';
      findings.push({
        kind: 'missing_index',
        title: table ? `Missing index on ${table}` : `Missing index: ${truncate(group.fingerprint)}`,
        narrative:
          `The plan scans ${table ?? 'a table'} in full, examining ${rowsScanned} rows ` +
          `(${formatMs(candidate.durationMs)}).${indexNote}`,
        metrics: { rowsScanned, durationMs: candidate.durationMs, fullScanSteps: scans.length },
        relatedOperations: group.traces,
        suggestionParameters: { rowsScanned, ...(table ? { table } : {}) },
      });
    }
    return findings;
  },
};
