/**
 * @fileoverview Diagnostic capability boundary
 *
 * Live diagnostics against the application's database are injected by the
 * host. Every method is optional; an analyzer that needs a missing one
 * fails with CapabilityUnavailableError. Implementations receive an
 * AbortSignal that fires on timeout or host cancellation.
 */

import type { OperationParameters } from '../types.js';

/** One step of an execution plan, normalized by the host adapter. */
export interface PlanStep {
  readonly table?: string;
  /** True when the step reads every row of `table` (MySQL `type=ALL`, PostgreSQL `Seq Scan`). */
  readonly fullScan: boolean;
  readonly rowsExamined: number;
  readonly index?: string | null;
}

export interface ExecutionPlan {
  readonly steps: readonly PlanStep[];
}

export interface TableIndex {
  readonly name: string;
  readonly columns: readonly string[];
}

export interface TableMetadata {
  readonly name: string;
  /** Estimated row count, when the platform reports one. */
  readonly rowCount?: number;
  readonly indexes: readonly TableIndex[];
}

export interface DiagnosticCapabilities {
  explainPlan?(text: string, parameters: OperationParameters, signal: AbortSignal): Promise<ExecutionPlan>;
  fetchPlatformSetting?(name: string, signal: AbortSignal): Promise<string | null>;
  describeTable?(table: string, signal: AbortSignal): Promise<TableMetadata>;
}
