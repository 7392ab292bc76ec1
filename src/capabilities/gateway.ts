/**
 * @fileoverview Diagnostic gateway
 *
 * The capability set as analyzers see it: each call is bounded by the host
 * timeout, tied to the pass's AbortSignal, and translated into
 * CapabilityUnavailableError when the capability is missing or fails.
 * TimeoutError passes through so the pipeline can report it as a timeout.
 */

import { Errors, isQueryLensError, toError, type CapabilityName } from '../core/errors.js';
import { withTimeout } from '../core/result.js';
import type { OperationParameters } from '../types.js';
import type { DiagnosticCapabilities, ExecutionPlan, TableMetadata } from './types.js';

export const DEFAULT_CAPABILITY_TIMEOUT_MS = 5000;

export class DiagnosticGateway {
  constructor(
    private readonly capabilities: DiagnosticCapabilities,
    private readonly timeoutMs: number = DEFAULT_CAPABILITY_TIMEOUT_MS,
    private readonly signal?: AbortSignal,
  ) {}

  has(capability: CapabilityName): boolean {
    return typeof this.capabilities[capability] === 'function';
  }

  explainPlan(text: string, parameters: OperationParameters): Promise<ExecutionPlan> {
    const explain = this.capabilities.explainPlan;
    if (!explain) {
      return Promise.reject(Errors.capability('explainPlan', 'not provided by the host'));
    }
    return this.call('explainPlan', (signal) => explain.call(this.capabilities, text, parameters, signal));
  }

  fetchPlatformSetting(name: string): Promise<string | null> {
    const fetchSetting = this.capabilities.fetchPlatformSetting;
    if (!fetchSetting) {
      return Promise.reject(Errors.capability('fetchPlatformSetting', 'not provided by the host'));
    }
    return this.call('fetchPlatformSetting', (signal) => fetchSetting.call(this.capabilities, name, signal));
  }

  describeTable(table: string): Promise<TableMetadata> {
    const describe = this.capabilities.describeTable;
    if (!describe) {
      return Promise.reject(Errors.capability('describeTable', 'not provided by the host'));
    }
    return this.call('describeTable', (signal) => describe.call(this.capabilities, table, signal));
  }

  private async call<T>(capability: CapabilityName, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(work, this.timeoutMs, { context: capability, signal: this.signal });
    } catch (error) {
      if (isQueryLensError(error)) {
        throw error;
      }
      const cause = toError(error);
      throw Errors.capability(capability, cause.message, cause);
    }
  }
}
