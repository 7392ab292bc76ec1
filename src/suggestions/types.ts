import type { Suggestion, SuggestionParameters } from '../types.js';

/**
 * Remediation boundary. Returning null, or throwing, leaves the issue
 * without a suggestion; it never fails the pass.
 */
export interface SuggestionProvider {
  suggest(kind: string, parameters: SuggestionParameters): Suggestion | null;
}
