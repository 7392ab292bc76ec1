/**
 * @fileoverview Sensitive field vocabulary
 *
 * A field is sensitive when its snake_case name contains one of the
 * patterns, unless a metadata prefix or suffix marks it as a flag,
 * timestamp or hash about the secret rather than the secret itself
 * (`is_token_valid`, `password_reset_at`, `password_hash`).
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const VocabularySchema = z.object({
  patterns: z.array(z.string().min(1)),
  metadataPrefixes: z.array(z.string().min(1)),
  metadataSuffixes: z.array(z.string().min(1)),
});

export type SensitiveVocabulary = z.infer<typeof VocabularySchema>;

export const DEFAULT_VOCABULARY: SensitiveVocabulary = VocabularySchema.parse(
  JSON.parse(readFileSync(new URL('../../data/sensitive_fields.json', import.meta.url), 'utf8')),
);

/** `apiKey`, `_apiKey` and `#apiKey` all read as `api_key`. */
export function toSnakeCase(name: string): string {
  return name
    .replace(/^[#_]+/, '')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

export function isSensitiveFieldName(
  name: string,
  patterns: readonly string[] = DEFAULT_VOCABULARY.patterns,
  vocabulary: SensitiveVocabulary = DEFAULT_VOCABULARY,
): boolean {
  const snake = toSnakeCase(name);
  if (vocabulary.metadataPrefixes.some((prefix) => snake.startsWith(prefix))) return false;
  if (vocabulary.metadataSuffixes.some((suffix) => snake.endsWith(suffix))) return false;
  return patterns.some((pattern) => snake.includes(pattern));
}
