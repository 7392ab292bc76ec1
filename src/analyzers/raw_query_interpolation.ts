import { RawQueryVisitor } from '../source/raw_query_visitor.js';
import type { Finding } from '../types.js';
import type { SourceAnalysisContext, SourceAnalyzer } from './types.js';

/**
 * One finding per query-execution call site whose statement text is
 * interpolated from runtime values.
 */
export const rawQueryInterpolationAnalyzer: SourceAnalyzer = {
  kind: 'raw_query_interpolation',
  target: 'source',

  analyze({ units }: SourceAnalysisContext): Finding[] {
    const findings: Finding[] = [];
    for (const unit of units) {
      const visitor = new RawQueryVisitor(unit.sourceFile).walk(unit.sourceFile);
      for (const { callee, line, column } of visitor.matches()) {
        findings.push({
          kind: 'raw_query_interpolation',
          title: `Interpolated query text passed to ${callee}()`,
          narrative:
            `${unit.fileName}:${line} builds the statement for ${callee}() from runtime values. ` +
            'Values concatenated into SQL text are open to injection and defeat statement caching.',
          metrics: { interpolations: 1 },
          relatedOperations: [],
          relatedOrigin: { file: unit.fileName, line, column },
          suggestionParameters: { callee, line },
        });
      }
    }
    return findings;
  },
};
