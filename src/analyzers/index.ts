import { divisionByZeroAnalyzer } from './division_by_zero.js';
import { eagerLoadingAnalyzer } from './eager_loading.js';
import { findAllAnalyzer } from './find_all.js';
import { frequentQueryAnalyzer } from './frequent_query.js';
import { ineffectiveLikeAnalyzer } from './ineffective_like.js';
import { limitWithCollectionJoinAnalyzer } from './limit_with_collection_join.js';
import { missingIndexAnalyzer } from './missing_index.js';
import { nPlusOneAnalyzer } from './n_plus_one.js';
import { nullComparisonAnalyzer } from './null_comparison.js';
import { orderByWithoutLimitAnalyzer } from './order_by_without_limit.js';
import { charsetAnalyzer, strictModeAnalyzer, timezoneMismatchAnalyzer } from './platform_settings.js';
import { rawQueryInterpolationAnalyzer } from './raw_query_interpolation.js';
import { AnalyzerRegistry } from './registry.js';
import { sensitiveDataExposureAnalyzer } from './sensitive_data_exposure.js';
import { slowQueryAnalyzer } from './slow_query.js';
import { sqlInjectionAnalyzer } from './sql_injection.js';
import type { Analyzer } from './types.js';

export const DEFAULT_ANALYZERS: readonly Analyzer[] = [
  nPlusOneAnalyzer,
  slowQueryAnalyzer,
  findAllAnalyzer,
  missingIndexAnalyzer,
  frequentQueryAnalyzer,
  orderByWithoutLimitAnalyzer,
  ineffectiveLikeAnalyzer,
  timezoneMismatchAnalyzer,
  strictModeAnalyzer,
  sensitiveDataExposureAnalyzer,
  rawQueryInterpolationAnalyzer,
  nullComparisonAnalyzer,
  divisionByZeroAnalyzer,
  eagerLoadingAnalyzer,
  limitWithCollectionJoinAnalyzer,
  sqlInjectionAnalyzer,
  charsetAnalyzer,
];

export function createDefaultAnalyzerRegistry(): AnalyzerRegistry {
  const registry = new AnalyzerRegistry();
  registry.registerAll(DEFAULT_ANALYZERS);
  return registry;
}

export { AnalyzerRegistry } from './registry.js';
export type {
  Analyzer,
  AnalysisSettings,
  SourceAnalysisContext,
  SourceAnalyzer,
  TraceAnalysisContext,
  TraceAnalyzer,
} from './types.js';
