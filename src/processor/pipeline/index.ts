/**
 * Pipeline 모듈 진입점
 *
 * 데이터 변환 파이프라인 관련 클래스와 타입을 내보냅니다.
 */

// 핵심 클래스
export { DataPipeline } from './DataPipeline';
export type { PipelineResult, PipelineOptions } from './DataPipeline';

// Transformer 구현
export { PrepareTransformer } from './PrepareTransformer';
export {
  CategoricalFilterTransformer,
  applyCategoricalFilter,
  toFilterKey,
} from './CategoricalFilterTransformer';
export { YearRangeTransformer, projectYearRange } from './YearRangeTransformer';
export { MeltTransformer, melt, toNumeric } from './MeltTransformer';
export {
  AggregateTransformer,
  buildAggregateRows,
  prepareChartRows,
  isAggregateRow,
  DEFAULT_SENTINEL_LABEL,
} from './AggregateTransformer';
export type { AggregateOptions, ChartRowOptions } from './AggregateTransformer';

// 타입 및 인터페이스
export { PipelinePhase, createInitialContext, withWarning } from './Transformer';
export type { Transformer, TransformContext } from './Transformer';
