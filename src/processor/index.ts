/**
 * 프로세서 모듈
 *
 * 와이드 테이블의 필터 → 연도 투영 → melt → 중앙값 집계를 담당합니다.
 *
 * 구성:
 * - ColumnClassifier: 식별자 / 연도 / 제외 컬럼 분류
 * - pipeline/: 단계별 Transformer와 DataPipeline
 * - engines/: Arquero 기반 테이블 연산
 * - DatasetPipeline: DatasetConfig로 파이프라인을 구성하는 오케스트레이터
 */

export {
  classifyColumns,
  isYearColumn,
  parseYear,
  sortYearColumns,
} from './ColumnClassifier';
export type { ColumnClassification } from './ColumnClassifier';

export { clampYearRange, defaultYearRange, isYearInRange } from './YearRange';
export type { ClampResult } from './YearRange';

export { buildFilterOptions, uniqueOptions } from './FilterOptions';

export {
  ArqueroEngine,
  median,
  medianByGroup,
  toArqueroTable,
  fromArqueroTable,
} from './engines/ArqueroEngine';

export { DatasetPipeline } from './DatasetPipeline';
export type { DatasetResult, DatasetPipelineOptions } from './DatasetPipeline';

export * from './pipeline';
