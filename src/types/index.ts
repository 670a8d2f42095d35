/**
 * 타입 정의 모듈
 *
 * 모든 모듈에서 공유하는 타입들을 정의합니다.
 * 이 파일에서 모든 타입을 한 번에 import할 수 있습니다.
 *
 * @example
 * import type { DataTable, LongRow, DatasetConfig, FilterSpec } from '@/types';
 */

// 데이터 타입
export type { CellValue, Row, DataTable, LongRow } from './data.types';
export { YEAR_COLUMN, VALUE_COLUMN, createTable, getCell } from './data.types';

// 설정 타입
export type {
  DatasetConfig,
  DatasetDefinition,
  FilterSpec,
  YearRange,
  PipelineWarningCode,
  PipelineWarning,
} from './config.types';
