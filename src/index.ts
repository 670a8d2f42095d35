/**
 * Pathway Explorer - 기후 경로 데이터 탐색 파이프라인
 *
 * 와이드 포맷 테이블(카테고리 컬럼 + 연도 컬럼)을 필터링하고,
 * 롱 포맷으로 바꿔 중앙값 추세를 만들고, 스프레드시트로 내보냅니다.
 * Arquero 기반의 테이블 연산을 사용합니다.
 */

// 타입 내보내기
export * from './types';

// 코어 모듈
export * from './core';

// 프로세서 모듈
export * from './processor';

// 설정
export { DatasetRegistry, createDatasetConfig } from './config/DatasetRegistry';
export { DEFAULT_DATASETS, createDefaultRegistry } from './config/datasets';

// 입출력
export type { TableLoader } from './io/TableLoader';
export { FileTableLoader, SUPPORTED_EXTENSIONS } from './io/TableLoader';
export { SourceCache, freezeTable } from './io/SourceCache';
export { parseCsvText } from './io/parseCsv';
export {
  parseWorkbook,
  encodeWorkbook,
  decodeWorkbook,
  exportFileName,
  DEFAULT_SHEET_NAME,
} from './io/workbook';

// 차트
export { buildChartSeries, sentinelSeriesName, MISSING_SERIES_NAME } from './chart/ChartSeries';
export type { ChartSeries, ChartPoint, ChartSeriesOptions } from './chart/ChartSeries';
