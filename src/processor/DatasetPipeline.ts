/**
 * DatasetPipeline - 데이터셋 파이프라인 오케스트레이터
 *
 * DatasetConfig 하나를 보고 Transformer들을 구성해 실행합니다.
 * 데이터셋별 차이(연도 필터 여부, 식별자 컬럼, 보조 그룹 키)는
 * 모두 설정에서 오고, 코드 경로는 하나입니다.
 *
 * 호출할 때마다 전체 원본 테이블에서 다시 계산합니다 (증분 계산 없음).
 * 같은 입력이면 항상 같은 결과가 나옵니다.
 */

import type {
  DataTable,
  DatasetConfig,
  FilterSpec,
  LongRow,
  PipelineWarning,
  YearRange,
} from '../types';
import { DEFAULT_PREVIEW_ROWS, previewRows } from '../core/Pagination';
import { DataPipeline, type PipelineOptions } from './pipeline/DataPipeline';
import { withWarning } from './pipeline/Transformer';
import { PrepareTransformer } from './pipeline/PrepareTransformer';
import { CategoricalFilterTransformer } from './pipeline/CategoricalFilterTransformer';
import { YearRangeTransformer } from './pipeline/YearRangeTransformer';
import { MeltTransformer } from './pipeline/MeltTransformer';
import { AggregateTransformer, prepareChartRows } from './pipeline/AggregateTransformer';

/**
 * 데이터셋 파이프라인 결과
 */
export interface DatasetResult {
  /** 데이터셋 ID */
  datasetId: string;

  /** 미리보기 (내보내기 테이블 앞부분) */
  previewTable: DataTable;

  /** 내보내기 테이블 (필터 + 연도 투영 후 와이드 포맷) */
  exportTable: DataTable;

  /** melt 결과 */
  longRows: LongRow[];

  /** 중앙값 집계 행 */
  aggregateRows: LongRow[];

  /** 차트용 행 (롱 행 + 집계 행, 표시 정책 적용) */
  chartRows: LongRow[];

  /** 식별자 컬럼 */
  identifierColumns: string[];

  /** 결과에 남은 연도 컬럼 (오름차순) */
  yearColumns: string[];

  /** 경고 (연도 범위 보정, 빈 결과) */
  warnings: PipelineWarning[];
}

/**
 * 오케스트레이터 옵션
 */
export interface DatasetPipelineOptions extends PipelineOptions {
  /** 미리보기 행 수 (기본값: 5) */
  previewRows?: number;
}

// =============================================================================
// DatasetPipeline 클래스
// =============================================================================

export class DatasetPipeline {
  private readonly options: DatasetPipelineOptions;

  constructor(options: DatasetPipelineOptions = {}) {
    this.options = options;
  }

  /**
   * 설정에서 파이프라인 구성
   *
   * 연도 필터가 꺼진 데이터셋은 YearRangeTransformer를 넣지 않습니다.
   */
  build(
    config: DatasetConfig,
    filterSpec: FilterSpec = {},
    yearRange: YearRange | null = null
  ): DataPipeline {
    const pipeline = new DataPipeline({ debug: this.options.debug });

    pipeline
      .addTransformer(new PrepareTransformer(config.excludeColumns))
      .addTransformer(new CategoricalFilterTransformer(filterSpec))
      .addTransformer(new MeltTransformer(config.id))
      .addTransformer(
        new AggregateTransformer({
          seriesColumn: config.seriesColumn,
          sentinelLabel: config.sentinelLabel,
          groupKey: config.secondaryGroupKey,
        })
      );

    if (config.yearFilterEnabled) {
      pipeline.addTransformer(new YearRangeTransformer(yearRange, config.id));
    }

    return pipeline;
  }

  /**
   * 파이프라인 실행
   *
   * @param config - 데이터셋 설정
   * @param table - 로드된 원본 테이블 (변경되지 않음)
   * @param filterSpec - 카테고리 필터 조건
   * @param yearRange - 연도 범위 (없으면 전체)
   * @throws ConfigurationError 식별자 컬럼이 테이블에 없을 때
   */
  run(
    config: DatasetConfig,
    table: DataTable,
    filterSpec: FilterSpec = {},
    yearRange: YearRange | null = null
  ): DatasetResult {
    const { context, executionTime } = this.build(config, filterSpec, yearRange).execute(
      table,
      config.identifierColumns
    );

    let ctx = context;
    if (ctx.table.rows.length === 0) {
      ctx = withWarning(ctx, {
        code: 'EMPTY_RESULT',
        message: `No rows in "${config.label}" match the current filters.`,
      });
    }

    if (this.options.debug) {
      console.log(
        `[DatasetPipeline] ${config.id}: ${ctx.table.rows.length} rows, ` +
          `${ctx.aggregateRows.length} aggregate rows in ${executionTime.toFixed(2)}ms`
      );
    }

    return {
      datasetId: config.id,
      previewTable: previewRows(ctx.table, this.options.previewRows ?? DEFAULT_PREVIEW_ROWS),
      exportTable: ctx.table,
      longRows: [...ctx.longRows],
      aggregateRows: [...ctx.aggregateRows],
      chartRows: prepareChartRows([...ctx.longRows, ...ctx.aggregateRows], {
        dropZeroValues: config.dropZeroValues,
      }),
      identifierColumns: [...ctx.identifierColumns],
      yearColumns: [...ctx.yearColumns],
      warnings: [...ctx.warnings],
    };
  }
}
