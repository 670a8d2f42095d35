/**
 * AggregateTransformer - 중앙값 추세 변환기
 *
 * 연도별(보조 그룹 키가 있으면 연도 × 키별) Value 중앙값으로
 * 합성 행(AggregateRow)을 만듭니다.
 *
 * - Value가 null인 행은 집계 전에 제외
 * - 값이 하나도 없는 그룹은 행을 만들지 않음 (0을 만들어내지 않음)
 * - 시리즈 컬럼에는 센티널 레이블("Median")이 들어감
 *
 * 집계 행은 원본 롱 행과 합쳐 차트 데이터가 됩니다 (prepareChartRows).
 */

import type { CellValue, LongRow, Row } from '../../types';
import { getCell, VALUE_COLUMN, YEAR_COLUMN } from '../../types';
import { medianByGroup } from '../engines/ArqueroEngine';
import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase } from './Transformer';

/** 기본 센티널 레이블 */
export const DEFAULT_SENTINEL_LABEL = 'Median';

/**
 * 집계 옵션
 */
export interface AggregateOptions {
  /** 센티널 레이블을 넣을 시리즈 컬럼 */
  seriesColumn: string;

  /** 센티널 레이블 (기본값: "Median") */
  sentinelLabel?: string;

  /** 보조 그룹 키 (예: "Variable") */
  groupKey?: string | null;

  /** 집계 행에 null로 채울 식별자 컬럼 */
  identifierColumns?: readonly string[];
}

/**
 * 차트 표시 옵션
 */
export interface ChartRowOptions {
  /** Value가 0인 행도 없는 값으로 보고 제외 (기본값: true) */
  dropZeroValues?: boolean;
}

/**
 * 중앙값 집계 행 생성 (집계 행만 반환)
 *
 * @example
 * buildAggregateRows(rows, { seriesColumn: 'Scenario' });
 * // → [{ Scenario: 'Median', Year: 2020, Value: 2.5 }, ...]
 */
export function buildAggregateRows(rows: readonly LongRow[], options: AggregateOptions): LongRow[] {
  const sentinelLabel = options.sentinelLabel ?? DEFAULT_SENTINEL_LABEL;
  const groupKey = options.groupKey ?? null;
  const groupKeys = groupKey ? [YEAR_COLUMN, groupKey] : [YEAR_COLUMN];

  const validRows: Row[] = [];
  for (const row of rows) {
    if (row.Value === null) continue;
    const groupRow: Row = { [YEAR_COLUMN]: row.Year, [VALUE_COLUMN]: row.Value };
    if (groupKey) {
      groupRow[groupKey] = getCell(row, groupKey);
    }
    validRows.push(groupRow);
  }

  const medians = medianByGroup(validRows, groupKeys);

  const result: LongRow[] = [];
  for (const median of medians.rows) {
    const year = getCell(median, YEAR_COLUMN);
    const value = getCell(median, VALUE_COLUMN);
    if (typeof year !== 'number' || typeof value !== 'number') continue;

    const aggregateRow: LongRow = { Year: year, Value: value };
    for (const column of options.identifierColumns ?? []) {
      aggregateRow[column] = null;
    }
    if (groupKey) {
      aggregateRow[groupKey] = getCell(median, groupKey);
    }
    aggregateRow[options.seriesColumn] = sentinelLabel;
    result.push(aggregateRow);
  }

  // 연도 오름차순 (같은 연도 안에서는 그룹 등장 순서 유지)
  return result.sort((a, b) => a.Year - b.Year);
}

/**
 * 차트 데이터 준비
 *
 * 원본 롱 행 + 집계 행을 합친 뒤 Value가 null인 행을 제외합니다.
 * dropZeroValues가 켜져 있으면 Value가 0인 행도 제외합니다.
 * (0을 없는 값으로 보는 표시 정책 - 실제 0 측정값과 구분되지 않음)
 */
export function prepareChartRows(
  rows: readonly LongRow[],
  options: ChartRowOptions = {}
): LongRow[] {
  const dropZeroValues = options.dropZeroValues ?? true;
  return rows.filter((row) => row.Value !== null && !(dropZeroValues && row.Value === 0));
}

/**
 * 집계 행 여부
 */
export function isAggregateRow(row: Row, seriesColumn: string, sentinelLabel: string): boolean {
  const value: CellValue = getCell(row, seriesColumn);
  return value === sentinelLabel;
}

// =============================================================================
// AggregateTransformer 클래스
// =============================================================================

/**
 * 중앙값 추세 변환기
 */
export class AggregateTransformer implements Transformer {
  readonly name = 'AggregateTransformer';
  readonly phase = PipelinePhase.AGGREGATE;

  private readonly options: AggregateOptions;

  constructor(options: AggregateOptions) {
    this.options = options;
  }

  transform(ctx: TransformContext): TransformContext {
    return {
      ...ctx,
      aggregateRows: buildAggregateRows(ctx.longRows, {
        ...this.options,
        identifierColumns: this.options.identifierColumns ?? ctx.identifierColumns,
      }),
    };
  }
}
