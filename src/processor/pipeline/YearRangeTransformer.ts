/**
 * YearRangeTransformer - 연도 범위 투영 변환기
 *
 * 식별자 컬럼(설정 순서) + 범위 안의 연도 컬럼(오름차순)만 남깁니다.
 * 식별자 컬럼이 없으면 MissingColumnError - 설정 버그이므로 무시하지 않습니다.
 */

import type { DataTable, YearRange } from '../../types';
import { assertColumns } from '../../core/errors';
import { classifyColumns, parseYear, sortYearColumns } from '../ColumnClassifier';
import { clampYearRange, defaultYearRange, isYearInRange } from '../YearRange';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase, withWarning } from './Transformer';

/**
 * 연도 범위 투영
 *
 * 호출 전에 startYear <= endYear로 보정되어 있어야 합니다 (clampYearRange).
 *
 * @throws MissingColumnError 식별자 컬럼이 테이블에 없을 때
 */
export function projectYearRange(
  table: DataTable,
  identifierColumns: readonly string[],
  startYear: number,
  endYear: number,
  datasetId?: string
): DataTable {
  assertColumns(table.columns, identifierColumns, datasetId);

  const { yearColumns } = classifyColumns(table.columns);
  const selectedYears = sortYearColumns(yearColumns).filter((column) =>
    isYearInRange(parseYear(column), { startYear, endYear })
  );

  return new ArqueroEngine(table).select([...identifierColumns, ...selectedYears]);
}

// =============================================================================
// YearRangeTransformer 클래스
// =============================================================================

/**
 * 연도 범위 투영 변환기
 *
 * 범위를 주지 않으면 현재 연도 컬럼 전체를 사용합니다.
 * 뒤집힌 범위는 보정하고 YEAR_RANGE_CLAMPED 경고를 남깁니다.
 */
export class YearRangeTransformer implements Transformer {
  readonly name = 'YearRangeTransformer';
  readonly phase = PipelinePhase.PROJECT;

  private readonly range: YearRange | null;
  private readonly datasetId: string | undefined;

  constructor(range: YearRange | null = null, datasetId?: string) {
    this.range = range;
    this.datasetId = datasetId;
  }

  transform(ctx: TransformContext): TransformContext {
    const requested = this.range ?? defaultYearRange(ctx.yearColumns);
    let next = ctx;
    let range: YearRange = { startYear: 0, endYear: -1 };

    if (requested) {
      const clamped = clampYearRange(requested);
      range = clamped.range;
      if (clamped.warning) {
        console.warn(`[${this.name}] ${clamped.warning.message}`);
        next = withWarning(next, clamped.warning);
      }
    }

    const table = projectYearRange(
      ctx.table,
      ctx.identifierColumns,
      range.startYear,
      range.endYear,
      this.datasetId
    );

    return {
      ...next,
      table,
      yearColumns: table.columns.slice(ctx.identifierColumns.length),
    };
  }
}
