/**
 * MeltTransformer - 와이드 → 롱 변환기
 *
 * (행 × 연도 컬럼)마다 LongRow 하나를 만듭니다.
 * 출력 행 수 = 입력 행 수 × 연도 컬럼 수 (항상 성립)
 *
 * 출력은 연도 컬럼 순서대로 묶입니다 (연도1의 모든 행, 연도2의 모든 행, ...).
 * 숫자로 바꿀 수 없는 값은 에러 없이 null이 됩니다.
 */

import type { CellValue, DataTable, LongRow } from '../../types';
import { getCell } from '../../types';
import { assertColumns } from '../../core/errors';
import { parseYear } from '../ColumnClassifier';
import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase } from './Transformer';

/** 숫자 문자열 패턴 (부호, 소수점, 지수 허용) */
const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * 셀 값 → 숫자 (변환 불가면 null)
 *
 * @example
 * toNumeric(12);       // 12
 * toNumeric(' 3.5 ');  // 3.5
 * toNumeric('n/a');    // null
 */
export function toNumeric(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * 와이드 테이블을 롱 포맷으로 변환
 *
 * @throws MissingColumnError 식별자/연도 컬럼이 테이블에 없을 때
 */
export function melt(
  table: DataTable,
  identifierColumns: readonly string[],
  yearColumns: readonly string[],
  datasetId?: string
): LongRow[] {
  assertColumns(table.columns, [...identifierColumns, ...yearColumns], datasetId);

  const result: LongRow[] = [];

  for (const yearColumn of yearColumns) {
    const year = parseYear(yearColumn);

    for (const row of table.rows) {
      const longRow: LongRow = { Year: year, Value: toNumeric(getCell(row, yearColumn)) };
      for (const column of identifierColumns) {
        longRow[column] = getCell(row, column);
      }
      result.push(longRow);
    }
  }

  return result;
}

// =============================================================================
// MeltTransformer 클래스
// =============================================================================

/**
 * 와이드 → 롱 변환기
 */
export class MeltTransformer implements Transformer {
  readonly name = 'MeltTransformer';
  readonly phase = PipelinePhase.RESHAPE;

  private readonly datasetId: string | undefined;

  constructor(datasetId?: string) {
    this.datasetId = datasetId;
  }

  transform(ctx: TransformContext): TransformContext {
    return {
      ...ctx,
      longRows: melt(ctx.table, ctx.identifierColumns, ctx.yearColumns, this.datasetId),
    };
  }
}
