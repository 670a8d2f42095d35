/**
 * CategoricalFilterTransformer - 카테고리 필터 변환기
 *
 * 컬럼별 허용 값 목록(FilterSpec)에 맞는 행만 남깁니다.
 * - 값은 문자열로 바꾼 뒤 소문자로 비교 (대소문자 무시)
 * - 여러 컬럼 조건은 AND 조합
 * - 빈 허용 목록 / 테이블에 없는 컬럼은 제약 없음
 * - missing(null) 셀은 제약이 걸린 컬럼에서 항상 탈락
 *
 * 행 순서와 모든 컬럼은 그대로 유지됩니다.
 */

import type { CellValue, DataTable, FilterSpec, Row } from '../../types';
import { getCell } from '../../types';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase } from './Transformer';

/**
 * 활성 제약 (컬럼 + 소문자 허용 집합)
 */
interface ActiveConstraint {
  column: string;
  allowed: Set<string>;
}

/**
 * 셀 값 → 비교용 키 (missing이면 null)
 */
export function toFilterKey(value: CellValue): string | null {
  if (value === null) return null;
  return String(value).toLowerCase();
}

/**
 * FilterSpec에서 실제로 적용할 제약만 추출
 */
function resolveConstraints(columns: readonly string[], spec: FilterSpec): ActiveConstraint[] {
  const present = new Set(columns);
  const constraints: ActiveConstraint[] = [];

  for (const [column, values] of Object.entries(spec)) {
    if (values.length === 0 || !present.has(column)) continue;
    constraints.push({
      column,
      allowed: new Set(values.map((v) => v.toLowerCase())),
    });
  }

  return constraints;
}

/**
 * 행이 모든 제약을 만족하는지 확인
 */
function rowMatches(row: Row, constraints: readonly ActiveConstraint[]): boolean {
  return constraints.every(({ column, allowed }) => {
    const key = toFilterKey(getCell(row, column));
    return key !== null && allowed.has(key);
  });
}

/**
 * 카테고리 필터 적용
 *
 * @example
 * applyCategoricalFilter(table, { Scenario: ['low'] }); // "Low" 행도 통과
 */
export function applyCategoricalFilter(table: DataTable, spec: FilterSpec): DataTable {
  const constraints = resolveConstraints(table.columns, spec);

  if (constraints.length === 0) {
    return { columns: [...table.columns], rows: [...table.rows] };
  }

  return new ArqueroEngine(table).filterRows((row) => rowMatches(row, constraints));
}

// =============================================================================
// CategoricalFilterTransformer 클래스
// =============================================================================

/**
 * 카테고리 필터 변환기
 */
export class CategoricalFilterTransformer implements Transformer {
  readonly name = 'CategoricalFilterTransformer';
  readonly phase = PipelinePhase.FILTER;

  /** 필터 조건 */
  private readonly spec: FilterSpec;

  constructor(spec: FilterSpec = {}) {
    this.spec = spec;
  }

  transform(ctx: TransformContext): TransformContext {
    return { ...ctx, table: applyCategoricalFilter(ctx.table, this.spec) };
  }
}
