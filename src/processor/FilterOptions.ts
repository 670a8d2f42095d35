/**
 * 픽리스트 옵션 계산
 *
 * 각 컬럼의 옵션은 앞쪽 컬럼들의 선택을 적용한 테이블에서 뽑습니다 (연쇄 필터).
 * 예: Model을 고르면 Scenario 옵션은 그 Model의 시나리오만 남음
 */

import type { DataTable, FilterSpec } from '../types';
import { ArqueroEngine } from './engines/ArqueroEngine';
import { applyCategoricalFilter } from './pipeline/CategoricalFilterTransformer';

/**
 * 컬럼의 유니크 값 (문자열, 처음 등장한 순서, missing 제외)
 */
export function uniqueOptions(table: DataTable, column: string): string[] {
  return new ArqueroEngine(table)
    .getUniqueValues(column)
    .filter((value) => value !== null)
    .map((value) => String(value));
}

/**
 * 픽리스트 옵션 계산
 *
 * 테이블에 없는 컬럼은 결과에서 빠집니다.
 *
 * @example
 * buildFilterOptions(table, ['Model', 'Scenario'], { Model: ['A'] });
 * // → { Model: ['A', 'B'], Scenario: [A 모델의 시나리오들] }
 */
export function buildFilterOptions(
  table: DataTable,
  filterColumns: readonly string[],
  spec: FilterSpec = {}
): Record<string, string[]> {
  const options: Record<string, string[]> = {};
  const applied: Record<string, readonly string[]> = {};
  let current = table;

  for (const column of filterColumns) {
    if (!table.columns.includes(column)) continue;

    options[column] = uniqueOptions(current, column);

    const selected = spec[column];
    if (selected && selected.length > 0) {
      applied[column] = selected;
      current = applyCategoricalFilter(table, applied);
    }
  }

  return options;
}
