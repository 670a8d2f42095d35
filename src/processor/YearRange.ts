/**
 * 연도 범위 보정
 *
 * 시작 연도가 끝 연도보다 크면 끝 연도를 시작 연도로 맞추고 경고를 돌려줍니다.
 * 에러로 처리하지 않습니다.
 */

import type { PipelineWarning, YearRange } from '../types';
import { parseYear, sortYearColumns } from './ColumnClassifier';

/**
 * 보정 결과
 */
export interface ClampResult {
  range: YearRange;
  warning?: PipelineWarning;
}

/**
 * 연도 범위 보정
 *
 * @example
 * clampYearRange({ startYear: 2030, endYear: 2020 });
 * // → { range: { startYear: 2030, endYear: 2030 }, warning: { code: 'YEAR_RANGE_CLAMPED', ... } }
 */
export function clampYearRange(range: YearRange): ClampResult {
  const startYear = Math.trunc(range.startYear);
  const endYear = Math.trunc(range.endYear);

  if (startYear <= endYear) {
    return { range: { startYear, endYear } };
  }

  return {
    range: { startYear, endYear: startYear },
    warning: {
      code: 'YEAR_RANGE_CLAMPED',
      message: `End year ${endYear} is before start year ${startYear}; end year reset to ${startYear}.`,
    },
  };
}

/**
 * 연도 컬럼 전체를 덮는 기본 범위 (연도 컬럼이 없으면 null)
 */
export function defaultYearRange(yearColumns: readonly string[]): YearRange | null {
  const sorted = sortYearColumns(yearColumns);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (first === undefined || last === undefined) {
    return null;
  }
  return { startYear: parseYear(first), endYear: parseYear(last) };
}

/**
 * 연도가 범위 안에 있는지 (양 끝 포함)
 */
export function isYearInRange(year: number, range: YearRange): boolean {
  return year >= range.startYear && year <= range.endYear;
}
