/**
 * ColumnClassifier - 컬럼 분류기
 *
 * 컬럼 이름만 보고 식별자 컬럼 / 연도 컬럼 / 제외 컬럼으로 나눕니다.
 * 레이블 전체가 숫자이면 연도 컬럼입니다 ("001" 같은 숫자 코드도 연도로 분류됨).
 */

/** 연도 컬럼 판별 패턴 (10진 숫자만) */
const YEAR_PATTERN = /^[0-9]+$/;

/**
 * 컬럼 분류 결과
 */
export interface ColumnClassification {
  /** 식별자(카테고리) 컬럼 - 입력 순서 유지 */
  identifiers: string[];

  /** 연도 컬럼 - 입력 순서 유지 (정렬하지 않음) */
  yearColumns: string[];

  /** 실제로 제거된 제외 컬럼 */
  excluded: string[];
}

/**
 * 연도 컬럼 여부
 *
 * @example
 * isYearColumn('2020');   // true
 * isYearColumn(' 2030 '); // true
 * isYearColumn('2020a');  // false
 */
export function isYearColumn(name: string): boolean {
  return YEAR_PATTERN.test(name.trim());
}

/**
 * 연도 컬럼 이름 → 정수 연도
 */
export function parseYear(name: string): number {
  return Number.parseInt(name.trim(), 10);
}

/**
 * 연도 컬럼을 정수 값 기준 오름차순 정렬 (새 배열 반환)
 */
export function sortYearColumns(columns: readonly string[]): string[] {
  return [...columns].sort((a, b) => parseYear(a) - parseYear(b));
}

/**
 * 컬럼 분류
 *
 * 제외 컬럼을 먼저 제거한 뒤 나머지를 분류합니다.
 * 존재하지 않는 제외 컬럼은 무시합니다.
 */
export function classifyColumns(
  columnNames: readonly string[],
  excludeColumns: readonly string[] = []
): ColumnClassification {
  const excludeSet = new Set(excludeColumns);
  const result: ColumnClassification = { identifiers: [], yearColumns: [], excluded: [] };

  for (const name of columnNames) {
    if (excludeSet.has(name)) {
      result.excluded.push(name);
    } else if (isYearColumn(name)) {
      result.yearColumns.push(name);
    } else {
      result.identifiers.push(name);
    }
  }

  return result;
}
