/**
 * 데이터 타입 정의
 *
 * 파이프라인이 다루는 기본 데이터 구조를 정의합니다.
 * 이 타입들은 모든 모듈에서 공통으로 사용됩니다.
 */

// ============================================================================
// 셀 값 타입
// ============================================================================

/**
 * 셀 하나에 들어갈 수 있는 값의 타입
 *
 * 로더가 불리언/날짜를 문자열로 정규화하므로 세 가지만 남습니다.
 *
 * @example
 * const model: CellValue = "REMIND";   // 문자열
 * const value: CellValue = 41.2;       // 숫자
 * const empty: CellValue = null;       // 빈 값 (missing)
 */
export type CellValue = string | number | null;

// ============================================================================
// 행(Row) 타입
// ============================================================================

/**
 * 한 줄의 데이터 (행)
 *
 * 키는 컬럼 이름이고 값은 CellValue입니다.
 * 없는 키는 missing(null)과 같게 취급합니다.
 *
 * @example
 * const row: Row = { Model: "A", Scenario: "Low", "2020": 10, "2025": 20 };
 */
export interface Row {
  [columnKey: string]: CellValue;
}

// ============================================================================
// 테이블 타입
// ============================================================================

/**
 * 와이드 포맷 테이블
 *
 * 컬럼 순서는 `columns`가 결정합니다.
 * ("2020" 같은 숫자형 키는 객체 키 순서를 따르지 않으므로 별도로 보관)
 */
export interface DataTable {
  /** 순서가 있는 컬럼 이름 */
  readonly columns: readonly string[];

  /** 행 데이터 (원본 파일 순서) */
  readonly rows: readonly Row[];
}

// ============================================================================
// 롱 포맷 행
// ============================================================================

/** melt 결과에서 연도가 들어가는 컬럼 이름 */
export const YEAR_COLUMN = 'Year';

/** melt 결과에서 값이 들어가는 컬럼 이름 */
export const VALUE_COLUMN = 'Value';

/**
 * 롱 포맷 행 (식별자 컬럼들 + Year + Value)
 *
 * 집계 행(AggregateRow)도 같은 모양이며, 시리즈 컬럼에 센티널 레이블이 들어갑니다.
 */
export interface LongRow extends Row {
  Year: number;
  Value: number | null;
}

// ============================================================================
// 헬퍼 함수
// ============================================================================

/**
 * 컬럼 이름과 행으로 테이블 생성
 */
export function createTable(columns: readonly string[], rows: readonly Row[]): DataTable {
  return { columns: [...columns], rows };
}

/**
 * 행에서 셀 값 조회 (없는 키는 null)
 */
export function getCell(row: Row, columnKey: string): CellValue {
  return row[columnKey] ?? null;
}
