/**
 * ArqueroEngine - Arquero 기반 테이블 연산
 *
 * DataTable ↔ Arquero 테이블 변환과 파이프라인 단계들이 쓰는
 * 행 필터, 컬럼 선택, 유니크 값, 그룹별 중앙값을 제공합니다.
 *
 * Arquero란?
 * - Observable에서 만든 JavaScript 데이터 처리 라이브러리
 * - R dplyr과 비슷한 동사형 API
 * - 컬럼 지향(Column-oriented) 저장으로 빠른 연산
 *
 * 원본 DataTable은 절대 변경하지 않고, 모든 연산은 새 DataTable을 반환합니다.
 */

import * as aq from 'arquero';
import type { CellValue, DataTable, Row } from '../../types';
import { getCell, VALUE_COLUMN } from '../../types';

/** Arquero 테이블 타입 */
type ArqueroTable = ReturnType<typeof aq.table>;

/**
 * Arquero가 돌려준 값을 CellValue로 정규화
 */
export function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * DataTable → Arquero 테이블
 *
 * "2020" 같은 숫자형 키는 객체 키 순서가 바뀌므로 컬럼 순서를 명시합니다.
 */
export function toArqueroTable(source: DataTable): ArqueroTable {
  const data: Record<string, CellValue[]> = {};
  for (const column of source.columns) {
    data[column] = source.rows.map((row) => getCell(row, column));
  }
  return aq.table(data, [...source.columns]);
}

/**
 * Arquero 테이블 → DataTable (필터가 적용된 행만)
 */
export function fromArqueroTable(table: ArqueroTable): DataTable {
  const columns = table.columnNames();
  const arrays = columns.map((column) => Array.from(table.array(column), toCellValue));
  const rowCount = table.numRows();
  const rows: Row[] = [];

  for (let i = 0; i < rowCount; i++) {
    const row: Row = {};
    columns.forEach((column, c) => {
      row[column] = arrays[c]?.[i] ?? null;
    });
    rows.push(row);
  }

  return { columns, rows };
}

// =============================================================================
// ArqueroEngine 클래스
// =============================================================================

/**
 * Arquero 테이블 래퍼
 *
 * 한 번 로드한 테이블에 대해 여러 연산을 실행할 때 사용합니다.
 */
export class ArqueroEngine {
  /** Arquero 테이블 (컬럼 지향 데이터 구조) */
  private readonly table: ArqueroTable;

  /** 컬럼 키 목록 */
  private readonly columnKeys: string[];

  constructor(source: DataTable) {
    this.table = toArqueroTable(source);
    this.columnKeys = [...source.columns];
  }

  // ==========================================================================
  // 메타데이터
  // ==========================================================================

  getRowCount(): number {
    return this.table.numRows();
  }

  getColumnKeys(): string[] {
    return [...this.columnKeys];
  }

  hasColumn(columnKey: string): boolean {
    return this.columnKeys.includes(columnKey);
  }

  // ==========================================================================
  // 연산
  // ==========================================================================

  /**
   * 조건을 만족하는 행만 남김 (행 순서와 모든 컬럼 유지)
   */
  filterRows(predicate: (row: Row) => boolean): DataTable {
    const filtered = this.table.filter(aq.escape((d: Row) => predicate(d)));
    return fromArqueroTable(filtered);
  }

  /**
   * 지정한 컬럼만 지정한 순서대로 선택
   */
  select(columns: readonly string[]): DataTable {
    if (columns.length === 0) {
      return { columns: [], rows: Array.from({ length: this.getRowCount() }, () => ({})) };
    }
    return fromArqueroTable(this.table.select(...columns));
  }

  /**
   * 특정 컬럼의 유니크 값 (처음 등장한 순서)
   */
  getUniqueValues(columnKey: string): CellValue[] {
    if (!this.hasColumn(columnKey)) {
      return [];
    }
    const uniqueTable = this.table.select(columnKey).dedupe();
    return Array.from(uniqueTable.array(columnKey), toCellValue);
  }
}

// =============================================================================
// 그룹 집계
// =============================================================================

/**
 * 중앙값 (정렬 후 가운데 값, 짝수 개면 가운데 두 값의 평균)
 *
 * 평균은 lo / 2 + hi / 2 로 계산합니다 (큰 값끼리 더해도 Infinity가 되지 않음).
 *
 * @example
 * median([3, 1, 2]);    // 2
 * median([0.7, 3.3]);   // 2
 * median([]);           // null
 */
export function median(values: readonly number[]): number | null {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const hi = sorted[mid];
  if (hi === undefined) {
    return null;
  }
  if (sorted.length % 2 === 1) {
    return hi;
  }
  const lo = sorted[mid - 1] ?? hi;
  return lo / 2 + hi / 2;
}

/**
 * array_agg 결과 → 유한한 숫자 배열
 */
function toNumberList(value: unknown): number[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
}

/**
 * 그룹별 Value 중앙값
 *
 * 그룹 나누기는 Arquero groupby, 그룹별 값 수집은 op.array_agg로 하고
 * 중앙값 계산은 median()이 합니다.
 * 반환 행은 groupKeys + Value 컬럼을 가지며 그룹이 처음 등장한 순서를 따릅니다.
 *
 * @param rows - Value가 null이 아닌 행들
 * @param groupKeys - 그룹 컬럼
 */
export function medianByGroup(rows: readonly Row[], groupKeys: readonly string[]): DataTable {
  const columns = [...groupKeys, VALUE_COLUMN];
  if (rows.length === 0) {
    return { columns, rows: [] };
  }

  const grouped = toArqueroTable({ columns, rows })
    .groupby(...groupKeys)
    .rollup({ [VALUE_COLUMN]: `d => op.array_agg(d.${VALUE_COLUMN})` });

  const keys = fromArqueroTable(grouped.select(...groupKeys)).rows;
  const valueLists = Array.from(grouped.array(VALUE_COLUMN), toNumberList);

  return {
    columns,
    rows: keys.map((key, i) => ({ ...key, [VALUE_COLUMN]: median(valueLists[i] ?? []) })),
  };
}
