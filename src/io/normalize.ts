/**
 * 로더 공통 정규화
 *
 * CSV/XLSX 어느 쪽에서 읽어도 같은 모양의 DataTable이 나오도록
 * 헤더와 셀 값을 정리합니다.
 */

import type { CellValue, DataTable, Row } from '../types';
import { createTable } from '../types';

/** 숫자로 읽을 문자열 ("007" 같은 앞자리 0 코드는 문자열로 유지) */
const NUMERIC_CELL_PATTERN = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

/**
 * 텍스트 셀 → CellValue
 *
 * @example
 * coerceTextCell(' 12.5 '); // 12.5
 * coerceTextCell('');       // null
 * coerceTextCell('007');    // '007'
 */
export function coerceTextCell(value: string): CellValue {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (NUMERIC_CELL_PATTERN.test(trimmed)) {
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return trimmed;
}

/**
 * 스프레드시트 셀 → CellValue
 */
export function normalizeSheetCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value === '' ? null : value;
  return String(value);
}

/**
 * 헤더 정리
 *
 * - 앞뒤 공백 제거, 빈 헤더는 "Column N"
 * - 중복 이름은 "이름.1", "이름.2" ...
 */
export function buildHeaders(rawHeaders: readonly unknown[]): string[] {
  const seen = new Map<string, number>();

  return rawHeaders.map((header, index) => {
    const label = header === null || header === undefined ? '' : String(header).trim();
    const base = label || `Column ${index + 1}`;

    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

/**
 * 헤더 + 셀 배열 → DataTable
 *
 * 짧은 행은 null로 채우고 긴 행은 잘라냅니다.
 */
export function buildTable(headers: readonly string[], records: readonly (readonly CellValue[])[]): DataTable {
  const rows = records.map((record) => {
    const row: Row = {};
    headers.forEach((header, index) => {
      row[header] = record[index] ?? null;
    });
    return row;
  });

  return createTable(headers, rows);
}
