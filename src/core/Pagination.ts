/**
 * 미리보기 / 페이지 나누기
 *
 * 필터 결과를 화면에 보여줄 때 사용합니다. 원본 테이블은 변경하지 않습니다.
 */

import type { DataTable } from '../types';
import { createTable } from '../types';

/** 미리보기 기본 행 수 */
export const DEFAULT_PREVIEW_ROWS = 5;

/** 페이지당 기본 행 수 */
export const DEFAULT_PAGE_SIZE = 1000;

/**
 * 페이지 결과
 */
export interface PageResult {
  /** 현재 페이지 행만 담은 테이블 */
  table: DataTable;

  /** 현재 페이지 (1부터, 범위 안으로 보정됨) */
  pageNumber: number;

  /** 전체 페이지 수 */
  pageCount: number;

  /** 전체 행 수 */
  totalRows: number;

  /** 현재 페이지 첫 행 인덱스 (포함) */
  startRow: number;

  /** 현재 페이지 끝 행 인덱스 (제외) */
  endRow: number;
}

/**
 * 앞쪽 count개 행만 담은 테이블
 */
export function previewRows(table: DataTable, count: number = DEFAULT_PREVIEW_ROWS): DataTable {
  return createTable(table.columns, table.rows.slice(0, Math.max(0, count)));
}

/**
 * 페이지 나누기
 *
 * 전체 페이지 수는 floor(totalRows / pageSize) + 1 입니다.
 * (빈 테이블도 빈 페이지 하나를 가짐)
 *
 * @example
 * paginate(table, 2, 1000); // 1000~1999 행
 */
export function paginate(
  table: DataTable,
  pageNumber: number,
  pageSize: number = DEFAULT_PAGE_SIZE
): PageResult {
  const size = Math.max(1, Math.floor(pageSize));
  const totalRows = table.rows.length;
  const pageCount = Math.floor(totalRows / size) + 1;
  const requested = Number.isFinite(pageNumber) ? Math.floor(pageNumber) : 1;
  const page = Math.min(Math.max(1, requested), pageCount);

  const startRow = (page - 1) * size;
  const endRow = Math.min(startRow + size, totalRows);

  return {
    table: createTable(table.columns, table.rows.slice(startRow, endRow)),
    pageNumber: page,
    pageCount,
    totalRows,
    startRow,
    endRow,
  };
}
