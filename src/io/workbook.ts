/**
 * XLSX 읽기/쓰기 (SheetJS)
 *
 * - parseWorkbook: 로드용 (첫 시트 또는 지정 시트)
 * - encodeWorkbook / decodeWorkbook: 내보내기용 (컬럼, 순서, 값 왕복 보존)
 */

import * as XLSX from 'xlsx';
import type { DataTable, DatasetConfig } from '../types';
import { getCell } from '../types';
import { buildHeaders, buildTable, normalizeSheetCell } from './normalize';

/** 내보내기 기본 시트 이름 */
export const DEFAULT_SHEET_NAME = 'Data';

/**
 * 워크북 바이트 → DataTable
 *
 * @param bytes - .xlsx/.xls 파일 내용
 * @param sheetName - 읽을 시트 (기본값: 첫 시트)
 * @param keepBlankRows - 빈 행 유지 여부
 * @throws Error 시트가 없을 때
 */
export function parseWorkbook(
  bytes: Uint8Array,
  sheetName?: string,
  keepBlankRows: boolean = false
): DataTable {
  const workbook = XLSX.read(Buffer.from(bytes), { type: 'buffer' });
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet = name === undefined ? undefined : workbook.Sheets[name];

  if (!sheet) {
    throw new Error(
      name === undefined ? 'Workbook has no sheets.' : `Sheet "${name}" not found in workbook.`
    );
  }

  const [headerRow = [], ...records] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: keepBlankRows,
    raw: true,
  });

  const headers = buildHeaders(headerRow);
  return buildTable(
    headers,
    records.map((record) => headers.map((_, index) => normalizeSheetCell(record[index])))
  );
}

/**
 * DataTable → XLSX 바이트
 *
 * 첫 줄은 컬럼 이름, missing 셀은 빈 셀로 씁니다.
 */
export function encodeWorkbook(table: DataTable, sheetName: string = DEFAULT_SHEET_NAME): Uint8Array {
  const aoa = [
    [...table.columns],
    ...table.rows.map((row) => table.columns.map((column) => getCell(row, column))),
  ];

  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, sheetName);

  const output: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return new Uint8Array(output);
}

/**
 * XLSX 바이트 → DataTable (encodeWorkbook의 역)
 */
export function decodeWorkbook(bytes: Uint8Array, sheetName?: string): DataTable {
  return parseWorkbook(bytes, sheetName, true);
}

/**
 * 내보내기 파일 이름
 *
 * @example
 * exportFileName(config); // "pathways_filtered_data.xlsx"
 */
export function exportFileName(config: Pick<DatasetConfig, 'id'>): string {
  return `${config.id}_filtered_data.xlsx`;
}
