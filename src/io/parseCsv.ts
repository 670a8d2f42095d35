/**
 * CSV 파서 (papaparse)
 *
 * 첫 줄은 헤더, 빈 줄은 건너뜁니다.
 * 숫자처럼 보이는 셀은 숫자로, 빈 셀은 null로 바꿉니다.
 */

import Papa from 'papaparse';
import type { DataTable } from '../types';
import { buildHeaders, buildTable, coerceTextCell } from './normalize';

/**
 * CSV 텍스트 → DataTable
 *
 * @throws Error 헤더가 없는 빈 입력
 */
export function parseCsvText(text: string): DataTable {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    header: false,
    skipEmptyLines: 'greedy',
    dynamicTyping: false,
  });

  if (result.errors.length > 0) {
    const first = result.errors[0];
    console.warn(
      `[parseCsv] ${result.errors.length} parse issue(s)` +
        (first ? `, first at row ${first.row ?? '?'}: ${first.message}` : '')
    );
  }

  const [headerRow, ...records] = result.data;
  if (!headerRow || headerRow.every((cell) => cell.trim() === '')) {
    throw new Error('CSV appears to be empty.');
  }

  const headers = buildHeaders(headerRow);
  return buildTable(
    headers,
    records.map((record) => record.map(coerceTextCell))
  );
}
