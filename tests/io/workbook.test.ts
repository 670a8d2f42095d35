/**
 * XLSX 읽기/쓰기 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SHEET_NAME,
  decodeWorkbook,
  encodeWorkbook,
  exportFileName,
  parseWorkbook,
} from '../../src/io/workbook';
import type { DataTable } from '../../src/types';

const table: DataTable = {
  columns: ['Model', 'Scenario', '2020', '2025'],
  rows: [
    { Model: 'GCAM', Scenario: null, '2020': 10, '2025': 12.5 },
    { Model: 'IMAGE', Scenario: 'High', '2020': 1.5, '2025': 20 },
  ],
};

describe('workbook', () => {
  it('내보낸 파일을 다시 읽으면 같은 테이블', () => {
    expect(decodeWorkbook(encodeWorkbook(table))).toEqual(table);
  });

  it('행이 없으면 헤더만', () => {
    const empty: DataTable = { columns: ['Model', '2020'], rows: [] };
    expect(decodeWorkbook(encodeWorkbook(empty))).toEqual(empty);
  });

  it('지정한 시트 이름으로 쓰고 읽기', () => {
    const bytes = encodeWorkbook(table, 'Pathways');

    expect(parseWorkbook(bytes, 'Pathways')).toEqual(table);
    expect(() => parseWorkbook(bytes, DEFAULT_SHEET_NAME)).toThrow('Sheet "Data" not found in workbook.');
  });

  it('내보내기 파일 이름', () => {
    expect(exportFileName({ id: 'pathways' })).toBe('pathways_filtered_data.xlsx');
  });
});
