/**
 * AggregateTransformer 단위 테스트
 *
 * 중앙값 정의(짝수 개는 가운데 두 값의 평균)를 값으로 검증합니다.
 */

import { describe, it, expect } from 'vitest';
import {
  AggregateTransformer,
  buildAggregateRows,
  isAggregateRow,
  prepareChartRows,
} from '../../../src/processor/pipeline/AggregateTransformer';
import { createInitialContext } from '../../../src/processor/pipeline/Transformer';
import type { LongRow } from '../../../src/types';
import { smallTable } from '../../fixtures/generateTestData';

/**
 * 한 연도의 롱 행 생성
 */
function rowsFor(year: number, values: (number | null)[], extra: Record<string, string> = {}): LongRow[] {
  return values.map((value, i) => ({ Scenario: `S${i}`, ...extra, Year: year, Value: value }));
}

describe('AggregateTransformer', () => {
  describe('buildAggregateRows', () => {
    it('짝수 개는 가운데 두 값의 평균', () => {
      const result = buildAggregateRows(rowsFor(2020, [4, 1, 3, 2]), { seriesColumn: 'Scenario' });
      expect(result).toEqual([{ Scenario: 'Median', Year: 2020, Value: 2.5 }]);
    });

    it('홀수 개는 가운데 값', () => {
      const result = buildAggregateRows(rowsFor(2020, [3, 1, 2]), { seriesColumn: 'Scenario' });
      expect(result).toEqual([{ Scenario: 'Median', Year: 2020, Value: 2 }]);
    });

    it('소수 값의 짝수 개 중앙값은 두 값의 산술 평균', () => {
      const first = buildAggregateRows(rowsFor(2020, [0.7, 3.3]), { seriesColumn: 'Scenario' });
      const second = buildAggregateRows(rowsFor(2020, [3.3, 0.2]), { seriesColumn: 'Scenario' });

      expect(first).toEqual([{ Scenario: 'Median', Year: 2020, Value: 2 }]);
      expect(second).toEqual([{ Scenario: 'Median', Year: 2020, Value: 1.75 }]);
    });

    it('missing 값은 제외하고 계산', () => {
      const result = buildAggregateRows(rowsFor(2020, [1, null, 5, null, 3]), {
        seriesColumn: 'Scenario',
      });
      expect(result).toEqual([{ Scenario: 'Median', Year: 2020, Value: 3 }]);
    });

    it('값이 모두 missing인 연도는 행을 만들지 않음', () => {
      const rows = [...rowsFor(2020, [null, null]), ...rowsFor(2025, [6, 8])];

      const result = buildAggregateRows(rows, { seriesColumn: 'Scenario' });

      expect(result).toEqual([{ Scenario: 'Median', Year: 2025, Value: 7 }]);
    });

    it('빈 입력은 빈 결과', () => {
      expect(buildAggregateRows([], { seriesColumn: 'Scenario' })).toEqual([]);
    });

    it('연도 오름차순으로 반환', () => {
      const rows = [...rowsFor(2030, [1]), ...rowsFor(2020, [2]), ...rowsFor(2025, [3])];

      const result = buildAggregateRows(rows, { seriesColumn: 'Scenario' });

      expect(result.map((r) => r.Year)).toEqual([2020, 2025, 2030]);
    });

    it('보조 그룹 키가 있으면 연도 × 키별 중앙값', () => {
      const rows = [
        ...rowsFor(2020, [1, 3], { Variable: 'CO2' }),
        ...rowsFor(2020, [10, 20, 30], { Variable: 'CH4' }),
        ...rowsFor(2025, [5, 7], { Variable: 'CO2' }),
      ];

      const result = buildAggregateRows(rows, {
        seriesColumn: 'Scenario',
        groupKey: 'Variable',
        sentinelLabel: 'Median - ALL',
      });

      expect(result).toEqual([
        { Scenario: 'Median - ALL', Variable: 'CO2', Year: 2020, Value: 2 },
        { Scenario: 'Median - ALL', Variable: 'CH4', Year: 2020, Value: 20 },
        { Scenario: 'Median - ALL', Variable: 'CO2', Year: 2025, Value: 6 },
      ]);
    });

    it('다른 식별자 컬럼은 null로 채움', () => {
      const rows: LongRow[] = [
        { Model: 'A', Scenario: 'Low', Year: 2020, Value: 1 },
        { Model: 'B', Scenario: 'High', Year: 2020, Value: 2 },
      ];

      const result = buildAggregateRows(rows, {
        seriesColumn: 'Scenario',
        identifierColumns: ['Model', 'Scenario'],
      });

      expect(result).toEqual([{ Model: null, Scenario: 'Median', Year: 2020, Value: 1.5 }]);
    });

    it('입력 행을 변경하지 않음', () => {
      const rows = rowsFor(2020, [1, 2]);
      const before = JSON.stringify(rows);
      buildAggregateRows(rows, { seriesColumn: 'Scenario' });
      expect(JSON.stringify(rows)).toBe(before);
    });
  });

  describe('prepareChartRows', () => {
    const rows: LongRow[] = [
      { Scenario: 'Low', Year: 2020, Value: 0 },
      { Scenario: 'Low', Year: 2025, Value: null },
      { Scenario: 'Low', Year: 2030, Value: 4 },
    ];

    it('기본값은 0과 missing 모두 제외', () => {
      expect(prepareChartRows(rows)).toEqual([{ Scenario: 'Low', Year: 2030, Value: 4 }]);
    });

    it('dropZeroValues=false면 0은 유지', () => {
      expect(prepareChartRows(rows, { dropZeroValues: false })).toEqual([
        { Scenario: 'Low', Year: 2020, Value: 0 },
        { Scenario: 'Low', Year: 2030, Value: 4 },
      ]);
    });
  });

  it('isAggregateRow는 센티널 레이블로 판별', () => {
    expect(isAggregateRow({ Scenario: 'Median' }, 'Scenario', 'Median')).toBe(true);
    expect(isAggregateRow({ Scenario: 'Low' }, 'Scenario', 'Median')).toBe(false);
  });

  describe('transform', () => {
    it('longRows에서 aggregateRows 생성', () => {
      const ctx = {
        ...createInitialContext(smallTable(), ['Model', 'Scenario']),
        longRows: [
          { Model: 'A', Scenario: 'Low', Year: 2020, Value: 10 },
          { Model: 'A', Scenario: 'High', Year: 2020, Value: 15 },
        ],
      };

      const result = new AggregateTransformer({ seriesColumn: 'Scenario' }).transform(ctx);

      expect(result.aggregateRows).toEqual([
        { Model: null, Scenario: 'Median', Year: 2020, Value: 12.5 },
      ]);
      expect(result.longRows).toBe(ctx.longRows);
    });
  });
});
