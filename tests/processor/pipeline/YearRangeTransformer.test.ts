/**
 * YearRangeTransformer / clampYearRange 단위 테스트
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  YearRangeTransformer,
  projectYearRange,
} from '../../../src/processor/pipeline/YearRangeTransformer';
import { applyCategoricalFilter } from '../../../src/processor/pipeline/CategoricalFilterTransformer';
import { createInitialContext } from '../../../src/processor/pipeline/Transformer';
import { clampYearRange, defaultYearRange, isYearInRange } from '../../../src/processor/YearRange';
import { ConfigurationError, MissingColumnError } from '../../../src/core/errors';
import type { DataTable } from '../../../src/types';
import { generatePathwayTable, smallTable } from '../../fixtures/generateTestData';

describe('YearRange', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('clampYearRange', () => {
    it('정상 범위는 그대로', () => {
      expect(clampYearRange({ startYear: 2020, endYear: 2030 })).toEqual({
        range: { startYear: 2020, endYear: 2030 },
      });
    });

    it('뒤집힌 범위는 끝 연도를 시작 연도로 보정하고 경고', () => {
      const result = clampYearRange({ startYear: 2030, endYear: 2020 });

      expect(result.range).toEqual({ startYear: 2030, endYear: 2030 });
      expect(result.warning?.code).toBe('YEAR_RANGE_CLAMPED');
    });

    it('시작 = 끝은 유효', () => {
      expect(clampYearRange({ startYear: 2025, endYear: 2025 }).warning).toBeUndefined();
    });
  });

  describe('defaultYearRange', () => {
    it('연도 컬럼 전체 범위', () => {
      expect(defaultYearRange(['2030', '2020', '2025'])).toEqual({ startYear: 2020, endYear: 2030 });
    });

    it('연도 컬럼이 없으면 null', () => {
      expect(defaultYearRange([])).toBeNull();
    });
  });

  it('isYearInRange는 양 끝 포함', () => {
    const range = { startYear: 2020, endYear: 2030 };
    expect(isYearInRange(2020, range)).toBe(true);
    expect(isYearInRange(2030, range)).toBe(true);
    expect(isYearInRange(2031, range)).toBe(false);
  });
});

describe('YearRangeTransformer', () => {
  describe('projectYearRange', () => {
    it('식별자 + 범위 안의 연도만 남김', () => {
      const result = projectYearRange(smallTable(), ['Model', 'Scenario'], 2020, 2025);

      expect(result.columns).toEqual(['Model', 'Scenario', '2020', '2025']);
      expect(result.rows).toEqual([
        { Model: 'A', Scenario: 'Low', '2020': 10, '2025': 20 },
        { Model: 'A', Scenario: 'High', '2020': 15, '2025': 25 },
      ]);
    });

    it('연도 컬럼은 오름차순, 식별자는 지정 순서', () => {
      const table: DataTable = {
        columns: ['2030', 'Scenario', '2020', 'Model', 'Notes'],
        rows: [{ '2030': 3, Scenario: 'Low', '2020': 1, Model: 'A', Notes: 'x' }],
      };

      const result = projectYearRange(table, ['Scenario', 'Model'], 2000, 2100);

      expect(result.columns).toEqual(['Scenario', 'Model', '2020', '2030']);
    });

    it('범위에 연도가 없으면 식별자만', () => {
      const result = projectYearRange(smallTable(), ['Model'], 2040, 2050);
      expect(result.columns).toEqual(['Model']);
      expect(result.rows).toEqual([{ Model: 'A' }, { Model: 'A' }]);
    });

    it('식별자 컬럼이 없으면 MissingColumnError', () => {
      const act = () => projectYearRange(smallTable(), ['Model', 'Region'], 2020, 2030, 'test');

      expect(act).toThrow(MissingColumnError);
      expect(act).toThrow(ConfigurationError);
      try {
        act();
      } catch (error) {
        expect(error).toBeInstanceOf(MissingColumnError);
        if (error instanceof MissingColumnError) {
          expect(error.columns).toEqual(['Region']);
          expect(error.datasetId).toBe('test');
        }
      }
    });

    it('필터와 투영은 순서를 바꿔도 결과가 같음', () => {
      const table = generatePathwayTable(200);
      const identifiers = ['Model', 'Scenario', 'Region', 'Variable', 'Unit'];
      const spec = { Scenario: ['Low'], Model: ['GCAM', 'REMIND'] };

      const filterFirst = projectYearRange(applyCategoricalFilter(table, spec), identifiers, 2025, 2035);
      const projectFirst = applyCategoricalFilter(
        projectYearRange(table, identifiers, 2025, 2035),
        spec
      );

      expect(filterFirst.columns).toEqual(['Model', 'Scenario', 'Region', 'Variable', 'Unit', '2025', '2030', '2035']);
      expect(projectFirst).toEqual(filterFirst);
    });
  });

  describe('transform', () => {
    it('범위를 주지 않으면 전체 연도 유지', () => {
      const ctx = { ...createInitialContext(smallTable(), ['Model', 'Scenario']), yearColumns: ['2020', '2025', '2030'] };

      const result = new YearRangeTransformer().transform(ctx);

      expect(result.yearColumns).toEqual(['2020', '2025', '2030']);
      expect(result.warnings).toEqual([]);
    });

    it('뒤집힌 범위는 보정 후 경고를 남김', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const ctx = { ...createInitialContext(smallTable(), ['Model', 'Scenario']), yearColumns: ['2020', '2025', '2030'] };

      const result = new YearRangeTransformer({ startYear: 2030, endYear: 2020 }).transform(ctx);

      expect(result.yearColumns).toEqual(['2030']);
      expect(result.table.columns).toEqual(['Model', 'Scenario', '2030']);
      expect(result.warnings.map((w) => w.code)).toEqual(['YEAR_RANGE_CLAMPED']);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });
});
