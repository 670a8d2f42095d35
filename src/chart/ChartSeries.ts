/**
 * 차트 시리즈 변환
 *
 * 차트 렌더러 경계용 데이터입니다. 렌더러는 시리즈마다 (Year, Value) 점을
 * 선으로 잇고, emphasis가 'strong'인 시리즈(센티널)를 굵게 그립니다.
 */

import type { CellValue, LongRow } from '../types';
import { getCell } from '../types';
import { isAggregateRow } from '../processor/pipeline/AggregateTransformer';

/** 시리즈 컬럼 값이 없는 행의 시리즈 이름 */
export const MISSING_SERIES_NAME = '(missing)';

/**
 * 차트 점
 */
export interface ChartPoint {
  year: number;
  value: number;
}

/**
 * 차트 시리즈 (선 하나)
 */
export interface ChartSeries {
  /** 시리즈 이름 (구분 컬럼 값) */
  name: string;

  /** 강조 여부 - 센티널(중앙값) 시리즈는 'strong' */
  emphasis: 'normal' | 'strong';

  /** 연도 오름차순 점 */
  points: ChartPoint[];
}

/**
 * 시리즈 변환 옵션
 */
export interface ChartSeriesOptions {
  /** 구분 컬럼 */
  seriesColumn: string;

  /** 센티널 레이블 */
  sentinelLabel: string;

  /** 보조 그룹 키 - 있으면 센티널 시리즈를 키 값마다 나눔 ("Median (CO2)") */
  groupKey?: string | null;
}

/**
 * 센티널 시리즈 이름
 *
 * @example
 * sentinelSeriesName('Median', 'Emissions|CO2'); // "Median (Emissions|CO2)"
 */
export function sentinelSeriesName(sentinelLabel: string, keyValue: CellValue): string {
  const key = keyValue === null ? MISSING_SERIES_NAME : String(keyValue);
  return `${sentinelLabel} (${key})`;
}

/**
 * 차트 행 → 시리즈 목록
 *
 * 시리즈는 처음 등장한 순서, 점은 연도 오름차순입니다.
 * Value가 null인 행은 건너뜁니다.
 * groupKey가 있으면 집계 행은 키 값별 시리즈가 되어 한 시리즈에 연도당 점이 하나입니다.
 */
export function buildChartSeries(
  rows: readonly LongRow[],
  options: ChartSeriesOptions
): ChartSeries[] {
  const seriesMap = new Map<string, ChartSeries>();

  for (const row of rows) {
    if (row.Value === null) continue;

    const aggregate = isAggregateRow(row, options.seriesColumn, options.sentinelLabel);
    const discriminator = getCell(row, options.seriesColumn);
    let name = discriminator === null ? MISSING_SERIES_NAME : String(discriminator);
    if (aggregate && options.groupKey) {
      name = sentinelSeriesName(options.sentinelLabel, getCell(row, options.groupKey));
    }

    let series = seriesMap.get(name);
    if (!series) {
      series = {
        name,
        emphasis: aggregate ? 'strong' : 'normal',
        points: [],
      };
      seriesMap.set(name, series);
    }
    series.points.push({ year: row.Year, value: row.Value });
  }

  const result = [...seriesMap.values()];
  for (const series of result) {
    series.points.sort((a, b) => a.year - b.year);
  }
  return result;
}
