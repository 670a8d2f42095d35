/**
 * 기본 데이터셋 정의
 *
 * 탭 하나당 정의 하나입니다. 파일 경로는 데이터 디렉터리 기준 상대 경로입니다.
 */

import type { DatasetDefinition } from '../types';
import { DatasetRegistry } from './DatasetRegistry';

export const DEFAULT_DATASETS: readonly DatasetDefinition[] = [
  {
    id: 'all-data',
    label: 'All Data',
    filePath: 'Alldata.csv',
    identifierColumns: ['Model', 'Scenario', 'Region', 'Variable', 'Unit'],
    filterColumns: ['Model', 'Scenario', 'Variable'],
    yearFilterEnabled: false,
    seriesColumn: 'Scenario',
  },
  {
    id: 'pathways',
    label: 'Emission Pathways',
    filePath: 'Alldata.csv',
    identifierColumns: ['Model', 'Scenario', 'Region', 'Variable', 'Unit'],
    filterColumns: ['Model', 'Scenario', 'Region', 'Variable', 'Unit'],
    yearFilterEnabled: true,
    secondaryGroupKey: 'Variable',
    seriesColumn: 'Scenario',
  },
  {
    id: 'products',
    label: 'Products',
    filePath: 'Products.xlsx',
    identifierColumns: ['Product', 'Category', 'Region'],
    yearFilterEnabled: true,
    seriesColumn: 'Region',
    sentinelLabel: 'Median - ALL',
  },
  {
    id: 'indicators',
    label: 'Country Indicators',
    filePath: 'Indicators.csv',
    identifierColumns: ['Country', 'Sector', 'Indicator'],
    yearFilterEnabled: true,
    secondaryGroupKey: 'Indicator',
    seriesColumn: 'Country',
    excludeColumns: ['Notes'],
  },
];

/**
 * 기본 레지스트리 생성
 *
 * @param dataDir - 데이터 파일이 있는 디렉터리
 */
export function createDefaultRegistry(dataDir: string): DatasetRegistry {
  return new DatasetRegistry(DEFAULT_DATASETS, dataDir);
}
