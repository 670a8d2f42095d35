/**
 * 테스트 데이터 생성 유틸리티
 *
 * 기후 경로 형태의 와이드 테이블을 메모리에서 생성합니다.
 * 시드를 고정하므로 같은 인자면 항상 같은 테이블이 나옵니다.
 *
 * @example
 * import { generatePathwayTable } from './generateTestData';
 * const table = generatePathwayTable(200, [2020, 2025, 2030]);
 */

import type { DataTable, DatasetConfig, DatasetDefinition, Row } from '../../src/types';
import { createDatasetConfig } from '../../src/config/DatasetRegistry';

// =============================================================================
// 샘플 데이터 풀
// =============================================================================

const MODELS = ['GCAM', 'IMAGE', 'MESSAGE', 'REMIND'];
const SCENARIOS = ['Low', 'Medium', 'High'];
const REGIONS = ['World', 'Asia', 'Europe'];
const VARIABLES = ['Emissions|CO2', 'Primary Energy'];

// =============================================================================
// 유틸리티 함수
// =============================================================================

/**
 * 시드 고정 난수 생성기 (LCG)
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/**
 * 배열에서 요소 선택
 */
function pick<T>(items: readonly T[], random: () => number): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error('pick() called with an empty array');
  }
  return item;
}

// =============================================================================
// 생성 함수
// =============================================================================

/**
 * 경로 테이블 생성
 *
 * 컬럼: Model, Scenario, Region, Variable, Unit, 연도들
 * 약 10%의 연도 셀은 "n/a" (숫자 변환 실패 케이스)
 *
 * @param rowCount - 행 수
 * @param years - 연도 목록
 * @param seed - 난수 시드
 */
export function generatePathwayTable(
  rowCount: number,
  years: readonly number[] = [2020, 2025, 2030, 2035, 2040],
  seed: number = 42
): DataTable {
  const random = createRandom(seed);
  const yearColumns = years.map(String);
  const rows: Row[] = [];

  for (let i = 0; i < rowCount; i++) {
    const row: Row = {
      Model: pick(MODELS, random),
      Scenario: pick(SCENARIOS, random),
      Region: pick(REGIONS, random),
      Variable: pick(VARIABLES, random),
      Unit: 'Mt CO2/yr',
    };
    for (const column of yearColumns) {
      row[column] = random() < 0.1 ? 'n/a' : Math.round(random() * 1000) / 10;
    }
    rows.push(row);
  }

  return {
    columns: ['Model', 'Scenario', 'Region', 'Variable', 'Unit', ...yearColumns],
    rows,
  };
}

/**
 * 작은 고정 테이블 (값을 직접 검증하는 테스트용)
 */
export function smallTable(): DataTable {
  return {
    columns: ['Model', 'Scenario', '2020', '2025', '2030'],
    rows: [
      { Model: 'A', Scenario: 'Low', '2020': 10, '2025': 20, '2030': 30 },
      { Model: 'A', Scenario: 'High', '2020': 15, '2025': 25, '2030': 35 },
    ],
  };
}

/**
 * 테스트용 데이터셋 설정
 */
export function testConfig(overrides: Partial<DatasetDefinition> = {}): DatasetConfig {
  return createDatasetConfig({
    id: 'test',
    label: 'Test',
    filePath: 'test.csv',
    identifierColumns: ['Model', 'Scenario'],
    seriesColumn: 'Scenario',
    ...overrides,
  });
}
