/**
 * DatasetRegistry 테스트
 */

import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { DatasetRegistry, createDatasetConfig } from '../../src/config/DatasetRegistry';
import { DEFAULT_DATASETS, createDefaultRegistry } from '../../src/config/datasets';
import { ConfigurationError } from '../../src/core/errors';
import type { DatasetDefinition } from '../../src/types';

const base: DatasetDefinition = {
  id: 'sample',
  filePath: 'sample.csv',
  identifierColumns: ['Model', 'Scenario'],
};

describe('createDatasetConfig', () => {
  it('기본값 적용', () => {
    expect(createDatasetConfig(base)).toEqual({
      id: 'sample',
      label: 'sample',
      filePath: 'sample.csv',
      identifierColumns: ['Model', 'Scenario'],
      filterColumns: ['Model', 'Scenario'],
      yearFilterEnabled: true,
      secondaryGroupKey: null,
      seriesColumn: 'Model',
      sentinelLabel: 'Median',
      excludeColumns: [],
      dropZeroValues: true,
    });
  });

  it('설정은 동결됨', () => {
    const config = createDatasetConfig(base);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.identifierColumns)).toBe(true);
  });

  it('정의 배열을 나중에 바꿔도 설정은 그대로', () => {
    const identifierColumns = ['Model', 'Scenario'];
    const config = createDatasetConfig({ ...base, identifierColumns });

    identifierColumns.push('Region');

    expect(config.identifierColumns).toEqual(['Model', 'Scenario']);
  });

  it('상대 경로는 기준 디렉터리로 해석', () => {
    const baseDir = path.resolve('data');
    expect(createDatasetConfig(base, baseDir).filePath).toBe(path.join(baseDir, 'sample.csv'));
  });

  it('절대 경로는 그대로', () => {
    const absolute = path.resolve('elsewhere', 'sample.csv');
    expect(createDatasetConfig({ ...base, filePath: absolute }, path.resolve('data')).filePath).toBe(
      absolute
    );
  });

  describe('검증', () => {
    it('빈 ID', () => {
      expect(() => createDatasetConfig({ ...base, id: ' ' })).toThrow(ConfigurationError);
    });

    it('빈 파일 경로', () => {
      expect(() => createDatasetConfig({ ...base, filePath: '' })).toThrow('has no file path');
    });

    it('식별자 컬럼 없음', () => {
      expect(() => createDatasetConfig({ ...base, identifierColumns: [] })).toThrow(
        'needs at least one identifier column'
      );
    });

    it('Year / Value는 식별자로 쓸 수 없음', () => {
      expect(() => createDatasetConfig({ ...base, identifierColumns: ['Model', 'Year'] })).toThrow(
        'reserved column name(s) as identifiers: Year'
      );
    });

    it('구분 컬럼은 식별자 중 하나여야 함', () => {
      expect(() => createDatasetConfig({ ...base, seriesColumn: 'Region' })).toThrow(
        'series column "Region" is not an identifier column'
      );
    });

    it('보조 그룹 키는 식별자 중 하나여야 함', () => {
      const act = () => createDatasetConfig({ ...base, secondaryGroupKey: 'Variable' });

      expect(act).toThrow(ConfigurationError);
      expect(act).toThrow('Dataset "sample" group key "Variable" is not an identifier column');
    });

    it('보조 그룹 키와 구분 컬럼은 달라야 함', () => {
      expect(() =>
        createDatasetConfig({ ...base, seriesColumn: 'Scenario', secondaryGroupKey: 'Scenario' })
      ).toThrow('Dataset "sample" group key "Scenario" must differ from the series column');
    });

    it('식별자인 보조 그룹 키는 허용', () => {
      const config = createDatasetConfig({ ...base, seriesColumn: 'Scenario', secondaryGroupKey: 'Model' });
      expect(config.secondaryGroupKey).toBe('Model');
    });
  });
});

describe('DatasetRegistry', () => {
  it('등록 순서대로 조회', () => {
    const registry = new DatasetRegistry([base, { ...base, id: 'other' }]);

    expect(registry.list().map((c) => c.id)).toEqual(['sample', 'other']);
    expect(registry.has('other')).toBe(true);
    expect(registry.get('sample').identifierColumns).toEqual(['Model', 'Scenario']);
  });

  it('없는 ID는 ConfigurationError', () => {
    const registry = new DatasetRegistry([base]);
    expect(() => registry.get('missing')).toThrow('Unknown dataset "missing"');
  });

  it('중복 ID는 ConfigurationError', () => {
    expect(() => new DatasetRegistry([base, base])).toThrow('Duplicate dataset id "sample"');
  });

  it('기본 데이터셋 정의는 모두 유효', () => {
    const dataDir = path.resolve('data');
    const registry = createDefaultRegistry(dataDir);

    expect(registry.list().map((c) => c.id)).toEqual(DEFAULT_DATASETS.map((d) => d.id));
    expect(registry.get('all-data').yearFilterEnabled).toBe(false);
    expect(registry.get('pathways').secondaryGroupKey).toBe('Variable');
    expect(registry.get('products').sentinelLabel).toBe('Median - ALL');
    expect(registry.get('indicators').filePath).toBe(path.join(dataDir, 'Indicators.csv'));
  });
});
