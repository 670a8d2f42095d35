/**
 * DatasetRegistry - 데이터셋 설정 레지스트리
 *
 * 애플리케이션 시작 시 정적 정의로부터 DatasetConfig를 만들어 보관합니다.
 * 만들어진 설정은 동결되어 이후 변경할 수 없습니다.
 */

import * as path from 'node:path';
import type { DatasetConfig, DatasetDefinition } from '../types';
import { VALUE_COLUMN, YEAR_COLUMN } from '../types';
import { ConfigurationError } from '../core/errors';
import { DEFAULT_SENTINEL_LABEL } from '../processor/pipeline/AggregateTransformer';

/** 식별자 컬럼으로 쓸 수 없는 이름 (melt 결과 컬럼) */
const RESERVED_COLUMNS = [YEAR_COLUMN, VALUE_COLUMN];

/**
 * 정의 검증 + 기본값 적용 + 동결
 *
 * @throws ConfigurationError 정의가 잘못된 경우
 */
export function createDatasetConfig(definition: DatasetDefinition, baseDir?: string): DatasetConfig {
  const { id } = definition;

  if (!id.trim()) {
    throw new ConfigurationError('Dataset id must not be empty');
  }
  if (!definition.filePath.trim()) {
    throw new ConfigurationError(`Dataset "${id}" has no file path`, id);
  }
  if (definition.identifierColumns.length === 0) {
    throw new ConfigurationError(`Dataset "${id}" needs at least one identifier column`, id);
  }

  const reserved = definition.identifierColumns.filter((c) => RESERVED_COLUMNS.includes(c));
  if (reserved.length > 0) {
    throw new ConfigurationError(
      `Dataset "${id}" uses reserved column name(s) as identifiers: ${reserved.join(', ')}`,
      id
    );
  }

  const seriesColumn = definition.seriesColumn ?? definition.identifierColumns[0];
  if (seriesColumn === undefined || !definition.identifierColumns.includes(seriesColumn)) {
    throw new ConfigurationError(
      `Dataset "${id}" series column "${String(seriesColumn)}" is not an identifier column`,
      id
    );
  }

  // 보조 그룹 키는 melt 결과에 남는 식별자여야 하고, 센티널이 덮어쓰는 컬럼이면 안 됨
  const secondaryGroupKey = definition.secondaryGroupKey ?? null;
  if (secondaryGroupKey !== null && !definition.identifierColumns.includes(secondaryGroupKey)) {
    throw new ConfigurationError(
      `Dataset "${id}" group key "${secondaryGroupKey}" is not an identifier column`,
      id
    );
  }
  if (secondaryGroupKey !== null && secondaryGroupKey === seriesColumn) {
    throw new ConfigurationError(
      `Dataset "${id}" group key "${secondaryGroupKey}" must differ from the series column`,
      id
    );
  }

  const filePath =
    baseDir && !path.isAbsolute(definition.filePath)
      ? path.resolve(baseDir, definition.filePath)
      : definition.filePath;

  return Object.freeze({
    id,
    label: definition.label ?? id,
    filePath,
    identifierColumns: Object.freeze([...definition.identifierColumns]),
    filterColumns: Object.freeze([...(definition.filterColumns ?? definition.identifierColumns)]),
    yearFilterEnabled: definition.yearFilterEnabled ?? true,
    secondaryGroupKey,
    seriesColumn,
    sentinelLabel: definition.sentinelLabel ?? DEFAULT_SENTINEL_LABEL,
    excludeColumns: Object.freeze([...(definition.excludeColumns ?? [])]),
    dropZeroValues: definition.dropZeroValues ?? true,
  });
}

// =============================================================================
// DatasetRegistry 클래스
// =============================================================================

export class DatasetRegistry {
  /** ID → 설정 (등록 순서 유지) */
  private readonly configs = new Map<string, DatasetConfig>();

  /**
   * @param definitions - 데이터셋 정의 목록
   * @param baseDir - 상대 파일 경로의 기준 디렉터리
   */
  constructor(definitions: readonly DatasetDefinition[], baseDir?: string) {
    for (const definition of definitions) {
      if (this.configs.has(definition.id)) {
        throw new ConfigurationError(`Duplicate dataset id "${definition.id}"`, definition.id);
      }
      this.configs.set(definition.id, createDatasetConfig(definition, baseDir));
    }
  }

  /**
   * 설정 조회
   *
   * @throws ConfigurationError 등록되지 않은 ID
   */
  get(id: string): DatasetConfig {
    const config = this.configs.get(id);
    if (!config) {
      throw new ConfigurationError(`Unknown dataset "${id}"`, id);
    }
    return config;
  }

  has(id: string): boolean {
    return this.configs.has(id);
  }

  /**
   * 모든 설정 (등록 순서)
   */
  list(): DatasetConfig[] {
    return [...this.configs.values()];
  }
}
