/**
 * Transformer 인터페이스 및 파이프라인 타입 정의
 *
 * 데이터 변환 파이프라인의 핵심 추상화입니다.
 * 각 Transformer는 컨텍스트를 입력받아 변환하고 새 컨텍스트를 반환합니다.
 * 입력 컨텍스트의 테이블/행 배열은 변경하지 않습니다.
 *
 * 파이프라인 구조:
 * Raw → Prepare → CategoricalFilter → YearRange → Melt → Aggregate
 */

import type { DataTable, LongRow, PipelineWarning } from '../../types';

// =============================================================================
// 파이프라인 단계
// =============================================================================

/**
 * 파이프라인 단계(Phase)
 *
 * 각 Transformer가 실행되는 순서를 결정합니다.
 * 낮은 숫자가 먼저 실행됩니다.
 */
export enum PipelinePhase {
  /** 제외 컬럼 제거 + 컬럼 분류 */
  PREPARE = 1,

  /** 카테고리 필터 (행) */
  FILTER = 2,

  /** 연도 범위 투영 (열) - 이 단계 후의 테이블이 내보내기 테이블 */
  PROJECT = 3,

  /** 와이드 → 롱 변환 */
  RESHAPE = 4,

  /** 중앙값 추세 생성 */
  AGGREGATE = 5,
}

// =============================================================================
// 변환 컨텍스트
// =============================================================================

/**
 * 변환 컨텍스트
 *
 * Transformer 간에 전달되는 데이터와 메타데이터입니다.
 */
export interface TransformContext {
  /** 현재 와이드 테이블 */
  table: DataTable;

  /** 식별자 컬럼 (설정 순서) */
  identifierColumns: readonly string[];

  /** 현재 연도 컬럼 (오름차순) */
  yearColumns: readonly string[];

  /** melt 결과 */
  longRows: readonly LongRow[];

  /** 중앙값 집계 행 */
  aggregateRows: readonly LongRow[];

  /** 누적된 경고 */
  warnings: readonly PipelineWarning[];
}

// =============================================================================
// Transformer 인터페이스
// =============================================================================

/**
 * Transformer 인터페이스
 *
 * 데이터 변환의 기본 단위입니다.
 * 각 Transformer는 독립적으로 테스트할 수 있어야 합니다.
 */
export interface Transformer {
  /** Transformer 이름 (디버깅용) */
  readonly name: string;

  /** 실행 단계 */
  readonly phase: PipelinePhase;

  /**
   * 변환 실행
   *
   * @param ctx - 입력 컨텍스트
   * @returns 변환된 컨텍스트
   */
  transform(ctx: TransformContext): TransformContext;
}

// =============================================================================
// 헬퍼 함수
// =============================================================================

/**
 * 초기 변환 컨텍스트 생성
 */
export function createInitialContext(
  table: DataTable,
  identifierColumns: readonly string[]
): TransformContext {
  return {
    table,
    identifierColumns: [...identifierColumns],
    yearColumns: [],
    longRows: [],
    aggregateRows: [],
    warnings: [],
  };
}

/**
 * 경고를 추가한 새 컨텍스트 반환
 */
export function withWarning(ctx: TransformContext, warning: PipelineWarning): TransformContext {
  return { ...ctx, warnings: [...ctx.warnings, warning] };
}
