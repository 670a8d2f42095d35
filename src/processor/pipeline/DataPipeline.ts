/**
 * DataPipeline - 데이터 변환 파이프라인
 *
 * Transformer들을 Phase 순서대로 실행하여 데이터를 변환합니다.
 * 모든 단계는 동기적으로 끝까지 실행되며 중간에 멈추지 않습니다.
 *
 * 파이프라인 구조:
 * Raw → Prepare → CategoricalFilter → (YearRange) → Melt → Aggregate
 */

import type { DataTable } from '../../types';
import {
  type Transformer,
  type TransformContext,
  PipelinePhase,
  createInitialContext,
} from './Transformer';

/**
 * 파이프라인 실행 결과
 */
export interface PipelineResult {
  /** 최종 컨텍스트 */
  context: TransformContext;

  /** 실행 시간 (ms) */
  executionTime: number;

  /** 각 단계별 실행 시간 (debug 모드에서만) */
  phaseTimings?: Map<PipelinePhase, number>;
}

/**
 * 파이프라인 옵션
 */
export interface PipelineOptions {
  /** 디버그 모드 (타이밍 기록 + 로그) */
  debug?: boolean;
}

// =============================================================================
// DataPipeline 클래스
// =============================================================================

/**
 * 데이터 변환 파이프라인
 *
 * Transformer들을 관리하고 순차적으로 실행합니다.
 */
export class DataPipeline {
  /** 등록된 Transformer 목록 */
  private transformers: Transformer[] = [];

  /** 파이프라인 옵션 */
  private readonly options: Required<PipelineOptions>;

  constructor(options: PipelineOptions = {}) {
    this.options = {
      debug: false,
      ...options,
    };
  }

  // ==========================================================================
  // Transformer 관리
  // ==========================================================================

  /**
   * Transformer 추가
   *
   * Phase 순서대로 자동 정렬됩니다. (같은 Phase는 추가한 순서)
   */
  addTransformer(transformer: Transformer): this {
    this.transformers.push(transformer);
    this.transformers.sort((a, b) => a.phase - b.phase);
    return this;
  }

  /**
   * Transformer 제거
   */
  removeTransformer(name: string): boolean {
    const index = this.transformers.findIndex((t) => t.name === name);
    if (index >= 0) {
      this.transformers.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Transformer 가져오기
   */
  getTransformer(name: string): Transformer | undefined {
    return this.transformers.find((t) => t.name === name);
  }

  /**
   * 모든 Transformer 반환
   */
  getTransformers(): readonly Transformer[] {
    return this.transformers;
  }

  // ==========================================================================
  // 파이프라인 실행
  // ==========================================================================

  /**
   * 파이프라인 실행
   *
   * @param table - 원본 테이블 (변경되지 않음)
   * @param identifierColumns - 식별자 컬럼
   */
  execute(table: DataTable, identifierColumns: readonly string[]): PipelineResult {
    const startTime = performance.now();
    const phaseTimings = this.options.debug ? new Map<PipelinePhase, number>() : undefined;

    let ctx = createInitialContext(table, identifierColumns);

    for (const transformer of this.transformers) {
      const phaseStart = phaseTimings ? performance.now() : 0;

      ctx = transformer.transform(ctx);

      if (phaseTimings) {
        const phaseTime = performance.now() - phaseStart;
        phaseTimings.set(transformer.phase, (phaseTimings.get(transformer.phase) ?? 0) + phaseTime);
        console.log(
          `[DataPipeline] ${transformer.name}: ${phaseTime.toFixed(2)}ms ` +
            `(rows=${ctx.table.rows.length}, long=${ctx.longRows.length})`
        );
      }
    }

    return {
      context: ctx,
      executionTime: performance.now() - startTime,
      phaseTimings,
    };
  }
}
