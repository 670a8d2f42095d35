/**
 * DashboardController - 데이터셋(탭) 실행 관리
 *
 * 대시보드 셸이 사용자 조작 한 번마다 호출하는 진입점입니다.
 * 활성 탭 같은 UI 상태는 갖지 않고, 모든 입력을 매개변수로 받습니다.
 *
 * 한 데이터셋의 실패(설정 오류, 로드 실패)는 그 데이터셋 결과로만 보고되며
 * 다른 데이터셋 실행에는 영향을 주지 않습니다.
 */

import type { DataTable, FilterSpec, PipelineWarning, YearRange } from '../types';
import type { DatasetRegistry } from '../config/DatasetRegistry';
import type { SourceCache } from '../io/SourceCache';
import { DatasetPipeline, type DatasetPipelineOptions, type DatasetResult } from '../processor/DatasetPipeline';
import { buildFilterOptions } from '../processor/FilterOptions';
import { encodeWorkbook, exportFileName } from '../io/workbook';
import { PipelineError } from './errors';
import { SimpleEventEmitter } from './SimpleEventEmitter';

/**
 * 데이터셋 실행 결과
 */
export type DatasetOutcome =
  | { ok: true; datasetId: string; result: DatasetResult }
  | { ok: false; datasetId: string; error: PipelineError };

/**
 * 컨트롤러 이벤트
 */
export interface DashboardEvents {
  /** 파이프라인 실행 완료 */
  result: { datasetId: string; result: DatasetResult };

  /** 사용자에게 보여줄 경고 */
  warning: { datasetId: string; warning: PipelineWarning };

  /** 데이터셋 실행 실패 */
  error: { datasetId: string; error: PipelineError };
}

/**
 * 내보내기 파일
 */
export interface ExportFile {
  fileName: string;
  bytes: Uint8Array;
}

export class DashboardController extends SimpleEventEmitter<DashboardEvents> {
  private readonly registry: DatasetRegistry;
  private readonly cache: SourceCache;
  private readonly pipeline: DatasetPipeline;

  constructor(registry: DatasetRegistry, cache: SourceCache, options: DatasetPipelineOptions = {}) {
    super();
    this.registry = registry;
    this.cache = cache;
    this.pipeline = new DatasetPipeline(options);
  }

  /**
   * 데이터셋 한 번 실행 (로드 → 파이프라인)
   *
   * PipelineError는 실패 결과로 돌려주고, 그 밖의 예외는 그대로 던집니다.
   */
  async runDataset(
    datasetId: string,
    filterSpec: FilterSpec = {},
    yearRange: YearRange | null = null
  ): Promise<DatasetOutcome> {
    try {
      const config = this.registry.get(datasetId);
      const table = await this.cache.get(config.filePath);
      const result = this.pipeline.run(config, table, filterSpec, yearRange);

      for (const warning of result.warnings) {
        this.emit('warning', { datasetId, warning });
      }
      this.emit('result', { datasetId, result });

      return { ok: true, datasetId, result };
    } catch (error) {
      if (!(error instanceof PipelineError)) {
        throw error;
      }
      console.error(`[DashboardController] ${datasetId}: ${error.message}`);
      this.emit('error', { datasetId, error });
      return { ok: false, datasetId, error };
    }
  }

  /**
   * 데이터셋 픽리스트 옵션
   */
  async filterOptions(datasetId: string, filterSpec: FilterSpec = {}): Promise<Record<string, string[]>> {
    const config = this.registry.get(datasetId);
    const table: DataTable = await this.cache.get(config.filePath);
    return buildFilterOptions(table, config.filterColumns, filterSpec);
  }

  /**
   * 실행 결과의 내보내기 테이블을 XLSX 파일로
   */
  exportDataset(result: DatasetResult): ExportFile {
    const config = this.registry.get(result.datasetId);
    return {
      fileName: exportFileName(config),
      bytes: encodeWorkbook(result.exportTable),
    };
  }
}
