/**
 * SourceCache - 로드된 원본 테이블 캐시
 *
 * 파이프라인에서 공유되는 유일한 자원입니다.
 * - 테이블은 동결(freeze)된 스냅샷으로 보관되어 어느 단계도 변경할 수 없음
 * - 같은 경로를 동시에 요청하면 진행 중인 로드 하나를 공유
 * - 로드가 실패하면 캐시에 남기지 않음 (다음 요청에서 재시도)
 */

import type { DataTable } from '../types';
import type { TableLoader } from './TableLoader';

/**
 * 테이블 동결 (행 객체까지)
 */
export function freezeTable(table: DataTable): DataTable {
  const rows = table.rows.map((row) => Object.freeze({ ...row }));
  return Object.freeze({
    columns: Object.freeze([...table.columns]),
    rows: Object.freeze(rows),
  });
}

export class SourceCache {
  /** 경로 → 로드 Promise */
  private readonly entries = new Map<string, Promise<DataTable>>();

  private readonly loader: TableLoader;

  constructor(loader: TableLoader) {
    this.loader = loader;
  }

  /**
   * 테이블 조회 (없으면 로드)
   */
  get(filePath: string): Promise<DataTable> {
    const cached = this.entries.get(filePath);
    if (cached) {
      return cached;
    }

    const pending = this.loader.load(filePath).then(freezeTable, (error: unknown) => {
      this.entries.delete(filePath);
      throw error;
    });

    this.entries.set(filePath, pending);
    return pending;
  }

  /**
   * 캐시 무효화 (경로를 생략하면 전체)
   */
  invalidate(filePath?: string): void {
    if (filePath === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(filePath);
    }
  }

  has(filePath: string): boolean {
    return this.entries.has(filePath);
  }
}
