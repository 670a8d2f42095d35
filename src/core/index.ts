/**
 * 코어 모듈
 *
 * 에러, 이벤트, 페이지 나누기, 대시보드 컨트롤러를 내보냅니다.
 */

export {
  PipelineError,
  ConfigurationError,
  MissingColumnError,
  DatasetLoadError,
  assertColumns,
  findMissingColumns,
} from './errors';

export { SimpleEventEmitter } from './SimpleEventEmitter';

export { previewRows, paginate, DEFAULT_PAGE_SIZE, DEFAULT_PREVIEW_ROWS } from './Pagination';
export type { PageResult } from './Pagination';

export { DashboardController } from './DashboardController';
export type { DatasetOutcome, DashboardEvents, ExportFile } from './DashboardController';
