/**
 * 파이프라인 에러 정의
 *
 * - ConfigurationError: 설정이 데이터와 맞지 않음 (해당 데이터셋 실행만 실패)
 * - MissingColumnError: 구조적으로 필요한 컬럼이 파일에 없음
 * - DatasetLoadError: 원본 파일을 읽지 못함
 *
 * 데이터 품질 문제(숫자가 아닌 값 등)는 에러가 아니라 null로 흡수됩니다.
 */

/**
 * 모든 파이프라인 에러의 기반 클래스
 */
export class PipelineError extends Error {
  override name = 'PipelineError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * 데이터셋 설정 오류
 */
export class ConfigurationError extends PipelineError {
  override name = 'ConfigurationError';

  /** 오류가 난 데이터셋 ID (알 수 있는 경우) */
  readonly datasetId: string | undefined;

  constructor(message: string, datasetId?: string) {
    super(message);
    this.datasetId = datasetId;
  }
}

/**
 * 필수 컬럼 누락
 *
 * 식별자 컬럼은 구조적이므로 없으면 조용히 무시하지 않고 실패합니다.
 * (필터 컬럼은 부수적이므로 없으면 무시)
 */
export class MissingColumnError extends ConfigurationError {
  override name = 'MissingColumnError';

  /** 누락된 컬럼 목록 */
  readonly columns: readonly string[];

  constructor(columns: readonly string[], datasetId?: string) {
    const scope = datasetId ? ` in dataset "${datasetId}"` : '';
    super(`Missing required column(s)${scope}: ${columns.join(', ')}`, datasetId);
    this.columns = [...columns];
  }
}

/**
 * 원본 파일 로드 실패
 */
export class DatasetLoadError extends PipelineError {
  override name = 'DatasetLoadError';

  /** 읽으려던 파일 경로 */
  readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Could not load "${filePath}": ${reason}`, { cause });
    this.filePath = filePath;
  }
}

/**
 * 테이블에 없는 컬럼 목록 반환
 */
export function findMissingColumns(
  available: readonly string[],
  required: readonly string[]
): string[] {
  const present = new Set(available);
  return required.filter((column) => !present.has(column));
}

/**
 * 필수 컬럼이 모두 있는지 확인 (없으면 MissingColumnError)
 */
export function assertColumns(
  available: readonly string[],
  required: readonly string[],
  datasetId?: string
): void {
  const missing = findMissingColumns(available, required);
  if (missing.length > 0) {
    throw new MissingColumnError(missing, datasetId);
  }
}
