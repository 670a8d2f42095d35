/**
 * 설정 타입 정의
 *
 * 데이터셋 설정, 필터 조건, 연도 범위처럼
 * 한 번의 파이프라인 실행을 결정하는 입력 타입들입니다.
 */

// ============================================================================
// 데이터셋 설정
// ============================================================================

/**
 * 데이터셋(탭) 하나의 선언적 설정
 *
 * 애플리케이션 시작 시 정적 레지스트리에서 만들어지며 이후 변경되지 않습니다.
 * `createDatasetConfig()`로만 생성하세요 (검증 + 동결).
 */
export interface DatasetConfig {
  /** 레지스트리 키 */
  readonly id: string;

  /** 화면에 표시할 이름 */
  readonly label: string;

  /** 원본 파일 위치 (.csv, .xlsx, .xls) */
  readonly filePath: string;

  /** 투영/melt 후에도 그대로 유지되는 식별자 컬럼 (순서 유지) */
  readonly identifierColumns: readonly string[];

  /** 픽리스트로 노출할 컬럼 */
  readonly filterColumns: readonly string[];

  /** 연도 범위 투영 적용 여부 */
  readonly yearFilterEnabled: boolean;

  /** 키별 중앙값 집계에 쓰는 보조 그룹 키 (예: "Variable") */
  readonly secondaryGroupKey: string | null;

  /** 차트가 시리즈를 구분하는 컬럼 (집계 행에는 센티널 레이블이 들어감) */
  readonly seriesColumn: string;

  /** 집계 행의 센티널 레이블 */
  readonly sentinelLabel: string;

  /** 처리 전에 제거할 컬럼 */
  readonly excludeColumns: readonly string[];

  /** 차트 데이터에서 Value가 0인 행을 제외할지 여부 */
  readonly dropZeroValues: boolean;
}

/**
 * 데이터셋 정의 (레지스트리 입력)
 *
 * 생략 가능한 필드는 `createDatasetConfig()`가 기본값으로 채웁니다.
 */
export interface DatasetDefinition {
  id: string;
  label?: string;
  filePath: string;
  identifierColumns: string[];
  filterColumns?: string[];
  yearFilterEnabled?: boolean;
  secondaryGroupKey?: string | null;
  seriesColumn?: string;
  sentinelLabel?: string;
  excludeColumns?: string[];
  dropZeroValues?: boolean;
}

// ============================================================================
// 필터 / 연도 범위
// ============================================================================

/**
 * 카테고리 필터 조건
 *
 * 컬럼 → 허용 값 목록 (대소문자 무시).
 * 키가 없거나 빈 배열이면 제약이 없습니다.
 *
 * @example
 * const spec: FilterSpec = { Scenario: ['Low', 'High'], Region: ['World'] };
 */
export type FilterSpec = Readonly<Record<string, readonly string[]>>;

/**
 * 연도 범위 (양 끝 포함)
 */
export interface YearRange {
  readonly startYear: number;
  readonly endYear: number;
}

// ============================================================================
// 경고
// ============================================================================

/**
 * 경고 코드
 *
 * - YEAR_RANGE_CLAMPED: 시작 연도가 끝 연도보다 커서 보정함
 * - EMPTY_RESULT: 필터/연도 범위 결과가 0행
 */
export type PipelineWarningCode = 'YEAR_RANGE_CLAMPED' | 'EMPTY_RESULT';

/**
 * 사용자에게 보여줄 경고 (에러가 아님)
 */
export interface PipelineWarning {
  readonly code: PipelineWarningCode;
  readonly message: string;
}
