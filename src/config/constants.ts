/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - YAML로 옮길 필요 없는 고정값만 여기에 둔다
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 "version"과 수동 동기화
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Maps Listing Scraper",
  SERVICE: "maps_scraper",
} as const;

/**
 * 필드 미확정 값 (Sentinel)
 * 빈 문자열/undefined 대신 항상 이 값으로 채운다
 */
export const NOT_AVAILABLE = "N/A";

/**
 * 설정 파일 경로
 */
export const PATH_CONFIG = {
  /**
   * 기본 설정 파일명 (ConfigLoader와 같은 디렉토리)
   */
  DEFAULT_CONFIG_FILE: "maps.yaml",

  /**
   * 설정 파일 경로 오버라이드
   * 환경변수: MAPS_CONFIG_PATH
   */
  CONFIG_PATH_OVERRIDE: process.env.MAPS_CONFIG_PATH || "",
} as const;

/**
 * Feed 수집 기본값
 * maps.yaml의 feedCollector 섹션이 우선
 */
export const FEED_COLLECTOR_DEFAULTS = {
  MAX_ATTEMPTS: 20,
  STALL_THRESHOLD: 3,
  SETTLE_DELAY_MS: 1500,
  STALL_BACKOFF_BASE_MS: 1500,
  STALL_BACKOFF_STEP_MS: 1000,
  RETRIGGER_SETTLE_MS: 1000,
} as const;

/**
 * 리스팅 파서 기본값
 */
export const PARSER_DEFAULTS = {
  /**
   * info fragment 결합 구분자
   */
  SEPARATOR: " · ",

  /**
   * 주소 최소 길이 (미만이면 N/A)
   */
  MIN_ADDRESS_LENGTH: 5,
} as const;

/**
 * 출력 설정
 * 환경변수: OUTPUT_FORMAT (table | lines | json)
 */
export const OUTPUT_CONFIG = {
  FORMAT: process.env.OUTPUT_FORMAT || "table",
} as const;
