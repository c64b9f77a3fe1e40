/**
 * Scraper Error Type Enum
 *
 * 목적:
 * - 세션 실패 원인 세분화
 * - 에러별 로깅 전략 차별화
 *
 * 세션 경계를 넘어 호출자에게 전파되지 않는다.
 * MapsSearchService가 잡아서 빈 결과 + status로 변환한다.
 */

import { errors } from "playwright";

/**
 * Scraper 에러 타입
 */
export enum ScraperErrorType {
  /** 결과 feed가 제한 시간 내에 보이지 않음 (세션 치명적) */
  FEED_NOT_LOADED = "FEED_NOT_LOADED",

  /** 필수 네비게이션 단계 실패 */
  NAVIGATION_FAILED = "NAVIGATION_FAILED",

  /** 설정 파일 로드/검증 실패 */
  CONFIG_INVALID = "CONFIG_INVALID",

  /** Browser/Page 에러 (실행 실패, 크래시) */
  BROWSER_ERROR = "BROWSER_ERROR",
}

/**
 * Scraper Error 클래스
 */
export class ScraperError extends Error {
  public readonly type: ScraperErrorType;
  public readonly errorCause?: unknown;

  constructor(type: ScraperErrorType, message: string, cause?: unknown) {
    super(message);
    this.name = "ScraperError";
    this.type = type;
    this.errorCause = cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      cause: this.errorCause instanceof Error ? this.errorCause.message : this.errorCause,
    };
  }
}

/**
 * 결과 feed 로딩 실패
 */
export class FeedNotLoadedError extends ScraperError {
  constructor(selector: string, timeoutMs: number, cause?: unknown) {
    super(
      ScraperErrorType.FEED_NOT_LOADED,
      `결과 feed가 ${timeoutMs}ms 내에 표시되지 않음 (selector: ${selector})`,
      cause,
    );
    this.name = "FeedNotLoadedError";
  }
}

/**
 * 네비게이션 단계 실패
 */
export class NavigationError extends ScraperError {
  constructor(step: number, action: string, cause?: unknown) {
    super(
      ScraperErrorType.NAVIGATION_FAILED,
      `네비게이션 실패 (Step ${step}: ${action})`,
      cause,
    );
    this.name = "NavigationError";
  }
}

/**
 * 설정 검증 실패
 */
export class ConfigValidationError extends ScraperError {
  constructor(configPath: string, detail: string) {
    super(ScraperErrorType.CONFIG_INVALID, `설정 검증 실패 (${configPath}): ${detail}`);
    this.name = "ConfigValidationError";
  }
}

/**
 * Playwright 타임아웃 여부
 * 타임아웃은 "요소 없음"으로 취급하는 경우가 많아 로그 레벨을 낮춘다
 */
export function isTimeoutError(error: unknown): boolean {
  if (error instanceof errors.TimeoutError) {
    return true;
  }
  return error instanceof Error && error.message.toLowerCase().includes("timeout");
}

/**
 * unknown 에러 → 메시지
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
