/**
 * Browser Controller Interface
 *
 * 브라우저 생명주기 및 네비게이션 관리 인터페이스
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당
 * - ISP: 최소 인터페이스 (검색 세션에 필요한 것만)
 * - DIP: 상위 모듈은 이 인터페이스에 의존
 */

import type { Page } from "playwright";
import type { BrowserSettings, NavigationStep } from "../../core/domain/MapsScraperConfig";

/**
 * 브라우저 초기화 옵션
 */
export interface BrowserInitOptions {
  /** 브라우저/컨텍스트 설정 */
  settings: BrowserSettings;
  /** 네비게이션 기본 제한 시간 */
  navigationTimeoutMs: number;
}

/**
 * 네비게이션 결과
 */
export interface NavigationResult {
  /** 최종 URL */
  finalUrl: string;
  /** 실행한 단계 수 */
  executedSteps: number;
  /** 실패했지만 선택 단계라 건너뛴 단계 수 */
  skippedSteps: number;
}

/**
 * Browser Controller Interface
 */
export interface IBrowserController {
  /**
   * 브라우저 초기화
   */
  initialize(options: BrowserInitOptions): Promise<void>;

  /**
   * 네비게이션 스텝 실행
   * @param steps 설정의 네비게이션 단계
   * @param variables 템플릿 변수 (예: { query })
   * @throws NavigationError 필수 단계 실패 시
   */
  executeNavigation(
    steps: readonly NavigationStep[],
    variables: Record<string, string>,
  ): Promise<NavigationResult>;

  /**
   * 결과 feed 노출 대기
   * @throws FeedNotLoadedError 제한 시간 초과 시
   */
  waitForFeed(selector: string, timeoutMs: number): Promise<void>;

  /**
   * 현재 Page 인스턴스 반환
   */
  getPage(): Page | null;

  /**
   * 리소스 정리 (여러 번 호출해도 안전)
   */
  cleanup(): Promise<void>;

  /**
   * 초기화 상태 확인
   */
  isInitialized(): boolean;
}
