/**
 * Feed Capability Interface
 *
 * FeedCollector가 의존하는 최소 인터페이스 (Playwright 비의존)
 *
 * SOLID 원칙:
 * - ISP: 수집 루프에 필요한 3가지 동작만 노출
 * - DIP: 수집 로직은 브라우저 구현이 아닌 이 인터페이스에 의존
 */
export interface IFeedCapability {
  /**
   * 현재 렌더링된 결과 항목 수
   */
  countItems(): Promise<number>;

  /**
   * 추가 로딩 요청 (feed 맨 아래로 스크롤)
   */
  requestMore(): Promise<void>;

  /**
   * "목록 끝" 표시 노출 여부 (짧은 제한 시간 대기)
   */
  isEndOfListVisible(): Promise<boolean>;
}

/**
 * 대기 함수 (테스트에서 교체)
 */
export type Sleeper = (ms: number) => Promise<void>;
