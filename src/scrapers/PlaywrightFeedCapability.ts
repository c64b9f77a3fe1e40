/**
 * Playwright Feed Capability
 *
 * IFeedCapability의 Playwright 구현 (FeedCollector ↔ Page 어댑터)
 */

import type { Page } from "playwright";
import type { IFeedCapability } from "../core/interfaces/IFeedCapability";

/**
 * Feed 관련 셀렉터
 */
export interface FeedSelectors {
  feed: string;
  resultItem: string;
  endOfList: string;
}

export class PlaywrightFeedCapability implements IFeedCapability {
  constructor(
    private readonly page: Page,
    private readonly selectors: FeedSelectors,
    private readonly endMarkerTimeoutMs: number,
  ) {}

  async countItems(): Promise<number> {
    return this.page.locator(this.selectors.resultItem).count();
  }

  /**
   * feed 컨테이너를 맨 아래로 스크롤
   */
  async requestMore(): Promise<void> {
    await this.page
      .locator(this.selectors.feed)
      .first()
      .evaluate((element) => {
        element.scrollTop = element.scrollHeight;
      });
  }

  /**
   * 제한 시간 내에 보이지 않으면 false
   */
  async isEndOfListVisible(): Promise<boolean> {
    try {
      await this.page
        .locator(this.selectors.endOfList)
        .first()
        .waitFor({ state: "visible", timeout: this.endMarkerTimeoutMs });
      return true;
    } catch {
      return false;
    }
  }
}
