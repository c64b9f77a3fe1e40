/**
 * Listing Bundle Reader
 *
 * 결과 항목 DOM → RawListingBundle
 *
 * 항목마다:
 * 1. page.evaluate로 이름 / 별점 힌트 / 리뷰 힌트 / 웹사이트 읽기
 * 2. info fragment 텍스트를 구분자로 결합
 *
 * evaluate 실패 → 항목 건너뜀
 * info fragment 실패 → 빈 info 텍스트로 계속
 */

import type { Locator, Page } from "playwright";
import type { Logger } from "../config/logger";
import { PARSER_DEFAULTS } from "../config/constants";
import type { RawListingBundle } from "../core/domain/Listing";
import type { IListingBundleReader } from "../core/interfaces/IListingBundleReader";
import { toErrorMessage } from "../core/interfaces/ScraperErrorType";
import { createComponentLogger } from "../utils/LoggerContext";

/**
 * 결과 항목 관련 셀렉터
 */
export interface ListingSelectors {
  resultItem: string;
  name: string;
  ratingLabel: string;
  infoFragment: string;
  website: string;
}

/**
 * 브라우저 컨텍스트에서 읽은 항목 요약
 */
export interface ItemSnapshot {
  name: string | null;
  ratingHint: string | null;
  reviewsHint: string | null;
  websiteUrl: string | null;
}

type SnapshotSelectors = Pick<ListingSelectors, "name" | "ratingLabel" | "website">;

/**
 * 브라우저 컨텍스트에서 실행 (외부 참조 불가)
 */
function snapshotItem(element: Element, selectors: SnapshotSelectors): ItemSnapshot {
  const data: ItemSnapshot = { name: null, ratingHint: null, reviewsHint: null, websiteUrl: null };

  data.name = element.querySelector(selectors.name)?.getAttribute("aria-label") ?? null;

  const ratingSpan = element.querySelector(selectors.ratingLabel);
  if (ratingSpan) {
    const label = ratingSpan.getAttribute("aria-label") ?? "";
    const ratingMatch = label.match(/(\d\.\d)/);
    if (ratingMatch) {
      data.ratingHint = ratingMatch[1];
    }

    const siblingText = ratingSpan.nextElementSibling?.textContent ?? "";
    if (/^\s*\(\s*\d{1,3}(?:[,.]\d{3})*\s*\)\s*$/.test(siblingText)) {
      data.reviewsHint = siblingText.replace(/\s+/g, "");
    } else {
      const labelMatch = label.match(/(\d{1,3}(?:[,.]\d{3})*)\s+reviews?/i);
      if (labelMatch) {
        data.reviewsHint = `(${labelMatch[1]})`;
      }
    }
  }

  const link = element.querySelector(selectors.website);
  const href = link instanceof HTMLAnchorElement ? link.href : "";
  if (href && !href.startsWith("https://www.google.com/maps")) {
    data.websiteUrl = href;
  }

  return data;
}

export class ListingBundleReader implements IListingBundleReader {
  private readonly log: Logger;

  constructor(
    private readonly page: Page,
    private readonly selectors: ListingSelectors,
    private readonly separator: string = PARSER_DEFAULTS.SEPARATOR,
    log?: Logger,
  ) {
    this.log = log ?? createComponentLogger("ListingBundleReader");
  }

  async readAll(): Promise<RawListingBundle[]> {
    const items = await this.page.locator(this.selectors.resultItem).all();
    const bundles: RawListingBundle[] = [];

    this.log.info({ items: items.length }, `[Reader] ${items.length}개 항목 읽기 시작`);

    for (const [index, item] of items.entries()) {
      const position = `${index + 1}/${items.length}`;

      let snapshot: ItemSnapshot;
      try {
        snapshot = await item.evaluate(snapshotItem, {
          name: this.selectors.name,
          ratingLabel: this.selectors.ratingLabel,
          website: this.selectors.website,
        });
      } catch (error) {
        this.log.warn({ position, error: toErrorMessage(error) }, "[Reader] 항목 읽기 실패 - 건너뜀");
        continue;
      }

      const infoTextRaw = await this.readInfoText(item, position);

      this.log.debug({ position, name: snapshot.name, infoTextRaw }, "[Reader] 항목 읽음");

      bundles.push({
        nameRaw: snapshot.name,
        infoTextRaw,
        ratingHint: snapshot.ratingHint,
        reviewsHint: snapshot.reviewsHint,
        websiteUrl: snapshot.websiteUrl,
      });
    }

    return bundles;
  }

  /**
   * info fragment 결합 (빈 fragment 제외)
   */
  private async readInfoText(item: Locator, position: string): Promise<string> {
    try {
      const fragments = await item.locator(this.selectors.infoFragment).allTextContents();
      return fragments.filter((text) => text.trim().length > 0).join(this.separator);
    } catch (error) {
      this.log.warn({ position, error: toErrorMessage(error) }, "[Reader] info 텍스트 읽기 실패");
      return "";
    }
  }
}
