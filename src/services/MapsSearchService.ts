/**
 * MapsSearchService - 지도 검색 세션 오케스트레이션
 *
 * SOLID 원칙:
 * - SRP: 세션 흐름 조율만 담당 (브라우저 제어/수집/파싱은 위임)
 * - DIP: IBrowserController / IFeedCapability / IListingBundleReader에 의존
 *
 * 흐름 (엄격히 순차):
 * 1. 브라우저 초기화
 * 2. 네비게이션 (검색어 입력)
 * 3. 결과 feed 대기
 * 4. feed 수집 (FeedCollector)
 * 5. 항목 읽기 (ListingBundleReader)
 * 6. 필드 파싱 (ListingFieldParser)
 * 7. 정리 (항상)
 *
 * search()는 예외를 던지지 않는다. 세션 실패는 status + 빈 records로 반환.
 */

import { v7 as uuidv7 } from "uuid";
import type { Page } from "playwright";
import type { Logger } from "../config/logger";
import type { MapsScraperConfig } from "../core/domain/MapsScraperConfig";
import type { ListingRecord } from "../core/domain/Listing";
import type { IFeedCapability, Sleeper } from "../core/interfaces/IFeedCapability";
import type { IListingBundleReader } from "../core/interfaces/IListingBundleReader";
import {
  ScraperError,
  ScraperErrorType,
  toErrorMessage,
} from "../core/interfaces/ScraperErrorType";
import { CollectionOutcome, FeedCollector } from "../collectors/FeedCollector";
import { ListingFieldParser } from "../parsers/listing/ListingFieldParser";
import { BrowserController } from "../scrapers/controllers/BrowserController";
import type { IBrowserController } from "../scrapers/controllers/IBrowserController";
import { PlaywrightFeedCapability } from "../scrapers/PlaywrightFeedCapability";
import { ListingBundleReader } from "../scrapers/ListingBundleReader";
import { createComponentLogger, createSessionLogger } from "../utils/LoggerContext";

/**
 * 세션 종료 상태
 */
export type SearchSessionStatus =
  | "completed"
  | "navigation_failed"
  | "feed_not_loaded"
  | "browser_error"
  | "failed";

/**
 * 검색 세션 결과
 */
export interface SearchSessionResult {
  sessionId: string;
  query: string;
  status: SearchSessionStatus;
  /** 파싱된 레코드 (feed 순서) */
  records: ListingRecord[];
  /** feed 수집 결과 (수집 전 실패 시 null) */
  collection: CollectionOutcome | null;
  /** 읽은 항목 수 */
  bundleCount: number;
  durationMs: number;
  error?: string;
}

/**
 * 교체 가능한 협력 객체 (테스트에서 주입)
 */
export interface MapsSearchDependencies {
  createController: (log: Logger) => IBrowserController;
  createFeed: (page: Page, config: MapsScraperConfig) => IFeedCapability;
  createReader: (page: Page, config: MapsScraperConfig, log: Logger) => IListingBundleReader;
  /** FeedCollector 대기 함수 (기본: setTimeout) */
  sleep?: Sleeper;
}

const DEFAULT_DEPENDENCIES: MapsSearchDependencies = {
  createController: (log) => new BrowserController(createComponentLogger("BrowserController", log)),
  createFeed: (page, config) =>
    new PlaywrightFeedCapability(page, config.selectors, config.timeouts.endMarkerMs),
  createReader: (page, config, log) =>
    new ListingBundleReader(
      page,
      config.selectors,
      config.parser.separator,
      createComponentLogger("ListingBundleReader", log),
    ),
};

/**
 * 에러 → 세션 상태
 */
function toSessionStatus(error: unknown): SearchSessionStatus {
  if (!(error instanceof ScraperError)) {
    return "failed";
  }
  switch (error.type) {
    case ScraperErrorType.NAVIGATION_FAILED:
      return "navigation_failed";
    case ScraperErrorType.FEED_NOT_LOADED:
      return "feed_not_loaded";
    case ScraperErrorType.BROWSER_ERROR:
      return "browser_error";
    default:
      return "failed";
  }
}

export class MapsSearchService {
  private readonly dependencies: MapsSearchDependencies;

  constructor(
    private readonly config: MapsScraperConfig,
    dependencies: Partial<MapsSearchDependencies> = {},
  ) {
    this.dependencies = { ...DEFAULT_DEPENDENCIES, ...dependencies };
  }

  /**
   * 검색 세션 실행
   * @param query 검색어 (그대로 검색창에 입력)
   */
  async search(query: string): Promise<SearchSessionResult> {
    const startTime = Date.now();
    const sessionId = uuidv7();
    const log = createSessionLogger(query, sessionId);
    const controller = this.dependencies.createController(log);

    let status: SearchSessionStatus = "completed";
    let records: ListingRecord[] = [];
    let collection: CollectionOutcome | null = null;
    let bundleCount = 0;
    let errorMessage: string | undefined;

    log.info({ site: this.config.site.name }, "[Search] 세션 시작");

    try {
      await controller.initialize({
        settings: this.config.browser,
        navigationTimeoutMs: this.config.timeouts.navigationMs,
      });

      await controller.executeNavigation(this.config.navigation, { query });
      await controller.waitForFeed(this.config.selectors.feed, this.config.timeouts.feedVisibleMs);

      const page = controller.getPage();
      if (!page) {
        throw new ScraperError(ScraperErrorType.BROWSER_ERROR, "Page 인스턴스 없음");
      }

      const collector = new FeedCollector(
        this.config.feedCollector,
        this.dependencies.sleep,
        createComponentLogger("FeedCollector", log),
      );
      collection = await collector.collect(this.dependencies.createFeed(page, this.config));

      const bundles = await this.dependencies.createReader(page, this.config, log).readAll();
      bundleCount = bundles.length;

      const parser = new ListingFieldParser(
        this.config.parser,
        createComponentLogger("ListingFieldParser", log),
      );
      records = parser.parseAll(bundles);
    } catch (error) {
      status = toSessionStatus(error);
      errorMessage = toErrorMessage(error);
      records = [];
      log.error(
        error instanceof ScraperError ? error.toLogObject() : { error: errorMessage },
        "[Search] 세션 실패 - 빈 결과 반환",
      );
    } finally {
      await this.cleanup(controller, log);
    }

    const durationMs = Date.now() - startTime;
    log.info(
      { status, records: records.length, bundles: bundleCount, collection, durationMs },
      "[Search] 세션 종료",
    );

    return {
      sessionId,
      query,
      status,
      records,
      collection,
      bundleCount,
      durationMs,
      ...(errorMessage !== undefined ? { error: errorMessage } : {}),
    };
  }

  private async cleanup(controller: IBrowserController, log: Logger): Promise<void> {
    try {
      await controller.cleanup();
    } catch (error) {
      log.warn({ error: toErrorMessage(error) }, "[Search] 브라우저 정리 실패");
    }
  }
}
