/**
 * Browser Controller 구현체
 *
 * 브라우저 생명주기 및 네비게이션 관리
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당 (수집/파싱 X)
 * - OCP: 네비게이션 단계는 maps.yaml로 확장
 * - LSP: IBrowserController 대체 가능
 *
 * 책임:
 * 1. 브라우저/컨텍스트/페이지 생명주기 관리
 * 2. 네비게이션 스텝 실행 (선택 단계 실패 허용)
 * 3. 결과 feed 노출 대기
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext, Page } from "playwright";

import { IBrowserController, BrowserInitOptions, NavigationResult } from "./IBrowserController";
import type { NavigationStep } from "../../core/domain/MapsScraperConfig";
import type { Logger } from "../../config/logger";
import { ConfigLoader } from "../../config/ConfigLoader";
import { resolveBrowserArgs } from "../../config/BrowserArgs";
import {
  FeedNotLoadedError,
  NavigationError,
  ScraperError,
  ScraperErrorType,
  isTimeoutError,
  toErrorMessage,
} from "../../core/interfaces/ScraperErrorType";
import { createComponentLogger } from "../../utils/LoggerContext";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

/**
 * Browser Controller 구현체
 */
export class BrowserController implements IBrowserController {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private navigationTimeoutMs = 30000;
  private _initialized = false;
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? createComponentLogger("BrowserController");
  }

  /**
   * 브라우저 초기화
   */
  async initialize(options: BrowserInitOptions): Promise<void> {
    if (this._initialized) {
      this.log.debug("BrowserController 이미 초기화됨");
      return;
    }

    const { settings } = options;
    this.navigationTimeoutMs = options.navigationTimeoutMs;

    this.log.info({ headless: settings.headless }, "브라우저 초기화 시작");

    try {
      this.browser = await chromium.launch({
        headless: settings.headless,
        args: resolveBrowserArgs(settings.args),
      });

      this.context = await this.browser.newContext({
        viewport: settings.viewport,
        locale: settings.locale,
        ...(settings.userAgent ? { userAgent: settings.userAgent } : {}),
      });

      // Anti-detection 설정
      await this.context.addInitScript(() => {
        Object.defineProperty(navigator, "webdriver", {
          get: () => false,
        });
      });

      this.page = await this.context.newPage();
      this.page.setDefaultNavigationTimeout(this.navigationTimeoutMs);
    } catch (error) {
      throw new ScraperError(
        ScraperErrorType.BROWSER_ERROR,
        `브라우저 실행 실패: ${toErrorMessage(error)}`,
        error,
      );
    }

    this._initialized = true;
    this.log.info("브라우저 초기화 완료");
  }

  /**
   * 네비게이션 스텝 실행
   */
  async executeNavigation(
    steps: readonly NavigationStep[],
    variables: Record<string, string>,
  ): Promise<NavigationResult> {
    const page = this.requirePage();
    const configLoader = ConfigLoader.getInstance();

    let executedSteps = 0;
    let skippedSteps = 0;

    for (const [index, rawStep] of steps.entries()) {
      const step = configLoader.substituteStep(rawStep, variables);
      const stepNumber = index + 1;

      try {
        await this.runStep(page, step);
        executedSteps += 1;
      } catch (error) {
        if (!step.optional) {
          this.log.error(
            { step: stepNumber, action: step.action, error: toErrorMessage(error) },
            "[Navigation] 필수 단계 실패",
          );
          throw new NavigationError(stepNumber, step.action, error);
        }

        skippedSteps += 1;
        if (isTimeoutError(error)) {
          this.log.info(
            { step: stepNumber, action: step.action },
            "[Navigation] 선택 단계 대상 없음 - 건너뜀",
          );
        } else {
          this.log.warn(
            { step: stepNumber, action: step.action, error: toErrorMessage(error) },
            "[Navigation] 선택 단계 실패 - 건너뜀",
          );
        }
      }
    }

    return { finalUrl: page.url(), executedSteps, skippedSteps };
  }

  /**
   * 단일 단계 실행
   */
  private async runStep(page: Page, step: NavigationStep): Promise<void> {
    switch (step.action) {
      case "navigate":
        this.log.info({ url: step.url }, "[Navigation] 페이지 이동");
        await page.goto(step.url, {
          waitUntil: step.waitUntil,
          timeout: step.timeout ?? this.navigationTimeoutMs,
        });
        return;

      case "click":
        this.log.info({ selector: step.selector }, "[Navigation] 요소 클릭");
        await page.locator(step.selector).first().click({ timeout: step.timeout });
        return;

      case "fill":
        this.log.info({ selector: step.selector }, "[Navigation] 텍스트 입력");
        await page.locator(step.selector).first().fill(step.value, { timeout: step.timeout });
        return;

      case "press":
        this.log.info({ selector: step.selector, key: step.key }, "[Navigation] 키 입력");
        await page.locator(step.selector).first().press(step.key, { timeout: step.timeout });
        return;

      case "wait":
        this.log.debug({ waitTimeMs: step.duration }, "[Navigation] 대기 중");
        await page.waitForTimeout(step.duration);
        return;
    }
  }

  /**
   * 결과 feed 노출 대기
   */
  async waitForFeed(selector: string, timeoutMs: number): Promise<void> {
    const page = this.requirePage();

    this.log.info({ selector, timeoutMs }, "[Feed] 결과 목록 대기 중");
    try {
      await page.locator(selector).first().waitFor({ state: "visible", timeout: timeoutMs });
    } catch (error) {
      throw new FeedNotLoadedError(selector, timeoutMs, error);
    }
    this.log.info("[Feed] 결과 목록 표시됨");
  }

  /**
   * 현재 Page 인스턴스 반환
   */
  getPage(): Page | null {
    return this.page;
  }

  /**
   * 리소스 정리
   * 개별 close 실패는 경고만 남기고 계속 진행
   */
  async cleanup(): Promise<void> {
    this.log.info("BrowserController 정리 중...");

    await this.closeQuietly("page", () => this.page?.close());
    this.page = null;

    await this.closeQuietly("context", () => this.context?.close());
    this.context = null;

    await this.closeQuietly("browser", () => this.browser?.close());
    this.browser = null;

    this._initialized = false;
    this.log.info("BrowserController 정리 완료");
  }

  /**
   * 초기화 상태 확인
   */
  isInitialized(): boolean {
    return this._initialized;
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new ScraperError(ScraperErrorType.BROWSER_ERROR, "BrowserController가 초기화되지 않음");
    }
    return this.page;
  }

  private async closeQuietly(target: string, close: () => Promise<void> | undefined): Promise<void> {
    try {
      await close();
    } catch (error) {
      this.log.warn({ target, error: toErrorMessage(error) }, "리소스 정리 실패 - 계속 진행");
    }
  }
}
