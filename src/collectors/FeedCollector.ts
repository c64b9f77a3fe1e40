/**
 * Feed Collector
 *
 * 전체 개수를 모르는 가상화 무한 스크롤 feed를 안정 상태까지 로딩한다.
 *
 * 정체(stall) 감지 루프:
 * - 개수가 늘면 정체 카운터 초기화
 * - 개수가 그대로면 정체 +1
 *   - "목록 끝" 표시가 보이면 종료
 *   - 정체가 임계값(3)에 도달하면 종료
 *   - 아니면 점점 긴 대기 후 재요청 (시도 횟수는 한 번만 소비)
 * - 최대 시도 횟수(20)에 도달하면 종료
 *
 * 로딩 요청 자체가 실패하면 즉시 종료하고 마지막으로 본 개수를 사용한다.
 */

import type { Logger } from "../config/logger";
import { FEED_COLLECTOR_DEFAULTS } from "../config/constants";
import { IFeedCapability, Sleeper } from "../core/interfaces/IFeedCapability";
import { createComponentLogger } from "../utils/LoggerContext";

/**
 * 수집 루프 옵션
 */
export interface FeedCollectorOptions {
  maxAttempts: number;
  stallThreshold: number;
  settleDelayMs: number;
  stallBackoffBaseMs: number;
  stallBackoffStepMs: number;
  retriggerSettleMs: number;
}

/**
 * 종료 사유
 */
export type CollectionStopReason =
  | "end_marker"
  | "stalled"
  | "max_attempts"
  | "trigger_failed"
  | "count_failed";

/**
 * 수집 결과
 */
export interface CollectionOutcome {
  /** 마지막으로 관측한 항목 수 */
  finalCount: number;
  /** 소비한 시도 횟수 */
  attempts: number;
  /** 종료 시점의 연속 정체 횟수 */
  stallCount: number;
  stopReason: CollectionStopReason;
}

const DEFAULT_OPTIONS: FeedCollectorOptions = {
  maxAttempts: FEED_COLLECTOR_DEFAULTS.MAX_ATTEMPTS,
  stallThreshold: FEED_COLLECTOR_DEFAULTS.STALL_THRESHOLD,
  settleDelayMs: FEED_COLLECTOR_DEFAULTS.SETTLE_DELAY_MS,
  stallBackoffBaseMs: FEED_COLLECTOR_DEFAULTS.STALL_BACKOFF_BASE_MS,
  stallBackoffStepMs: FEED_COLLECTOR_DEFAULTS.STALL_BACKOFF_STEP_MS,
  retriggerSettleMs: FEED_COLLECTOR_DEFAULTS.RETRIGGER_SETTLE_MS,
};

const defaultSleeper: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Feed Collector
 */
export class FeedCollector {
  private readonly options: FeedCollectorOptions;
  private readonly sleep: Sleeper;
  private readonly log: Logger;

  constructor(options: Partial<FeedCollectorOptions> = {}, sleep: Sleeper = defaultSleeper, log?: Logger) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.sleep = sleep;
    this.log = log ?? createComponentLogger("FeedCollector");
  }

  /**
   * feed를 끝까지 로딩
   * 예외를 던지지 않는다 (실패 시 부분 결과)
   */
  async collect(feed: IFeedCapability): Promise<CollectionOutcome> {
    const { maxAttempts, stallThreshold } = this.options;

    let previousCount = 0;
    let attempts = 0;
    let stallCount = 0;

    const finish = (stopReason: CollectionStopReason): CollectionOutcome => {
      const outcome = { finalCount: previousCount, attempts, stallCount, stopReason };
      this.log.info(outcome, `[Feed] 수집 종료: ${stopReason}`);
      return outcome;
    };

    while (attempts < maxAttempts) {
      let currentCount: number;
      try {
        currentCount = await feed.countItems();
      } catch (error) {
        this.log.warn({ error, attempts }, "[Feed] 항목 수 조회 실패 - 수집 중단");
        return finish("count_failed");
      }

      this.log.debug({ count: currentCount, attempts }, `[Feed] 현재 ${currentCount}개`);

      if (currentCount === previousCount && attempts > 0) {
        stallCount += 1;

        if (await this.probeEndMarker(feed)) {
          return finish("end_marker");
        }

        if (stallCount >= stallThreshold) {
          this.log.info({ stallCount }, `[Feed] ${stallCount}회 연속 변화 없음 - 끝으로 판단`);
          return finish("stalled");
        }

        const backoffMs = this.options.stallBackoffBaseMs + stallCount * this.options.stallBackoffStepMs;
        this.log.debug({ stallCount, backoffMs }, "[Feed] 변화 없음 - 대기 후 재요청");
        await this.sleep(backoffMs);

        if (!(await this.trigger(feed, this.options.retriggerSettleMs, attempts))) {
          return finish("trigger_failed");
        }
      } else {
        stallCount = 0;
      }

      previousCount = currentCount;

      if (!(await this.trigger(feed, this.options.settleDelayMs, attempts))) {
        return finish("trigger_failed");
      }

      attempts += 1;
    }

    return finish("max_attempts");
  }

  /**
   * 로딩 요청 + 안정화 대기
   * @returns 성공 여부
   */
  private async trigger(feed: IFeedCapability, settleMs: number, attempts: number): Promise<boolean> {
    try {
      await feed.requestMore();
    } catch (error) {
      this.log.warn({ error, attempts }, "[Feed] 스크롤 요청 실패 - 수집 중단");
      return false;
    }
    await this.sleep(settleMs);
    return true;
  }

  /**
   * "목록 끝" 표시 확인 (실패는 "안 보임"으로 처리)
   */
  private async probeEndMarker(feed: IFeedCapability): Promise<boolean> {
    try {
      const visible = await feed.isEndOfListVisible();
      if (visible) {
        this.log.info("[Feed] 목록 끝 표시 감지");
      }
      return visible;
    } catch (error) {
      this.log.debug({ error }, "[Feed] 목록 끝 표시 확인 실패 - 계속 진행");
      return false;
    }
  }
}
