/**
 * FeedCollector Test
 *
 * 목적: 정체 감지 루프 종료 조건 검증 (목록 끝 / 정체 / 최대 시도 / 요청 실패)
 */

import { describe, it, expect, jest } from "@jest/globals";
import { FeedCollector } from "@/collectors/FeedCollector";
import type { Sleeper } from "@/core/interfaces/IFeedCapability";

/**
 * 개수 시퀀스를 돌려주는 가짜 feed
 */
function createFeed(counts: number[], endVisible = false) {
  const countItems = jest.fn<() => Promise<number>>();
  for (const count of counts) {
    countItems.mockResolvedValueOnce(count);
  }

  return {
    countItems,
    requestMore: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
    isEndOfListVisible: jest.fn<() => Promise<boolean>>().mockResolvedValue(endVisible),
  };
}

function createSleeper() {
  return jest.fn<Sleeper>().mockResolvedValue(undefined);
}

describe("FeedCollector", () => {
  it("3회 연속 개수 변화가 없으면 종료해야 함 [0,5,5,5,5]", async () => {
    const feed = createFeed([0, 5, 5, 5, 5]);
    const sleep = createSleeper();

    const outcome = await new FeedCollector({}, sleep).collect(feed);

    expect(outcome).toEqual({ finalCount: 5, attempts: 4, stallCount: 3, stopReason: "stalled" });
    expect(feed.countItems).toHaveBeenCalledTimes(5);
    expect(feed.isEndOfListVisible).toHaveBeenCalledTimes(3);
    expect(feed.requestMore).toHaveBeenCalledTimes(6);
  });

  it("정체 시 점점 긴 대기 후 재요청해야 함", async () => {
    const feed = createFeed([0, 5, 5, 5, 5]);
    const sleep = createSleeper();

    await new FeedCollector({}, sleep).collect(feed);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([
      1500, 1500, 2500, 1000, 1500, 3500, 1000, 1500,
    ]);
  });

  it("목록 끝 표시가 보이면 즉시 종료해야 함 [0,5,9,12]", async () => {
    const feed = createFeed([0, 5, 9, 12, 12], true);

    const outcome = await new FeedCollector({}, createSleeper()).collect(feed);

    expect(outcome).toEqual({ finalCount: 12, attempts: 4, stallCount: 1, stopReason: "end_marker" });
    expect(feed.isEndOfListVisible).toHaveBeenCalledTimes(1);
    expect(feed.countItems).toHaveBeenCalledTimes(5);
  });

  it("개수가 늘어나는 동안에는 목록 끝 표시를 확인하지 않아야 함", async () => {
    const feed = createFeed([0, 3, 6], true);

    const outcome = await new FeedCollector({ maxAttempts: 3 }, createSleeper()).collect(feed);

    expect(outcome.stopReason).toBe("max_attempts");
    expect(outcome.finalCount).toBe(6);
    expect(feed.isEndOfListVisible).not.toHaveBeenCalled();
  });

  it("로딩 요청이 실패하면 마지막 개수로 종료해야 함", async () => {
    const feed = createFeed([0, 4]);
    feed.requestMore
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error("feed detached"));

    const outcome = await new FeedCollector({}, createSleeper()).collect(feed);

    expect(outcome).toEqual({ finalCount: 4, attempts: 1, stallCount: 0, stopReason: "trigger_failed" });
  });

  it("개수 조회가 실패하면 종료해야 함", async () => {
    const feed = createFeed([]);
    feed.countItems.mockRejectedValueOnce(new Error("page closed"));

    const outcome = await new FeedCollector({}, createSleeper()).collect(feed);

    expect(outcome).toEqual({ finalCount: 0, attempts: 0, stallCount: 0, stopReason: "count_failed" });
    expect(feed.requestMore).not.toHaveBeenCalled();
  });

  it("목록 끝 확인 실패는 '안 보임'으로 처리해야 함", async () => {
    const feed = createFeed([0, 5, 5]);
    feed.isEndOfListVisible.mockRejectedValue(new Error("selector error"));

    const outcome = await new FeedCollector({ stallThreshold: 1 }, createSleeper()).collect(feed);

    expect(outcome.stopReason).toBe("stalled");
    expect(outcome.finalCount).toBe(5);
  });

  it("빈 feed는 정체로 종료해야 함 (개수 0)", async () => {
    const feed = createFeed([0, 0, 0, 0]);

    const outcome = await new FeedCollector({}, createSleeper()).collect(feed);

    expect(outcome).toEqual({ finalCount: 0, attempts: 3, stallCount: 3, stopReason: "stalled" });
  });
});
