/**
 * ExtractionPipeline Test
 *
 * 목적: 단계 순서, 단계 실패 격리, 소비 구간 커버리지 검증
 */

import { describe, it, expect } from "@jest/globals";
import {
  createExtractionPipeline,
  runExtractionPipeline,
} from "@/parsers/listing/ExtractionPipeline";
import { createInitialState, ExtractionStage } from "@/parsers/listing/ExtractionState";
import { ratingStage } from "@/parsers/listing/stages/RatingStage";
import { reviewsStage } from "@/parsers/listing/stages/ReviewsStage";

describe("ExtractionPipeline", () => {
  it("고정된 순서로 단계를 생성해야 함", () => {
    expect(createExtractionPipeline().map((stage) => stage.name)).toEqual([
      "rating",
      "reviews",
      "price",
      "phone",
      "cleanup:after-phone",
      "type",
      "cleanup:after-type",
      "address",
    ]);
  });

  it("모든 필드를 서로 겹치지 않게 추출해야 함", () => {
    const text = "4.2 · (87) · ££ · Indian · 12 High Street, Leeds · Open 24 hours · +44 20 7946 0958";
    const { state, failedStage } = runExtractionPipeline(
      createExtractionPipeline(),
      createInitialState(text),
    );

    expect(failedStage).toBeNull();
    expect(state.fields).toEqual({
      rating: "4.2",
      reviews: "(87)",
      price: "££",
      phone: "+44 20 7946 0958",
      type: "Indian",
      address: "12 High Street, Leeds",
    });
    expect(state.original).toBe(text);
  });

  it("단계 예외 시 멈추고 이미 확정된 필드는 유지해야 함", () => {
    const failing: ExtractionStage = {
      name: "broken",
      apply: () => {
        throw new Error("stage exploded");
      },
    };

    const result = runExtractionPipeline(
      [ratingStage, failing, reviewsStage],
      createInitialState("4.5 · (10)"),
    );

    expect(result.failedStage).toBe("broken");
    expect(result.state.fields).toEqual({ rating: "4.5" });
    expect(result.error).toBeInstanceOf(Error);
  });

  describe("소비 구간 커버리지 (순서 무관)", () => {
    const fragments = ["Pakistani", "(312)", "3.9", "17 Clifton Road, Karachi", "$15–25"];

    it.each([
      [["Pakistani", "(312)", "3.9", "17 Clifton Road, Karachi", "$15–25"]],
      [["17 Clifton Road, Karachi", "$15–25", "Pakistani", "3.9", "(312)"]],
    ])("모든 조각이 소비 구간에 포함되어야 함: %j", (ordered) => {
      const { state } = runExtractionPipeline(
        createExtractionPipeline(),
        createInitialState(ordered.join(" · ")),
      );

      const consumed = state.spans.map((span) => span.text);
      for (const fragment of fragments) {
        expect(consumed.some((text) => text.includes(fragment))).toBe(true);
      }
      expect(state.fields.address).toBe("17 Clifton Road, Karachi");
      expect(state.fields.type).toBe("Pakistani");
    });
  });
});
