/**
 * Rating / Reviews Stage Test
 *
 * 목적: 평점 "D.D", 괄호 리뷰 수 추출 및 구간 소비 검증
 */

import { describe, it, expect } from "@jest/globals";
import { createInitialState } from "@/parsers/listing/ExtractionState";
import { extractRating } from "@/parsers/listing/stages/RatingStage";
import { extractReviews } from "@/parsers/listing/stages/ReviewsStage";

describe("RatingStage", () => {
  it("첫 번째 D.D 값을 추출하고 버퍼에서 제거해야 함", () => {
    const state = extractRating(createInitialState("4.3 · (210) · Cafe"));

    expect(state.fields.rating).toBe("4.3");
    expect(state.buffer).toBe(" · (210) · Cafe");
    expect(state.spans).toEqual([{ field: "rating", text: "4.3" }]);
    expect(state.notes).toEqual([{ stage: "rating", outcome: "matched" }]);
  });

  it("바로 뒤의 stars 단어를 함께 소비해야 함", () => {
    const state = extractRating(createInitialState("4.5 stars · Italian"));

    expect(state.fields.rating).toBe("4.5");
    expect(state.buffer).toBe(" · Italian");
  });

  it("통화 금액이나 더 긴 숫자의 일부는 평점으로 보지 않아야 함", () => {
    const state = extractRating(createInitialState("$4.50 · 12.5 km"));

    expect(state.fields.rating).toBeUndefined();
    expect(state.buffer).toBe("$4.50 · 12.5 km");
    expect(state.notes).toEqual([{ stage: "rating", outcome: "not_matched" }]);
  });
});

describe("ReviewsStage", () => {
  it("천 단위 구분 리뷰 수를 괄호 포함 그대로 저장해야 함", () => {
    const state = extractReviews(createInitialState("Bar · (1,234) · Soho"));

    expect(state.fields.reviews).toBe("(1,234)");
    expect(state.buffer).toBe("Bar ·  · Soho");
  });

  it("구분 없는 정수도 추출해야 함", () => {
    expect(extractReviews(createInitialState("(87)")).fields.reviews).toBe("(87)");
  });

  it("전화번호 지역번호는 리뷰 수로 보지 않아야 함", () => {
    const state = extractReviews(createInitialState("+44 (20) 7946 0958"));

    expect(state.fields.reviews).toBeUndefined();
    expect(state.notes).toEqual([{ stage: "reviews", outcome: "not_matched" }]);
  });

  it("잘못된 천 단위 구분은 매칭하지 않아야 함", () => {
    expect(extractReviews(createInitialState("(12,34)")).fields.reviews).toBeUndefined();
  });
});
