/**
 * 리뷰 수 추출 단계
 *
 * 괄호로 감싼 정수 (천 단위 구분 선택): "(1,234)", "(87)"
 * 괄호 포함 그대로 저장한다.
 * 전화번호 지역번호 "+44 (20) ..."는 리뷰 수로 보지 않는다.
 */

import { ExtractionStage, ExtractionState, withField, withNote } from "../ExtractionState";

export const REVIEWS_PATTERN = /(?<!\+\d{1,4}[ -]?)\((?:\d{1,3}(?:[,.]\d{3})+|\d+)\)/;

export function extractReviews(state: ExtractionState): ExtractionState {
  const match = REVIEWS_PATTERN.exec(state.buffer);
  if (!match) {
    return withNote(state, reviewsStage.name, "not_matched");
  }

  return withField(state, reviewsStage.name, "reviews", match[0], {
    start: match.index,
    text: match[0],
  });
}

export const reviewsStage: ExtractionStage = {
  name: "reviews",
  apply: extractReviews,
};
