/**
 * 평점 추출 단계
 *
 * 첫 번째 독립된 "D.D" 패턴.
 * 더 긴 숫자나 통화 금액의 일부("$4.50", "12.5")는 제외하고,
 * 바로 뒤의 "star(s)" 단어는 함께 소비한다.
 */

import { ExtractionStage, ExtractionState, withField, withNote } from "../ExtractionState";

export const RATING_PATTERN = /(?<![\d.£$€₹¥฿])(\d\.\d)(?!\d)(?:\s*stars?\b)?/i;

export function extractRating(state: ExtractionState): ExtractionState {
  const match = RATING_PATTERN.exec(state.buffer);
  if (!match) {
    return withNote(state, ratingStage.name, "not_matched");
  }

  return withField(state, ratingStage.name, "rating", match[1], {
    start: match.index,
    text: match[0],
  });
}

export const ratingStage: ExtractionStage = {
  name: "rating",
  apply: extractRating,
};
