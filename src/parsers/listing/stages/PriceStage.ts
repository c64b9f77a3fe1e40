/**
 * 가격 추출 단계 (2단계 매칭)
 *
 * Tier A: 통화 기호 + 숫자/천 단위 구분/범위/"+" (뒤에 붙은 글자까지 넓게 매칭)
 *   → 시작점 고정 clean 패턴으로 재검증
 *   → 넓은 매칭 전체와 같으면 그대로, 뒤에 글자가 남으면 clean 부분만 채택
 * Tier B: Tier A 실패 시 통화 기호 1~4개 ("$$")
 *
 * 버퍼에서는 항상 원래 매칭(Tier A 넓은 매칭 / Tier B) 구간을 제거한다.
 *
 * ⚠️ 뒤에 붙은 글자를 잡음으로 보는 것은 휴리스틱이다.
 * "€20–30French"(다음 필드가 붙은 경우)와 진짜 잘못된 가격을 구분하지 못한다.
 */

import { ExtractionStage, ExtractionState, withField, withNote } from "../ExtractionState";
import { collapseWhitespace } from "../TextNormalizer";

export const PRICE_BROAD_PATTERN = /[£$€₹¥฿]\s*\d[\d,.–+-]*\p{L}*/u;
export const PRICE_CLEAN_PATTERN = /^[£$€₹¥฿]\s*\d+(?:[.,]\d+)*(?:[–-]\d+(?:[.,]\d+)*)?\+?/u;
export const PRICE_SYMBOL_PATTERN = /[£$€₹¥฿]{1,4}/u;

export function extractPrice(state: ExtractionState): ExtractionState {
  const broad = PRICE_BROAD_PATTERN.exec(state.buffer);

  if (broad) {
    const clean = PRICE_CLEAN_PATTERN.exec(broad[0]);

    if (clean) {
      const remainder = broad[0].slice(clean[0].length);
      const exact = remainder.trim() === "";

      return withField(
        state,
        priceStage.name,
        "price",
        collapseWhitespace(clean[0]),
        { start: broad.index, text: broad[0] },
        exact
          ? { outcome: "matched", detail: "tier A" }
          : { outcome: "degraded", detail: `tier A, trailing text dropped: "${remainder}"` },
      );
    }
  }

  const symbols = PRICE_SYMBOL_PATTERN.exec(state.buffer);
  if (!symbols) {
    return withNote(state, priceStage.name, "not_matched");
  }

  return withField(
    state,
    priceStage.name,
    "price",
    symbols[0],
    { start: symbols.index, text: symbols[0] },
    { outcome: "matched", detail: "tier B" },
  );
}

export const priceStage: ExtractionStage = {
  name: "price",
  apply: extractPrice,
};
