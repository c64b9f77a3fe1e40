/**
 * 전화번호 추출 단계
 *
 * 작업 버퍼가 아닌 원본 info 텍스트에서 매칭한다.
 * 형식: "+" 국가번호, 선택적 (지역번호), 구분자, 3자리 이상 숫자 묶음 2개
 *
 * 버퍼 제거는 3단계로 강등:
 * 1. structured: 공백 차이를 허용하는 패턴으로 제거
 * 2. literal: 원문 그대로 부분 문자열 제거
 * 3. unchanged: 버퍼 유지 (앞 단계에서 일부가 이미 소비된 경우)
 */

import { ExtractionStage, ExtractionState, removeSpan, withNote } from "../ExtractionState";
import { collapseWhitespace, escapeRegExp } from "../TextNormalizer";

export const PHONE_PATTERN = /\+\d{1,4}[ -]?\(?\d{2,4}\)?[ -]?\d{3,}[\s-]?\d{3,}/;

export type PhoneRemovalTier = "structured" | "literal" | "unchanged";

export interface PhoneRemovalResult {
  buffer: string;
  tier: PhoneRemovalTier;
  /** structured 단계 실패 사유 */
  reason?: string;
}

/**
 * 버퍼에서 전화번호 텍스트 제거 (3단계)
 */
export function removePhoneText(buffer: string, phoneText: string): PhoneRemovalResult {
  let reason: string | undefined;

  try {
    const pattern = new RegExp(escapeRegExp(phoneText).replace(/ /g, "\\s*"));
    const match = pattern.exec(buffer);
    if (match) {
      return {
        buffer: removeSpan(buffer, match.index, match.index + match[0].length),
        tier: "structured",
      };
    }
    reason = "pattern not found";
  } catch (error) {
    reason = error instanceof Error ? error.message : String(error);
  }

  const index = buffer.indexOf(phoneText);
  if (index >= 0) {
    return {
      buffer: removeSpan(buffer, index, index + phoneText.length),
      tier: "literal",
      reason,
    };
  }

  return { buffer, tier: "unchanged", reason };
}

export function extractPhone(state: ExtractionState): ExtractionState {
  const match = PHONE_PATTERN.exec(state.original);
  if (!match) {
    return withNote(state, phoneStage.name, "not_matched");
  }

  const phone = collapseWhitespace(match[0]);
  const removal = removePhoneText(state.buffer, match[0]);

  return {
    ...state,
    buffer: removal.buffer,
    fields: { ...state.fields, phone },
    spans: [...state.spans, { field: "phone", text: match[0] }],
    notes: [
      ...state.notes,
      {
        stage: phoneStage.name,
        outcome: removal.tier === "structured" ? "matched" : "degraded",
        detail: removal.reason ? `removal ${removal.tier} (${removal.reason})` : `removal ${removal.tier}`,
      },
    ],
  };
}

export const phoneStage: ExtractionStage = {
  name: "phone",
  apply: extractPhone,
};
